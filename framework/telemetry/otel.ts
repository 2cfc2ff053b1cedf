/**
 * OpenTelemetry Integration
 *
 * Request spans for routed traffic. Spans go to whatever tracer provider the
 * host process registered with `@opentelemetry/api`; with none registered, or
 * with tracing switched off, the API's no-op tracer is used.
 *
 * @module
 */

import {
  trace,
  INVALID_SPAN_CONTEXT,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';

let enabled = process.env.OTEL_ENABLED === 'true';

/**
 * Check if tracing is switched on
 */
export function isOTELEnabled(): boolean {
  return enabled;
}

/**
 * Process-wide default for `withSpan` callers that pass no `enabled`
 */
export function setOTELEnabled(value: boolean): void {
  enabled = value;
}

/** Cached tracer instance */
let _tracer: Tracer | undefined;

/**
 * Get the OpenTelemetry tracer for the framework
 */
export function getOTELTracer(name = 'switchyard', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
  /** Overrides the process-wide switch */
  enabled?: boolean;
}

/**
 * Create a new span and run a function within its context.
 * The span is ended when the function settles; a rejection is recorded on
 * the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!(options.enabled ?? isOTELEnabled())) {
    return fn(trace.wrapSpanContext(INVALID_SPAN_CONTEXT));
  }

  return getOTELTracer().startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    async (span) => {
      try {
        return await fn(span);
      } catch (error) {
        recordException(span, error);
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Record an exception on a span and set error status
 */
export function recordException(span: Span, error: unknown): void {
  const exception = error instanceof Error ? error : new Error(String(error));
  span.recordException(exception);
  span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
}

/**
 * Annotate a server span with the response status
 */
export function setResponseStatus(span: Span, status: number): void {
  span.setAttribute('http.response.status_code', status);
  span.setStatus({ code: status >= 500 ? SpanStatusCode.ERROR : SpanStatusCode.OK });
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
