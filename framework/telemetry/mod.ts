/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry request spans.
 */

export {
  Logger,
  getLogger,
  formatPretty,
  setLogger,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  setOTELEnabled,
  getOTELTracer,
  withSpan,
  recordException,
  setResponseStatus,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
