/**
 * Handler Adapter
 *
 * Turns a context-aware handler into the Request → Response function the
 * multiplexer dispatches to, gated on one HTTP method and bound to the
 * middleware chains of the group it was registered on.
 */

import { RequestContext } from '../http/context.ts';
import type { Handler, HttpMethod, MuxHandler } from '../http/types.ts';
import type { MiddlewareChain } from '../middleware/chain.ts';
import type { Logger } from '../telemetry/logger.ts';
import { SpanKind, recordException, setResponseStatus, withSpan } from '../telemetry/otel.ts';
import { notFound } from './mux.ts';

export interface AdapterScope {
  /** Runs first, for every route */
  globalChain: MiddlewareChain;
  /** The registering group's own chain; absent for routes on the root */
  groupChain?: MiddlewareChain;
  logger: Logger;
  /** Session cookie lifetime in seconds */
  sessionLifetime: number;
  /** Wrap each request in a SERVER span */
  tracing: boolean;
}

/**
 * Wrap `handler` so it only answers `method`. Other methods get the
 * multiplexer's 404.
 */
export function adaptHandler(
  handler: Handler,
  method: HttpMethod,
  route: string,
  scope: AdapterScope
): MuxHandler {
  return async (request: Request): Promise<Response> => {
    if (request.method !== method) {
      return notFound();
    }

    const path = new URL(request.url).pathname;

    return await withSpan(
      `${method} ${route}`,
      async (span) => {
        const ctx = new RequestContext(request, {
          logger: scope.logger,
          sessionLifetime: scope.sessionLifetime,
        });

        try {
          await scope.globalChain.run(ctx);
          await scope.groupChain?.run(ctx);
          await handler(ctx);
        } catch (error) {
          scope.logger.error('Request error', error, { method, path, route });
          recordException(span, error);
          setResponseStatus(span, 500);
          return internalServerError();
        }

        const response = ctx.res.build();
        setResponseStatus(span, response.status);
        return response;
      },
      {
        kind: SpanKind.SERVER,
        enabled: scope.tracing,
        attributes: {
          'http.request.method': method,
          'http.route': route,
          'url.path': path,
        },
      }
    );
  };
}

/**
 * Routes several methods registered on one path through a single
 * multiplexer entry
 */
export class MethodTable {
  private handlers = new Map<string, MuxHandler>();

  add(method: HttpMethod, handler: MuxHandler): void {
    this.handlers.set(method, handler);
  }

  has(method: HttpMethod): boolean {
    return this.handlers.has(method);
  }

  readonly dispatch: MuxHandler = (request) => {
    const handler = this.handlers.get(request.method);
    return handler ? handler(request) : notFound();
  };
}

function internalServerError(): Response {
  return new Response('Internal Server Error', {
    status: 500,
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  });
}
