/**
 * Logging Middleware
 *
 * Request logging for monitoring and debugging.
 */

import type { Middleware } from '../http/types.ts';
import type { Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  logHeaders?: boolean;
  /** Path prefixes that are not logged */
  excludePaths?: string[];
}

const DEFAULT_OPTIONS: Required<LoggingOptions> = {
  logHeaders: false,
  excludePaths: ['/favicon.ico'],
};

/**
 * Log every request the middleware runs for. Without a logger the
 * context's logger is used.
 */
export function requestLogging(logger?: Logger, options: LoggingOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return (ctx) => {
    const { req } = ctx;
    if (opts.excludePaths.some((path) => req.path.startsWith(path))) {
      return;
    }

    const context: Record<string, unknown> = {
      method: req.method,
      path: req.path,
      ip: req.ip,
    };
    if (opts.logHeaders) {
      context.headers = Object.fromEntries(req.headers.entries());
    }

    (logger ?? ctx.logger).info(`→ ${req.method} ${req.path}`, context);
  };
}
