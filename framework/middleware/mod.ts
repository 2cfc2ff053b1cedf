/**
 * Middleware Layer
 *
 * Ordered chains run before handlers, plus the stock middleware and
 * handler decorators.
 */

export { MiddlewareChain } from './chain.ts';
export { requestLogging, type LoggingOptions } from './logging.ts';
export { gzip, type CompressionOptions } from './compression.ts';
