/**
 * switchyard
 *
 * Request dispatch for node:http: grouped routes, ordered middleware
 * chains, request-scoped values and cookie sessions.
 *
 * @module switchyard
 */

// Routing
export {
  Group,
  createRouter,
  ServeMux,
  cleanPath,
  notFound,
  redirect,
  type RouterOptions,
  type RouteInfo,
} from './router/mod.ts';

// HTTP
export {
  Server,
  RequestContext,
  ServerRequest,
  ResponseWriter,
  parseAddress,
  type Handler,
  type Middleware,
  type MuxHandler,
  type HttpMethod,
  type Cookie,
  type ServerOptions,
} from './http/mod.ts';

// Middleware
export {
  MiddlewareChain,
  requestLogging,
  gzip,
  type LoggingOptions,
  type CompressionOptions,
} from './middleware/mod.ts';

// Static files
export { fileServer, serveFile, stripPrefix } from './static/mod.ts';

// Configuration
export { Config, loadConfig, getConfig, type ConfigInput, type ResolvedConfig } from './config/mod.ts';

// Telemetry
export { Logger, getLogger, setLogger, type LogLevel, type LogEntry, type LoggerOptions } from './telemetry/mod.ts';

// Errors
export {
  RouteConfigError,
  SessionNotFoundError,
  ContextValueTypeError,
  ConfigError,
  AddressError,
} from './errors.ts';
