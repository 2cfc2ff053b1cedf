/**
 * HTTP Layer
 *
 * Request/response abstractions and the node:http binding.
 */

export { Server, parseAddress, toRequest, writeResponse, type ServerOptions, type ListenAddress } from './server.ts';
export { RequestContext, type RequestContextOptions } from './context.ts';
export { ServerRequest, parseCookieHeader } from './request.ts';
export { ResponseWriter, serializeCookie } from './response.ts';
export type { Handler, Middleware, MuxHandler, HttpMethod, Cookie } from './types.ts';
