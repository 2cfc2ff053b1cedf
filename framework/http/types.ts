/**
 * HTTP Type Definitions
 */

import type { RequestContext } from './context.ts';

/**
 * Handler signature the multiplexer dispatches to
 */
export type MuxHandler = (request: Request) => Promise<Response> | Response;

/**
 * Context-aware route handler
 */
export type Handler = (ctx: RequestContext) => Promise<void> | void;

/**
 * Middleware function signature.
 *
 * Middleware runs before the handler and shares its context. It has no
 * `next` and no return value: every middleware of the matched scope runs,
 * then the handler runs.
 */
export type Middleware = (ctx: RequestContext) => Promise<void> | void;

/**
 * HTTP methods a route can be registered for
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/**
 * A cookie as set on a response or read from a request
 */
export interface Cookie {
  name: string;
  value: string;
  path?: string;
  domain?: string;
  expires?: Date;
  /** Seconds; `0` asks the client to drop the cookie at once */
  maxAge?: number;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}
