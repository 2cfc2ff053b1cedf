/**
 * Request Context
 *
 * Per-request object handed to middleware and handlers. Owns the request
 * and the response under construction for the lifetime of one request and
 * carries request-scoped values plus cookie-backed session helpers.
 */

import { randomUUID } from 'node:crypto';
import { ServerRequest } from './request.ts';
import { ResponseWriter } from './response.ts';
import type { Cookie } from './types.ts';
import { ContextValueTypeError, SessionNotFoundError } from '../errors.ts';
import type { Logger } from '../telemetry/logger.ts';

export interface RequestContextOptions {
  logger: Logger;
  /** Session cookie lifetime in seconds */
  sessionLifetime: number;
}

export class RequestContext {
  readonly req: ServerRequest;
  readonly res: ResponseWriter;
  readonly logger: Logger;
  private readonly values = new Map<string, unknown>();
  private readonly sessionLifetime: number;

  constructor(request: Request, options: RequestContextOptions) {
    this.req = new ServerRequest(request);
    this.res = new ResponseWriter();
    this.logger = options.logger;
    this.sessionLifetime = options.sessionLifetime;
  }

  /**
   * Append text to the response body
   */
  write(text: string): void {
    this.res.write(text);
  }

  /**
   * Write `value` as a compact JSON body.
   *
   * A value that cannot be serialized (cycles, BigInt) turns the response
   * into a 500 with a fixed error body; nothing partial is written.
   */
  writeJSON(value: unknown): void {
    let body: string;
    try {
      body = JSON.stringify(value) ?? 'null';
    } catch (error) {
      this.logger.error('JSON serialization failed', error, { path: this.req.path });
      this.res
        .status(500)
        .type('application/json')
        .discardBody()
        .write('{"error":"JSON serialization failed"}');
      return;
    }

    this.res.type('application/json').write(body);
  }

  /**
   * Store a value for the rest of this request
   */
  setContextValue(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  /**
   * Read a request-scoped value; `undefined` when never set
   */
  getContextValue(key: string): unknown {
    return this.values.get(key);
  }

  /**
   * Read a request-scoped value, checked by `guard`
   */
  requireContextValue<T>(key: string, guard: (value: unknown) => value is T): T {
    if (!this.values.has(key)) {
      throw new ContextValueTypeError(key, 'missing');
    }
    const value = this.values.get(key);
    if (!guard(value)) {
      throw new ContextValueTypeError(key, 'mismatch');
    }
    return value;
  }

  /**
   * Start a session: set cookie `name` to a fresh random token.
   * Returns the token.
   */
  newSession(name: string): string {
    const token = randomUUID();

    this.res.cookie({
      name,
      value: token,
      path: '/',
      expires: new Date(Date.now() + this.sessionLifetime * 1000),
    });

    return token;
  }

  /**
   * Read the session cookie `name` sent with the request
   */
  getSession(name: string): Cookie {
    const value = this.req.cookie(name);
    if (value === undefined) {
      throw new SessionNotFoundError(name);
    }
    return { name, value };
  }

  /**
   * Ask the client to drop the session cookie `name`
   */
  deleteSession(name: string): void {
    this.res.cookie({
      name,
      value: 'deleted',
      path: '/',
      expires: new Date(0),
      maxAge: 0,
    });
  }
}
