/**
 * Response Writer
 *
 * Collects status, headers, cookies and body bytes while middleware and the
 * handler run, then builds the final Response once the handler returns.
 */

import type { Cookie } from './types.ts';

const encoder = new TextEncoder();

/** Statuses that must not carry a body */
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * Write-side view of the response being produced
 */
export class ResponseWriter {
  private _status: number = 200;
  private _headers: Headers = new Headers();
  private _chunks: Uint8Array[] = [];
  private _cookies: string[] = [];

  /**
   * Current status code
   */
  get statusCode(): number {
    return this._status;
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    this._headers.set('Content-Type', contentType);
    return this;
  }

  /**
   * Append bytes to the body. Strings are written as UTF-8.
   */
  write(chunk: string | Uint8Array): this {
    this._chunks.push(typeof chunk === 'string' ? encoder.encode(chunk) : chunk);
    return this;
  }

  /**
   * Drop everything written to the body so far
   */
  discardBody(): this {
    this._chunks = [];
    return this;
  }

  /**
   * Take over status, headers and body of a finished Response
   */
  async send(response: Response): Promise<this> {
    this._status = response.status;
    response.headers.forEach((value, key) => {
      if (key.toLowerCase() !== 'set-cookie') {
        this._headers.set(key, value);
      }
    });
    this._cookies.push(...response.headers.getSetCookie());
    this._chunks = response.body ? [new Uint8Array(await response.arrayBuffer())] : [];
    return this;
  }

  /**
   * Queue a Set-Cookie header
   */
  cookie(cookie: Cookie): this {
    this._cookies.push(serializeCookie(cookie));
    return this;
  }

  /**
   * Build the final Response object
   */
  build(): Response {
    const headers = new Headers(this._headers);
    for (const cookie of this._cookies) {
      headers.append('Set-Cookie', cookie);
    }

    const body = NULL_BODY_STATUSES.has(this._status) || this._chunks.length === 0
      ? null
      : concat(this._chunks);

    return new Response(body, { status: this._status, headers });
  }
}

/**
 * Serialize a cookie into a Set-Cookie header value
 */
export function serializeCookie(cookie: Cookie): string {
  const parts = [`${encodeURIComponent(cookie.name)}=${encodeURIComponent(cookie.value)}`];

  if (cookie.path) {
    parts.push(`Path=${cookie.path}`);
  }
  if (cookie.domain) {
    parts.push(`Domain=${cookie.domain}`);
  }
  if (cookie.expires) {
    parts.push(`Expires=${cookie.expires.toUTCString()}`);
  }
  if (cookie.maxAge !== undefined) {
    parts.push(`Max-Age=${cookie.maxAge}`);
  }
  if (cookie.httpOnly) {
    parts.push('HttpOnly');
  }
  if (cookie.secure) {
    parts.push('Secure');
  }
  if (cookie.sameSite) {
    parts.push(`SameSite=${cookie.sameSite}`);
  }

  return parts.join('; ');
}

/**
 * Combine chunks into one buffer
 */
export function concat(chunks: Uint8Array[]): Uint8Array {
  const totalLength = chunks.reduce((acc, chunk) => acc + chunk.byteLength, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}
