/**
 * Compression Decorator
 *
 * Wraps a file-serving handler: every response gets a cache lifetime, and
 * responses to clients that accept gzip are compressed.
 */

import { promisify } from 'node:util';
import { gzip as gzipCallback } from 'node:zlib';
import type { MuxHandler } from '../http/types.ts';

const gzipAsync = promisify(gzipCallback);

export interface CompressionOptions {
  /** Cache lifetime in seconds */
  maxAge?: number;
}

const DEFAULT_OPTIONS: Required<CompressionOptions> = {
  maxAge: 86400, // 1 day
};

/**
 * Decorate `handler` with caching headers and gzip compression
 */
export function gzip(handler: MuxHandler, options: CompressionOptions = {}): MuxHandler {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return async (request) => {
    const response = await handler(request);

    const headers = new Headers(response.headers);
    headers.set('Cache-Control', `max-age:${opts.maxAge}`);

    const acceptEncoding = request.headers.get('Accept-Encoding') ?? '';
    if (!acceptEncoding.includes('gzip') || !isCompressible(request, response)) {
      return rebuild(response, headers, response.body);
    }

    // Read the whole body, then finish the gzip stream once
    const body = new Uint8Array(await response.arrayBuffer());
    const compressed = new Uint8Array(await gzipAsync(body));

    headers.set('Content-Encoding', 'gzip');
    headers.set('Content-Length', compressed.byteLength.toString());
    headers.append('Vary', 'Accept-Encoding');

    return rebuild(response, headers, compressed);
  };
}

/**
 * Responses without a body, or already encoded, pass through
 */
function isCompressible(request: Request, response: Response): boolean {
  if (request.method === 'HEAD' || response.body === null) {
    return false;
  }
  if (response.status === 204 || response.status === 304) {
    return false;
  }
  return !response.headers.has('Content-Encoding');
}

function rebuild(
  response: Response,
  headers: Headers,
  body: ReadableStream<Uint8Array> | Uint8Array | null
): Response {
  return new Response(body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
