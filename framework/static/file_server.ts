/**
 * Static File Serving
 *
 * Plain file handlers for the multiplexer: serve one file, serve a
 * directory tree, strip a URL prefix before handing on.
 */

import { readFile, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, extname, join, relative, resolve, isAbsolute } from 'node:path';
import type { MuxHandler } from '../http/types.ts';
import { cleanPath, notFound, redirect } from '../router/mux.ts';

/**
 * Serve the files under `root`, addressed by request path.
 * Directories serve their `index.html`; there are no listings.
 */
export function fileServer(root: string): MuxHandler {
  const rootDir = resolve(root);

  return async (request) => {
    const url = new URL(request.url);
    const requestPath = decodePath(url.pathname);
    if (requestPath === null) {
      return notFound();
    }

    const cleaned = cleanPath(requestPath);
    const filePath = join(rootDir, cleaned);
    if (!isInside(rootDir, filePath)) {
      return notFound();
    }

    const info = await statOrNull(filePath);
    if (!info) {
      return notFound();
    }

    if (info.isDirectory()) {
      if (!url.pathname.endsWith('/')) {
        return redirect('./' + basename(cleaned) + '/' + url.search);
      }
      return await serveFile(request, join(filePath, 'index.html'));
    }

    return await respondWithFile(request, filePath, info);
  };
}

/**
 * Forward requests whose path starts with `prefix`, with the prefix
 * removed; anything else is not found
 */
export function stripPrefix(prefix: string, handler: MuxHandler): MuxHandler {
  return async (request) => {
    const url = new URL(request.url);
    if (!url.pathname.startsWith(prefix)) {
      return notFound();
    }

    url.pathname = url.pathname.slice(prefix.length);
    return await handler(
      new Request(url.toString(), {
        method: request.method,
        headers: request.headers,
        signal: request.signal,
      })
    );
  };
}

/**
 * Serve the file at `filePath`
 */
export async function serveFile(request: Request, filePath: string): Promise<Response> {
  const info = await statOrNull(filePath);
  if (!info || info.isDirectory()) {
    return notFound();
  }
  return await respondWithFile(request, filePath, info);
}

async function respondWithFile(request: Request, filePath: string, info: Stats): Promise<Response> {
  const lastModified = new Date(Math.floor(info.mtimeMs / 1000) * 1000);
  const headers = new Headers({
    'Content-Type': contentTypeFor(filePath),
    'Last-Modified': lastModified.toUTCString(),
  });

  if (notModifiedSince(request, lastModified)) {
    return new Response(null, { status: 304, headers });
  }

  headers.set('Content-Length', info.size.toString());
  if (request.method === 'HEAD') {
    return new Response(null, { status: 200, headers });
  }

  const body = new Uint8Array(await readFile(filePath));
  return new Response(body, { status: 200, headers });
}

function notModifiedSince(request: Request, lastModified: Date): boolean {
  const header = request.headers.get('If-Modified-Since');
  if (!header || (request.method !== 'GET' && request.method !== 'HEAD')) {
    return false;
  }
  const since = Date.parse(header);
  return !Number.isNaN(since) && lastModified.getTime() <= since;
}

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

function decodePath(pathname: string): string | null {
  try {
    return decodeURIComponent(pathname);
  } catch {
    // Malformed percent-encoding names no file
    return null;
  }
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Content type by file extension
 */
export function contentTypeFor(filePath: string): string {
  const ext = extname(filePath).slice(1).toLowerCase();
  return MIME_TYPES[ext] ?? 'application/octet-stream';
}

/**
 * Common MIME types
 */
const MIME_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  htm: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  js: 'application/javascript; charset=utf-8',
  mjs: 'application/javascript; charset=utf-8',
  json: 'application/json; charset=utf-8',
  xml: 'application/xml; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  ico: 'image/x-icon',
  woff: 'font/woff',
  woff2: 'font/woff2',
  ttf: 'font/ttf',
  otf: 'font/otf',
  pdf: 'application/pdf',
  zip: 'application/zip',
};
