/**
 * Request Multiplexer
 *
 * Maps URL paths to handlers. A pattern not ending in a slash names one
 * exact path (`/favicon.ico`); a pattern ending in a slash names a subtree
 * (`/static/`), matched by prefix. Exact patterns win; among subtrees the
 * longest wins, so `/` catches everything nothing else claimed.
 */

import type { MuxHandler } from '../http/types.ts';
import { RouteConfigError } from '../errors.ts';

export interface MuxEntry {
  pattern: string;
  handler: MuxHandler;
}

/**
 * Path-prefix request multiplexer
 */
export class ServeMux {
  private entries = new Map<string, MuxEntry>();
  /** Subtree patterns, longest first */
  private subtrees: MuxEntry[] = [];
  private frozen = false;

  /**
   * Register a handler for a pattern. Each pattern registers once.
   */
  handle(pattern: string, handler: MuxHandler): void {
    if (this.frozen) {
      throw new RouteConfigError(`Cannot register ${pattern} after the server started listening`);
    }
    if (!pattern.startsWith('/')) {
      throw new RouteConfigError(`Invalid pattern "${pattern}": must start with /`);
    }
    if (this.entries.has(pattern)) {
      throw new RouteConfigError(`Multiple registrations for ${pattern}`);
    }

    const entry: MuxEntry = { pattern, handler };
    this.entries.set(pattern, entry);

    if (pattern.endsWith('/')) {
      this.subtrees.push(entry);
      this.subtrees.sort((a, b) => b.pattern.length - a.pattern.length);
    }
  }

  /**
   * Check whether a pattern is registered
   */
  has(pattern: string): boolean {
    return this.entries.has(pattern);
  }

  /**
   * Registered patterns, in registration order
   */
  patterns(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Reject (or again accept) registrations
   */
  setFrozen(frozen: boolean): void {
    this.frozen = frozen;
  }

  /**
   * Find the entry serving a (clean) path
   */
  match(path: string): MuxEntry | null {
    const exact = this.entries.get(path);
    if (exact) {
      return exact;
    }
    return this.subtrees.find((entry) => path.startsWith(entry.pattern)) ?? null;
  }

  /**
   * Dispatch a request to the matching handler
   */
  async dispatch(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const path = cleanPath(url.pathname);

    if (this.shouldRedirectToSlash(path)) {
      return redirect(path + '/' + url.search);
    }
    if (path !== url.pathname) {
      return redirect(path + url.search);
    }

    const entry = this.match(path);
    if (!entry) {
      return notFound();
    }
    return await entry.handler(request);
  }

  /**
   * `/tree` with only `/tree/` registered is sent to `/tree/`
   */
  private shouldRedirectToSlash(path: string): boolean {
    if (this.entries.has(path) || path.endsWith('/')) {
      return false;
    }
    return this.entries.has(path + '/');
  }
}

/**
 * The multiplexer's not-found reply
 */
export function notFound(): Response {
  return new Response('404 page not found\n', {
    status: 404,
    headers: {
      'Content-Type': 'text/plain; charset=utf-8',
      'X-Content-Type-Options': 'nosniff',
    },
  });
}

/**
 * Permanent redirect to a path on the same host
 */
export function redirect(location: string, status = 301): Response {
  return new Response(null, { status, headers: { Location: location } });
}

/**
 * Canonical form of a URL path: leading slash, no empty, `.` or `..`
 * segments; a trailing slash survives unless the path reduces to `/`.
 */
export function cleanPath(path: string): string {
  if (path === '') {
    return '/';
  }

  const rooted = path.startsWith('/') ? path : '/' + path;
  const segments: string[] = [];

  for (const segment of rooted.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      segments.pop();
    } else {
      segments.push(segment);
    }
  }

  const cleaned = '/' + segments.join('/');
  const trailing = rooted.endsWith('/') && cleaned !== '/';
  return trailing ? cleaned + '/' : cleaned;
}
