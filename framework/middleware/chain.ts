/**
 * Middleware Chain
 *
 * An ordered list of middleware run before a handler. Registration order is
 * invocation order: no reordering, no deduplication, no priorities. Every
 * middleware runs; there is no way for one to stop the chain short of
 * throwing.
 */

import type { RequestContext } from '../http/context.ts';
import type { Middleware } from '../http/types.ts';
import { RouteConfigError } from '../errors.ts';

export class MiddlewareChain {
  private middleware: Middleware[] = [];
  private frozen = false;

  constructor(middleware: Middleware[] = []) {
    this.middleware = [...middleware];
  }

  /**
   * Append middleware, in call order
   */
  use(...middleware: Middleware[]): this {
    if (this.frozen) {
      throw new RouteConfigError('Cannot add middleware after the server started listening');
    }
    this.middleware.push(...middleware);
    return this;
  }

  /**
   * Reject (or again accept) additions
   */
  setFrozen(frozen: boolean): void {
    this.frozen = frozen;
  }

  /**
   * Get the number of middleware in the chain
   */
  get length(): number {
    return this.middleware.length;
  }

  /**
   * Middleware in invocation order
   */
  toArray(): Middleware[] {
    return [...this.middleware];
  }

  /**
   * Run every middleware in order, each awaited before the next starts
   */
  async run(ctx: RequestContext): Promise<void> {
    for (const middleware of this.middleware) {
      await middleware(ctx);
    }
  }
}
