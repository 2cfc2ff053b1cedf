/**
 * Route Group
 *
 * A path-prefix scope with its own middleware chain. The root group has an
 * empty prefix and owns the multiplexer and the global chain; every group
 * created from it shares both.
 *
 * Grouping is flat: a child's prefix is the pattern it was created with,
 * not joined to its parent's, and a request runs the global chain, then the
 * chain of the group its route was registered on, then the handler. Chains
 * of enclosing groups do not run.
 */

import { Config, getConfig } from '../config/config.ts';
import { RouteConfigError } from '../errors.ts';
import { Server, parseAddress } from '../http/server.ts';
import type { Handler, HttpMethod, Middleware } from '../http/types.ts';
import { gzip } from '../middleware/compression.ts';
import { MiddlewareChain } from '../middleware/chain.ts';
import { fileServer, serveFile, stripPrefix } from '../static/file_server.ts';
import { Logger, getLogger } from '../telemetry/logger.ts';
import { MethodTable, adaptHandler } from './adapter.ts';
import { ServeMux } from './mux.ts';

export interface RouterOptions {
  logger?: Logger;
  config?: Config;
}

export interface RouteInfo {
  /** `*` for file routes, which answer every method */
  method: HttpMethod | '*';
  path: string;
}

/** State shared by every group of one router */
interface RouterCore {
  mux: ServeMux;
  globalChain: MiddlewareChain;
  groupChains: MiddlewareChain[];
  methodTables: Map<string, MethodTable>;
  routes: RouteInfo[];
  logger: Logger;
  config: Config;
  server: Server | null;
}

/**
 * Route group for organizing related routes
 */
export class Group {
  readonly prefix: string;
  private readonly core: RouterCore;
  private readonly chain: MiddlewareChain;

  private constructor(core: RouterCore, prefix: string, chain: MiddlewareChain) {
    this.core = core;
    this.prefix = prefix;
    this.chain = chain;
  }

  /**
   * Create a root group with a fresh multiplexer and an empty global chain
   */
  static root(options: RouterOptions = {}): Group {
    const config = options.config ?? getConfig();

    const core: RouterCore = {
      mux: new ServeMux(),
      globalChain: new MiddlewareChain(),
      groupChains: [],
      methodTables: new Map(),
      routes: [],
      logger: options.logger ?? getLogger(),
      config,
      server: null,
    };

    return new Group(core, '', core.globalChain);
  }

  /**
   * Whether this is the root group
   */
  get isRoot(): boolean {
    return this.chain === this.core.globalChain;
  }

  get logger(): Logger {
    return this.core.logger;
  }

  /**
   * Create a group with prefix `pattern`, seeded with `middleware`
   */
  group(pattern: string, ...middleware: Middleware[]): Group {
    if (pattern === '' || !pattern.startsWith('/')) {
      throw new RouteConfigError(
        `Invalid group pattern "${pattern}": it can't be empty and has to start with /`
      );
    }
    this.assertNotListening();

    const chain = new MiddlewareChain(middleware);
    this.core.groupChains.push(chain);
    return new Group(this.core, pattern, chain);
  }

  /**
   * Add middleware. On the root this is the global chain, run for every
   * route; on any other group it is the group's own chain.
   */
  use(...middleware: Middleware[]): this {
    this.chain.use(...middleware);
    return this;
  }

  get(pattern: string, handler: Handler): this {
    return this.route('GET', pattern, handler);
  }

  post(pattern: string, handler: Handler): this {
    return this.route('POST', pattern, handler);
  }

  put(pattern: string, handler: Handler): this {
    return this.route('PUT', pattern, handler);
  }

  patch(pattern: string, handler: Handler): this {
    return this.route('PATCH', pattern, handler);
  }

  delete(pattern: string, handler: Handler): this {
    return this.route('DELETE', pattern, handler);
  }

  head(pattern: string, handler: Handler): this {
    return this.route('HEAD', pattern, handler);
  }

  options(pattern: string, handler: Handler): this {
    return this.route('OPTIONS', pattern, handler);
  }

  /**
   * Register `handler` for `method` on `prefix + pattern`
   */
  route(method: HttpMethod, pattern: string, handler: Handler): this {
    this.assertNotListening();

    const path = this.prefix + pattern;
    let table = this.core.methodTables.get(path);

    if (table?.has(method)) {
      throw new RouteConfigError(`Multiple registrations for ${method} ${path}`);
    }
    if (!table) {
      table = new MethodTable();
      this.core.mux.handle(path, table.dispatch);
      this.core.methodTables.set(path, table);
    }

    table.add(
      method,
      adaptHandler(handler, method, path, {
        globalChain: this.core.globalChain,
        groupChain: this.isRoot ? undefined : this.chain,
        logger: this.core.logger,
        sessionLifetime: this.core.config.get('session').lifetime,
        tracing: this.core.config.get('telemetry').otel,
      })
    );
    this.core.routes.push({ method, path });
    return this;
  }

  /**
   * Serve the files under `dirPath` at `urlPath`, gzip-compressed for
   * clients that accept it. `prefix` is stripped from the request path
   * before it is resolved under `dirPath`.
   */
  serveFiles(urlPath: string, dirPath: string, prefix: string): this {
    this.assertNotListening();

    const handler = gzip(stripPrefix(prefix, fileServer(dirPath)), {
      maxAge: this.core.config.get('static').maxAge,
    });
    this.core.mux.handle(urlPath, handler);
    this.core.routes.push({ method: '*', path: urlPath });
    return this;
  }

  /**
   * Serve the file at `filePath` for GET /favicon.ico
   */
  serveFavicon(filePath: string): this {
    return this.get('/favicon.ico', async (ctx) => {
      await ctx.res.send(await serveFile(ctx.req.raw, filePath));
    });
  }

  /**
   * Dispatch one request through the shared multiplexer
   */
  handle(request: Request): Promise<Response> {
    return this.core.mux.dispatch(request);
  }

  /**
   * Registered routes, in registration order
   */
  routes(): RouteInfo[] {
    return [...this.core.routes];
  }

  /**
   * Start serving on `address` (`host:port`, host optional). The route table
   * is frozen while the server runs. Resolves once the server is closed;
   * rejects on a bad address or a failed bind, leaving the router as it was.
   */
  async listen(address: string = this.core.config.get('address')): Promise<void> {
    this.assertNotListening();
    parseAddress(address);

    this.setFrozen(true);
    const server = new Server((request) => this.handle(request), { logger: this.core.logger });
    this.core.server = server;

    try {
      await server.listen(address);
    } catch (error) {
      this.core.server = null;
      this.setFrozen(false);
      throw error;
    }
  }

  /**
   * Stop the server started by `listen`
   */
  async close(): Promise<void> {
    await this.core.server?.close();
  }

  /**
   * The server started by `listen`, if any
   */
  get server(): Server | null {
    return this.core.server;
  }

  private setFrozen(frozen: boolean): void {
    this.core.mux.setFrozen(frozen);
    this.core.globalChain.setFrozen(frozen);
    for (const chain of this.core.groupChains) {
      chain.setFrozen(frozen);
    }
  }

  private assertNotListening(): void {
    if (this.core.server) {
      throw new RouteConfigError('Routes cannot change after the server started listening');
    }
  }
}

/**
 * Create a root group
 */
export function createRouter(options?: RouterOptions): Group {
  return Group.root(options);
}
