/**
 * HTTP Server
 *
 * Binds a multiplexer handler to node:http. Incoming messages become Fetch
 * Requests; the Responses handlers return are written back out.
 */

import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
  type Server as HttpServer,
} from 'node:http';
import type { AddressInfo } from 'node:net';
import { buffer } from 'node:stream/consumers';
import { AddressError } from '../errors.ts';
import { Logger, getLogger } from '../telemetry/logger.ts';
import type { MuxHandler } from './types.ts';

export interface ServerOptions {
  logger?: Logger;
}

export interface ListenAddress {
  /** Omitted: all interfaces */
  host?: string;
  port: number;
}

/**
 * HTTP server for a multiplexer
 */
export class Server {
  private handler: MuxHandler;
  private logger: Logger;
  private server: HttpServer | null = null;

  constructor(handler: MuxHandler, options: ServerOptions = {}) {
    this.handler = handler;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * node:http request listener dispatching to the handler
   */
  readonly requestListener = (req: IncomingMessage, res: ServerResponse): void => {
    this.handleRequest(req, res).catch((error: unknown) => {
      this.logger.error('Failed to write response', error, { method: req.method, url: req.url });
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  };

  /**
   * Start accepting connections on `address`. Resolves once the server is
   * closed; rejects on a bad address or with the listener's failure.
   */
  async listen(address: string): Promise<void> {
    const { host, port } = parseAddress(address);
    const server = createServer(this.requestListener);
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', (error) => {
        this.logger.error('Listener failed', error, { address });
        this.server = null;
        reject(error);
      });
      server.once('close', () => resolve());

      server.listen(port, host, () => {
        this.logger.info(`listening @${address}`);
      });
    });
  }

  /**
   * Bound address, once listening
   */
  address(): AddressInfo | null {
    const bound = this.server?.address();
    return bound && typeof bound === 'object' ? bound : null;
  }

  /**
   * Stop accepting connections and drop idle ones
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;

    return new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let request: Request;
    try {
      request = await toRequest(req);
    } catch (error) {
      this.logger.warn('Malformed request', { url: req.url, reason: String(error) });
      await writeResponse(res, new Response('Bad Request', { status: 400 }));
      return;
    }

    await writeResponse(res, await this.handler(request));
  }
}

/**
 * Parse `host:port`, `:port` or `[v6]:port`
 */
export function parseAddress(address: string): ListenAddress {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d{1,5})$/.exec(address);
  if (!match) {
    throw new AddressError(address);
  }

  const port = Number(match[3]);
  if (port > 65535) {
    throw new AddressError(address);
  }

  const host = match[1] ?? match[2];
  return host ? { host, port } : { port };
}

/**
 * Convert a node:http message into a Fetch Request
 */
export async function toRequest(req: IncomingMessage): Promise<Request> {
  const host = req.headers.host ?? 'localhost';
  const url = new URL(`http://${host}${req.url ?? '/'}`);
  const method = req.method ?? 'GET';

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(name, item);
      }
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  let body: Uint8Array | null = null;
  if (method !== 'GET' && method !== 'HEAD') {
    const data = await buffer(req);
    body = data.byteLength > 0 ? new Uint8Array(data) : null;
  }

  return new Request(url, { method, headers, body });
}

/**
 * Write a Fetch Response onto a node:http response
 */
export async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;

  response.headers.forEach((value, name) => {
    if (name !== 'set-cookie') {
      res.setHeader(name, value);
    }
  });

  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) {
    res.setHeader('Set-Cookie', cookies);
  }

  if (!response.body) {
    res.end();
    return;
  }

  const body = new Uint8Array(await response.arrayBuffer());
  if (!res.hasHeader('Content-Length')) {
    res.setHeader('Content-Length', body.byteLength);
  }
  res.end(body);
}
