/**
 * Server Request
 *
 * Wraps the native Request with the accessors handlers and middleware
 * commonly need: path, query, headers and cookies.
 */

/**
 * Read-side view of the request being dispatched
 */
export class ServerRequest {
  private _request: Request;
  private _url: URL;
  private _cookies: Map<string, string> | null = null;
  private _body: Promise<ArrayBuffer> | null = null;

  constructor(request: Request) {
    this._request = request;
    this._url = new URL(request.url);
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  /**
   * HTTP method (GET, POST, etc.)
   */
  get method(): string {
    return this._request.method;
  }

  /**
   * Full URL
   */
  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  /**
   * Query parameters
   */
  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  /**
   * Request headers
   */
  get headers(): Headers {
    return this._request.headers;
  }

  /**
   * Get a specific header value
   */
  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Content-Type header
   */
  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Check if request is HTTPS
   */
  get isSecure(): boolean {
    return this._url.protocol === 'https:';
  }

  /**
   * Get the client IP address (accounting for proxies)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ??
      this.header('X-Real-IP') ??
      'unknown'
    );
  }

  /**
   * Cookies sent with the request. When a name repeats, the first wins.
   */
  get cookies(): Map<string, string> {
    if (!this._cookies) {
      this._cookies = parseCookieHeader(this.header('Cookie') ?? '');
    }
    return this._cookies;
  }

  /**
   * Get a specific cookie value
   */
  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Read the request body. The body is consumed once and reused by every
   * later read.
   */
  arrayBuffer(): Promise<ArrayBuffer> {
    if (!this._body) {
      this._body = this._request.arrayBuffer();
    }
    return this._body;
  }

  /**
   * Parse and return the request body as text
   */
  async text(): Promise<string> {
    return new TextDecoder().decode(await this.arrayBuffer());
  }

  /**
   * Parse and return the request body as JSON
   */
  async json(): Promise<unknown> {
    const parsed: unknown = JSON.parse(await this.text());
    return parsed;
  }
}

/**
 * Parse a `Cookie` request header into name/value pairs
 */
export function parseCookieHeader(header: string): Map<string, string> {
  const cookies = new Map<string, string>();

  for (const pair of header.split(';')) {
    const [rawName, ...rest] = pair.split('=');
    const name = rawName.trim();
    if (!name || cookies.has(name)) continue;

    let value = rest.join('=').trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    cookies.set(name, decodeCookieValue(value));
  }

  return cookies;
}

function decodeCookieValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Not percent-encoded by us; keep the raw octets
    return value;
  }
}
