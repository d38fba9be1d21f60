export type HandlerResult = void | Promise<void>;

/**
 * Per-request state seen by proxies, middleware and handlers.
 *
 * `path` is writable so a proxy rewrite can re-target routing.
 */
export interface Context {
  readonly method: string;
  path: string;
  readonly query: URLSearchParams;
  /** Route parameters, filled in once a route matches. */
  params: Record<string, string>;
  param(name: string): string;
  header(name: string): string | undefined;
  setHeader(name: string, value: string): void;
  send(status: number, body: string, contentType?: string): void;
  json(status: number, data: unknown): void;
  text(status: number, body: string): void;
  html(status: number, body: string): void;
  redirect(url: string, status?: number): void;
  readonly written: boolean;
}

export type HandlerFunc = (ctx: Context) => HandlerResult;
export type MiddlewareFunc = (next: HandlerFunc) => HandlerFunc;

export interface RecordedResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface ContextInit {
  method?: string;
  /** Path with an optional query string, e.g. `/users/42?tab=posts`. */
  url: string;
  headers?: Record<string, string>;
}

/**
 * In-memory Context. Adapters build one per request and flush `response`
 * to the transport once the app has handled it.
 */
export class RequestContext implements Context {
  readonly method: string;
  path: string;
  readonly query: URLSearchParams;
  params: Record<string, string> = {};
  readonly response: RecordedResponse = { status: 200, headers: {}, body: '' };
  private readonly requestHeaders: Map<string, string>;
  private sent = false;

  constructor(init: ContextInit) {
    const url = new URL(init.url, 'http://localhost');
    this.method = (init.method ?? 'GET').toUpperCase();
    this.path = url.pathname;
    this.query = url.searchParams;
    this.requestHeaders = new Map(
      Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value])
    );
  }

  get written(): boolean {
    return this.sent;
  }

  param(name: string): string {
    return this.params[name] ?? '';
  }

  header(name: string): string | undefined {
    return this.requestHeaders.get(name.toLowerCase());
  }

  setHeader(name: string, value: string): void {
    this.response.headers[name.toLowerCase()] = value;
  }

  send(status: number, body: string, contentType?: string): void {
    if (contentType) this.setHeader('content-type', contentType);
    this.response.status = status;
    this.response.body = body;
    this.sent = true;
  }

  json(status: number, data: unknown): void {
    this.send(status, JSON.stringify(data), 'application/json');
  }

  text(status: number, body: string): void {
    this.send(status, body, 'text/plain; charset=utf-8');
  }

  html(status: number, body: string): void {
    this.send(status, body, 'text/html; charset=utf-8');
  }

  redirect(url: string, status = 302): void {
    this.setHeader('location', url);
    this.send(status, '');
  }
}
