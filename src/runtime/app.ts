import { RouteTree, type RouteEntry } from '../routing/route-tree.js';
import type { Context, HandlerFunc, MiddlewareFunc } from './context.js';
import { executeProxy, type ProxyFunc } from './proxy.js';

export interface LayoutProps {
  title: string;
  children: string;
  ctx: Context;
}

export type LayoutFunc = (props: LayoutProps) => string | Promise<string>;

export interface PageOptions {
  title: string;
  /** Outermost first. */
  layouts?: LayoutFunc[];
}

/** Wrap a rendered page in its layouts, innermost first, and send it as HTML. */
export async function renderPage(ctx: Context, body: string | Promise<string>, options: PageOptions): Promise<void> {
  let html = await body;
  const layouts = options.layouts ?? [];
  for (let i = layouts.length - 1; i >= 0; i--) {
    html = await layouts[i]({ title: options.title, children: html, ctx });
  }
  ctx.html(200, html);
}

export type ErrorHandler = (error: unknown, ctx: Context) => void | Promise<void>;

export interface AppOptions {
  onError?: ErrorHandler;
}

function defaultErrorHandler(error: unknown, ctx: Context): void {
  console.error(`[kiln] ${ctx.method} ${ctx.path} failed:`, error);
  if (!ctx.written) ctx.text(500, 'Internal Server Error');
}

/**
 * Runtime router. Generated `registerRoutes(app)` calls populate it; `handle`
 * runs proxy, then the scope's middleware chain, then the matched handler.
 */
export class App {
  private readonly tree = new RouteTree<HandlerFunc, MiddlewareFunc, ProxyFunc>();
  private readonly onError: ErrorHandler;

  constructor(options: AppOptions = {}) {
    this.onError = options.onError ?? defaultErrorHandler;
  }

  /** Global middleware. */
  use(middleware: MiddlewareFunc): this {
    this.tree.addMiddleware('', '', middleware);
    return this;
  }

  addMiddleware(pathPrefix: string, scope: string, middleware: MiddlewareFunc): this {
    this.tree.addMiddleware(pathPrefix, scope, middleware);
    return this;
  }

  /** Throws PatternCompileError for a malformed matcher pattern. */
  setProxy(proxy: ProxyFunc, patterns: readonly string[] = []): this {
    this.tree.setProxy(proxy, patterns);
    return this;
  }

  registerRoute(method: string, pattern: string, handler: HandlerFunc, scope?: string): this {
    this.tree.addRoute(method, pattern, handler, scope);
    return this;
  }

  get(pattern: string, handler: HandlerFunc, scope?: string): this {
    return this.registerRoute('GET', pattern, handler, scope);
  }

  post(pattern: string, handler: HandlerFunc, scope?: string): this {
    return this.registerRoute('POST', pattern, handler, scope);
  }

  routes(): RouteEntry<HandlerFunc>[] {
    return this.tree.routes();
  }

  async handle(ctx: Context): Promise<void> {
    try {
      const proxy = this.tree.proxy();
      if (proxy && !(await executeProxy(ctx, proxy))) return;

      const match = this.tree.match(ctx.method, ctx.path);
      if (!match) {
        const allowed = this.tree.allowedMethods(ctx.path);
        if (allowed.length > 0) {
          ctx.setHeader('allow', allowed.join(', '));
          ctx.text(405, 'Method Not Allowed');
        } else {
          ctx.text(404, 'Not Found');
        }
        return;
      }

      ctx.params = match.params;
      let handler = match.route.handler;
      const chain = this.tree.middlewareChain(match.route.scope);
      for (let i = chain.length - 1; i >= 0; i--) {
        handler = chain[i].middleware(handler);
      }

      await handler(ctx);
    } catch (error) {
      await this.onError(error, ctx);
    }
  }
}
