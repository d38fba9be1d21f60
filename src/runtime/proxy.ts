import type { ProxyEntry } from '../routing/route-tree.js';
import type { Context } from './context.js';

export type ProxyResult =
  | { action: 'continue'; headers?: Record<string, string> }
  | { action: 'redirect'; url: string; status: number; headers?: Record<string, string> }
  | { action: 'rewrite'; path: string; headers?: Record<string, string> }
  | { action: 'response'; status: number; body: string; contentType: string; headers?: Record<string, string> };

export type ProxyFunc = (ctx: Context) => ProxyResult | undefined | Promise<ProxyResult | undefined>;

export function proxyContinue(): ProxyResult {
  return { action: 'continue' };
}

export function proxyRedirect(url: string, status = 307): ProxyResult {
  return { action: 'redirect', url, status };
}

/** Re-target routing to `path` without telling the client. */
export function proxyRewrite(path: string): ProxyResult {
  return { action: 'rewrite', path };
}

export function proxyResponse(status: number, body: string, contentType = 'text/plain; charset=utf-8'): ProxyResult {
  return { action: 'response', status, body, contentType };
}

export function proxyJson(status: number, data: unknown): ProxyResult {
  return proxyResponse(status, JSON.stringify(data), 'application/json');
}

export function withHeaders(result: ProxyResult, headers: Record<string, string>): ProxyResult {
  return { ...result, headers: { ...result.headers, ...headers } };
}

/**
 * Run the proxy stage. Resolves to true when routing should continue,
 * false when the proxy already answered.
 */
export async function executeProxy(ctx: Context, entry: ProxyEntry<ProxyFunc>): Promise<boolean> {
  if (!entry.matcher.matches(ctx.path)) return true;

  const result = await entry.handler(ctx);
  if (!result) return true;

  for (const [name, value] of Object.entries(result.headers ?? {})) {
    ctx.setHeader(name, value);
  }

  switch (result.action) {
    case 'continue':
      return true;
    case 'redirect':
      ctx.redirect(result.url, result.status);
      return false;
    case 'rewrite':
      ctx.path = result.path;
      return true;
    case 'response':
      ctx.send(result.status, result.body, result.contentType);
      return false;
  }
}
