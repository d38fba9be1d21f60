import type { IncomingMessage, RequestListener, ServerResponse } from 'http';
import type { App } from './app.js';
import { RequestContext } from './context.js';

function headersOf(req: IncomingMessage): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value !== undefined) headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

/** Adapter for `http.createServer(createRequestListener(app))`. */
export function createRequestListener(app: App): RequestListener {
  return (req: IncomingMessage, res: ServerResponse) => {
    const ctx = new RequestContext({ method: req.method, url: req.url ?? '/', headers: headersOf(req) });

    app.handle(ctx).then(() => {
      res.writeHead(ctx.response.status, ctx.response.headers);
      res.end(ctx.method === 'HEAD' ? undefined : ctx.response.body);
    }, (error: unknown) => {
      console.error('[kiln] request failed:', error);
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  };
}
