import { test } from 'node:test';
import assert from 'node:assert/strict';

import { App, renderPage, type LayoutFunc } from '../src/runtime/app.js';
import { RequestContext, type Context, type HandlerFunc, type MiddlewareFunc } from '../src/runtime/context.js';
import {
  proxyContinue,
  proxyJson,
  proxyRedirect,
  proxyResponse,
  proxyRewrite,
  withHeaders,
  type ProxyResult,
} from '../src/runtime/proxy.js';

async function request(app: App, url: string, method = 'GET'): Promise<RequestContext> {
  const ctx = new RequestContext({ method, url });
  await app.handle(ctx);
  return ctx;
}

function tracing(log: string[], name: string): MiddlewareFunc {
  return (next: HandlerFunc) => async (ctx: Context) => {
    log.push(`${name}-in`);
    await next(ctx);
    log.push(`${name}-out`);
  };
}

test('App - middleware wraps handlers outer-in, inner-out', async () => {
  const log: string[] = [];
  const app = new App();
  app.addMiddleware('/api', 'api', tracing(log, 'B'));
  app.use(tracing(log, 'A'));
  app.registerRoute('GET', '/api/items', async ctx => {
    log.push('handler');
    ctx.text(200, 'ok');
  }, 'api/items');

  const ctx = await request(app, '/api/items');

  assert.equal(ctx.response.body, 'ok');
  assert.deepEqual(log, ['A-in', 'B-in', 'handler', 'B-out', 'A-out']);
});

test('App - group middleware does not leak to sibling groups', async () => {
  const log: string[] = [];
  const app = new App();
  app.addMiddleware('/', '(dashboard)', tracing(log, 'dashboard'));
  app.get('/apps', ctx => ctx.text(200, 'apps'), '(dashboard)/apps');
  app.get('/login', ctx => ctx.text(200, 'login'), '(auth)/login');

  await request(app, '/login');
  assert.deepEqual(log, []);

  await request(app, '/apps');
  assert.deepEqual(log, ['dashboard-in', 'dashboard-out']);
});

test('App - route parameters and query are exposed on the context', async () => {
  const app = new App();
  app.get('/users/{id}', ctx => ctx.json(200, { id: ctx.param('id'), tab: ctx.query.get('tab') }));
  app.get('/files/*', ctx => ctx.text(200, ctx.param('*')));

  const user = await request(app, '/users/42?tab=posts');
  assert.equal(user.response.body, '{"id":"42","tab":"posts"}');
  assert.equal(user.response.headers['content-type'], 'application/json');

  const file = await request(app, '/files/a/b.txt');
  assert.equal(file.response.body, 'a/b.txt');
});

test('App - malformed escapes in the path do not fail the request', async () => {
  const app = new App();
  app.get('/users/{id}', ctx => ctx.text(200, ctx.param('id')));

  const ctx = await request(app, '/users/%E0%A4%A');
  assert.equal(ctx.response.status, 200);
  assert.equal(ctx.response.body, '%E0%A4%A');
});

test('App - unknown paths are 404 and known paths with other methods are 405', async () => {
  const app = new App();
  app.get('/items', ctx => ctx.text(200, 'list'));
  app.registerRoute('DELETE', '/items', ctx => ctx.send(204, ''));

  const missing = await request(app, '/nothing');
  assert.equal(missing.response.status, 404);
  assert.equal(missing.response.body, 'Not Found');

  const wrongMethod = await request(app, '/items', 'PUT');
  assert.equal(wrongMethod.response.status, 405);
  assert.equal(wrongMethod.response.headers.allow, 'DELETE, GET');
});

test('App - proxy redirect and response stop routing', async () => {
  let reached = false;
  const app = new App();
  app.get('/admin', () => {
    reached = true;
  });
  app.get('/status', () => {
    reached = true;
  });
  app.setProxy(ctx => {
    if (ctx.path === '/admin') return proxyRedirect('/login');
    if (ctx.path === '/status') return proxyResponse(503, 'maintenance');
    return undefined;
  });

  const redirected = await request(app, '/admin');
  assert.equal(redirected.response.status, 307);
  assert.equal(redirected.response.headers.location, '/login');

  const answered = await request(app, '/status');
  assert.equal(answered.response.status, 503);
  assert.equal(answered.response.body, 'maintenance');
  assert.equal(reached, false);
});

test('App - proxy rewrite re-targets routing and headers are applied', async () => {
  const app = new App();
  app.get('/v2/items', ctx => ctx.text(200, 'v2'));
  app.setProxy(async (): Promise<ProxyResult> => withHeaders(proxyRewrite('/v2/items'), { 'x-proxied': '1' }));

  const ctx = await request(app, '/items');
  assert.equal(ctx.response.body, 'v2');
  assert.equal(ctx.response.headers['x-proxied'], '1');
  assert.equal(ctx.path, '/v2/items');
});

test('App - proxy only runs for matching paths', async () => {
  const app = new App();
  app.get('/public', ctx => ctx.text(200, 'public'));
  app.get('/api/data', ctx => ctx.text(200, 'data'));
  app.setProxy(() => proxyJson(401, { error: 'unauthorized' }), ['/api/:path*']);

  assert.equal((await request(app, '/public')).response.body, 'public');

  const blocked = await request(app, '/api/data');
  assert.equal(blocked.response.status, 401);
  assert.equal(blocked.response.body, '{"error":"unauthorized"}');
});

test('App - proxy continue falls through to the router', async () => {
  const app = new App();
  app.get('/', ctx => ctx.text(200, 'home'));
  app.setProxy(() => withHeaders(proxyContinue(), { 'x-request-id': 'test-id' }));

  const ctx = await request(app, '/');
  assert.equal(ctx.response.body, 'home');
  assert.equal(ctx.response.headers['x-request-id'], 'test-id');
});

test('App - handler errors go to the error handler', async () => {
  const seen: unknown[] = [];
  const app = new App({
    onError: (error, ctx) => {
      seen.push(error);
      ctx.text(500, 'custom failure');
    },
  });
  app.get('/boom', () => {
    throw new Error('boom');
  });

  const ctx = await request(app, '/boom');
  assert.equal(ctx.response.body, 'custom failure');
  assert.equal(seen.length, 1);
  assert.ok(seen[0] instanceof Error);
});

test('App - registered routes are listed by priority', () => {
  const app = new App();
  app.get('/docs/*', () => undefined);
  app.get('/users/{id}', () => undefined);
  app.get('/about', () => undefined);

  assert.deepEqual(app.routes().map(r => r.pattern), ['/about', '/users/{id}', '/docs/*']);
});

test('App - pages render through their layouts, outermost first', async () => {
  const outer: LayoutFunc = ({ children }) => `<o>${children}</o>`;
  const inner: LayoutFunc = async ({ title, children }) => `<i title="${title}">${children}</i>`;
  const ctx = new RequestContext({ url: '/' });

  await renderPage(ctx, 'x', { title: 'Home', layouts: [outer, inner] });

  assert.equal(ctx.response.status, 200);
  assert.equal(ctx.response.body, '<o><i title="Home">x</i></o>');
  assert.equal(ctx.response.headers['content-type'], 'text/html; charset=utf-8');
});

test('App - request context normalizes method and headers', () => {
  const ctx = new RequestContext({ method: 'post', url: '/x?a=1&a=2', headers: { 'X-Token': 'test-secret' } });

  assert.equal(ctx.method, 'POST');
  assert.equal(ctx.header('x-token'), 'test-secret');
  assert.deepEqual(ctx.query.getAll('a'), ['1', '2']);
  assert.equal(ctx.param('missing'), '');
  assert.equal(ctx.written, false);

  ctx.redirect('/elsewhere');
  assert.equal(ctx.response.status, 302);
  assert.equal(ctx.written, true);
});
