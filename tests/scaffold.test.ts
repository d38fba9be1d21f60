import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import {
  generateLoader,
  generateMiddleware,
  generatePage,
  generateProxy,
  generateRoute,
  isMiddlewareTemplate,
  isProxyTemplate,
  parseMethods,
  ScaffoldError,
} from '../src/cli/scaffold.js';
import { scanApp } from '../src/routing/scanner.js';
import { withTempProject } from './support/temp-project.js';

test('Scaffold - route handlers read the directory parameters', async () => {
  await withTempProject(async ({ appDir }) => {
    const result = generateRoute({ appDir, path: 'users/[id]', methods: ['get', 'delete', 'Get'] });

    assert.equal(result.pattern, '/users/{id}');
    assert.deepEqual(result.files, [path.join(appDir, 'users', '[id]', 'route.ts')]);
    assert.equal(fs.readFileSync(result.files[0], 'utf-8'), [
      "import type { Context } from 'kiln';",
      '',
      'export async function GET(ctx: Context): Promise<void> {',
      "  ctx.json(200, { id: ctx.param('id') });",
      '}',
      '',
      'export async function DELETE(ctx: Context): Promise<void> {',
      "  ctx.send(204, '');",
      '}',
      '',
    ].join('\n'));

    const scan = scanApp(appDir);
    assert.deepEqual(scan.routes.map(r => `${r.method} ${r.pattern}`), ['GET /users/{id}', 'DELETE /users/{id}']);
    assert.deepEqual(scan.skipped, []);
  });
});

test('Scaffold - catch-all parameters are read from the router capture', async () => {
  await withTempProject(async ({ appDir }) => {
    const docs = generateRoute({ appDir, path: 'docs/[...slug]' });
    const files = generateRoute({ appDir, path: 'orgs/[org]/files/[[...rest]]' });

    assert.equal(docs.pattern, '/docs/*');
    assert.equal(fs.readFileSync(docs.files[0], 'utf-8').split('\n')[3], "  ctx.json(200, { slug: ctx.param('*') });");
    assert.equal(files.pattern, '/orgs/{org}/files/*');
    assert.equal(
      fs.readFileSync(files.files[0], 'utf-8').split('\n')[3],
      "  ctx.json(200, { org: ctx.param('org'), rest: ctx.param('*') });"
    );
  });
});

test('Scaffold - route imports come from the configured runtime module', async () => {
  await withTempProject(async ({ appDir }) => {
    const { files } = generateRoute({ appDir, path: 'api/items', methods: ['POST'], runtimeModule: '@acme/web' });
    const lines = fs.readFileSync(files[0], 'utf-8').split('\n');

    assert.equal(lines[0], "import type { Context } from '@acme/web';");
    assert.equal(lines[3], '  ctx.json(201, { ok: true });');
  });
});

test('Scaffold - method lists are normalized and validated', () => {
  assert.deepEqual(parseMethods(undefined), ['GET']);
  assert.deepEqual(parseMethods([' ']), ['GET']);
  assert.deepEqual(parseMethods(['post', 'PUT', 'post']), ['POST', 'PUT']);
  assert.throws(() => parseMethods(['FETCH']), (error: unknown) => {
    assert.ok(error instanceof ScaffoldError);
    assert.equal(error.message, 'unknown HTTP method: FETCH');
    return true;
  });
});

test('Scaffold - existing files are never overwritten', async () => {
  await withTempProject(async ({ appDir, write }) => {
    const existing = write('src/app/health/route.ts', '// mine\n');

    assert.throws(() => generateRoute({ appDir, path: 'health' }), {
      name: 'ScaffoldError',
      message: `file already exists: ${existing}`,
    });
    assert.equal(fs.readFileSync(existing, 'utf-8'), '// mine\n');
  });
});

test('Scaffold - every middleware template passes the signature check', async () => {
  await withTempProject(async ({ appDir }) => {
    generateMiddleware({ appDir });
    generateMiddleware({ appDir, path: 'admin', template: 'logging' });
    generateMiddleware({ appDir, path: '(shop)', template: 'timing' });

    const scan = scanApp(appDir);
    assert.deepEqual(scan.middleware.map(m => m.scope), ['', '(shop)', 'admin']);
    assert.deepEqual(scan.skipped, []);
  });
});

test('Scaffold - proxy templates match every path and pass the signature check', async () => {
  await withTempProject(async ({ appDir }) => {
    generateProxy({ appDir, template: 'maintenance' });

    const { proxy } = scanApp(appDir);
    assert.equal(proxy?.hasValidSignature, true);
    assert.deepEqual(proxy?.matcherPatterns, ['/:path*']);
    assert.throws(() => generateProxy({ appDir }), ScaffoldError);
  });
});

test('Scaffold - pages take their URL parameters and may add a layout', async () => {
  await withTempProject(async ({ appDir }) => {
    const result = generatePage({ appDir, path: 'blog/[slug]', withLayout: true });

    assert.equal(result.pattern, '/blog/{slug}');
    assert.deepEqual(result.files, [
      path.join(appDir, 'blog', '[slug]', 'page.ts'),
      path.join(appDir, 'blog', '[slug]', 'layout.ts'),
    ]);
    assert.equal(
      fs.readFileSync(result.files[0], 'utf-8').split('\n')[0],
      'export function Page(slug: string): string {'
    );

    const scan = scanApp(appDir);
    assert.deepEqual(scan.pages[0].params, [{ name: 'slug', type: 'string', fromPath: true }]);
    assert.equal(scan.pages[0].title, 'Slug');
    assert.deepEqual(scan.layouts.map(l => l.scope), ['blog/{slug}']);
  });
});

test('Scaffold - an existing layout is left alone', async () => {
  await withTempProject(async ({ appDir, write }) => {
    const layout = write('src/app/layout.ts', '// custom layout\n');

    const result = generatePage({ appDir, withLayout: true });

    assert.deepEqual(result.files, [path.join(appDir, 'page.ts')]);
    assert.equal(result.pattern, '/');
    assert.equal(fs.readFileSync(layout, 'utf-8'), '// custom layout\n');
  });
});

test('Scaffold - loaders are written beside the page and picked up by the scan', async () => {
  await withTempProject(async ({ appDir }) => {
    const result = generateLoader({ appDir, path: 'users/[id]' });
    generatePage({ appDir, path: 'users/[id]' });

    const loaderPath = path.join(appDir, 'users', '[id]', 'loader.ts');
    assert.equal(result.pattern, '/users/{id}');
    assert.deepEqual(result.files, [loaderPath]);
    assert.equal(fs.readFileSync(loaderPath, 'utf-8'), [
      "import type { Context } from 'kiln';",
      '',
      'export interface UsersIdData {',
      '  id: string;',
      '}',
      '',
      'export async function loader(ctx: Context): Promise<UsersIdData> {',
      "  return { id: ctx.param('id') };",
      '}',
      '',
    ].join('\n'));

    const [page] = scanApp(appDir).pages;
    assert.equal(page.loaderFile, loaderPath);
  });
});

test('Scaffold - loader data types default from the path or take the given name', async () => {
  await withTempProject(async ({ appDir }) => {
    const docs = generateLoader({ appDir, path: 'docs/[...slug]' });
    const root = generateLoader({ appDir, dataType: 'Stats' });

    const docsLines = fs.readFileSync(docs.files[0], 'utf-8').split('\n');
    assert.equal(docsLines[2], 'export interface DocsSlugData {');
    assert.equal(docsLines[7], "  return { slug: ctx.param('*') };");

    const rootLines = fs.readFileSync(root.files[0], 'utf-8').split('\n');
    assert.equal(root.pattern, '/');
    assert.equal(rootLines[2], 'export interface Stats {');
    assert.equal(rootLines[3], '  path: string;');
    assert.equal(rootLines[7], '  return { path: ctx.path };');
  });
});

test('Scaffold - loaders are refused for bad names and pages with their own loader', async () => {
  await withTempProject(async ({ appDir, write }) => {
    const pagePath = write('src/app/reports/page.ts', [
      'export async function loader() { return 1; }',
      'export function Page(count: number): string { return String(count); }',
      '',
    ].join('\n'));

    assert.throws(() => generateLoader({ appDir, path: 'stats', dataType: 'stats-data' }), {
      name: 'ScaffoldError',
      message: 'invalid data type name: stats-data',
    });
    assert.throws(() => generateLoader({ appDir, path: 'reports' }), {
      name: 'ScaffoldError',
      message: `page already exports a loader: ${pagePath}`,
    });
    assert.equal(fs.existsSync(path.join(appDir, 'reports', 'loader.ts')), false);
  });
});

test('Scaffold - template names are recognized', () => {
  assert.equal(isMiddlewareTemplate('timing'), true);
  assert.equal(isMiddlewareTemplate('maintenance'), false);
  assert.equal(isProxyTemplate('maintenance'), true);
  assert.equal(isProxyTemplate('toString'), false);
});
