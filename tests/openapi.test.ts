import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import {
  deriveTag,
  generateOpenApiDocument,
  pathParameters,
  readHandlerDoc,
  writeOpenApiFile,
  type OpenApiParameter,
} from '../src/cli/openapi.js';
import { collectExportedFunctions, parseRoutingSource } from '../src/routing/scanner.js';
import { withTempProject, type TempProject } from './support/temp-project.js';

const IMPORTS = "import type { Context } from 'kiln';\n";

const REQUEST_BODY = {
  description: 'Request body',
  required: true,
  content: { 'application/json': { schema: { type: 'object' } } },
};

const ID_PARAM: OpenApiParameter = {
  name: 'id',
  in: 'path',
  required: true,
  description: 'id parameter',
  schema: { type: 'string' },
};

function writeApi({ write }: TempProject): void {
  write('src/app/route.ts', IMPORTS + 'export function GET(ctx: Context) {}\n');
  write('src/app/api/users/route.ts', IMPORTS + `
/**
 * List users
 * Returns every user, newest first.
 * Supports paging.
 */
export async function GET(ctx: Context): Promise<void> {}

/** Create a user */
export const POST = async (ctx: Context): Promise<void> => {};
`);
  write('src/app/api/users/[id]/route.ts', IMPORTS + `
export function GET(ctx: Context) {}
export function POST(ctx: Context) {}
/** Remove a user */
export function DELETE(ctx: Context) {}
`);
  write('src/app/files/[...path]/route.ts', IMPORTS + 'export function GET(ctx: Context) {}\n');
  write('src/app/about/route.ts', IMPORTS + 'export function GET(ctx: Context) {}\nexport function POST(ctx: Context) {}\n');
  write('src/app/about/page.ts', "export function Page(): string { return 'about'; }\n");
}

test('OpenAPI - routes become operations grouped by path', async () => {
  await withTempProject(async project => {
    writeApi(project);

    const { document, routes } = generateOpenApiDocument(project.appDir, {
      title: 'Test API',
      version: '2.0.0',
      description: 'Fixture service',
      servers: ['http://localhost:3000'],
    });

    assert.equal(routes.length, 8);
    assert.deepEqual(document, {
      openapi: '3.1.0',
      info: { title: 'Test API', version: '2.0.0', description: 'Fixture service' },
      servers: [{ url: 'http://localhost:3000' }],
      paths: {
        '/': {
          get: { tags: ['default'], responses: { '200': { description: 'Success' } } },
        },
        '/about': {
          post: {
            tags: ['about'],
            requestBody: REQUEST_BODY,
            responses: { '200': { description: 'Success' }, '400': { description: 'Bad Request' } },
          },
        },
        '/api/users': {
          get: {
            summary: 'List users',
            description: 'Returns every user, newest first.\nSupports paging.',
            tags: ['users'],
            responses: { '200': { description: 'Success' } },
          },
          post: {
            summary: 'Create a user',
            tags: ['users'],
            requestBody: REQUEST_BODY,
            responses: { '200': { description: 'Success' }, '400': { description: 'Bad Request' } },
          },
        },
        '/api/users/{id}': {
          delete: {
            summary: 'Remove a user',
            tags: ['users'],
            parameters: [ID_PARAM],
            responses: { '200': { description: 'Success' }, '404': { description: 'Not Found' } },
          },
          get: {
            tags: ['users'],
            parameters: [ID_PARAM],
            responses: { '200': { description: 'Success' }, '404': { description: 'Not Found' } },
          },
          post: {
            tags: ['users'],
            parameters: [ID_PARAM],
            requestBody: REQUEST_BODY,
            responses: { '200': { description: 'Success' }, '400': { description: 'Bad Request' } },
          },
        },
        '/files/*': {
          get: { tags: ['files'], responses: { '200': { description: 'Success' } } },
        },
      },
    });
  });
});

test('OpenAPI - defaults and the 3.0 version switch', async () => {
  await withTempProject(async ({ appDir }) => {
    const { document } = generateOpenApiDocument(appDir, { openapiVersion: '3.0.3' });

    assert.deepEqual(document, {
      openapi: '3.0.3',
      info: { title: 'API', version: '1.0.0' },
      paths: {},
    });
  });
});

test('OpenAPI - tags come from the first visible directory after api', () => {
  assert.equal(deriveTag('api/users/[id]'), 'users');
  assert.equal(deriveTag('(admin)/settings'), 'settings');
  assert.equal(deriveTag('api/(v1)/[org]/orders'), 'orders');
  assert.equal(deriveTag('v2/api/items'), 'v2');
  assert.equal(deriveTag('api'), 'default');
  assert.equal(deriveTag(''), 'default');
});

test('OpenAPI - path parameters skip catch-alls', () => {
  assert.deepEqual(pathParameters('/orgs/{org}/files/*').map(p => p.name), ['org']);
  assert.deepEqual(pathParameters('/about'), []);
});

test('OpenAPI - handler docs read the closest JSDoc block and ignore tags', () => {
  const source = IMPORTS + `
/** Unrelated banner */
/**
 * Fetch a report.
 *
 * Builds the totals on demand.
 * @param ctx request context
 */
export function GET(ctx: Context) {}

// Plain comments are not documentation.
export const POST = (ctx: Context) => {};
`;
  const functions = collectExportedFunctions(parseRoutingSource('/app/reports/route.ts', source));

  assert.deepEqual(functions.map(fn => [fn.name, readHandlerDoc(fn.node)]), [
    ['GET', { summary: 'Fetch a report.', description: 'Builds the totals on demand.' }],
    ['POST', { summary: '', description: '' }],
  ]);
});

test('OpenAPI - documents are written as JSON or YAML and not rewritten when unchanged', async () => {
  await withTempProject(async project => {
    writeApi(project);
    const jsonPath = path.join(project.rootDir, 'openapi.json');
    const yamlPath = path.join(project.rootDir, 'docs', 'api.yaml');

    const first = await writeOpenApiFile(project.appDir, jsonPath);
    const second = await writeOpenApiFile(project.appDir, jsonPath);
    const yaml = await writeOpenApiFile(project.appDir, yamlPath);

    assert.deepEqual(first, {
      outputPath: jsonPath,
      format: 'json',
      version: '3.1.0',
      routes: 8,
      size: fs.statSync(jsonPath).size,
      written: true,
    });
    assert.equal(second.written, false);
    assert.deepEqual(
      JSON.parse(fs.readFileSync(jsonPath, 'utf-8')),
      generateOpenApiDocument(project.appDir).document
    );

    assert.equal(yaml.format, 'yaml');
    assert.deepEqual(fs.readFileSync(yamlPath, 'utf-8').split('\n').slice(0, 4), [
      'openapi: 3.1.0',
      'info:',
      '  title: API',
      '  version: 1.0.0',
    ]);
  });
});
