import * as fs from 'fs';
import * as path from 'path';
import ts from 'typescript';
import YAML from 'yaml';
import { resolveConflicts } from '../routing/conflicts.js';
import { collectExportedFunctions, parseRoutingSource, scanApp, type ScanOptions } from '../routing/scanner.js';
import { translateSegment } from '../routing/segments.js';
import type { HttpMethod, RouteRecord } from '../routing/types.js';

export const DEFAULT_OPENAPI_FILE = 'openapi.json';

export type OpenApiVersion = '3.1.0' | '3.0.3';
export type OpenApiFormat = 'json' | 'yaml';

export interface OpenApiOptions extends ScanOptions {
  title?: string;
  version?: string;
  description?: string;
  servers?: string[];
  openapiVersion?: OpenApiVersion;
}

// ============================================================================
// Document shapes
// ============================================================================

export interface OpenApiParameter {
  name: string;
  in: 'path';
  required: true;
  description: string;
  schema: { type: 'string' };
}

export interface OpenApiRequestBody {
  description: string;
  required: true;
  content: { 'application/json': { schema: { type: 'object' } } };
}

export interface OpenApiOperation {
  summary?: string;
  description?: string;
  tags: string[];
  parameters?: OpenApiParameter[];
  requestBody?: OpenApiRequestBody;
  responses: Record<string, { description: string }>;
}

export type OperationKey = 'delete' | 'get' | 'head' | 'options' | 'patch' | 'post' | 'put';

export type OpenApiPathItem = Partial<Record<OperationKey, OpenApiOperation>>;

export interface OpenApiDocument {
  openapi: OpenApiVersion;
  info: { title: string; version: string; description?: string };
  servers?: Array<{ url: string }>;
  paths: Record<string, OpenApiPathItem>;
}

const OPERATION_KEYS: Record<HttpMethod, OperationKey> = {
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  PATCH: 'patch',
  DELETE: 'delete',
  HEAD: 'head',
  OPTIONS: 'options',
};

const OPERATION_ORDER: OperationKey[] = ['delete', 'get', 'head', 'options', 'patch', 'post', 'put'];

// ============================================================================
// Handler documentation
// ============================================================================

export interface HandlerDoc {
  summary: string;
  description: string;
}

/** JSDoc on `export const GET = ...` lives on the variable statement. */
function jsDocHost(node: ts.Node): ts.Node {
  let current = node;
  while (!ts.isFunctionDeclaration(current) && !ts.isVariableStatement(current) && !ts.isSourceFile(current)) {
    current = current.parent;
  }
  return current;
}

/** First non-empty JSDoc line is the summary; the remaining lines form the description. */
export function readHandlerDoc(node: ts.Node): HandlerDoc {
  const docs = ts.getJSDocCommentsAndTags(jsDocHost(node)).filter(ts.isJSDoc);
  const doc = docs[docs.length - 1];
  const text = doc ? ts.getTextOfJSDocComment(doc.comment) ?? '' : '';
  const lines = text.split('\n').map(line => line.trim()).filter(Boolean);

  return {
    summary: lines[0] ?? '',
    description: lines.slice(1).join('\n'),
  };
}

function handlerDocs(files: readonly string[]): Map<string, Map<string, HandlerDoc>> {
  const byFile = new Map<string, Map<string, HandlerDoc>>();
  for (const file of files) {
    if (byFile.has(file)) continue;
    const sourceFile = parseRoutingSource(file, fs.readFileSync(file, 'utf-8'));
    const docs = new Map<string, HandlerDoc>();
    for (const fn of collectExportedFunctions(sourceFile)) {
      if (!docs.has(fn.name)) docs.set(fn.name, readHandlerDoc(fn.node));
    }
    byFile.set(file, docs);
  }
  return byFile;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Tag from the first URL-visible literal directory, ignoring a leading `api`.
 * `api/users/[id]` → `users`.
 */
export function deriveTag(dir: string): string {
  const segments = dir.split('/').filter(Boolean);
  if (segments[0] === 'api') segments.shift();

  for (const raw of segments) {
    const segment = translateSegment(raw);
    if (segment.kind === 'literal') return segment.value;
  }
  return 'default';
}

export function pathParameters(pattern: string): OpenApiParameter[] {
  return pattern
    .split('/')
    .filter(segment => segment.startsWith('{') && segment.endsWith('}'))
    .map(segment => segment.slice(1, -1))
    .map((name): OpenApiParameter => ({
      name,
      in: 'path',
      required: true,
      description: `${name} parameter`,
      schema: { type: 'string' },
    }));
}

function hasBody(method: HttpMethod): boolean {
  return method === 'POST' || method === 'PUT' || method === 'PATCH';
}

export function buildOperation(route: RouteRecord, doc: HandlerDoc): OpenApiOperation {
  const operation: OpenApiOperation = { tags: [deriveTag(route.dir)], responses: {} };
  if (doc.summary) operation.summary = doc.summary;
  if (doc.description) operation.description = doc.description;

  const parameters = pathParameters(route.pattern);
  if (parameters.length > 0) operation.parameters = parameters;

  if (hasBody(route.method)) {
    operation.requestBody = {
      description: 'Request body',
      required: true,
      content: { 'application/json': { schema: { type: 'object' } } },
    };
  }

  operation.responses['200'] = { description: 'Success' };
  if (hasBody(route.method)) operation.responses['400'] = { description: 'Bad Request' };
  if (parameters.length > 0 && route.method !== 'POST') operation.responses['404'] = { description: 'Not Found' };

  return operation;
}

// ============================================================================
// Document
// ============================================================================

export interface OpenApiResult {
  document: OpenApiDocument;
  routes: RouteRecord[];
}

/**
 * Describe the API routes under `appDir`. GET handlers that a page takes
 * over are left out, as they are at run time.
 */
export function generateOpenApiDocument(appDir: string, options: OpenApiOptions = {}): OpenApiResult {
  const scan = scanApp(appDir, options);
  const { routes } = resolveConflicts(scan);
  const docs = handlerDocs(routes.map(route => route.sourceFile));

  const grouped = new Map<string, Map<OperationKey, OpenApiOperation>>();
  for (const route of routes) {
    const operations = grouped.get(route.pattern) ?? new Map<OperationKey, OpenApiOperation>();
    grouped.set(route.pattern, operations);

    const key = OPERATION_KEYS[route.method];
    if (operations.has(key)) continue;
    const doc = docs.get(route.sourceFile)?.get(route.handler) ?? { summary: '', description: '' };
    operations.set(key, buildOperation(route, doc));
  }

  const paths: Record<string, OpenApiPathItem> = {};
  for (const pattern of [...grouped.keys()].sort()) {
    const operations = grouped.get(pattern);
    const item: OpenApiPathItem = {};
    for (const key of OPERATION_ORDER) {
      const operation = operations?.get(key);
      if (operation) item[key] = operation;
    }
    paths[pattern] = item;
  }

  const document: OpenApiDocument = {
    openapi: options.openapiVersion ?? '3.1.0',
    info: { title: options.title ?? 'API', version: options.version ?? '1.0.0' },
    paths,
  };
  if (options.description) document.info.description = options.description;
  if (options.servers && options.servers.length > 0) {
    document.servers = options.servers.map(url => ({ url }));
  }

  return { document, routes };
}

export function serializeOpenApi(document: OpenApiDocument, format: OpenApiFormat): string {
  return format === 'yaml' ? YAML.stringify(document) : `${JSON.stringify(document, null, 2)}\n`;
}

export interface OpenApiWriteResult {
  outputPath: string;
  format: OpenApiFormat;
  version: OpenApiVersion;
  routes: number;
  size: number;
  written: boolean;
}

/** Format follows `format`, else the output extension (`.yaml`/`.yml` mean YAML). */
export async function writeOpenApiFile(
  appDir: string,
  outputPath: string,
  options: OpenApiOptions & { format?: OpenApiFormat } = {}
): Promise<OpenApiWriteResult> {
  const resolvedOutput = path.resolve(outputPath);
  const format = options.format ?? (/\.ya?ml$/i.test(resolvedOutput) ? 'yaml' : 'json');
  const { document, routes } = generateOpenApiDocument(appDir, options);
  const content = serializeOpenApi(document, format);

  const unchanged = fs.existsSync(resolvedOutput) && fs.readFileSync(resolvedOutput, 'utf-8') === content;
  if (!unchanged) {
    await fs.promises.mkdir(path.dirname(resolvedOutput), { recursive: true });
    await fs.promises.writeFile(resolvedOutput, content, 'utf-8');
  }

  return {
    outputPath: resolvedOutput,
    format,
    version: document.openapi,
    routes: routes.length,
    size: Buffer.byteLength(content),
    written: !unchanged,
  };
}
