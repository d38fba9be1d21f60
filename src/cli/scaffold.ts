import * as fs from 'fs';
import * as path from 'path';
import { isHttpMethod, LOADER_FILE, type HttpMethod } from '../routing/types.js';
import { deriveTitle, translatePath } from '../routing/segments.js';
import { hasLoaderDeclaration } from '../routing/text-scan.js';
import { DEFAULT_RUNTIME_MODULE } from './routes-generator.js';

export class ScaffoldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScaffoldError';
  }
}

export interface ScaffoldResult {
  files: string[];
  /** URL pattern served by the new file, where it serves one. */
  pattern?: string;
}

interface ScaffoldBase {
  appDir: string;
  runtimeModule?: string;
}

export interface RouteScaffold extends ScaffoldBase {
  path: string;
  methods?: string[];
}

export type MiddlewareTemplate = 'blank' | 'logging' | 'timing';

export interface MiddlewareScaffold extends ScaffoldBase {
  path?: string;
  template?: MiddlewareTemplate;
}

export type ProxyTemplate = 'blank' | 'maintenance';

export interface ProxyScaffold extends ScaffoldBase {
  template?: ProxyTemplate;
}

export interface PageScaffold extends ScaffoldBase {
  path?: string;
  withLayout?: boolean;
}

export interface LoaderScaffold extends ScaffoldBase {
  path?: string;
  /** Name of the returned data interface. Defaults to the path in PascalCase plus `Data`. */
  dataType?: string;
}

// ============================================================================
// Templates
// ============================================================================

// The router stores a catch-all capture under '*'.
function paramReads(params: string[], catchAll: string | null): string[] {
  return params.map(p => `${p}: ctx.param('${p === catchAll ? '*' : p}')`);
}

function routeTemplate(runtime: string, methods: HttpMethod[], params: string[], catchAll: string | null): string {
  const reads = paramReads(params, catchAll);
  const handlers = methods.map(method => {
    const body = method === 'GET'
      ? reads.length > 0
        ? `  ctx.json(200, { ${reads.join(', ')} });`
        : `  ctx.json(200, { ok: true });`
      : method === 'DELETE' || method === 'HEAD' || method === 'OPTIONS'
        ? `  ctx.send(204, '');`
        : `  ctx.json(${method === 'POST' ? 201 : 200}, { ok: true });`;
    return `export async function ${method}(ctx: Context): Promise<void> {\n${body}\n}\n`;
  });

  return `import type { Context } from '${runtime}';\n\n${handlers.join('\n')}`;
}

const MIDDLEWARE_TEMPLATES: Record<MiddlewareTemplate, (runtime: string) => string> = {
  blank: runtime => `import type { Context, HandlerFunc } from '${runtime}';

export function middleware(next: HandlerFunc): HandlerFunc {
  return async (ctx: Context) => {
    await next(ctx);
  };
}
`,
  logging: runtime => `import type { Context, HandlerFunc } from '${runtime}';

export function middleware(next: HandlerFunc): HandlerFunc {
  return async (ctx: Context) => {
    console.log(\`--> \${ctx.method} \${ctx.path}\`);
    await next(ctx);
    console.log(\`<-- \${ctx.method} \${ctx.path}\`);
  };
}
`,
  timing: runtime => `import type { Context, HandlerFunc } from '${runtime}';

export function middleware(next: HandlerFunc): HandlerFunc {
  return async (ctx: Context) => {
    const start = performance.now();
    await next(ctx);
    ctx.setHeader('server-timing', \`total;dur=\${(performance.now() - start).toFixed(1)}\`);
  };
}
`,
};

const PROXY_TEMPLATES: Record<ProxyTemplate, (runtime: string) => string> = {
  blank: runtime => `import { proxyContinue, type Context, type ProxyResult } from '${runtime}';

export const config = {
  matcher: ['/:path*'],
};

export function proxy(ctx: Context): ProxyResult {
  return proxyContinue();
}
`,
  maintenance: runtime => `import { proxyContinue, proxyResponse, type Context, type ProxyResult } from '${runtime}';

export const config = {
  matcher: ['/:path*'],
};

export function proxy(ctx: Context): ProxyResult {
  if (process.env.MAINTENANCE === '1') {
    return proxyResponse(503, 'Down for maintenance');
  }
  return proxyContinue();
}
`,
};

function pageTemplate(title: string, params: string[]): string {
  const signature = params.map(p => `${p}: string`).join(', ');
  const details = params.map(p => `\n    <p>${p}: \${${p}}</p>`).join('');
  return `export function Page(${signature}): string {
  return \`<section>
    <h1>${title}</h1>${details}
  </section>\`;
}
`;
}

function loaderTemplate(runtime: string, dataType: string, params: string[], catchAll: string | null): string {
  const fields = params.length > 0 ? params.map(p => `  ${p}: string;`) : ['  path: string;'];
  const reads = params.length > 0 ? paramReads(params, catchAll) : ['path: ctx.path'];
  return `import type { Context } from '${runtime}';

export interface ${dataType} {
${fields.join('\n')}
}

export async function loader(ctx: Context): Promise<${dataType}> {
  return { ${reads.join(', ')} };
}
`;
}

function layoutTemplate(runtime: string): string {
  return `import type { LayoutProps } from '${runtime}';

export function Layout({ title, children }: LayoutProps): string {
  return \`<!doctype html>
<html>
  <head><title>\${title}</title></head>
  <body>
    <main>\${children}</main>
  </body>
</html>\`;
}
`;
}

// ============================================================================
// Generators
// ============================================================================

function normalizeRelPath(value: string | undefined): string {
  return (value ?? '').split(/[\\/]+/).filter(Boolean).join('/');
}

function writeNewFile(filePath: string, content: string): void {
  if (fs.existsSync(filePath)) {
    throw new ScaffoldError(`file already exists: ${filePath}`);
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

export function parseMethods(values: readonly string[] | undefined): HttpMethod[] {
  const methods: HttpMethod[] = [];
  for (const raw of values ?? ['GET']) {
    const method = raw.trim().toUpperCase();
    if (!method) continue;
    if (!isHttpMethod(method)) {
      throw new ScaffoldError(`unknown HTTP method: ${raw}`);
    }
    if (!methods.includes(method)) methods.push(method);
  }
  return methods.length > 0 ? methods : ['GET'];
}

export function generateRoute(options: RouteScaffold): ScaffoldResult {
  const rel = normalizeRelPath(options.path);
  const methods = parseMethods(options.methods);
  const translated = translatePath(rel);
  const filePath = path.join(options.appDir, ...rel.split('/').filter(Boolean), 'route.ts');

  writeNewFile(filePath, routeTemplate(options.runtimeModule ?? DEFAULT_RUNTIME_MODULE, methods, translated.params, translated.catchAll));
  return { files: [filePath], pattern: translated.pattern };
}

export function generateMiddleware(options: MiddlewareScaffold): ScaffoldResult {
  const rel = normalizeRelPath(options.path);
  const template = MIDDLEWARE_TEMPLATES[options.template ?? 'blank'];
  const filePath = path.join(options.appDir, ...rel.split('/').filter(Boolean), 'middleware.ts');

  writeNewFile(filePath, template(options.runtimeModule ?? DEFAULT_RUNTIME_MODULE));
  return { files: [filePath] };
}

export function generateProxy(options: ProxyScaffold): ScaffoldResult {
  const template = PROXY_TEMPLATES[options.template ?? 'blank'];
  const filePath = path.join(options.appDir, 'proxy.ts');

  writeNewFile(filePath, template(options.runtimeModule ?? DEFAULT_RUNTIME_MODULE));
  return { files: [filePath] };
}

/** Page plus, on request, a layout beside it. An existing layout is left alone. */
export function generatePage(options: PageScaffold): ScaffoldResult {
  const rel = normalizeRelPath(options.path);
  const dir = path.join(options.appDir, ...rel.split('/').filter(Boolean));
  const translated = translatePath(rel);
  const pagePath = path.join(dir, 'page.ts');

  writeNewFile(pagePath, pageTemplate(deriveTitle(rel), translated.params));
  const files = [pagePath];

  if (options.withLayout) {
    const layoutPath = path.join(dir, 'layout.ts');
    if (!fs.existsSync(layoutPath)) {
      writeNewFile(layoutPath, layoutTemplate(options.runtimeModule ?? DEFAULT_RUNTIME_MODULE));
      files.push(layoutPath);
    }
  }

  return { files, pattern: translated.pattern };
}

function defaultDataType(rel: string): string {
  if (rel === '') return 'HomeData';
  const words = translatePath(rel).identifier.split('_').filter(Boolean);
  return words.map(word => word.charAt(0).toUpperCase() + word.slice(1)).join('') + 'Data';
}

/**
 * Sibling `loader.ts` for the page at `path`. Refuses when the page already
 * exports its own loader, since that one takes precedence.
 */
export function generateLoader(options: LoaderScaffold): ScaffoldResult {
  const rel = normalizeRelPath(options.path);
  const dir = path.join(options.appDir, ...rel.split('/').filter(Boolean));
  const translated = translatePath(rel);
  const dataType = options.dataType ?? defaultDataType(rel);

  if (!/^[A-Za-z_$][\w$]*$/.test(dataType)) {
    throw new ScaffoldError(`invalid data type name: ${dataType}`);
  }

  const pagePath = path.join(dir, 'page.ts');
  if (fs.existsSync(pagePath) && hasLoaderDeclaration(fs.readFileSync(pagePath, 'utf-8'))) {
    throw new ScaffoldError(`page already exports a loader: ${pagePath}`);
  }

  const loaderPath = path.join(dir, LOADER_FILE);
  writeNewFile(loaderPath, loaderTemplate(
    options.runtimeModule ?? DEFAULT_RUNTIME_MODULE,
    dataType,
    translated.params,
    translated.catchAll
  ));
  return { files: [loaderPath], pattern: translated.pattern };
}

export function isMiddlewareTemplate(value: string): value is MiddlewareTemplate {
  return Object.prototype.hasOwnProperty.call(MIDDLEWARE_TEMPLATES, value);
}

export function isProxyTemplate(value: string): value is ProxyTemplate {
  return Object.prototype.hasOwnProperty.call(PROXY_TEMPLATES, value);
}
