import * as fs from 'fs';
import * as path from 'path';
import { warn, type LogOptions } from '../core/log.js';
import { isUrlConvertible, resolveConflicts, type ParamWarning, type RouteConflict } from '../routing/conflicts.js';
import { RouteTree, scopeContains } from '../routing/route-tree.js';
import { scanApp } from '../routing/scanner.js';
import { translatePath } from '../routing/segments.js';
import {
  routingFileKind,
  type LayoutRecord,
  type MiddlewareRecord,
  type PageParam,
  type PageRecord,
  type ProxyDescriptor,
  type RouteRecord,
  type ScanResult,
} from '../routing/types.js';
import { createImportMappings, resolveImportPath, type ImportMapping } from './import-paths.js';

export const GENERATED_HEADER = '// Code generated by kiln. DO NOT EDIT.';
export const DEFAULT_OUTPUT_FILE = 'routes.generated.ts';
export const DEFAULT_RUNTIME_MODULE = 'kiln';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions extends LogOptions {
  /** Module the generated file imports `App`, `Context` and `renderPage` from. */
  runtimeModule?: string;
}

export interface GenerateResult {
  outputPath: string;
  /** False when the existing file already had identical contents. */
  written: boolean;
  scan: ScanResult;
  routes: RouteRecord[];
  conflicts: RouteConflict[];
  warnings: ParamWarning[];
  mappings: ImportMapping[];
}

/** Machine-readable report printed by `kiln routes generate --json`. */
export interface GenerationSummary {
  success: true;
  generatedFiles: string[];
  written: boolean;
  routes: number;
  middleware: number;
  pages: number;
  layouts: number;
  proxy: boolean;
  stagedImports: number;
  skipped: Array<{ file: string; name: string; reason: string }>;
  conflicts: string[];
  warnings: string[];
}

export class OutputConflictError extends Error {
  readonly outputPath: string;

  constructor(outputPath: string) {
    super(`refusing to overwrite ${outputPath}: it is a hand-authored routing file`);
    this.name = 'OutputConflictError';
    this.outputPath = outputPath;
  }
}

export interface RenderInput {
  appDir: string;
  outputPath: string;
  proxy: ProxyDescriptor | null;
  middleware: readonly MiddlewareRecord[];
  routes: readonly RouteRecord[];
  pages: readonly PageRecord[];
  layouts: readonly LayoutRecord[];
  mappings?: readonly ImportMapping[];
  runtimeModule?: string;
}

// ============================================================================
// Aliases
// ============================================================================

/**
 * Import aliases for one generation run. Each module gets one alias; a base
 * name already taken by another module is suffixed 2, 3, ...
 */
export class AliasRegistry {
  private readonly byModule = new Map<string, string>();
  private readonly nextSuffix = new Map<string, number>();
  private readonly taken = new Set<string>();
  private readonly ordered: Array<{ alias: string; specifier: string }> = [];

  aliasFor(specifier: string, base: string): string {
    const existing = this.byModule.get(specifier);
    if (existing) return existing;

    let alias = base;
    let suffix = this.nextSuffix.get(base) ?? 2;
    while (this.taken.has(alias)) {
      alias = `${base}${suffix}`;
      suffix++;
    }
    this.nextSuffix.set(base, suffix);

    this.taken.add(alias);
    this.byModule.set(specifier, alias);
    this.ordered.push({ alias, specifier });
    return alias;
  }

  imports(): ReadonlyArray<{ alias: string; specifier: string }> {
    return this.ordered;
  }
}

// ============================================================================
// Rendering helpers
// ============================================================================

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/\n/g, '\\n')}'`;
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

function importSpecifier(fromDir: string, file: string): string {
  let rel = toPosix(path.relative(fromDir, file)).replace(/\.ts$/, '.js');
  if (!rel.startsWith('.')) rel = `./${rel}`;
  return rel;
}

function aliasBase(dir: string, kind: string): string {
  return kind === 'proxy' ? 'proxy' : `${translatePath(dir).identifier}_${kind}`;
}

const ARRAY_TYPE_RE = /^(?:.+\[\]|(?:Readonly)?Array<.+>)$/;

export function zeroValue(type: string): string {
  const trimmed = type.trim();
  if (trimmed === 'string') return "''";
  if (trimmed === 'number') return '0';
  if (trimmed === 'boolean') return 'false';
  if (trimmed === 'bigint') return '0n';
  if (ARRAY_TYPE_RE.test(trimmed)) return '[]';
  // Any other declared type: assignable to every parameter under strict.
  return 'undefined as never';
}

function paramExpression(page: PageRecord, param: PageParam): string {
  if (!param.fromPath || !isUrlConvertible(param.type)) return zeroValue(param.type);

  const key = param.name === page.catchAllParam ? '*' : param.name;
  const read = `ctx.param(${quote(key)})`;
  switch (param.type.trim()) {
    case 'number':
      return `Number(${read})`;
    case 'boolean':
      return `${read} === 'true'`;
    case 'string[]':
      return `${read}.split('/').filter(Boolean)`;
    default:
      return read;
  }
}

function layoutsFor(page: PageRecord, layouts: readonly LayoutRecord[]): LayoutRecord[] {
  const depth = (scope: string) => (scope === '' ? 0 : scope.split('/').length);
  return layouts
    .filter(layout => scopeContains(layout.scope, page.scope))
    .sort((a, b) => depth(a.scope) - depth(b.scope));
}

// ============================================================================
// Module rendering
// ============================================================================

function renderEmpty(runtimeModule: string): string {
  return [
    GENERATED_HEADER,
    '',
    `import type { App } from ${quote(runtimeModule)};`,
    '',
    'export function registerRoutes(_app: App): void {}',
    '',
  ].join('\n');
}

/** Render the registration module. Pure; the same input gives the same text. */
export function renderRoutesModule(input: RenderInput): string {
  const runtimeModule = input.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  const proxy = input.proxy && input.proxy.hasValidSignature ? input.proxy : null;

  if (!proxy && input.middleware.length === 0 && input.routes.length === 0 && input.pages.length === 0) {
    return renderEmpty(runtimeModule);
  }

  const outDir = path.dirname(path.resolve(input.outputPath));
  const mappings = input.mappings ?? [];
  const aliases = new AliasRegistry();
  const alias = (file: string, dir: string, kind: string) =>
    aliases.aliasFor(importSpecifier(outDir, resolveImportPath(file, mappings)), aliasBase(dir, kind));

  const blocks: string[][] = [];

  if (proxy) {
    const name = alias(proxy.sourceFile, '', 'proxy');
    const patterns = proxy.matcherPatterns.map(quote).join(', ');
    blocks.push([`  app.setProxy(${name}.proxy, [${patterns}]);`]);
  }

  if (input.middleware.length > 0) {
    blocks.push(input.middleware.map(mw => {
      const name = alias(mw.sourceFile, mw.dir, 'middleware');
      return `  app.addMiddleware(${quote(mw.pathPrefix)}, ${quote(mw.scope)}, ${name}.${mw.middleware});`;
    }));
  }

  if (input.routes.length > 0) {
    blocks.push(input.routes.map(route => {
      const name = alias(route.sourceFile, route.dir, 'route');
      return `  app.registerRoute(${quote(route.method)}, ${quote(route.pattern)}, ${name}.${route.handler}, ${quote(route.scope)});`;
    }));
  }

  for (const page of input.pages) {
    const name = alias(page.sourceFile, page.dir, 'page');
    const layoutRefs = layoutsFor(page, input.layouts)
      .map(layout => `${alias(layout.sourceFile, layout.dir, 'layout')}.Layout`);

    let body: string;
    if (page.loaderFile) {
      const loader = page.loaderFile === page.sourceFile ? name : alias(page.loaderFile, page.dir, 'loader');
      body = `${name}.Page(await ${loader}.loader(ctx))`;
    } else if (page.params.length > 0) {
      body = `${name}.Page(${page.params.map(param => paramExpression(page, param)).join(', ')})`;
    } else {
      body = `${name}.Page()`;
    }

    blocks.push([
      `  app.get(${quote(page.pattern)}, async (ctx: Context) => {`,
      `    await renderPage(ctx, ${body}, { title: ${quote(page.title)}, layouts: [${layoutRefs.join(', ')}] });`,
      `  }, ${quote(page.scope)});`,
    ]);
  }

  const runtimeImport = input.pages.length > 0
    ? `import { renderPage, type App, type Context } from ${quote(runtimeModule)};`
    : `import type { App } from ${quote(runtimeModule)};`;

  const lines = [
    GENERATED_HEADER,
    `// Source: ${toPosix(path.relative(outDir, path.resolve(input.appDir))) || '.'}`,
    '',
    runtimeImport,
    ...aliases.imports().map(entry => `import * as ${entry.alias} from ${quote(entry.specifier)};`),
    '',
    'export function registerRoutes(app: App): void {',
    blocks.map(block => block.join('\n')).join('\n\n'),
    '}',
    '',
  ];

  return lines.join('\n');
}

// ============================================================================
// Pipeline
// ============================================================================

function assertWritableOutput(outputPath: string): void {
  if (!routingFileKind(path.basename(outputPath)) || !fs.existsSync(outputPath)) return;

  const existing = fs.readFileSync(outputPath, 'utf-8');
  if (!existing.startsWith(GENERATED_HEADER)) {
    throw new OutputConflictError(outputPath);
  }
}

/** Build-time index, also where an invalid proxy matcher fails the run. */
export function buildRouteTree(
  routes: readonly RouteRecord[],
  middleware: readonly MiddlewareRecord[],
  proxy: ProxyDescriptor | null
): RouteTree<RouteRecord, MiddlewareRecord, ProxyDescriptor> {
  const tree = new RouteTree<RouteRecord, MiddlewareRecord, ProxyDescriptor>();
  if (proxy && proxy.hasValidSignature) tree.setProxy(proxy, proxy.matcherPatterns);
  for (const mw of middleware) tree.addMiddleware(mw.pathPrefix, mw.scope, mw);
  for (const route of routes) tree.addRoute(route.method, route.pattern, route, route.scope);
  return tree;
}

function collectSourceFiles(scan: ScanResult, routes: readonly RouteRecord[]): string[] {
  return [
    ...(scan.proxy ? [scan.proxy.sourceFile] : []),
    ...scan.middleware.map(mw => mw.sourceFile),
    ...routes.map(route => route.sourceFile),
    ...scan.pages.map(page => page.sourceFile),
    ...scan.pages.flatMap(page => (page.loaderFile ? [page.loaderFile] : [])),
    ...scan.layouts.map(layout => layout.sourceFile),
  ];
}

export function summarizeGeneration(result: GenerateResult): GenerationSummary {
  const { scan } = result;
  return {
    success: true,
    generatedFiles: [result.outputPath],
    written: result.written,
    routes: result.routes.length,
    middleware: scan.middleware.length,
    pages: scan.pages.length,
    layouts: scan.layouts.length,
    proxy: scan.proxy !== null && scan.proxy.hasValidSignature,
    stagedImports: result.mappings.length,
    skipped: scan.skipped.map(entry => ({
      file: toPosix(path.relative(scan.appDir, entry.sourceFile)),
      name: entry.name,
      reason: entry.reason,
    })),
    conflicts: result.conflicts.map(conflict => conflict.message),
    warnings: result.warnings.map(warning => warning.message),
  };
}

/**
 * Scan `appDir`, resolve conflicts and write the registration module.
 *
 * Throws on unparseable routing files, invalid proxy matchers and output
 * paths that point at hand-authored routing files. Conflicts and parameter
 * mismatches are warned about and returned.
 */
export async function generateRoutesFile(
  appDir: string,
  outputPath: string,
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const resolvedOutput = path.resolve(outputPath);
  assertWritableOutput(resolvedOutput);

  const scan = scanApp(appDir, options);
  const { routes, conflicts, warnings } = resolveConflicts(scan);
  buildRouteTree(routes, scan.middleware, scan.proxy);

  const mappings = createImportMappings(scan.appDir, collectSourceFiles(scan, routes), options);

  const content = renderRoutesModule({
    appDir: scan.appDir,
    outputPath: resolvedOutput,
    proxy: scan.proxy,
    middleware: scan.middleware,
    routes,
    pages: scan.pages,
    layouts: scan.layouts,
    mappings,
    runtimeModule: options.runtimeModule,
  });

  for (const conflict of conflicts) warn('routes', conflict.message);
  for (const warning of warnings) warn('routes', warning.message);

  const unchanged = fs.existsSync(resolvedOutput) && fs.readFileSync(resolvedOutput, 'utf-8') === content;
  if (!unchanged) {
    await fs.promises.mkdir(path.dirname(resolvedOutput), { recursive: true });
    await fs.promises.writeFile(resolvedOutput, content, 'utf-8');
  }

  return {
    outputPath: resolvedOutput,
    written: !unchanged,
    scan,
    routes,
    conflicts,
    warnings,
    mappings,
  };
}
