import * as fs from 'fs';
import * as path from 'path';
import ts from 'typescript';
import { debug, type LogOptions } from '../core/log.js';
import { calculatePriority, deriveTitle, translatePath, translateSegment } from './segments.js';
import {
  checkHandlerSignature,
  checkMiddlewareSignature,
  checkProxySignature,
  type ExportedFunction,
  type SignatureResult,
} from './signatures.js';
import {
  findPageDeclaration,
  hasLayoutDeclaration,
  hasLoaderDeclaration,
  toPageParams,
  type PageDeclaration,
} from './text-scan.js';
import {
  isHttpMethod,
  LOADER_FILE,
  routingFileKind,
  type LayoutRecord,
  type MiddlewareRecord,
  type PageRecord,
  type ProxyDescriptor,
  type RouteRecord,
  type RoutingFileKind,
  type ScanResult,
  type SkippedDeclaration,
} from './types.js';

export const STAGING_DIR_NAME = '.kiln';

export type ScanOptions = LogOptions;

export class ScanError extends Error {
  readonly sourceFile: string;

  constructor(sourceFile: string, message: string) {
    super(`failed to parse ${sourceFile}: ${message}`);
    this.name = 'ScanError';
    this.sourceFile = sourceFile;
  }
}

// ============================================================================
// Parsing
// ============================================================================

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `${line + 1}:${character + 1} ${message}`;
  }
  return message;
}

/** Parse without type checking; any syntax error is fatal. */
export function parseRoutingSource(filePath: string, text: string): ts.SourceFile {
  const { diagnostics } = ts.transpileModule(text, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.ESNext },
  });

  const syntaxErrors = (diagnostics ?? []).filter(d => d.category === ts.DiagnosticCategory.Error);
  if (syntaxErrors.length > 0) {
    throw new ScanError(filePath, formatDiagnostic(syntaxErrors[0]));
  }

  return ts.createSourceFile(filePath, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

function isExported(node: ts.Node): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some(m => m.kind === ts.SyntaxKind.ExportKeyword) ?? false;
}

function unwrapExpression(node: ts.Expression): ts.Expression {
  let current = node;
  while (
    ts.isParenthesizedExpression(current) ||
    ts.isAsExpression(current) ||
    ts.isSatisfiesExpression(current) ||
    ts.isTypeAssertionExpression(current)
  ) {
    current = current.expression;
  }
  return current;
}

/** Exported `function` declarations and `const` function initializers, in source order. */
export function collectExportedFunctions(sourceFile: ts.SourceFile): ExportedFunction[] {
  const found: ExportedFunction[] = [];

  for (const statement of sourceFile.statements) {
    if (ts.isFunctionDeclaration(statement) && statement.name && isExported(statement)) {
      found.push({ name: statement.name.text, node: statement });
      continue;
    }

    if (!ts.isVariableStatement(statement) || !isExported(statement)) continue;

    for (const decl of statement.declarationList.declarations) {
      if (!ts.isIdentifier(decl.name) || !decl.initializer) continue;
      const init = unwrapExpression(decl.initializer);
      if (ts.isArrowFunction(init) || ts.isFunctionExpression(init)) {
        found.push({ name: decl.name.text, node: init, declaredType: decl.type });
      }
    }
  }

  return found;
}

// ============================================================================
// Static matcher extraction
// ============================================================================

function findConstInitializer(sourceFile: ts.SourceFile, name: string): ts.Expression | null {
  for (const statement of sourceFile.statements) {
    if (!ts.isVariableStatement(statement)) continue;
    if (!(statement.declarationList.flags & ts.NodeFlags.Const)) continue;
    for (const decl of statement.declarationList.declarations) {
      if (ts.isIdentifier(decl.name) && decl.name.text === name && decl.initializer) {
        return decl.initializer;
      }
    }
  }
  return null;
}

function resolveValue(sourceFile: ts.SourceFile, expr: ts.Expression, seen: Set<string>): ts.Expression {
  const node = unwrapExpression(expr);
  if (!ts.isIdentifier(node) || seen.has(node.text)) return node;

  const init = findConstInitializer(sourceFile, node.text);
  if (!init) return node;
  seen.add(node.text);
  return resolveValue(sourceFile, init, seen);
}

function literalString(sourceFile: ts.SourceFile, expr: ts.Expression): string | null {
  const node = resolveValue(sourceFile, expr, new Set());
  return ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node) ? node.text : null;
}

function propertyName(name: ts.PropertyName): string | null {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  return null;
}

/**
 * Reads `export const config = { matcher: [...] }`.
 * Only string literals (directly or through a same-file const) are kept.
 */
export function extractMatcherPatterns(sourceFile: ts.SourceFile): string[] {
  const configInit = findConstInitializer(sourceFile, 'config');
  if (!configInit) return [];

  const config = resolveValue(sourceFile, configInit, new Set(['config']));
  if (!ts.isObjectLiteralExpression(config)) return [];

  for (const prop of config.properties) {
    if (!ts.isPropertyAssignment(prop) || propertyName(prop.name) !== 'matcher') continue;

    const value = resolveValue(sourceFile, prop.initializer, new Set());
    if (ts.isArrayLiteralExpression(value)) {
      const patterns: string[] = [];
      for (const element of value.elements) {
        const text = literalString(sourceFile, element);
        if (text !== null) patterns.push(text);
      }
      return patterns;
    }

    const single = literalString(sourceFile, value);
    return single !== null ? [single] : [];
  }

  return [];
}

// ============================================================================
// Directory walk
// ============================================================================

interface ScanState {
  appDir: string;
  options: ScanOptions;
  routes: RouteRecord[];
  middleware: MiddlewareRecord[];
  proxy: ProxyDescriptor | null;
  pages: PageRecord[];
  layouts: LayoutRecord[];
  skipped: SkippedDeclaration[];
}

function skipDeclaration(state: ScanState, sourceFile: string, name: string, result: SignatureResult): void {
  if (result.valid) return;
  state.skipped.push(Object.freeze({ sourceFile, name, reason: result.reason }));
  debug(state.options, 'scan', `skipped ${name} in ${path.relative(state.appDir, sourceFile)}: ${result.reason}`);
}

function shouldSkipDir(name: string): boolean {
  if (name.startsWith('.') || name === 'node_modules' || name === STAGING_DIR_NAME) return true;
  return translateSegment(name).kind === 'skip';
}

function scanRouteFile(state: ScanState, filePath: string, relDir: string, sourceFile: ts.SourceFile): void {
  const translated = translatePath(relDir);
  const seen = new Set<string>();

  for (const fn of collectExportedFunctions(sourceFile)) {
    const method = fn.name;
    if (!isHttpMethod(method) || seen.has(method)) continue;

    const result = checkHandlerSignature(fn);
    if (!result.valid) {
      skipDeclaration(state, filePath, method, result);
      continue;
    }

    seen.add(method);
    state.routes.push(Object.freeze({
      method,
      pattern: translated.pattern,
      priority: calculatePriority(translated.pattern),
      scope: translated.scope,
      dir: relDir,
      sourceFile: filePath,
      handler: method,
    }));
  }
}

function scanMiddlewareFile(state: ScanState, filePath: string, relDir: string, sourceFile: ts.SourceFile): void {
  const translated = translatePath(relDir);

  for (const fn of collectExportedFunctions(sourceFile)) {
    if (fn.name !== 'middleware') continue;

    const result = checkMiddlewareSignature(fn);
    if (!result.valid) {
      skipDeclaration(state, filePath, fn.name, result);
      continue;
    }

    state.middleware.push(Object.freeze({
      pathPrefix: relDir === '' ? '' : translated.pattern,
      scope: translated.scope,
      dir: relDir,
      sourceFile: filePath,
      middleware: fn.name,
    }));
    return;
  }
}

function scanProxyFile(state: ScanState, filePath: string, relDir: string, sourceFile: ts.SourceFile): void {
  if (relDir !== '') {
    debug(state.options, 'scan', `ignoring ${relDir}/proxy.ts: proxy is only recognized at the app root`);
    return;
  }

  const fn = collectExportedFunctions(sourceFile).find(candidate => candidate.name === 'proxy');
  if (!fn) {
    debug(state.options, 'scan', 'proxy.ts has no exported proxy function');
    return;
  }

  const result = checkProxySignature(fn);
  skipDeclaration(state, filePath, fn.name, result);

  state.proxy = Object.freeze({
    sourceFile: filePath,
    hasValidSignature: result.valid,
    matcherPatterns: Object.freeze(extractMatcherPatterns(sourceFile)),
  });
}

function findLoaderFile(filePath: string, decl: PageDeclaration): string | null {
  if (decl.hasLoader) return filePath;

  const sibling = path.join(path.dirname(filePath), LOADER_FILE);
  if (!fs.existsSync(sibling)) return null;

  const text = fs.readFileSync(sibling, 'utf-8');
  parseRoutingSource(sibling, text);
  return hasLoaderDeclaration(text) ? sibling : null;
}

function scanPageFile(state: ScanState, filePath: string, relDir: string, text: string): void {
  const decl = findPageDeclaration(text);
  if (!decl) {
    debug(state.options, 'scan', `no Page() export in ${path.relative(state.appDir, filePath)}`);
    return;
  }

  const translated = translatePath(relDir);
  state.pages.push(Object.freeze({
    pattern: translated.pattern,
    scope: translated.scope,
    dir: relDir,
    sourceFile: filePath,
    params: Object.freeze(toPageParams(decl.params, translated.params).map(p => Object.freeze(p))),
    urlParams: Object.freeze([...translated.params]),
    catchAllParam: translated.catchAll,
    title: deriveTitle(relDir),
    loaderFile: findLoaderFile(filePath, decl),
  }));
}

function scanLayoutFile(state: ScanState, filePath: string, relDir: string, text: string): void {
  if (!hasLayoutDeclaration(text)) {
    debug(state.options, 'scan', `layout ${path.relative(state.appDir, filePath)} needs a Layout() export containing \${children}`);
    return;
  }

  const translated = translatePath(relDir);
  state.layouts.push(Object.freeze({
    pathPrefix: translated.pattern,
    scope: translated.scope,
    dir: relDir,
    sourceFile: filePath,
    title: deriveTitle(relDir),
  }));
}

function scanFile(state: ScanState, kind: RoutingFileKind, filePath: string, relDir: string): void {
  const text = fs.readFileSync(filePath, 'utf-8');
  const sourceFile = parseRoutingSource(filePath, text);

  switch (kind) {
    case 'route':
      scanRouteFile(state, filePath, relDir, sourceFile);
      break;
    case 'middleware':
      scanMiddlewareFile(state, filePath, relDir, sourceFile);
      break;
    case 'proxy':
      scanProxyFile(state, filePath, relDir, sourceFile);
      break;
    case 'page':
      scanPageFile(state, filePath, relDir, text);
      break;
    case 'layout':
      scanLayoutFile(state, filePath, relDir, text);
      break;
  }
}

function walk(state: ScanState, dir: string, relDir: string): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const kind = routingFileKind(entry.name);
    if (kind) scanFile(state, kind, path.join(dir, entry.name), relDir);
  }

  for (const entry of entries) {
    if (!entry.isDirectory() || shouldSkipDir(entry.name)) continue;
    walk(state, path.join(dir, entry.name), relDir ? `${relDir}/${entry.name}` : entry.name);
  }
}

/** Walk `appDir` and collect registration records. A missing directory scans as empty. */
export function scanApp(appDir: string, options: ScanOptions = {}): ScanResult {
  const root = path.resolve(appDir);
  const state: ScanState = {
    appDir: root,
    options,
    routes: [],
    middleware: [],
    proxy: null,
    pages: [],
    layouts: [],
    skipped: [],
  };

  if (fs.existsSync(root) && fs.statSync(root).isDirectory()) {
    walk(state, root, '');
  }

  return Object.freeze({
    appDir: root,
    routes: Object.freeze(state.routes),
    middleware: Object.freeze(state.middleware),
    proxy: state.proxy,
    pages: Object.freeze(state.pages),
    layouts: Object.freeze(state.layouts),
    skipped: Object.freeze(state.skipped),
  });
}
