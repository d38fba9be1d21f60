import * as path from 'path';
import type { PageRecord, RouteRecord, ScanResult } from './types.js';

export type ConflictKind = 'page-get' | 'duplicate-route';

export interface RouteConflict {
  kind: ConflictKind;
  method: string;
  pattern: string;
  /** Files involved; the first one wins. */
  files: string[];
  message: string;
}

export interface ParamWarning {
  sourceFile: string;
  param: string;
  message: string;
}

export interface ResolvedRoutes {
  routes: RouteRecord[];
  conflicts: RouteConflict[];
  warnings: ParamWarning[];
}

const SCALAR_TYPES = new Set(['string', 'number', 'boolean']);

/** Types a URL segment can be converted to without a loader. */
export function isUrlConvertible(type: string): boolean {
  const trimmed = type.trim();
  return SCALAR_TYPES.has(trimmed) || trimmed === 'string[]';
}

function label(appDir: string, file: string): string {
  return path.relative(appDir, file).split(path.sep).join('/');
}

function pageParamWarnings(appDir: string, page: PageRecord): ParamWarning[] {
  if (page.loaderFile) return [];

  const warnings: ParamWarning[] = [];
  const file = label(appDir, page.sourceFile);
  const declared = new Set(page.params.map(p => p.name));
  const reported = new Set<string>();

  for (const urlParam of page.urlParams) {
    if (declared.has(urlParam) || reported.has(urlParam)) continue;
    reported.add(urlParam);
    warnings.push({
      sourceFile: page.sourceFile,
      param: urlParam,
      message:
        `URL parameter '${urlParam}' from ${page.pattern} is not accepted by Page() in ${file}. ` +
        `Add '${urlParam}: string' to Page() to use it.`,
    });
  }

  for (const param of page.params) {
    if (reported.has(param.name)) continue;

    if (param.fromPath) {
      if (isUrlConvertible(param.type)) continue;
      reported.add(param.name);
      warnings.push({
        sourceFile: page.sourceFile,
        param: param.name,
        message:
          `URL parameter '${param.name}' is declared as ${param.type} in ${file}; only string, number, ` +
          `boolean and string[] are read from the URL. It will be passed as a zero value. ` +
          `Export a loader() to provide it.`,
      });
      continue;
    }

    reported.add(param.name);
    const hint = SCALAR_TYPES.has(param.type.trim())
      ? ''
      : ` Export a loader() to provide '${param.name}: ${param.type}'.`;
    warnings.push({
      sourceFile: page.sourceFile,
      param: param.name,
      message:
        `Page parameter '${param.name}' in ${file} is not found in URL path ${page.pattern}. ` +
        `It will be passed as a zero value.${hint}`,
    });
  }

  return warnings;
}

/**
 * Applies page precedence and collects advisory diagnostics.
 *
 * A page owns GET for its directory: a route GET in the same directory is
 * dropped. Nothing here throws.
 */
export function resolveConflicts(scan: ScanResult): ResolvedRoutes {
  const pagesByDir = new Map(scan.pages.map(page => [page.dir, page]));
  const conflicts: RouteConflict[] = [];
  const routes: RouteRecord[] = [];

  for (const route of scan.routes) {
    const page = pagesByDir.get(route.dir);
    if (page && route.method === 'GET') {
      const routeFile = label(scan.appDir, route.sourceFile);
      const pageFile = label(scan.appDir, page.sourceFile);
      conflicts.push({
        kind: 'page-get',
        method: 'GET',
        pattern: route.pattern,
        files: [page.sourceFile, route.sourceFile],
        message:
          `GET ${route.pattern} is declared by both ${pageFile} and ${routeFile}. ` +
          `The page wins; remove GET from ${routeFile} or move the page.`,
      });
      continue;
    }
    routes.push(route);
  }

  const firstByKey = new Map<string, RouteRecord>();
  for (const route of routes) {
    const key = `${route.method} ${route.pattern}`;
    const first = firstByKey.get(key);
    if (!first) {
      firstByKey.set(key, route);
      continue;
    }
    conflicts.push({
      kind: 'duplicate-route',
      method: route.method,
      pattern: route.pattern,
      files: [first.sourceFile, route.sourceFile],
      message:
        `${key} is declared in ${label(scan.appDir, first.sourceFile)} and ` +
        `${label(scan.appDir, route.sourceFile)}. Requests resolve to the first registration.`,
    });
  }

  const warnings = scan.pages.flatMap(page => pageParamWarnings(scan.appDir, page));

  return { routes, conflicts, warnings };
}
