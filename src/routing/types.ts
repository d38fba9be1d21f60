export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}

export type RoutingFileKind = 'route' | 'middleware' | 'proxy' | 'page' | 'layout';

export const ROUTING_FILES: Record<string, RoutingFileKind> = {
  'route.ts': 'route',
  'middleware.ts': 'middleware',
  'proxy.ts': 'proxy',
  'page.ts': 'page',
  'layout.ts': 'layout',
};

export function routingFileKind(fileName: string): RoutingFileKind | null {
  return Object.prototype.hasOwnProperty.call(ROUTING_FILES, fileName) ? ROUTING_FILES[fileName] : null;
}

/** Optional companion of `page.ts` exporting the page's `loader`. */
export const LOADER_FILE = 'loader.ts';

// ============================================================================
// Registration records
// ============================================================================
//
// `dir` is the POSIX directory relative to the app root ('' at the root);
// `sourceFile` is absolute.

export interface RouteRecord {
  readonly method: HttpMethod;
  readonly pattern: string;
  readonly priority: number;
  readonly scope: string;
  readonly dir: string;
  readonly sourceFile: string;
  /** Exported name of the handler, identical to `method`. */
  readonly handler: string;
}

export interface MiddlewareRecord {
  readonly pathPrefix: string;
  readonly scope: string;
  readonly dir: string;
  readonly sourceFile: string;
  readonly middleware: string;
}

export interface ProxyDescriptor {
  readonly sourceFile: string;
  readonly hasValidSignature: boolean;
  readonly matcherPatterns: readonly string[];
}

export interface PageParam {
  readonly name: string;
  readonly type: string;
  /** True when the URL pattern carries a parameter of the same name. */
  readonly fromPath: boolean;
}

export interface PageRecord {
  readonly pattern: string;
  readonly scope: string;
  readonly dir: string;
  readonly sourceFile: string;
  readonly params: readonly PageParam[];
  readonly urlParams: readonly string[];
  readonly catchAllParam: string | null;
  readonly title: string;
  /** Module exporting `loader`: the page itself, a sibling loader.ts, or null. */
  readonly loaderFile: string | null;
}

export interface LayoutRecord {
  readonly pathPrefix: string;
  readonly scope: string;
  readonly dir: string;
  readonly sourceFile: string;
  readonly title: string;
}

export interface SkippedDeclaration {
  readonly sourceFile: string;
  readonly name: string;
  readonly reason: string;
}

export interface ScanResult {
  readonly appDir: string;
  readonly routes: readonly RouteRecord[];
  readonly middleware: readonly MiddlewareRecord[];
  readonly proxy: ProxyDescriptor | null;
  readonly pages: readonly PageRecord[];
  readonly layouts: readonly LayoutRecord[];
  readonly skipped: readonly SkippedDeclaration[];
}
