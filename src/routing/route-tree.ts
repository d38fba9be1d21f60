import { compileMatcher, type CompiledMatcher } from './proxy-pattern.js';
import { calculatePriority } from './segments.js';

export interface RouteEntry<H> {
  readonly method: string;
  readonly pattern: string;
  readonly priority: number;
  readonly scope: string;
  readonly handler: H;
}

export interface MiddlewareEntry<M> {
  readonly pathPrefix: string;
  readonly scope: string;
  readonly middleware: M;
}

export interface ProxyEntry<P> {
  readonly handler: P;
  readonly matcher: CompiledMatcher;
}

export interface RouteMatch<H> {
  route: RouteEntry<H>;
  /** `{name}` captures by name; a trailing `*` capture is stored under `*`. */
  params: Record<string, string>;
}

interface IndexedRoute<H> {
  entry: RouteEntry<H>;
  order: number;
  regex: RegExp;
  keys: string[];
}

interface IndexedMiddleware<M> {
  entry: MiddlewareEntry<M>;
  order: number;
  depth: number;
}

/** Scope implied by a URL pattern when a route has no directory scope. */
export function scopeFromPattern(pattern: string): string {
  return pattern.replace(/^\/+/, '').replace(/\/+$/, '');
}

function scopeDepth(scope: string): number {
  return scope === '' ? 0 : scope.split('/').length;
}

/** True when `ancestor` is `''` or a prefix of `scope` on a segment boundary. */
export function scopeContains(ancestor: string, scope: string): boolean {
  if (ancestor === '') return true;
  return scope === ancestor || scope.startsWith(ancestor + '/');
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileRoutePattern(pattern: string): { regex: RegExp; keys: string[] } {
  const keys: string[] = [];
  let source = '^';

  for (const segment of pattern.split('/').filter(Boolean)) {
    if (segment === '*') {
      keys.push('*');
      source += '(?:/(.*))?';
      break;
    }
    const param = /^\{([^}]+)\}$/.exec(segment);
    if (param) {
      keys.push(param[1]);
      source += '/([^/]+)';
    } else {
      source += '/' + escapeRegex(segment);
    }
  }

  if (source === '^') source += '/';
  return { regex: new RegExp(source + '$'), keys };
}

function normalizeRequestPath(requestPath: string): string {
  if (requestPath.length > 1 && requestPath.endsWith('/')) return requestPath.replace(/\/+$/, '') || '/';
  return requestPath || '/';
}

/** Malformed percent escapes are kept as sent. */
function decodeParam(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    if (error instanceof URIError) return raw;
    throw error;
  }
}

/**
 * Index of routes and middleware shared by the generator and the runtime
 * router, so both resolve priority and middleware inheritance identically.
 *
 * Not safe for mutation while another caller is querying it; build it once,
 * then read.
 */
export class RouteTree<H, M, P = unknown> {
  private readonly routeIndex: IndexedRoute<H>[] = [];
  private readonly middlewareIndex: IndexedMiddleware<M>[] = [];
  private proxyEntry: ProxyEntry<P> | undefined;
  private sorted: IndexedRoute<H>[] | null = null;

  addRoute(method: string, pattern: string, handler: H, scope: string = scopeFromPattern(pattern)): RouteEntry<H> {
    const entry: RouteEntry<H> = Object.freeze({
      method: method.toUpperCase(),
      pattern,
      priority: calculatePriority(pattern),
      scope,
      handler,
    });
    const { regex, keys } = compileRoutePattern(pattern);
    this.routeIndex.push({ entry, order: this.routeIndex.length, regex, keys });
    this.sorted = null;
    return entry;
  }

  addMiddleware(pathPrefix: string, scope: string, middleware: M): MiddlewareEntry<M> {
    const entry: MiddlewareEntry<M> = Object.freeze({ pathPrefix, scope, middleware });
    this.middlewareIndex.push({ entry, order: this.middlewareIndex.length, depth: scopeDepth(scope) });
    return entry;
  }

  /** Throws PatternCompileError when a matcher pattern does not compile. */
  setProxy(handler: P, patterns: readonly string[] = []): ProxyEntry<P> {
    const entry: ProxyEntry<P> = Object.freeze({ handler, matcher: compileMatcher(patterns) });
    this.proxyEntry = entry;
    return entry;
  }

  proxy(): ProxyEntry<P> | undefined {
    return this.proxyEntry;
  }

  /** Routes by descending priority; equal priorities keep insertion order. */
  routes(): RouteEntry<H>[] {
    return this.byPriority().map(indexed => indexed.entry);
  }

  private byPriority(): IndexedRoute<H>[] {
    if (!this.sorted) {
      this.sorted = [...this.routeIndex]
        .sort((a, b) => b.entry.priority - a.entry.priority || a.order - b.order);
    }
    return this.sorted;
  }

  middleware(): readonly MiddlewareEntry<M>[] {
    return this.middlewareIndex.map(indexed => indexed.entry);
  }

  /**
   * Middleware applying to `scope`, outermost first: global entries, then
   * by scope depth, then by registration order.
   */
  middlewareChain(scope: string): MiddlewareEntry<M>[] {
    return this.middlewareIndex
      .filter(indexed => scopeContains(indexed.entry.scope, scope))
      .sort((a, b) => a.depth - b.depth || a.order - b.order)
      .map(indexed => indexed.entry);
  }

  match(method: string, requestPath: string): RouteMatch<H> | null {
    const wanted = method.toUpperCase();
    const target = normalizeRequestPath(requestPath);
    for (const indexed of this.byPriority()) {
      const entry = indexed.entry;
      if (entry.method !== wanted) continue;

      const found = indexed.regex.exec(target);
      if (!found) continue;

      const params: Record<string, string> = {};
      indexed.keys.forEach((key, i) => {
        params[key] = decodeParam(found[i + 1] ?? '');
      });
      return { route: entry, params };
    }

    return null;
  }

  /** Methods registered for any pattern matching `requestPath`, for 405 responses. */
  allowedMethods(requestPath: string): string[] {
    const target = normalizeRequestPath(requestPath);
    const methods = new Set<string>();
    for (const indexed of this.routeIndex) {
      if (indexed.regex.test(target)) methods.add(indexed.entry.method);
    }
    return [...methods].sort();
  }
}
