// ============================================================================
// Directory segment conventions
// ============================================================================
//
//   users          literal          /users
//   [id]           param            /{id}
//   [...slug]      catch-all        /*
//   [[...slug]]    optional         /*   (also matches the bare prefix)
//   (admin)        group            not in the URL, kept in the scope
//   _components    private          subtree pruned

export type Segment =
  | { kind: 'literal'; value: string }
  | { kind: 'param'; name: string }
  | { kind: 'wildcard'; name: string; optional: boolean }
  | { kind: 'group'; name: string }
  | { kind: 'skip' };

export interface TranslatedPath {
  /** Slash-rooted URL pattern using `{name}` and `*`. */
  pattern: string;
  /** Pattern contributions plus group markers, without a leading slash. Root is `''`. */
  scope: string;
  /** Dynamic and catch-all parameter names in path order. */
  params: string[];
  /** Name of the catch-all parameter, whose value the router stores under `*`. */
  catchAll: string | null;
  /** JS-safe base name for generated aliases, from every non-private segment. */
  identifier: string;
  /** True when some segment is private and the whole subtree must be pruned. */
  skipped: boolean;
}

export const PRIORITY_STATIC = 100;
export const PRIORITY_DYNAMIC = 50;
export const PRIORITY_WILDCARD = 5;

const OPTIONAL_CATCH_ALL_RE = /^\[\[\.\.\.([A-Za-z_$][\w$]*)\]\]$/;
const CATCH_ALL_RE = /^\[\.\.\.([A-Za-z_$][\w$]*)\]$/;
const GROUP_RE = /^\(([^()/]+)\)$/;
const DYNAMIC_RE = /^\[([A-Za-z_$][\w$]*)\]$/;

export function translateSegment(segment: string): Segment {
  let match = OPTIONAL_CATCH_ALL_RE.exec(segment);
  if (match) return { kind: 'wildcard', name: match[1], optional: true };

  match = CATCH_ALL_RE.exec(segment);
  if (match) return { kind: 'wildcard', name: match[1], optional: false };

  match = GROUP_RE.exec(segment);
  if (match) return { kind: 'group', name: match[1] };

  match = DYNAMIC_RE.exec(segment);
  if (match) return { kind: 'param', name: match[1] };

  if (segment.startsWith('_')) return { kind: 'skip' };

  return { kind: 'literal', value: segment };
}

export function isRouteGroup(segment: string): boolean {
  return GROUP_RE.test(segment);
}

export function isPrivateSegment(segment: string): boolean {
  return translateSegment(segment).kind === 'skip';
}

function splitSegments(relativeDir: string): string[] {
  return relativeDir.split('/').filter(part => part !== '' && part !== '.');
}

/**
 * Translate a POSIX path relative to the app directory.
 *
 * `(admin)/users/[id]` → pattern `/users/{id}`, scope `(admin)/users/{id}`.
 */
export function translatePath(relativeDir: string): TranslatedPath {
  const urlParts: string[] = [];
  const scopeParts: string[] = [];
  const identParts: string[] = [];
  const params: string[] = [];
  let catchAll: string | null = null;
  let skipped = false;

  for (const raw of splitSegments(relativeDir)) {
    const segment = translateSegment(raw);
    switch (segment.kind) {
      case 'literal':
        urlParts.push(segment.value);
        scopeParts.push(segment.value);
        identParts.push(segment.value);
        break;
      case 'param':
        urlParts.push(`{${segment.name}}`);
        scopeParts.push(`{${segment.name}}`);
        identParts.push(segment.name);
        params.push(segment.name);
        break;
      case 'wildcard':
        urlParts.push('*');
        scopeParts.push('*');
        identParts.push(segment.name);
        params.push(segment.name);
        catchAll = segment.name;
        break;
      case 'group':
        scopeParts.push(`(${segment.name})`);
        identParts.push(segment.name);
        break;
      case 'skip':
        skipped = true;
        break;
    }
  }

  return {
    pattern: urlParts.length > 0 ? '/' + urlParts.join('/') : '/',
    scope: scopeParts.join('/'),
    params,
    catchAll,
    identifier: toIdentifier(identParts),
    skipped,
  };
}

export function calculatePriority(pattern: string): number {
  if (pattern.includes('*')) return PRIORITY_WILDCARD;
  if (pattern.includes('{')) return PRIORITY_DYNAMIC;
  return PRIORITY_STATIC;
}

export function toIdentifier(parts: string[]): string {
  const joined = parts
    .map(part => part.replace(/[^A-Za-z0-9_]/g, '_'))
    .filter(Boolean)
    .join('_');

  if (!joined) return 'root';
  return /^[0-9]/.test(joined) ? `_${joined}` : joined;
}

export function toTitleCase(value: string): string {
  return value
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** Page title from the deepest URL-visible segment; "Home" at the root. */
export function deriveTitle(relativeDir: string): string {
  const segments = splitSegments(relativeDir).map(translateSegment);

  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i];
    if (segment.kind === 'literal') return toTitleCase(segment.value);
    if (segment.kind === 'param' || segment.kind === 'wildcard') return toTitleCase(segment.name);
  }

  return 'Home';
}
