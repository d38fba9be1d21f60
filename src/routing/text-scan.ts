import type { PageParam } from './types.js';

// ============================================================================
// Lightweight text scanning for page and layout modules
// ============================================================================
//
// Pages are read textually so that any valid Page() declaration is accepted
// regardless of the types it references.

const IDENT_RE = /^[A-Za-z_$][\w$]*$/;
const PAGE_DECL_RE = /export\s+(?:async\s+)?function\s+Page\s*(?:<[^>]*>\s*)?\(/;
const LOADER_RE = /export\s+(?:(?:async\s+)?function\s+loader\b|const\s+loader\b)/;
const LAYOUT_DECL_RE = /export\s+(?:async\s+)?function\s+Layout\s*(?:<[^>]*>\s*)?\(/;

export const CHILDREN_MARKER = '${children}';

/**
 * Index of `target` at nesting depth 0, ignoring string contents.
 * Returns -1 when absent.
 */
export function topLevelIndexOf(input: string, target: string): number {
  return scanTopLevel(input, target, () => true);
}

export function splitTopLevel(input: string, separator = ','): string[] {
  const parts: string[] = [];
  let start = 0;
  scanTopLevel(input, separator, index => {
    parts.push(input.slice(start, index));
    start = index + 1;
    return false;
  });
  parts.push(input.slice(start));
  return parts;
}

function scanTopLevel(input: string, target: string, onMatch: (index: number) => boolean): number {
  let depth = 0;
  let inString: '"' | "'" | '`' | null = null;
  let escaped = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === inString) {
        inString = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') {
      inString = ch;
      continue;
    }
    if (ch === '(' || ch === '[' || ch === '{' || ch === '<') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}' || (ch === '>' && input[i - 1] !== '=')) {
      depth = Math.max(0, depth - 1);
    } else if (ch === target && depth === 0 && !(ch === '=' && input[i + 1] === '>')) {
      if (onMatch(i)) return i;
    }
  }

  return -1;
}

/** Text between the parenthesis at `openIndex` and its matching close, or null if unbalanced. */
export function readBalancedParens(text: string, openIndex: number): string | null {
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(') depth++;
    else if (ch === ')') {
      depth--;
      if (depth === 0) return text.slice(openIndex + 1, i);
    }
  }
  return null;
}

function stripDefaultValue(input: string): string {
  const eqIdx = topLevelIndexOf(input, '=');
  return eqIdx >= 0 ? input.slice(0, eqIdx).trim() : input.trim();
}

export interface ParsedParam {
  name: string;
  type: string;
}

/**
 * Parse a parameter list like `id: string, page, size: number`.
 *
 * A parameter without an annotation takes the type of the next annotated
 * parameter after it, falling back to `string`. Destructured parameters are
 * not addressable by name and are dropped.
 */
export function parseParamList(list: string): ParsedParam[] {
  const raw: Array<{ name: string; type: string | null }> = [];

  for (const part of splitTopLevel(list)) {
    const entry = stripDefaultValue(part);
    if (!entry) continue;

    const colonIdx = topLevelIndexOf(entry, ':');
    const namePart = (colonIdx >= 0 ? entry.slice(0, colonIdx) : entry).trim().replace(/\?$/, '');
    const typePart = colonIdx >= 0 ? entry.slice(colonIdx + 1).trim() : '';

    if (!IDENT_RE.test(namePart)) continue;
    raw.push({ name: namePart, type: typePart || null });
  }

  const result: ParsedParam[] = new Array(raw.length);
  let carried = 'string';
  for (let i = raw.length - 1; i >= 0; i--) {
    const type = raw[i].type;
    if (type !== null) carried = type;
    result[i] = { name: raw[i].name, type: type ?? carried };
  }
  return result;
}

export interface PageDeclaration {
  params: ParsedParam[];
  hasLoader: boolean;
}

export function findPageDeclaration(source: string): PageDeclaration | null {
  const match = PAGE_DECL_RE.exec(source);
  if (!match) return null;

  const openIndex = match.index + match[0].length - 1;
  const list = readBalancedParens(source, openIndex);
  if (list === null) return null;

  return {
    params: parseParamList(list),
    hasLoader: LOADER_RE.test(source),
  };
}

export function hasLoaderDeclaration(source: string): boolean {
  return LOADER_RE.test(source);
}

export function hasLayoutDeclaration(source: string): boolean {
  return LAYOUT_DECL_RE.test(source) && source.includes(CHILDREN_MARKER);
}

export function toPageParams(parsed: ParsedParam[], urlParams: readonly string[]): PageParam[] {
  return parsed.map(param => ({
    name: param.name,
    type: param.type,
    fromPath: urlParams.includes(param.name),
  }));
}
