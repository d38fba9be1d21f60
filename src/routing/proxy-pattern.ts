/**
 * Proxy matcher patterns.
 *
 * A compact path DSL compiled to regular expressions:
 *
 *   /api/:path*        zero or more segments after /api/
 *   /files/:name+      one or more segments
 *   /users/:id         exactly one segment
 *   /posts/:slug?      optional single segment
 *   /(en|de)/docs      inline alternation group, copied verbatim
 *   ^/raw-regex        used as a regular expression directly
 *   * , /* or ''       every path
 *
 * Every compiled pattern is anchored at the start and tolerates trailing
 * path content.
 */

export interface CompiledMatcher {
  readonly patterns: readonly string[];
  matches(path: string): boolean;
}

export class PatternCompileError extends Error {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`invalid proxy matcher pattern "${pattern}": ${reason}`);
    this.name = 'PatternCompileError';
    this.pattern = pattern;
  }
}

const REGEX_SPECIAL = new Set(['.', '+', '?', '[', ']', '{', '}', '\\', '^', '$', '|']);

function isParamChar(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

/** Regular expression source for one pattern. Does not validate it. */
export function compilePathPattern(pattern: string): string {
  if (pattern === '*' || pattern === '/*' || pattern === '') {
    return '.*';
  }

  if (pattern.startsWith('^') || pattern.startsWith('/(')) {
    let source = pattern.endsWith('/') ? pattern.slice(0, -1) : pattern;
    if (!source.startsWith('^')) source = '^' + source;
    return source;
  }

  let out = '^';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === ':') {
      let j = i + 1;
      while (j < pattern.length && isParamChar(pattern[j])) j++;

      const modifier = pattern[j];
      if (modifier === '*') {
        out += '.*';
        j++;
      } else if (modifier === '+') {
        out += '.+';
        j++;
      } else if (modifier === '?') {
        out += '([^/]*)';
        j++;
      } else {
        out += '([^/]+)';
      }
      i = j;
      continue;
    }

    if (ch === '*') {
      out += '.*';
      i++;
      continue;
    }

    if (ch === '(') {
      let j = i + 1;
      let depth = 1;
      while (j < pattern.length && depth > 0) {
        if (pattern[j] === '(') depth++;
        else if (pattern[j] === ')') depth--;
        j++;
      }
      out += pattern.slice(i, j);
      i = j;
      continue;
    }

    out += REGEX_SPECIAL.has(ch) ? '\\' + ch : ch;
    i++;
  }

  return out + '(/.*)?$';
}

export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(compilePathPattern(pattern));
  } catch (error) {
    throw new PatternCompileError(pattern, error);
  }
}

/** Compile a matcher list. An empty list matches every path. */
export function compileMatcher(patterns: readonly string[]): CompiledMatcher {
  const compiled = patterns.map(compilePattern);
  const frozen = Object.freeze([...patterns]);

  return {
    patterns: frozen,
    matches(path: string): boolean {
      if (compiled.length === 0) return true;
      return compiled.some(re => re.test(path));
    },
  };
}
