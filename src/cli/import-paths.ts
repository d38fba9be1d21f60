import * as fs from 'fs';
import * as path from 'path';
import { debug, type LogOptions } from '../core/log.js';
import { STAGING_DIR_NAME } from '../routing/scanner.js';

/**
 * Characters that change meaning inside a relative ESM specifier:
 * `#` and `?` start a fragment/query, `%` starts an escape and `\` is
 * read as a separator.
 */
const ILLEGAL_IMPORT_CHARS = /[#?%\\]/g;

export interface ImportMapping {
  /** Absolute directory holding the authored files. */
  originalPath: string;
  /** POSIX path relative to the staging root. */
  sanitizedAlias: string;
  /** Absolute staging directory containing file-level symlinks. */
  materializedDirectory: string;
}

export function stagingRoot(appDir: string): string {
  return path.join(path.dirname(path.resolve(appDir)), STAGING_DIR_NAME, 'imports');
}

export function needsSanitization(relativePath: string): boolean {
  return /[#?%\\]/.test(relativePath);
}

export function sanitizeSegment(segment: string): string {
  return segment.replace(ILLEGAL_IMPORT_CHARS, ch => `_${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

function isLinkableSource(name: string): boolean {
  return name.endsWith('.ts') && !name.endsWith('.d.ts') && !/\.(test|spec)\.ts$/.test(name);
}

function lstatOrNull(target: string): fs.Stats | null {
  try {
    return fs.lstatSync(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

/** Create, repair or keep one symlink. Never replaces something that is not a symlink. */
function ensureSymlink(linkPath: string, target: string): 'created' | 'repaired' | 'unchanged' {
  const stat = lstatOrNull(linkPath);

  if (stat && !stat.isSymbolicLink()) {
    throw new Error(`refusing to replace ${linkPath}: it is not a symlink created by kiln`);
  }

  if (stat) {
    if (fs.readlinkSync(linkPath) === target) return 'unchanged';
    fs.unlinkSync(linkPath);
    fs.symlinkSync(target, linkPath);
    return 'repaired';
  }

  fs.symlinkSync(target, linkPath);
  return 'created';
}

/** Removes symlinks not in `keep` and directories left empty. Returns true if `dir` was removed. */
function pruneStaging(dir: string, keep: Set<string>): boolean {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isSymbolicLink()) {
      if (!keep.has(entryPath)) fs.unlinkSync(entryPath);
    } else if (entry.isDirectory()) {
      pruneStaging(entryPath, keep);
    }
  }

  if (fs.readdirSync(dir).length === 0) {
    fs.rmdirSync(dir);
    return true;
  }
  return false;
}

function removeIfEmpty(dir: string): void {
  if (fs.existsSync(dir) && fs.readdirSync(dir).length === 0) fs.rmdirSync(dir);
}

/**
 * Stage every directory (among `sourceFiles`' directories) whose path
 * relative to `appDir` cannot be written in an import specifier.
 *
 * Staged directories are real; each linkable `.ts` file inside is a
 * relative symlink to the authored file. Re-running converges to the same
 * link set.
 */
export function createImportMappings(
  appDir: string,
  sourceFiles: readonly string[],
  options: LogOptions = {}
): ImportMapping[] {
  const root = path.resolve(appDir);
  const staging = stagingRoot(root);
  const dirs = [...new Set(sourceFiles.map(file => path.dirname(path.resolve(file))))].sort();
  const mappings: ImportMapping[] = [];
  const keep = new Set<string>();

  for (const dir of dirs) {
    const rel = toPosix(path.relative(root, dir));
    if (!rel || rel.startsWith('..') || !needsSanitization(rel)) continue;

    const sanitizedAlias = rel.split('/').map(sanitizeSegment).join('/');
    const materializedDirectory = path.join(staging, ...sanitizedAlias.split('/'));
    fs.mkdirSync(materializedDirectory, { recursive: true });

    const files = fs.readdirSync(dir, { withFileTypes: true })
      .filter(entry => entry.isFile() && isLinkableSource(entry.name))
      .map(entry => entry.name)
      .sort();

    for (const name of files) {
      const linkPath = path.join(materializedDirectory, name);
      const target = path.relative(materializedDirectory, path.join(dir, name));
      const outcome = ensureSymlink(linkPath, target);
      if (outcome !== 'unchanged') debug(options, 'imports', `${outcome} ${toPosix(path.relative(root, linkPath))}`);
      keep.add(linkPath);
    }

    mappings.push({ originalPath: dir, sanitizedAlias, materializedDirectory });
  }

  if (fs.existsSync(staging) && pruneStaging(staging, keep)) {
    removeIfEmpty(path.dirname(staging));
  }

  return mappings;
}

/** Path to import `file` through, preferring its staged symlink when one exists. */
export function resolveImportPath(file: string, mappings: readonly ImportMapping[]): string {
  const dir = path.dirname(path.resolve(file));
  const mapping = mappings.find(m => m.originalPath === dir);
  return mapping ? path.join(mapping.materializedDirectory, path.basename(file)) : file;
}

/** Remove every staged symlink and the directories they leave empty. */
export function cleanupImportStaging(appDir: string): void {
  const staging = stagingRoot(appDir);
  if (!fs.existsSync(staging)) return;
  if (pruneStaging(staging, new Set())) {
    removeIfEmpty(path.dirname(staging));
  }
}
