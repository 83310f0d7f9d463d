/**
 * Enumerates audio files under the source directory
 */

import glob from 'fast-glob';
import { isAbsolute, relative, resolve } from 'path';

export interface ScanOptions {
  /** Extensions including the dot, matched case-insensitively */
  extensions: string[];
  /** Directories to leave out, e.g. a mirror that lives inside the source */
  exclude?: string[];
}

function ignorePatternFor(root: string, dir: string): string | null {
  const rel = relative(root, resolve(dir));
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return `${glob.escapePath(rel.split('\\').join('/'))}/**`;
}

/**
 * Absolute paths of matching files, sorted so runs batch deterministically.
 * Directory links are not followed.
 */
export async function scanSource(sourceRoot: string, options: ScanOptions): Promise<string[]> {
  const root = resolve(sourceRoot);
  const patterns = options.extensions.map(ext => `**/*${glob.escapePath(ext)}`);
  const ignore = (options.exclude ?? [])
    .map(dir => ignorePatternFor(root, dir))
    .filter((pattern): pattern is string => pattern !== null);

  const entries = await glob(patterns, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    ignore,
  });

  return [...new Set(entries.map(entry => resolve(entry)))].sort();
}
