import { lstat, realpath, stat } from 'fs/promises';
import type { Stats } from 'fs';
import { isAbsolute, relative, resolve, sep } from 'path';

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * lstat that returns null instead of throwing for a missing path
 */
export async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

/**
 * realpath that returns null when the path (or a link on the way) is missing
 */
export async function realpathOrNull(path: string): Promise<string | null> {
  try {
    return await realpath(path);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

/**
 * Whether a path resolves to something, following links
 */
export async function targetExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error) || (isErrnoException(error) && error.code === 'ELOOP')) return false;
    throw error;
  }
}

/**
 * Whether `path` lies strictly below `root`
 */
export function isInside(root: string, path: string): boolean {
  const rel = relative(resolve(root), resolve(path));
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}
