/**
 * Checks made once at process start. The reconciliation core assumes they
 * passed and that it may create links in the mirror tree.
 */

import { constants } from 'fs';
import { access, mkdir, rm, stat, symlink } from 'fs/promises';
import { join, resolve } from 'path';
import { AppError, createSilentLogger, errorMessage, type Logger } from './logger.js';

export async function assertSourceReadable(sourceRoot: string): Promise<void> {
  const root = resolve(sourceRoot);
  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new Error('not a directory');
    }
    await access(root, constants.R_OK | constants.X_OK);
  } catch (error) {
    throw new AppError(`Source directory is not readable: ${root} (${errorMessage(error)})`, 'SETUP_FAILED', {
      sourceRoot: root,
    });
  }
}

function symlinkHint(platform: NodeJS.Platform): string {
  return platform === 'win32'
    ? 'Run from an elevated shell or enable Developer Mode to allow symbolic links.'
    : 'Check that the mirror directory is writable and on a filesystem that supports symbolic links.';
}

/**
 * Create the mirror root and prove a link can be made inside it
 */
export async function assertCanLink(
  mirrorRoot: string,
  logger: Logger = createSilentLogger('Preconditions'),
  platform: NodeJS.Platform = process.platform
): Promise<void> {
  const root = resolve(mirrorRoot);
  const testLink = join(root, `.tracklink-check-${process.pid}`);

  try {
    await mkdir(root, { recursive: true });
    await rm(testLink, { force: true });
    await symlink(root, testLink, 'dir');
    await rm(testLink, { force: true });
    logger.debug(`Link support confirmed in ${root}`);
  } catch (error) {
    throw new AppError(
      `Cannot create links in ${root}: ${errorMessage(error)}. ${symlinkHint(platform)}`,
      'SYMLINK_UNSUPPORTED',
      { mirrorRoot: root },
      { cause: error }
    );
  }
}

export async function checkPreconditions(
  options: { sourceRoot: string; mirrorRoot: string; dryRun: boolean },
  logger?: Logger
): Promise<void> {
  await assertSourceReadable(options.sourceRoot);
  if (!options.dryRun) {
    await assertCanLink(options.mirrorRoot, logger);
  }
}
