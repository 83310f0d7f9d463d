/**
 * Bottom-up cleanup of the mirror tree: dangling links first, then the
 * directories they leave empty
 */

import type { Dirent } from 'fs';
import { readdir, rmdir, unlink } from 'fs/promises';
import { join, resolve } from 'path';
import { isNotFound, lstatOrNull, targetExists } from './fs-utils.js';
import { createSilentLogger, errorMessage, type Logger } from './logger.js';
import type { SweepResult } from './types.js';

export interface SweepOptions {
  /** Count what would be removed without removing anything */
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * Remove links whose target is gone and directories left with no entries.
 * Children are always handled before their parent, so a parent emptied by
 * the sweep is removed in the same pass. The root itself is kept.
 */
export async function sweepMirror(mirrorRoot: string, options: SweepOptions = {}): Promise<SweepResult> {
  const root = resolve(mirrorRoot);
  const logger = options.logger ?? createSilentLogger('Sweep');
  const dryRun = options.dryRun ?? false;
  const result: SweepResult = { linksRemoved: 0, dirsRemoved: 0 };

  const rootStats = await lstatOrNull(root);
  if (!rootStats || !rootStats.isDirectory()) {
    logger.debug(`Nothing to sweep at ${root}`);
    return result;
  }

  /** Returns the number of entries left in `dir` after sweeping it */
  const sweepDir = async (dir: string): Promise<number> => {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }

    let remaining = entries.length;
    for (const entry of entries) {
      const entryPath = join(dir, entry.name);

      try {
        if (entry.isSymbolicLink()) {
          if (await targetExists(entryPath)) continue;
          logger.trace(`Removing broken link: ${entryPath}`);
          if (!dryRun) {
            await unlink(entryPath);
          }
          result.linksRemoved++;
          remaining--;
        } else if (entry.isDirectory()) {
          const left = await sweepDir(entryPath);
          if (left > 0) continue;
          logger.trace(`Removing empty folder: ${entryPath}`);
          if (!dryRun) {
            await rmdir(entryPath);
          }
          result.dirsRemoved++;
          remaining--;
        }
      } catch (error) {
        // Leave the entry in place and keep sweeping its siblings
        logger.error(`Failed to sweep ${entryPath}: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
      }
    }
    return remaining;
  };

  await sweepDir(root);
  logger.info(`Removed ${result.linksRemoved} broken links`);
  logger.info(`Removed ${result.dirsRemoved} folders`);
  return result;
}
