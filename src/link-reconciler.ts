/**
 * Applies diff results to the mirror tree of Artist/Album/Title links
 */

import { mkdir, readlink, realpath, symlink, unlink } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { lstatOrNull, realpathOrNull } from './fs-utils.js';
import { createSilentLogger, errorMessage, AppError, type Logger } from './logger.js';
import { deriveLinkName, sanitizeForPath } from './sanitize.js';
import type { DiffResult, IndexEntry, LinkAction, LinkOutcome, TrackRecord } from './types.js';

export interface LinkReconcilerOptions {
  mirrorRoot: string;
  maxNameLength: number;
  safeFilenames: boolean;
  dryRun?: boolean;
  logger?: Logger;
}

export interface LinkLocation {
  dir: string;
  path: string;
}

export class LinkReconciler {
  private readonly mirrorRoot: string;
  private readonly maxNameLength: number;
  private readonly safeFilenames: boolean;
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  /** link path -> identity that claimed it during this run */
  private readonly claimed = new Map<string, string>();

  constructor(options: LinkReconcilerOptions) {
    this.mirrorRoot = resolve(options.mirrorRoot);
    this.maxNameLength = options.maxNameLength;
    this.safeFilenames = options.safeFilenames;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createSilentLogger('LinkReconciler');
  }

  private segment(value: string): string {
    return sanitizeForPath(value, this.maxNameLength, this.logger);
  }

  /**
   * Where the current link of a track belongs
   */
  locate(track: TrackRecord): LinkLocation {
    const dir = join(this.mirrorRoot, this.segment(track.artist), this.segment(track.album));
    const name = deriveLinkName(track, {
      maxLength: this.maxNameLength,
      safeFilenames: this.safeFilenames,
      logger: this.logger,
    });
    return { dir, path: join(dir, name) };
  }

  /**
   * Where the link of a stored entry was placed, or null if it never got one
   */
  locatePrevious(previous: IndexEntry): string | null {
    if (!previous.linkPath) return null;
    return join(
      this.mirrorRoot,
      this.segment(previous.artist),
      this.segment(previous.album),
      basename(previous.linkPath)
    );
  }

  async reconcile(diff: DiffResult): Promise<LinkOutcome> {
    const { track } = diff;
    let removedPrevious = false;

    try {
      const location = this.locate(track);
      const target = await realpath(track.sourcePath);

      // A stored link elsewhere is stale, whether the tags changed or only the naming options did
      if (diff.tag !== 'new') {
        const previousPath = this.locatePrevious(diff.previous);
        if (previousPath && previousPath !== location.path) {
          removedPrevious = await this.removePrevious(previousPath, diff.previous, track, target);
        }
      }

      this.claim(location.path, track);
      const action = await this.placeLink(location, target);

      this.logger.debug(`Track ${track.fileName} linked at ${location.path}`, { action });
      return {
        identityKey: track.identityKey,
        linked: true,
        action,
        removedPrevious,
        record: { ...track, linkPath: location.path },
      };
    } catch (error) {
      const failure = new AppError(
        `Failed to link ${track.sourcePath}: ${errorMessage(error)}`,
        'LINK_FAILED',
        { identityKey: track.identityKey },
        { cause: error }
      );
      this.logger.error(failure.message, error instanceof Error ? error : undefined);
      return {
        identityKey: track.identityKey,
        linked: false,
        action: 'failed',
        removedPrevious,
        record: track,
        error: failure,
      };
    }
  }

  private claim(linkPath: string, track: TrackRecord): void {
    const owner = this.claimed.get(linkPath);
    if (owner && owner !== track.identityKey) {
      this.logger.warn(`Link collision: ${linkPath} is claimed by two tracks, the later one replaces it`, {
        earlier: owner,
        later: track.identityKey,
      });
    }
    this.claimed.set(linkPath, track.identityKey);
  }

  /**
   * Remove the link of a superseded entry. A link that is already gone is not
   * an error. The path is left alone when it is not a link, when another track
   * claimed it this run, or when the link points at some other file.
   */
  private async removePrevious(
    linkPath: string,
    previous: IndexEntry,
    track: TrackRecord,
    currentTarget: string
  ): Promise<boolean> {
    const owner = this.claimed.get(linkPath);
    if (owner && owner !== track.identityKey) {
      this.logger.debug(`Not removing ${linkPath}: now linked for ${owner}`);
      return false;
    }

    const existing = await lstatOrNull(linkPath);
    if (!existing) {
      this.logger.debug(`Previous link already gone: ${linkPath}`);
      return false;
    }
    if (!existing.isSymbolicLink()) {
      this.logger.warn(`Not removing ${linkPath}: it is not a link`);
      return false;
    }

    const pointsAt = await readlink(linkPath);
    const ownTargets = new Set([previous.sourcePath, currentTarget]);
    const previousTarget = await realpathOrNull(previous.sourcePath);
    if (previousTarget) ownTargets.add(previousTarget);
    if (!ownTargets.has(pointsAt)) {
      this.logger.debug(`Not removing ${linkPath}: it points at ${pointsAt}`);
      return false;
    }

    if (this.dryRun) {
      this.logger.info(`Would remove link: ${linkPath}`);
    } else {
      await unlink(linkPath);
      this.logger.info(`Removed link: ${linkPath}`);
    }
    return true;
  }

  private async placeLink(location: LinkLocation, target: string): Promise<LinkAction> {
    const existing = await lstatOrNull(location.path);

    if (existing?.isSymbolicLink() && (await readlink(location.path)) === target) {
      this.logger.trace(`Link already current: ${location.path}`);
      return 'kept';
    }

    const action: LinkAction = existing ? 'replaced' : 'created';
    if (this.dryRun) {
      this.logger.info(`Would ${action === 'created' ? 'create' : 'replace'} link: ${location.path} -> ${target}`);
      return action;
    }

    await mkdir(location.dir, { recursive: true });
    if (existing) {
      await unlink(location.path);
      this.logger.debug(`Removed existing entry: ${location.path}`);
    }
    await symlink(target, location.path);
    this.logger.info(`Created link: ${location.path} -> ${target}`);
    return action;
  }
}
