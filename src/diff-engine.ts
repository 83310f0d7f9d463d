/**
 * Classifies freshly resolved tracks against the index
 */

import type { IndexStore } from './index-store.js';
import { AppError, createSilentLogger, handleError, type Logger } from './logger.js';
import type { DiffResult, DuplicateIdentity, TrackRecord } from './types.js';

export interface BatchDiff {
  /** One result per identity, in first-seen order */
  results: Map<string, DiffResult>;
  duplicates: DuplicateIdentity[];
}

/**
 * Keep one record per identity. A later record with the same identity replaces
 * the earlier one and the collision is reported.
 */
export function dedupeByIdentity(
  batch: readonly TrackRecord[],
  logger: Logger = createSilentLogger()
): { tracks: Map<string, TrackRecord>; duplicates: DuplicateIdentity[] } {
  const tracks = new Map<string, TrackRecord>();
  const duplicates: DuplicateIdentity[] = [];

  for (const track of batch) {
    const earlier = tracks.get(track.identityKey);
    if (earlier) {
      const duplicate = new AppError(
        `Duplicate identity detected: ${track.identityKey} in ${track.sourcePath}`,
        'DUPLICATE_IDENTITY',
        { identityKey: track.identityKey, earlier: earlier.sourcePath, later: track.sourcePath }
      );
      handleError(duplicate, logger);
      duplicates.push({ identityKey: track.identityKey, discarded: earlier.sourcePath, kept: track.sourcePath });
    }
    tracks.set(track.identityKey, track);
  }

  return { tracks, duplicates };
}

export class DiffEngine {
  private readonly store: IndexStore;
  private readonly logger: Logger;

  constructor(store: IndexStore, logger: Logger = createSilentLogger()) {
    this.store = store;
    this.logger = logger;
  }

  diff(batch: readonly TrackRecord[]): BatchDiff {
    const { tracks, duplicates } = dedupeByIdentity(batch, this.logger);
    const previous = this.store.lookupMany(tracks.keys());
    const results = new Map<string, DiffResult>();

    for (const [identityKey, track] of tracks) {
      const prior = previous.get(identityKey);

      if (!prior) {
        this.logger.debug(`Track ${track.fileName} not found in index`);
        results.set(identityKey, { tag: 'new', track });
        continue;
      }

      if (prior.versionKey !== track.versionKey) {
        this.logger.debug(`Track ${track.fileName} changed since last run`);
        this.logger.trace('Version keys differ', { current: track.versionKey, previous: prior.versionKey });
        results.set(identityKey, { tag: 'changed', track, previous: prior });
      } else {
        this.logger.trace(`Track ${track.fileName} unchanged`);
        results.set(identityKey, { tag: 'unchanged', track, previous: prior });
      }
    }

    return { results, duplicates };
  }
}
