/**
 * Reconciliation run: sweep, scan, then resolve → diff → link → index one
 * batch at a time, and sweep again.
 *
 * Within a batch the index is written only after every link action of that
 * batch, so an interrupted batch is simply redone by the next run.
 */

import { resolve } from 'path';
import type { AppConfig } from './config.js';
import { DiffEngine } from './diff-engine.js';
import { IdentityResolver } from './identity-resolver.js';
import type { IndexStore } from './index-store.js';
import { LinkReconciler } from './link-reconciler.js';
import { AppError, createSilentLogger, handleError, type Logger } from './logger.js';
import type { MetadataReader } from './metadata-reader.js';
import { scanSource } from './scanner.js';
import { sweepMirror } from './sweep.js';
import type { BatchReport, DuplicatePolicy, RunSummary, TrackRecord } from './types.js';

export interface ReconcileOptions {
  sourceRoot: string;
  mirrorRoot: string;
  extensions: string[];
  batchSize: number;
  maxNameLength: number;
  safeFilenames: boolean;
  dryRun: boolean;
  duplicatePolicy: DuplicatePolicy;
}

export interface ReconcileDependencies {
  reader: MetadataReader;
  store: IndexStore;
  logger?: Logger;
}

export function optionsFromConfig(config: AppConfig): ReconcileOptions {
  return {
    sourceRoot: config.source.path,
    mirrorRoot: config.mirror.path,
    extensions: config.source.extensions,
    batchSize: config.run.batchSize,
    maxNameLength: config.mirror.maxNameLength,
    safeFilenames: config.mirror.safeFilenames,
    dryRun: config.run.dryRun,
    duplicatePolicy: config.run.duplicatePolicy,
  };
}

export function* chunked<T>(items: readonly T[], size: number): Generator<T[]> {
  const step = Math.max(1, Math.floor(size));
  for (let start = 0; start < items.length; start += step) {
    yield items.slice(start, start + step);
  }
}

function emptyReport(index: number, tracks: number): BatchReport {
  return {
    index,
    tracks,
    newTracks: 0,
    changedTracks: 0,
    unchangedTracks: 0,
    duplicates: 0,
    linksCreated: 0,
    linksReplaced: 0,
    linksKept: 0,
    linksRemoved: 0,
    linkFailures: 0,
    indexed: 0,
    committed: false,
    durationMs: 0,
  };
}

export class ReconcileRunner {
  private readonly options: ReconcileOptions;
  private readonly store: IndexStore;
  private readonly logger: Logger;
  private readonly resolver: IdentityResolver;
  private readonly diffEngine: DiffEngine;

  constructor(options: ReconcileOptions, deps: ReconcileDependencies) {
    this.options = {
      ...options,
      sourceRoot: resolve(options.sourceRoot),
      mirrorRoot: resolve(options.mirrorRoot),
    };
    this.store = deps.store;
    this.logger = deps.logger ?? createSilentLogger();
    this.resolver = new IdentityResolver(deps.reader, this.logger.child('IdentityResolver'));
    this.diffEngine = new DiffEngine(this.store, this.logger.child('DiffEngine'));
  }

  /**
   * Reconcile the whole source tree once
   */
  async run(): Promise<RunSummary> {
    const started = Date.now();
    const { sourceRoot, mirrorRoot, dryRun } = this.options;
    const sweepLogger = this.logger.child('Sweep');

    this.logger.info('Starting music mirror reconciliation', { sourceRoot, mirrorRoot, dryRun });

    this.logger.info('Cleaning up empty folders and broken links left by earlier runs');
    const sweepBefore = await sweepMirror(mirrorRoot, { dryRun, logger: sweepLogger });

    const files = await scanSource(sourceRoot, {
      extensions: this.options.extensions,
      exclude: [mirrorRoot],
    });
    this.logger.info(`Discovered ${files.length} audio files`);

    const reconciler = new LinkReconciler({
      mirrorRoot,
      maxNameLength: this.options.maxNameLength,
      safeFilenames: this.options.safeFilenames,
      dryRun,
      logger: this.logger.child('LinkReconciler'),
    });

    const summary: RunSummary = {
      filesDiscovered: files.length,
      tracksResolved: 0,
      skipped: 0,
      newTracks: 0,
      changedTracks: 0,
      unchangedTracks: 0,
      duplicates: 0,
      linksCreated: 0,
      linksReplaced: 0,
      linksKept: 0,
      linksRemoved: 0,
      linkFailures: 0,
      indexed: 0,
      batches: 0,
      failedBatches: 0,
      sweepBefore,
      sweepAfter: { linksRemoved: 0, dirsRemoved: 0 },
      durationMs: 0,
      dryRun,
    };

    const seen = new Set<string>();
    let batchIndex = 0;
    for (const batchFiles of chunked(files, this.options.batchSize)) {
      const tracks: TrackRecord[] = [];
      for (const file of batchFiles) {
        const track = await this.resolver.resolve(file);
        if (track) {
          tracks.push(track);
        } else {
          summary.skipped++;
        }
      }
      summary.tracksResolved += tracks.length;

      const report = await this.processBatch(tracks, batchIndex, seen, reconciler);
      summary.batches++;
      if (!report.committed) summary.failedBatches++;
      summary.newTracks += report.newTracks;
      summary.changedTracks += report.changedTracks;
      summary.unchangedTracks += report.unchangedTracks;
      summary.duplicates += report.duplicates;
      summary.linksCreated += report.linksCreated;
      summary.linksReplaced += report.linksReplaced;
      summary.linksKept += report.linksKept;
      summary.linksRemoved += report.linksRemoved;
      summary.linkFailures += report.linkFailures;
      summary.indexed += report.indexed;
      batchIndex++;
    }

    this.logger.info(`Processed ${summary.tracksResolved} tracks in total`);
    this.logger.info(`Created ${summary.linksCreated + summary.linksReplaced} links in total`);

    this.logger.info('Cleaning up folders and links orphaned by this run');
    summary.sweepAfter = await sweepMirror(mirrorRoot, { dryRun, logger: sweepLogger });

    summary.durationMs = Date.now() - started;
    this.logger.info(`Finished processing in ${(summary.durationMs / 1000).toFixed(2)} seconds`);
    return summary;
  }

  /**
   * Diff, link and index one batch. `seen` carries the identities of earlier
   * batches of the same run.
   */
  async processBatch(
    tracks: readonly TrackRecord[],
    index: number,
    seen: Set<string>,
    reconciler: LinkReconciler
  ): Promise<BatchReport> {
    const started = Date.now();
    const report = emptyReport(index, tracks.length);
    const batchLogger = this.logger.child(`Batch ${index + 1}`);

    const earlier = tracks.filter(track => seen.has(track.identityKey));
    for (const track of earlier) {
      const duplicate = new AppError(
        `Duplicate identity detected: ${track.identityKey} in ${track.sourcePath} was already processed this run`,
        'DUPLICATE_IDENTITY',
        { identityKey: track.identityKey }
      );
      handleError(duplicate, batchLogger);
    }

    const { results, duplicates } = this.diffEngine.diff(tracks);
    report.duplicates = duplicates.length + earlier.length;

    if (this.options.duplicatePolicy === 'reject-batch' && report.duplicates > 0) {
      batchLogger.error(`Rejecting batch: ${report.duplicates} duplicate identities`);
      report.durationMs = Date.now() - started;
      return report;
    }

    const toIndex: TrackRecord[] = [];
    for (const [identityKey, diff] of results) {
      seen.add(identityKey);

      if (diff.tag === 'new') report.newTracks++;
      else if (diff.tag === 'changed') report.changedTracks++;
      else report.unchangedTracks++;

      const outcome = await reconciler.reconcile(diff);
      if (outcome.removedPrevious) report.linksRemoved++;

      switch (outcome.action) {
        case 'created':
          report.linksCreated++;
          break;
        case 'replaced':
          report.linksReplaced++;
          break;
        case 'kept':
          report.linksKept++;
          break;
        case 'failed':
          report.linkFailures++;
          break;
      }

      // Only records whose link exists go to the index
      if (outcome.linked) {
        toIndex.push(outcome.record);
      }
    }

    if (this.options.dryRun) {
      batchLogger.info(`Would update ${toIndex.length} tracks in the index`);
      report.indexed = toIndex.length;
      report.committed = true;
    } else {
      try {
        this.store.upsertMany(toIndex);
        report.indexed = toIndex.length;
        report.committed = true;
      } catch (error) {
        handleError(error, batchLogger, 'INDEX_WRITE_FAILED', { batch: index + 1 });
        batchLogger.warn('Batch not committed; the next run will redo it');
      }
    }

    report.durationMs = Date.now() - started;
    batchLogger.info(`Batch processed in ${(report.durationMs / 1000).toFixed(2)}s`, {
      tracks: report.tracks,
      new: report.newTracks,
      changed: report.changedTracks,
      unchanged: report.unchangedTracks,
    });
    return report;
  }
}
