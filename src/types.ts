/**
 * Core data types for tracklink
 */

import type { AppError } from './logger.js';

/**
 * One observed audio file at a point in time. Never mutated: reconciliation
 * returns a copy with `linkPath` filled in.
 */
export interface TrackRecord {
  readonly identityKey: string;
  readonly versionKey: string;
  readonly artist: string;
  readonly album: string;
  readonly title: string;
  readonly trackNumber: number;
  readonly fileName: string;
  readonly sourcePath: string;
  /** Empty until a link has been made */
  readonly linkPath: string;
}

/**
 * Durable form of a track, keyed by identity
 */
export interface IndexEntry {
  readonly identityKey: string;
  readonly versionKey: string;
  readonly artist: string;
  readonly album: string;
  readonly title: string;
  readonly sourcePath: string;
  readonly linkPath: string;
  readonly updatedAt: string;
  /** Remembered source path no longer exists; the identity is still authoritative */
  readonly sourceMissing: boolean;
}

export type DiffTag = 'new' | 'changed' | 'unchanged';

export type DiffResult =
  | { readonly tag: 'new'; readonly track: TrackRecord }
  | { readonly tag: 'changed'; readonly track: TrackRecord; readonly previous: IndexEntry }
  | { readonly tag: 'unchanged'; readonly track: TrackRecord; readonly previous: IndexEntry };

export interface DuplicateIdentity {
  identityKey: string;
  /** Source path of the record that was dropped */
  discarded: string;
  /** Source path of the record that drives reconciliation */
  kept: string;
}

export type LinkAction = 'created' | 'replaced' | 'kept' | 'failed';

export interface LinkOutcome {
  identityKey: string;
  linked: boolean;
  action: LinkAction;
  removedPrevious: boolean;
  /** Reconciled record; `linkPath` is set when `linked` is true */
  record: TrackRecord;
  error?: AppError;
}

export interface SweepResult {
  linksRemoved: number;
  dirsRemoved: number;
}

export type DuplicatePolicy = 'last-write-wins' | 'reject-batch';

export interface BatchReport {
  index: number;
  tracks: number;
  newTracks: number;
  changedTracks: number;
  unchangedTracks: number;
  duplicates: number;
  linksCreated: number;
  linksReplaced: number;
  linksKept: number;
  linksRemoved: number;
  linkFailures: number;
  indexed: number;
  committed: boolean;
  durationMs: number;
}

export interface RunSummary {
  filesDiscovered: number;
  tracksResolved: number;
  skipped: number;
  newTracks: number;
  changedTracks: number;
  unchangedTracks: number;
  duplicates: number;
  linksCreated: number;
  linksReplaced: number;
  linksKept: number;
  linksRemoved: number;
  linkFailures: number;
  indexed: number;
  batches: number;
  failedBatches: number;
  sweepBefore: SweepResult;
  sweepAfter: SweepResult;
  durationMs: number;
  dryRun: boolean;
}
