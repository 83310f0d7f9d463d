/**
 * tracklink - keep a mirror tree of Artist/Album/Title links in step with a
 * folder of audio files
 */

export * from './types.js';
export { Logger, ConsoleSink, FileSink, AppError, handleError, createSilentLogger } from './logger.js';
export type { LogLevel, LogEntry, LogSink, LoggerOptions, ErrorCode } from './logger.js';
export { ConfigManager, DEFAULT_CONFIG, validateConfig, mergeConfigs, createExampleConfig } from './config.js';
export type { AppConfig, ConfigOverrides } from './config.js';
export { MusicMetadataReader } from './metadata-reader.js';
export type { AudioMetadata, MetadataReader } from './metadata-reader.js';
export { IdentityResolver, computeVersionKey, hashFileContent } from './identity-resolver.js';
export { TrackIndex } from './index-store.js';
export type { IndexStore, TrackIndexOptions } from './index-store.js';
export { DiffEngine, dedupeByIdentity } from './diff-engine.js';
export type { BatchDiff } from './diff-engine.js';
export { LinkReconciler } from './link-reconciler.js';
export type { LinkReconcilerOptions, LinkLocation } from './link-reconciler.js';
export { sanitizeForPath, deriveLinkName, ABSOLUTE_NAME_LIMIT } from './sanitize.js';
export { sweepMirror } from './sweep.js';
export { scanSource } from './scanner.js';
export { ReconcileRunner, optionsFromConfig, chunked } from './reconcile.js';
export type { ReconcileOptions, ReconcileDependencies } from './reconcile.js';
export { checkPreconditions, assertCanLink, assertSourceReadable } from './preconditions.js';
export { watchSource, RunScheduler } from './watch.js';
export type { WatchHandle, WatchOptions } from './watch.js';
