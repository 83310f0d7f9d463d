/**
 * Re-runs reconciliation when the source tree changes
 */

import { watch, type FSWatcher } from 'chokidar';
import { extname, resolve } from 'path';
import { isInside } from './fs-utils.js';
import { createSilentLogger, handleError, type Logger } from './logger.js';
import type { RunSummary } from './types.js';

export interface Reconcilable {
  run(): Promise<RunSummary>;
}

export interface WatchOptions {
  sourceRoot: string;
  /** Mirror folder, ignored when it lies inside the source */
  mirrorRoot?: string;
  extensions: string[];
  debounceMs: number;
  logger?: Logger;
  /** Called after every completed run */
  onRun?: (summary: RunSummary) => void;
}

export interface WatchHandle {
  /** Resolves once the initial tree has been read and events are reported */
  ready(): Promise<void>;
  /** Resolves once the watcher is closed and any run in progress has finished */
  close(): Promise<void>;
  /** Schedule a run as if a file had changed */
  trigger(reason: string): void;
}

/**
 * Serializes runs: a trigger during a run schedules exactly one follow-up run,
 * and triggers inside the debounce window collapse into one.
 */
export class RunScheduler {
  private readonly target: Reconcilable;
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private readonly onRun?: (summary: RunSummary) => void;
  private timer?: NodeJS.Timeout;
  private running?: Promise<void>;
  private pending = false;
  private closed = false;

  constructor(target: Reconcilable, debounceMs: number, logger: Logger, onRun?: (summary: RunSummary) => void) {
    this.target = target;
    this.debounceMs = debounceMs;
    this.logger = logger;
    this.onRun = onRun;
  }

  trigger(reason: string): void {
    if (this.closed) return;
    this.logger.debug(`Change detected: ${reason}`);

    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.start();
    }, this.debounceMs);
  }

  private start(): void {
    if (this.running) {
      this.pending = true;
      return;
    }

    this.running = this.execute().finally(() => {
      this.running = undefined;
      if (this.pending && !this.closed) {
        this.pending = false;
        this.start();
      }
    });
  }

  private async execute(): Promise<void> {
    try {
      const summary = await this.target.run();
      this.logger.info('Reconciliation finished', {
        created: summary.linksCreated + summary.linksReplaced,
        removed: summary.linksRemoved,
        failedBatches: summary.failedBatches,
      });
      this.onRun?.(summary);
    } catch (error) {
      handleError(error, this.logger);
    }
  }

  /**
   * Wait for the run in progress, including a queued follow-up
   */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.idle();
  }
}

export function watchSource(target: Reconcilable, options: WatchOptions): WatchHandle {
  const logger = options.logger ?? createSilentLogger('Watch');
  const extensions = new Set(options.extensions.map(ext => ext.toLowerCase()));
  const scheduler = new RunScheduler(target, options.debounceMs, logger, options.onRun);

  const { mirrorRoot } = options;
  const mirror = mirrorRoot && isInside(options.sourceRoot, mirrorRoot) ? resolve(mirrorRoot) : undefined;

  const watcher: FSWatcher = watch(options.sourceRoot, {
    persistent: true,
    ignoreInitial: true,
    followSymlinks: false,
    ignored: (path: string) => mirror !== undefined && (resolve(path) === mirror || isInside(mirror, path)),
    awaitWriteFinish: { stabilityThreshold: 500, pollInterval: 100 },
  });
  const ready = new Promise<void>(resolveReady => {
    watcher.once('ready', () => resolveReady());
  });

  const onFileEvent = (event: string) => (path: string) => {
    if (!extensions.has(extname(path).toLowerCase())) return;
    scheduler.trigger(`${event} ${path}`);
  };

  watcher.on('add', onFileEvent('added'));
  watcher.on('change', onFileEvent('changed'));
  watcher.on('unlink', onFileEvent('removed'));
  watcher.on('unlinkDir', (path: string) => scheduler.trigger(`removed ${path}`));
  watcher.on('error', (error: unknown) => {
    handleError(error, logger);
  });

  logger.info(`Watching ${options.sourceRoot} for changes`);

  return {
    ready: () => ready,
    trigger: reason => scheduler.trigger(reason),
    close: async () => {
      await watcher.close();
      await scheduler.close();
    },
  };
}
