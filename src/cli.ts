#!/usr/bin/env node
/**
 * tracklink command line: mirror a music folder as Artist/Album/Title links
 */

import { config as loadEnv } from 'dotenv';
import { realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import {
  ConfigManager,
  configFromEnv,
  createExampleConfig,
  type AppConfig,
  type ConfigOverrides,
} from './config.js';
import { TrackIndex } from './index-store.js';
import { AppError, ConsoleSink, FileSink, Logger, errorMessage, type LogLevel, type LogSink } from './logger.js';
import { MusicMetadataReader } from './metadata-reader.js';
import { checkPreconditions } from './preconditions.js';
import { ReconcileRunner, optionsFromConfig } from './reconcile.js';
import { sweepMirror } from './sweep.js';
import type { RunSummary } from './types.js';
import { watchSource } from './watch.js';

export type Command = 'run' | 'sweep' | 'status' | 'init-config' | 'help';

export interface CliOptions {
  command: Command;
  configPath: string;
  initConfigPath?: string;
  overrides: ConfigOverrides;
  watch: boolean;
  errors: string[];
}

const COMMANDS: readonly Command[] = ['run', 'sweep', 'status', 'init-config', 'help'];

const VERBOSITY_LEVELS: Record<number, LogLevel> = {
  0: 'warn',
  1: 'info',
  2: 'debug',
  3: 'trace',
};

export function verbosityToLevel(verbosity: number): LogLevel {
  if (verbosity >= 3) return 'trace';
  if (verbosity <= 0) return 'warn';
  return VERBOSITY_LEVELS[verbosity] ?? 'info';
}

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export function printUsage(): void {
  console.log(`Usage: tracklink [command] [options]

Commands:
  run                     Reconcile the mirror with the source folder (default)
  sweep                   Only remove broken links and empty folders from the mirror
  status                  Print index statistics
  init-config [path]      Write an example YAML config (default ./tracklink.example.yaml)

Options:
  --config <file>         YAML or JSON config file (default ./tracklink.yaml)
  --input <dir>           Source folder with audio files
  --output <dir>          Mirror folder for links
  --db <file>             Index database path
  --batch-size <n>        Tracks per batch
  --sanitizer-length <n>  Maximum length of a folder or file name
  --safe-filenames        Append a short identity suffix to link names (default)
  --no-safe-filenames     Use plain titles as link names
  --dry-run               Log every action without touching the mirror or index
  --verbosity <0-3>       0=warn 1=info 2=debug 3=trace
  --log-file <file>       Also append log lines to this file
  --watch                 Keep running and reconcile again when the source changes
  --help                  Show this help`);
}

export function parseArgs(argv: string[]): CliOptions {
  const errors: string[] = [];
  const overrides: ConfigOverrides = {};
  let command: Command = 'run';
  let configPath = './tracklink.yaml';
  let initConfigPath: string | undefined;
  let watch = false;

  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const takeValue = (): string | undefined => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        errors.push(`${arg} needs a value`);
        return undefined;
      }
      i++;
      return value;
    };
    const takeInt = (): number | undefined => {
      const raw = takeValue();
      if (raw === undefined) return undefined;
      const value = parseInt(raw, 10);
      if (!Number.isFinite(value) || String(value) !== raw.trim()) {
        errors.push(`${arg} expects a whole number, got "${raw}"`);
        return undefined;
      }
      return value;
    };

    switch (arg) {
      case '--config': {
        const value = takeValue();
        if (value) configPath = value;
        break;
      }
      case '--input':
        overrides.source = { ...overrides.source, path: takeValue() };
        break;
      case '--output':
        overrides.mirror = { ...overrides.mirror, path: takeValue() };
        break;
      case '--db':
        overrides.index = { ...overrides.index, path: takeValue() };
        break;
      case '--batch-size':
        overrides.run = { ...overrides.run, batchSize: takeInt() };
        break;
      case '--sanitizer-length':
        overrides.mirror = { ...overrides.mirror, maxNameLength: takeInt() };
        break;
      case '--safe-filenames':
        overrides.mirror = { ...overrides.mirror, safeFilenames: true };
        break;
      case '--no-safe-filenames':
        overrides.mirror = { ...overrides.mirror, safeFilenames: false };
        break;
      case '--dry-run':
        overrides.run = { ...overrides.run, dryRun: true };
        break;
      case '--verbosity': {
        const verbosity = takeInt();
        if (verbosity !== undefined) {
          overrides.logging = { ...overrides.logging, level: verbosityToLevel(verbosity) };
        }
        break;
      }
      case '--log-file':
        overrides.logging = { ...overrides.logging, file: takeValue() };
        break;
      case '--watch':
        watch = true;
        break;
      case '--help':
      case '-h':
        command = 'help';
        break;
      default:
        if (arg.startsWith('-')) {
          errors.push(`Unknown option: ${arg}`);
        } else {
          positionals.push(arg);
        }
    }
  }

  if (command !== 'help' && positionals.length > 0) {
    const [first, ...rest] = positionals;
    if (isCommand(first)) {
      command = first;
      if (command === 'init-config') {
        initConfigPath = rest.shift();
      }
      if (rest.length > 0) errors.push(`Unexpected argument: ${rest[0]}`);
    } else {
      errors.push(`Unknown command: ${first}`);
    }
  }

  return { command, configPath, initConfigPath, overrides, watch, errors };
}

/**
 * Config from file, then environment, then command line
 */
export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const manager = new ConfigManager(options.configPath);
  manager.apply(configFromEnv(env));
  manager.apply(options.overrides);

  const { valid, errors } = manager.validate();
  if (!valid) {
    throw new AppError(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIG', { errors });
  }
  return manager.getAll();
}

export function createLogger(config: AppConfig): Logger {
  const dryRun = config.run.dryRun;
  let level = config.logging.level;
  // Dry runs always log at debug or finer
  if (dryRun && (level === 'info' || level === 'warn' || level === 'error')) {
    level = 'debug';
  }

  const sinks: LogSink[] = [new ConsoleSink()];
  if (config.logging.file) {
    sinks.push(new FileSink(resolve(config.logging.file)));
  }
  return new Logger({ level, sinks, tag: dryRun ? '==DRYRUN==' : undefined });
}

function printSummary(summary: RunSummary): void {
  console.log(`\n📊 Reconciliation summary${summary.dryRun ? ' (dry run)' : ''}:`);
  console.log(`  Files discovered: ${summary.filesDiscovered}`);
  console.log(`  Tracks resolved:  ${summary.tracksResolved} (skipped ${summary.skipped})`);
  console.log(
    `  New / changed / unchanged: ${summary.newTracks} / ${summary.changedTracks} / ${summary.unchangedTracks}`
  );
  console.log(
    `  Links created: ${summary.linksCreated}, replaced: ${summary.linksReplaced}, kept: ${summary.linksKept}, removed: ${summary.linksRemoved}`
  );
  if (summary.linkFailures > 0) console.log(`  Link failures: ${summary.linkFailures}`);
  if (summary.duplicates > 0) console.log(`  Duplicate identities: ${summary.duplicates}`);
  console.log(`  Indexed: ${summary.indexed} in ${summary.batches} batches (${summary.failedBatches} failed)`);
  console.log(
    `  Swept: ${summary.sweepBefore.linksRemoved + summary.sweepAfter.linksRemoved} links, ${summary.sweepBefore.dirsRemoved + summary.sweepAfter.dirsRemoved} folders`
  );
  console.log(`  Duration: ${(summary.durationMs / 1000).toFixed(2)}s`);
}

async function runCommand(config: AppConfig, watch: boolean, logger: Logger): Promise<number> {
  const dryRun = config.run.dryRun;
  await checkPreconditions(
    { sourceRoot: config.source.path, mirrorRoot: config.mirror.path, dryRun },
    logger.child('Preconditions')
  );

  const store = new TrackIndex(config.index.path, { readonly: dryRun, logger: logger.child('TrackIndex') });
  const runner = new ReconcileRunner(optionsFromConfig(config), {
    reader: new MusicMetadataReader(),
    store,
    logger,
  });

  try {
    const summary = await runner.run();
    printSummary(summary);

    if (!watch) {
      return summary.failedBatches > 0 ? 1 : 0;
    }

    const handle = watchSource(runner, {
      sourceRoot: config.source.path,
      mirrorRoot: config.mirror.path,
      extensions: config.source.extensions,
      debounceMs: config.watch.debounceMs,
      logger: logger.child('Watch'),
      onRun: printSummary,
    });

    await new Promise<void>(resolveStop => {
      const stop = () => {
        logger.info('Stopping watcher');
        resolveStop();
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
    });
    await handle.close();
    return 0;
  } finally {
    store.close();
  }
}

async function statusCommand(config: AppConfig, logger: Logger): Promise<number> {
  const store = new TrackIndex(config.index.path, { readonly: true, logger: logger.child('TrackIndex') });
  try {
    const stats = store.getStats();
    console.log('\n📊 Index status:');
    console.log(`  Database:        ${resolve(config.index.path)}`);
    console.log(`  Tracks:          ${stats.tracks}`);
    console.log(`  Artists:         ${stats.artists}`);
    console.log(`  Albums:          ${stats.albums}`);
    console.log(`  Missing sources: ${stats.missingSources}`);
    if (stats.lastUpdated) console.log(`  Last updated:    ${stats.lastUpdated}`);
    return 0;
  } finally {
    store.close();
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  loadEnv();
  const options = parseArgs(argv);

  if (options.errors.length > 0) {
    for (const error of options.errors) console.error(`❌ ${error}`);
    printUsage();
    return 1;
  }

  if (options.command === 'help') {
    printUsage();
    return 0;
  }

  if (options.command === 'init-config') {
    const target = options.initConfigPath ?? './tracklink.example.yaml';
    createExampleConfig(target);
    console.log(`✅ Example config written to ${target}`);
    return 0;
  }

  let config: AppConfig;
  try {
    config = resolveConfig(options);
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }

  const logger = createLogger(config);

  try {
    switch (options.command) {
      case 'sweep': {
        const result = await sweepMirror(config.mirror.path, {
          dryRun: config.run.dryRun,
          logger: logger.child('Sweep'),
        });
        console.log(`✅ Removed ${result.linksRemoved} broken links and ${result.dirsRemoved} folders`);
        return 0;
      }
      case 'status':
        return await statusCommand(config, logger);
      default:
        return await runCommand(config, options.watch, logger);
    }
  } catch (error) {
    const message = error instanceof AppError ? `${error.code}: ${error.message}` : errorMessage(error);
    logger.error(`tracklink failed: ${message}`, error instanceof Error ? error : undefined);
    return 1;
  }
}

function isDirectRun(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    // npm installs the bin as a link, so compare real paths
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  main().then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error('❌ tracklink failed:', error);
      process.exitCode = 1;
    }
  );
}
