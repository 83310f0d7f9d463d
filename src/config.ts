/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { AppError, createSilentLogger, errorMessage, isLogLevel, type Logger, type LogLevel } from './logger.js';
import type { DuplicatePolicy } from './types.js';

export interface SourceConfig {
  path: string;
  extensions: string[];
}

export interface MirrorConfig {
  path: string;
  maxNameLength: number;
  safeFilenames: boolean;
}

export interface IndexConfig {
  path: string;
}

export interface RunConfig {
  batchSize: number;
  dryRun: boolean;
  duplicatePolicy: DuplicatePolicy;
}

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
}

export interface WatchConfig {
  debounceMs: number;
}

export interface AppConfig {
  source: SourceConfig;
  mirror: MirrorConfig;
  index: IndexConfig;
  run: RunConfig;
  logging: LoggingConfig;
  watch: WatchConfig;
}

/**
 * Deep-partial shape accepted from files, environment and flags
 */
export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

export const DEFAULT_CONFIG: AppConfig = {
  source: {
    path: './input_music',
    extensions: ['.flac'],
  },
  mirror: {
    path: './linked_music',
    maxNameLength: 50,
    safeFilenames: true,
  },
  index: {
    path: './music_metadata.db',
  },
  run: {
    batchSize: 500,
    dryRun: false,
    duplicatePolicy: 'last-write-wins',
  },
  logging: {
    level: 'info',
    file: './music_log.txt',
  },
  watch: {
    debounceMs: 2000,
  },
};

const SECTIONS = ['source', 'mirror', 'index', 'run', 'logging', 'watch'] as const;

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge overrides into a config, section by section (overrides take precedence)
 */
export function mergeConfigs(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    source: { ...base.source, ...definedOnly(overrides.source) },
    mirror: { ...base.mirror, ...definedOnly(overrides.mirror) },
    index: { ...base.index, ...definedOnly(overrides.index) },
    run: { ...base.run, ...definedOnly(overrides.run) },
    logging: { ...base.logging, ...definedOnly(overrides.logging) },
    watch: { ...base.watch, ...definedOnly(overrides.watch) },
  };
}

function definedOnly<T extends object>(section: T | undefined): Partial<T> {
  if (!section) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(section) as Array<keyof T>) {
    if (section[key] !== undefined && section[key] !== null) {
      result[key] = section[key];
    }
  }
  return result;
}

/**
 * Narrow an untyped document (parsed YAML/JSON) to config overrides. Unknown
 * keys are ignored, mistyped values are reported.
 */
export function parseConfigDocument(doc: unknown): { overrides: ConfigOverrides; errors: string[] } {
  const errors: string[] = [];
  const overrides: ConfigOverrides = {};
  if (doc === undefined || doc === null) return { overrides, errors };
  if (!isRecord(doc)) {
    return { overrides, errors: ['Config document must be a mapping'] };
  }

  const str = (section: string, key: string, value: unknown): string | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    errors.push(`${section}.${key} must be a string`);
    return undefined;
  };
  const num = (section: string, key: string, value: unknown): number | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    errors.push(`${section}.${key} must be a number`);
    return undefined;
  };
  const bool = (section: string, key: string, value: unknown): boolean | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    errors.push(`${section}.${key} must be true or false`);
    return undefined;
  };

  for (const section of SECTIONS) {
    const raw = doc[section];
    if (raw === undefined || raw === null) continue;
    if (!isRecord(raw)) {
      errors.push(`${section} must be a mapping`);
      continue;
    }

    switch (section) {
      case 'source': {
        let extensions: string[] | undefined;
        if (raw.extensions !== undefined) {
          if (Array.isArray(raw.extensions) && raw.extensions.every(ext => typeof ext === 'string')) {
            extensions = raw.extensions.map(ext => String(ext));
          } else {
            errors.push('source.extensions must be a list of strings');
          }
        }
        overrides.source = { path: str(section, 'path', raw.path), extensions };
        break;
      }
      case 'mirror':
        overrides.mirror = {
          path: str(section, 'path', raw.path),
          maxNameLength: num(section, 'maxNameLength', raw.maxNameLength),
          safeFilenames: bool(section, 'safeFilenames', raw.safeFilenames),
        };
        break;
      case 'index':
        overrides.index = { path: str(section, 'path', raw.path) };
        break;
      case 'run': {
        let duplicatePolicy: DuplicatePolicy | undefined;
        if (raw.duplicatePolicy !== undefined) {
          if (raw.duplicatePolicy === 'last-write-wins' || raw.duplicatePolicy === 'reject-batch') {
            duplicatePolicy = raw.duplicatePolicy;
          } else {
            errors.push("run.duplicatePolicy must be 'last-write-wins' or 'reject-batch'");
          }
        }
        overrides.run = {
          batchSize: num(section, 'batchSize', raw.batchSize),
          dryRun: bool(section, 'dryRun', raw.dryRun),
          duplicatePolicy,
        };
        break;
      }
      case 'logging': {
        let level: LogLevel | undefined;
        if (raw.level !== undefined) {
          if (isLogLevel(raw.level)) {
            level = raw.level;
          } else {
            errors.push('logging.level must be one of trace, debug, info, warn, error');
          }
        }
        overrides.logging = { level, file: str(section, 'file', raw.file) };
        break;
      }
      case 'watch':
        overrides.watch = { debounceMs: num(section, 'debounceMs', raw.debounceMs) };
        break;
    }
  }

  return { overrides, errors };
}

/**
 * Overrides from TRACKLINK_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.TRACKLINK_INPUT) overrides.source = { path: env.TRACKLINK_INPUT };
  if (env.TRACKLINK_OUTPUT) overrides.mirror = { path: env.TRACKLINK_OUTPUT };
  if (env.TRACKLINK_DB) overrides.index = { path: env.TRACKLINK_DB };
  if (env.TRACKLINK_BATCH_SIZE) {
    const batchSize = parseInt(env.TRACKLINK_BATCH_SIZE, 10);
    if (Number.isFinite(batchSize)) overrides.run = { batchSize };
  }
  if (isLogLevel(env.TRACKLINK_LOG_LEVEL)) overrides.logging = { level: env.TRACKLINK_LOG_LEVEL };
  return overrides;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private readonly configPath: string;
  private readonly logger: Logger;

  constructor(configPath: string = './tracklink.yaml', logger: Logger = createSilentLogger('ConfigManager')) {
    this.configPath = configPath;
    this.logger = logger;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      this.logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }

    let doc: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      if (this.configPath.endsWith('.json')) {
        doc = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        doc = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw new AppError(`Failed to load config: ${errorMessage(error)}`, 'INVALID_CONFIG', { path: this.configPath });
    }

    const { overrides, errors } = parseConfigDocument(doc);
    if (errors.length > 0) {
      throw new AppError(`Invalid config ${this.configPath}: ${errors.join('; ')}`, 'INVALID_CONFIG', {
        path: this.configPath,
        errors,
      });
    }

    this.logger.info(`Loaded configuration from ${this.configPath}`);
    return mergeConfigs(cloneConfig(DEFAULT_CONFIG), overrides);
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Layer further overrides (environment, command line) on top
   */
  apply(overrides: ConfigOverrides): void {
    this.config = mergeConfigs(this.config, overrides);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    return validateConfig(this.config);
  }
}

export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.run.batchSize) || config.run.batchSize < 1) {
    errors.push('Batch size must be a whole number of at least 1');
  }

  if (
    !Number.isInteger(config.mirror.maxNameLength) ||
    config.mirror.maxNameLength < 1 ||
    config.mirror.maxNameLength > 250
  ) {
    errors.push('Max name length must be between 1 and 250');
  }

  if (config.source.extensions.length === 0) {
    errors.push('At least one source extension is required');
  }
  for (const ext of config.source.extensions) {
    if (!ext.startsWith('.') || ext.length < 2) {
      errors.push(`Extension must start with a dot: ${ext}`);
    }
  }

  if (config.watch.debounceMs < 0) {
    errors.push('Watch debounce must not be negative');
  }

  if (!config.source.path) errors.push('Source path is required');
  if (!config.mirror.path) errors.push('Mirror path is required');
  if (!config.index.path) errors.push('Index path is required');

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = './tracklink.example.yaml'): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, YAML.dump(DEFAULT_CONFIG, { indent: 2 }));
}
