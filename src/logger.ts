/**
 * Leveled logging with pluggable sinks.
 *
 * There is no global instance: the CLI builds one logger and hands it (or a
 * child with its own context) to every component.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LogSink {
  write(entry: LogEntry, formatted: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  sinks?: LogSink[];
  /** Tag inserted after the level on every line, e.g. `==DRYRUN==` */
  tag?: string;
  historySize?: number;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Writes to stdout/stderr with a colour per level
 */
export class ConsoleSink implements LogSink {
  private static readonly colors: Record<LogLevel, string> = {
    trace: '\x1b[90m', // Grey
    debug: '\x1b[36m', // Cyan
    info: '\x1b[32m', // Green
    warn: '\x1b[33m', // Yellow
    error: '\x1b[31m', // Red
  };

  write(entry: LogEntry, formatted: string): void {
    const color = ConsoleSink.colors[entry.level];
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }
}

/**
 * Appends plain lines to a log file
 */
export class FileSink implements LogSink {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    mkdirSync(dirname(filePath), { recursive: true });
  }

  write(_entry: LogEntry, formatted: string): void {
    appendFileSync(this.filePath, formatted + '\n', 'utf-8');
  }
}

export interface LoggerState {
  minLevel: LogLevel;
  sinks: LogSink[];
  tag?: string;
  history: LogEntry[];
  historySize: number;
}

export class Logger {
  private readonly state: LoggerState;
  private readonly context?: string;

  constructor(options: LoggerOptions = {}, shared?: LoggerState) {
    this.state = shared ?? {
      minLevel: options.level ?? 'info',
      sinks: options.sinks ?? [new ConsoleSink()],
      tag: options.tag,
      history: [],
      historySize: options.historySize ?? 1000,
    };
    this.context = options.context;
  }

  /**
   * Logger sharing sinks, level and history, reporting under another context
   */
  child(context: string): Logger {
    return new Logger({ context }, this.state);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.state.minLevel);
  }

  isEnabled(level: LogLevel): boolean {
    return this.shouldLog(level);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const tag = this.state.tag ? ` ${this.state.tag}` : '';
    const context = entry.context ? ` [${entry.context}]` : '';

    let message = `${timestamp} ${level}${tag}${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack && this.shouldLog('debug')) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return message;
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.state.history.push(entry);
    if (this.state.history.length > this.state.historySize) {
      this.state.history.splice(0, this.state.history.length - this.state.historySize);
    }

    const formatted = this.formatMessage(entry);
    for (const sink of this.state.sinks) {
      sink.write(entry, formatted);
    }
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'trace', message, data, context: this.context });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, data, context: this.context });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.state.history.filter(log => log.level === level) : [...this.state.history];
  }

  clear(): void {
    this.state.history.length = 0;
  }

  setMinLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.state.minLevel;
  }
}

/**
 * Logger that records history but writes nowhere, for library callers that
 * do not pass one
 */
export function createSilentLogger(context?: string): Logger {
  return new Logger({ level: 'trace', sinks: [], context });
}

export type ErrorCode =
  | 'SETUP_FAILED'
  | 'SYMLINK_UNSUPPORTED'
  | 'INDEX_OPEN_FAILED'
  | 'INDEX_WRITE_FAILED'
  | 'LINK_FAILED'
  | 'DUPLICATE_IDENTITY'
  | 'INVALID_CONFIG'
  | 'UNKNOWN_ERROR';

/**
 * Application error carrying a machine-readable code
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = 'UNKNOWN_ERROR',
    public context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalizes anything thrown into an AppError and logs it
 */
export function handleError(
  error: unknown,
  logger: Logger,
  code: ErrorCode = 'UNKNOWN_ERROR',
  context?: Record<string, unknown>
): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, error.context);
    return error;
  }

  const appError = new AppError(errorMessage(error), code, context, { cause: error });
  logger.error(appError.message, error instanceof Error ? error : undefined, context);
  return appError;
}
