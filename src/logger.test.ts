import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import {
  AppError,
  ConsoleSink,
  FileSink,
  Logger,
  createSilentLogger,
  errorMessage,
  handleError,
  isLogLevel,
  type LogEntry,
  type LogSink,
} from './logger.js';

class MemorySink implements LogSink {
  lines: string[] = [];
  entries: LogEntry[] = [];

  write(entry: LogEntry, formatted: string): void {
    this.entries.push(entry);
    this.lines.push(formatted);
  }
}

describe('Logger', () => {
  let sink: MemorySink;
  let logger: Logger;

  beforeEach(() => {
    sink = new MemorySink();
    logger = new Logger({ context: 'test', sinks: [sink] });
  });

  describe('Formatting', () => {
    it('should write timestamp, level, context and message', () => {
      logger.info('Hello');

      const [entry] = sink.entries;
      expect(sink.lines).toEqual([`${entry.timestamp.toISOString()} INFO  [test] Hello`]);
    });

    it('should append data as indented JSON', () => {
      logger.warn('Careful', { count: 2 });

      const [entry] = sink.entries;
      expect(sink.lines[0]).toBe(`${entry.timestamp.toISOString()} WARN  [test] Careful\n  {\n    "count": 2\n  }`);
    });

    it('should add the tag after the level', () => {
      const tagged = new Logger({ level: 'debug', sinks: [sink], tag: '==DRYRUN==' });
      tagged.debug('Would create link');

      const [entry] = sink.entries;
      expect(sink.lines[0]).toBe(`${entry.timestamp.toISOString()} DEBUG ==DRYRUN== Would create link`);
    });

    it('should include the error message and only show stacks when debugging', () => {
      logger.error('Failed', new Error('disk full'));
      expect(sink.lines[0].split('\n')).toHaveLength(2);
      expect(sink.lines[0].split('\n')[1]).toBe('  Error: disk full');

      logger.setMinLevel('debug');
      logger.error('Failed again', new Error('disk full'));
      expect(sink.lines[1]).toContain('\n  Stack: Error: disk full');
    });
  });

  describe('Log Levels', () => {
    it('should drop messages below the minimum level', () => {
      logger.debug('hidden');
      logger.trace('hidden');
      logger.info('shown');

      expect(sink.lines).toHaveLength(1);
      expect(logger.isEnabled('debug')).toBe(false);
      expect(logger.isEnabled('error')).toBe(true);
    });

    it('should change level at runtime', () => {
      logger.setMinLevel('trace');
      logger.trace('visible');

      expect(logger.getMinLevel()).toBe('trace');
      expect(sink.lines).toHaveLength(1);
    });

    it('should recognise level names', () => {
      expect(isLogLevel('warn')).toBe(true);
      expect(isLogLevel('WARN')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe('Children', () => {
    it('should share sinks, level and history under their own context', () => {
      const child = logger.child('Batch 1');
      child.info('from child');
      logger.setMinLevel('error');
      child.info('suppressed');

      expect(sink.entries.map(entry => entry.context)).toEqual(['Batch 1']);
      expect(logger.getLogs()).toHaveLength(1);
      expect(child.getLogs('info')[0].message).toBe('from child');
    });
  });

  describe('History', () => {
    it('should keep a bounded history', () => {
      const bounded = new Logger({ sinks: [], historySize: 2 });
      bounded.info('one');
      bounded.info('two');
      bounded.info('three');

      expect(bounded.getLogs().map(log => log.message)).toEqual(['two', 'three']);
      bounded.clear();
      expect(bounded.getLogs()).toEqual([]);
    });

    it('should record everything in a silent logger', () => {
      const silent = createSilentLogger('quiet');
      silent.trace('t');
      silent.error('e');

      expect(silent.getLogs().map(log => log.level)).toEqual(['trace', 'error']);
    });
  });

  describe('Sinks', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(TEST_DIR, 'logger-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should append lines to a file', () => {
      const logFile = join(dir, 'logs', 'run.log');
      const fileLogger = new Logger({ sinks: [new FileSink(logFile)] });

      fileLogger.info('first');
      fileLogger.info('second');

      const lines = readFileSync(logFile, 'utf-8').split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[0].endsWith(' INFO  first')).toBe(true);
      expect(lines[1].endsWith(' INFO  second')).toBe(true);
      expect(lines[2]).toBe('');
    });

    it('should route levels to the matching console method', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const consoleLogger = new Logger({ sinks: [new ConsoleSink()] });

      consoleLogger.info('i');
      consoleLogger.warn('w');
      consoleLogger.error('e');

      expect(log).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(error).toHaveBeenCalledTimes(1);
      log.mockRestore();
      warn.mockRestore();
      error.mockRestore();
    });
  });
});

describe('Error Handling', () => {
  it('should create AppError with code and context', () => {
    const error = new AppError('Test error', 'LINK_FAILED', { path: '/x' });

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('LINK_FAILED');
    expect(error.context).toEqual({ path: '/x' });
    expect(error.name).toBe('AppError');
  });

  it('should default to UNKNOWN_ERROR', () => {
    expect(new AppError('x').code).toBe('UNKNOWN_ERROR');
  });

  it('should wrap foreign errors and log them', () => {
    const logger = createSilentLogger();
    const cause = new Error('boom');

    const wrapped = handleError(cause, logger, 'INDEX_WRITE_FAILED', { batch: 2 });

    expect(wrapped).toBeInstanceOf(AppError);
    expect(wrapped.code).toBe('INDEX_WRITE_FAILED');
    expect(wrapped.cause).toBe(cause);
    expect(logger.getLogs('error')[0]).toMatchObject({ message: 'boom', data: { batch: 2 } });
  });

  it('should pass AppErrors through unchanged', () => {
    const logger = createSilentLogger();
    const original = new AppError('already wrapped', 'SETUP_FAILED');

    expect(handleError(original, logger)).toBe(original);
    expect(logger.getLogs('error')).toHaveLength(1);
  });

  it('should describe non-Error values', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(new Error('err'))).toBe('err');
  });
});
