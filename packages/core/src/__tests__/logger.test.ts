import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  EngineLogger,
  createLogger,
  formatLogEntry,
  isDebugMode,
  setDebugMode,
  silentLogger,
  type LogEntry,
} from '../observability/logger.js';
import { EngineError } from '../errors/engine-error.js';

function capture(config: Parameters<typeof createLogger>[0] = {}) {
  const entries: LogEntry[] = [];
  const logger = createLogger({ ...config, handler: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('EngineLogger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  describe('creation', () => {
    it('should create via factory with the sw module by default', () => {
      const logger = createLogger();
      expect(logger).toBeInstanceOf(EngineLogger);
      expect(logger.module).toBe('sw');
    });

    it('should prefix child modules', () => {
      const { logger, entries } = capture();
      logger.child('fetch').child('cache').info('hit');
      expect(entries[0].module).toBe('sw:fetch:cache');
    });
  });

  describe('log levels', () => {
    it('should drop debug at the default level', () => {
      const { logger, entries } = capture();
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((entry) => entry.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should only emit errors at error level', () => {
      const { logger, entries } = capture({ level: 'error' });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });

    it('should let children inherit the level', () => {
      const { logger, entries } = capture({ level: 'warn' });
      logger.child('sync').info('ignored');
      expect(entries).toHaveLength(0);
    });
  });

  describe('debug mode', () => {
    it('should toggle global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
    });

    it('should override the configured level', () => {
      const { logger, entries } = capture({ level: 'error' });
      setDebugMode(true);
      logger.debug('now visible');
      expect(entries).toHaveLength(1);
    });

    it('should honour the debug flag', () => {
      const { logger, entries } = capture({ level: 'error', debug: true });
      logger.debug('visible');
      expect(entries).toHaveLength(1);
    });
  });

  describe('entries', () => {
    it('should omit an empty context', () => {
      const { logger, entries } = capture();
      logger.info('plain', {});
      expect(entries[0]).not.toHaveProperty('context');
    });

    it('should describe errors passed to error()', () => {
      const { logger, entries } = capture();
      logger.error('Install failed', EngineError.fromCode('OFFLINE_S300'), { namespace: 'attendance-tracker-v1.0.0' });

      expect(entries[0].context).toMatchObject({
        namespace: 'attendance-tracker-v1.0.0',
        error: { name: 'EngineError', message: 'Precache install failed', code: 'OFFLINE_S300' },
      });
    });

    it('should describe non-error values', () => {
      const { logger, entries } = capture();
      logger.error('Rejected', 'plain reason');
      expect(entries[0].context).toEqual({ error: { message: 'plain reason' } });
    });

    it('should log a duration when a timer ends', () => {
      const { logger, entries } = capture({ level: 'debug' });
      const end = logger.time('install');
      end({ entries: 5 });

      expect(entries[0].message).toBe('install completed');
      expect(entries[0].context).toMatchObject({ entries: 5 });
      expect(entries[0].context?.durationMs).toBeTypeOf('number');
    });
  });

  describe('console output', () => {
    it('should format entries as a single text line', () => {
      const line = formatLogEntry({
        level: 'warn',
        message: 'Cache write dropped',
        timestamp: Date.UTC(2025, 7, 1, 9, 0, 0),
        module: 'sw:fetch',
        context: { url: '/static/app.js' },
      });

      expect(line).toBe('2025-08-01T09:00:00.000Z WARN[sw:fetch] Cache write dropped {"url":"/static/app.js"}');
    });

    it('should write to the console method matching the level', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      createLogger({ module: 'sw' }).warn('careful');

      expect(warn).toHaveBeenCalledOnce();
      expect(warn.mock.calls[0][0]).toMatch(/ WARN\[sw\] careful$/);
    });

    it('should write JSON lines when asked', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});
      createLogger({ module: 'sw', json: true }).info('ready', { version: 'v1.0.0' });

      expect(JSON.parse(String(info.mock.calls[0][0]))).toMatchObject({
        level: 'info',
        module: 'sw',
        message: 'ready',
        context: { version: 'v1.0.0' },
      });
    });

    it('should stay quiet with the silent logger', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      silentLogger.error('dropped');
      expect(error).not.toHaveBeenCalled();
    });
  });
});
