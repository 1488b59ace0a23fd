import { afterEach, describe, expect, it, vi } from 'vitest';
import { RelayLogger, createLogger, isDebugMode, setDebugMode } from '../observability/logger.js';
import type { LogEntry } from '../observability/logger.js';

describe('RelayLogger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  describe('creation', () => {
    it('should create via factory', () => {
      const logger = createLogger({ module: 'test' });
      expect(logger).toBeInstanceOf(RelayLogger);
      expect(logger.module).toBe('test');
    });

    it('should prefix child logger modules', () => {
      const entries: LogEntry[] = [];
      const parent = createLogger({ module: 'parent', handler: (e) => entries.push(e) });
      parent.child('child').info('hello');
      expect(entries[0]?.module).toBe('parent:child');
    });

    it('should default the module name', () => {
      expect(createLogger().module).toBe('sqlite-relay');
    });
  });

  describe('log levels', () => {
    it('should call handler for info and above at default level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should include debug when level is debug', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: (e) => entries.push(e) });
      logger.debug('debug msg', { key: 'value' });
      expect(entries).toHaveLength(1);
      expect(entries[0]?.context).toEqual({ key: 'value' });
    });

    it('should only emit errors at error level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });
  });

  describe('debug mode', () => {
    it('should toggle global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
      setDebugMode(false);
      expect(isDebugMode()).toBe(false);
    });

    it('should override level when debug mode is on', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      setDebugMode(true);
      logger.debug('should appear');
      expect(entries).toHaveLength(1);
    });

    it('should write to the console when the logger is in debug mode', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = createLogger({ module: 'test', debug: true });
      logger.info('visible');
      expect(spy).toHaveBeenCalledWith('[test] visible', '');
    });

    it('should stay silent without handler, json or debug', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      createLogger({ module: 'test' }).info('hidden');
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('error logging', () => {
    it('should attach error details to the entry', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.error('failed', new Error('test error'), { extra: 'data' });
      expect(entries[0]?.error?.message).toBe('test error');
      expect(entries[0]?.error?.name).toBe('Error');
      expect(entries[0]?.context).toEqual({ extra: 'data' });
    });

    it('should describe non-Error values', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.warn('odd failure', undefined, 'plain text');
      expect(entries[0]?.error).toEqual({ name: 'Error', message: 'plain text' });
    });
  });

  describe('time', () => {
    it('should measure operation duration', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: (e) => entries.push(e) });
      const end = logger.time('my-op');
      end({ count: 42 });
      expect(entries).toHaveLength(1);
      expect(entries[0]?.message).toBe('my-op completed');
      const ctx = entries[0]?.context ?? {};
      expect(ctx['durationMs']).toBeGreaterThanOrEqual(0);
      expect(ctx['count']).toBe(42);
    });
  });

  describe('JSON output', () => {
    it('should output JSON when configured', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = createLogger({ module: 'test', json: true });
      logger.info('json test');
      expect(spy).toHaveBeenCalledTimes(1);
      const output = String(spy.mock.calls[0]?.[0]);
      const parsed = JSON.parse(output) as LogEntry;
      expect(parsed.message).toBe('json test');
      expect(parsed.module).toBe('test');
    });

    it('should route errors to console.error', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      createLogger({ module: 'test', json: true }).error('boom');
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });
});
