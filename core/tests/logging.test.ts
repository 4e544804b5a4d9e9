/**
 * Tests for Structured Logging
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import type { LogEntry } from '../src/index.js';
import {
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLevelAtLeast,
  withContext,
} from '../src/index.js';

describe('Logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('isLevelAtLeast', () => {
    it('should order levels', () => {
      expect(isLevelAtLeast('error', 'warn')).toBe(true);
      expect(isLevelAtLeast('info', 'info')).toBe(true);
      expect(isLevelAtLeast('debug', 'info')).toBe(false);
    });
  });

  describe('createLogger', () => {
    it('should drop entries below the minimum level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ minLevel: 'warn', output: (entry) => entries.push(entry) });

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e', new Error('x'), { operation: 'op' });

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
      expect(entries[1]?.error?.message).toBe('x');
      expect(entries[1]?.context).toEqual({ operation: 'op' });
    });

    it('should omit absent context and error', () => {
      const entries: LogEntry[] = [];
      createLogger({ output: (entry) => entries.push(entry) }).info('hello');

      expect(Object.keys(entries[0] ?? {})).toEqual(['level', 'message', 'timestamp']);
    });
  });

  describe('formatLogEntry', () => {
    const entry: LogEntry = {
      level: 'error',
      message: 'failed',
      timestamp: 0,
      context: { column: '$data' },
      error: new TypeError('bad type'),
    };

    it('should format JSON lines', () => {
      expect(formatLogEntry(entry, 'json')).toBe(
        '{"level":"error","message":"failed","timestamp":0,"context":{"column":"$data"},' +
          '"error":{"name":"TypeError","message":"bad type"}}'
      );
    });

    it('should format pretty lines', () => {
      expect(formatLogEntry(entry, 'pretty')).toBe(
        '[1970-01-01T00:00:00.000Z] ERROR failed {"column":"$data"}\n  Error: bad type'
      );
      expect(formatLogEntry({ level: 'info', message: 'ok', timestamp: 0 }, 'pretty')).toBe(
        '[1970-01-01T00:00:00.000Z] INFO  ok'
      );
    });
  });

  describe('createConsoleLogger', () => {
    it('should route levels to console methods', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      const logger = createConsoleLogger({ minLevel: 'info' });
      logger.debug('hidden');
      logger.info('shown');
      logger.warn('careful');
      logger.error('broken');

      expect(log).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(error).toHaveBeenCalledTimes(1);
      expect(log.mock.calls[0]?.[0]).toContain('"message":"shown"');
    });
  });

  describe('createNoopLogger', () => {
    it('should accept calls without output', () => {
      const logger = createNoopLogger();

      expect(() => logger.error('ignored', new Error('x'))).not.toThrow();
    });
  });

  describe('createTestLogger', () => {
    it('should capture and clear entries', () => {
      const logger = createTestLogger();
      logger.info('one');
      logger.warn('two');

      expect(logger.getLogs().map((e) => e.message)).toEqual(['one', 'two']);
      expect(logger.getLogsByLevel('warn')).toHaveLength(1);

      logger.clear();
      expect(logger.getLogs()).toEqual([]);
    });
  });

  describe('withContext', () => {
    it('should merge the bound context under local context', () => {
      const logger = createTestLogger();
      const child = withContext(logger, { column: '$data', operation: 'outer' });

      child.info('a');
      child.debug('b', { operation: 'inner', fieldCount: 2 });
      child.error('c', new Error('x'), { errorCode: 'E' });

      expect(logger.getLogs().map((e) => e.context)).toEqual([
        { column: '$data', operation: 'outer' },
        { column: '$data', operation: 'inner', fieldCount: 2 },
        { column: '$data', operation: 'outer', errorCode: 'E' },
      ]);
      expect(logger.getLogs()[2]?.error?.message).toBe('x');
    });
  });
});
