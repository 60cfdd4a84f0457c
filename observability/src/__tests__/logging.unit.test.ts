/**
 * Tests for the structured logging implementations
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { pooled, buildSharedPool, STRING_TRAITS, type LogEntry } from '@pooled/core';
import {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatEntry,
  withContext,
  LogLevels,
} from '../logging.js';

describe('createTestLogger', () => {
  let testLogger: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    testLogger = createTestLogger();
  });

  it('should capture every level', () => {
    testLogger.debug('d');
    testLogger.info('i');
    testLogger.warn('w');
    testLogger.error('e', new Error('boom'));

    expect(testLogger.getLogs().map(entry => entry.level)).toEqual(['debug', 'info', 'warn', 'error']);
    expect(testLogger.getLogsByLevel('error')[0].error?.message).toBe('boom');
  });

  it('should include context in log entries', () => {
    testLogger.info('pool built', { poolSize: 3, column: 'city' });
    expect(testLogger.getLogs()[0].context).toEqual({ poolSize: 3, column: 'city' });
  });

  it('should clear captured entries', () => {
    testLogger.info('one');
    testLogger.clear();
    expect(testLogger.getLogs()).toEqual([]);
  });

  it('should filter by minimum level', () => {
    const logger = createTestLogger({ minLevel: 'warn' });
    logger.info('dropped');
    logger.warn('kept');
    expect(logger.getLogs().map(entry => entry.message)).toEqual(['kept']);
  });

  it('should record what a pooled column logs', () => {
    const column = pooled(['b', 'a', 'b'], { logger: testLogger });
    column.set(0, 'c');
    column.replace('a', 'c');

    expect(testLogger.getLogsByLevel('debug').map(entry => entry.message)).toEqual([
      'Built pool',
      'Pool grew',
      'Merged pool slot',
    ]);
    expect(testLogger.getLogs()[2].context).toEqual({
      operation: 'replace',
      slot: 3,
      orphanedSlot: 1,
      rows: 1,
    });
  });
});

describe('createLogger', () => {
  it('should pass entries to the output function', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ output: entry => entries.push(entry) });
    logger.warn('careful', { rows: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'warn', message: 'careful', context: { rows: 2 } });
    expect(typeof entries[0].timestamp).toBe('number');
  });

  it('should omit context and error when not given', () => {
    const entries: LogEntry[] = [];
    createLogger({ output: entry => entries.push(entry) }).info('bare');
    expect(Object.keys(entries[0]).sort()).toEqual(['level', 'message', 'timestamp']);
  });

  it('should discard entries without an output', () => {
    expect(() => createLogger().error('nowhere')).not.toThrow();
  });
});

describe('formatEntry', () => {
  const entry: LogEntry = {
    level: 'info',
    message: 'Built pool',
    timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
    context: { poolSize: 2 },
  };

  it('should render JSON lines', () => {
    expect(formatEntry(entry, 'json')).toBe(
      `{"level":"info","message":"Built pool","timestamp":${entry.timestamp},"context":{"poolSize":2}}`
    );
  });

  it('should render pretty lines', () => {
    expect(formatEntry(entry, 'pretty')).toBe('[2024-01-02T03:04:05.000Z] INFO  Built pool {"poolSize":2}');
  });

  it('should append error details in pretty format', () => {
    const error = new Error('bad');
    error.stack = 'Error: bad\n    at here';
    const line = formatEntry({ level: 'error', message: 'failed', timestamp: 0, error }, 'pretty');
    expect(line).toBe('[1970-01-01T00:00:00.000Z] ERROR failed\n  Error: bad\n  Error: bad\n    at here');
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one formatted line per entry', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createConsoleLogger({ format: 'json', minLevel: 'info' });

    logger.debug('hidden');
    logger.info('shown', { rows: 1 });

    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0][0]);
    expect(JSON.parse(line)).toMatchObject({ level: 'info', message: 'shown', context: { rows: 1 } });
  });
});

describe('createNoopLogger', () => {
  it('should accept every call', () => {
    const logger = createNoopLogger();
    expect(() => {
      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');
    }).not.toThrow();
  });
});

describe('withContext', () => {
  it('should merge parent context under local context', () => {
    const testLogger = createTestLogger();
    const child = withContext(testLogger, { column: 'left', operation: 'outer' });

    child.info('first');
    child.info('second', { operation: 'inner' });

    expect(testLogger.getLogs()[0].context).toEqual({ column: 'left', operation: 'outer' });
    expect(testLogger.getLogs()[1].context).toEqual({ column: 'left', operation: 'inner' });
  });

  it('should label shared pool entries', () => {
    const testLogger = createTestLogger();
    buildSharedPool(['a'], ['b'], { traits: STRING_TRAITS, logger: withContext(testLogger, { column: 'key' }) });

    expect(testLogger.getLogs()[0].context).toEqual({
      column: 'key',
      operation: 'buildSharedPool',
      rows: 2,
      poolSize: 2,
      refWidth: 16,
    });
  });
});

describe('LogLevels', () => {
  it('should order levels', () => {
    expect(LogLevels.order('debug')).toBe(0);
    expect(LogLevels.isAtLeast('error', 'warn')).toBe(true);
    expect(LogLevels.isAtLeast('info', 'warn')).toBe(false);
  });

  it('should recognise level names', () => {
    expect(LogLevels.isLogLevel('warn')).toBe(true);
    expect(LogLevels.isLogLevel('toString')).toBe(false);
    expect(LogLevels.isLogLevel(3)).toBe(false);
  });
});
