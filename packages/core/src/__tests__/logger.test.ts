import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, formatLogEntry, getLogger, setLogger, type LogLevel } from '../logger.js';

const NOW = new Date('2024-01-02T03:04:05.000Z');

function collecting(level: LogLevel | (() => LogLevel)): { lines: string[]; logger: ReturnType<typeof createLogger> } {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    sink: (lvl, line) => {
      lines.push(`${lvl}|${line}`);
    },
  });
  return { lines, logger };
}

describe('formatLogEntry', () => {
  it('should format timestamp, padded level, message and context', () => {
    expect(formatLogEntry('info', 'hello', { a: 1 }, NOW)).toBe('[2024-01-02T03:04:05.000Z] [INFO ] hello {"a":1}');
  });

  it('should leave out empty context', () => {
    expect(formatLogEntry('error', 'failed', {}, NOW)).toBe('[2024-01-02T03:04:05.000Z] [ERROR] failed');
    expect(formatLogEntry('debug', 'step', undefined, NOW)).toBe('[2024-01-02T03:04:05.000Z] [DEBUG] step');
  });
});

describe('createLogger', () => {
  it('should drop entries below the threshold', () => {
    const { lines, logger } = collecting('warn');
    logger.debug('one');
    logger.info('two');
    logger.warn('three');
    logger.error('four');

    expect(lines.map((line) => line.split('|')[0])).toEqual(['warn', 'error']);
    expect(lines[0]).toMatch(/^warn\|\[.+\] \[WARN \] three$/);
  });

  it('should write nothing when silent', () => {
    const { lines, logger } = collecting('silent');
    logger.error('ignored');

    expect(lines).toEqual([]);
  });

  it('should read a level function on every call', () => {
    let level: LogLevel = 'error';
    const { lines, logger } = collecting(() => level);
    logger.info('before');
    level = 'debug';
    logger.info('after');

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('[INFO ] after')).toBe(true);
  });
});

describe('setLogger', () => {
  afterEach(() => {
    setLogger();
  });

  it('should replace and restore the shared logger', () => {
    const original = getLogger();
    const { logger } = collecting('debug');
    setLogger(logger);

    expect(getLogger()).toBe(logger);
    setLogger();
    expect(getLogger()).toBe(original);
  });
});
