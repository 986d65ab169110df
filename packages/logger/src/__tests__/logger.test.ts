import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { validateLoggerEnv } from '../env.schema.js';
import { getLogger, initLogger } from '../logger.js';

interface CapturedEntry {
  level: number;
  category?: string;
  msg?: string;
  service?: string;
  [key: string]: unknown;
}

function captureEntries(): { entries: CapturedEntry[]; destination: { write: (msg: string) => void } } {
  const entries: CapturedEntry[] = [];
  return {
    entries,
    destination: {
      write: (msg: string) => {
        entries.push(JSON.parse(msg) as CapturedEntry);
      },
    },
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({});
  });

  afterEach(() => {
    initLogger({});
  });

  it('should be silent under test when no destination is injected', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write');
    const logger = getLogger('test');

    logger.info('test message');
    logger.error('error message');

    expect(stderrSpy).not.toHaveBeenCalled();
    stderrSpy.mockRestore();
  });

  it('should write entries with their category to the injected destination', () => {
    const { entries, destination } = captureEntries();
    initLogger({ level: 'info', destination });

    getLogger('test-category').info('test message');

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe(30);
    expect(entries[0]?.category).toBe('test-category');
    expect(entries[0]?.msg).toBe('test message');
    expect(entries[0]?.service).toBe('tallyledger');
  });

  it('should respect log levels', () => {
    const { entries, destination } = captureEntries();
    initLogger({ level: 'warn', destination });
    const logger = getLogger('test');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(entries.map((e) => e.level)).toEqual([40, 50]);
  });

  it('should merge context objects into the entry', () => {
    const { entries, destination } = captureEntries();
    initLogger({ level: 'info', destination });

    getLogger('test').warn({ line: 3, reason: 'bad amount' }, 'record skipped');

    expect(entries[0]?.msg).toBe('record skipped');
    expect(entries[0]?.['line']).toBe(3);
    expect(entries[0]?.['reason']).toBe('bad amount');
  });

  it('should serialize errors under the error key', () => {
    const { entries, destination } = captureEntries();
    initLogger({ level: 'info', destination });

    getLogger('test').error({ error: new Error('disk gone') }, 'write failed');

    expect(entries[0]?.['error']).toMatchObject({ type: 'Error', message: 'disk gone' });
  });

  it('should route loggers created before reconfiguration to the new destination', () => {
    const logger = getLogger('early');
    const { entries, destination } = captureEntries();

    initLogger({ level: 'debug', destination });
    logger.debug('after reconfigure');

    expect(entries).toHaveLength(1);
    expect(entries[0]?.category).toBe('early');
  });
});

describe('validateLoggerEnv', () => {
  it('should apply defaults', () => {
    const env = validateLoggerEnv({});

    expect(env.LOGGER_LOG_LEVEL).toBe('info');
    expect(env.LOGGER_FILE_LOG_ENABLED).toBe(false);
    expect(env.LOGGER_FILE_LOG_PATH).toBe('logs/tallyledger.log');
    expect(env.NODE_ENV).toBe('development');
  });

  it('should parse boolean flags from strings', () => {
    expect(validateLoggerEnv({ LOGGER_FILE_LOG_ENABLED: 'true' }).LOGGER_FILE_LOG_ENABLED).toBe(true);
  });

  it('should reject unknown log levels', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_LEVEL: 'verbose' })).toThrow('LOGGER_LOG_LEVEL');
  });
});
