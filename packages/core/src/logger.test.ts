/**
 * Tests for logger interface and utilities
 */

import { describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  formatLogLine,
  LOG_LEVELS,
  type LogLevel,
  parseLogLevel,
  shouldLog
} from './logger.js';

describe('LOG_LEVELS', () => {
  it('should be ordered from least to most verbose', () => {
    expect(LOG_LEVELS.error).toBeLessThan(LOG_LEVELS.warn);
    expect(LOG_LEVELS.warn).toBeLessThan(LOG_LEVELS.info);
    expect(LOG_LEVELS.info).toBeLessThan(LOG_LEVELS.debug);
  });
});

describe('shouldLog', () => {
  it('should log errors at every level', () => {
    const levels: LogLevel[] = ['error', 'warn', 'info', 'debug'];
    for (const level of levels) {
      expect(shouldLog(level, 'error')).toBe(true);
    }
  });

  it('should log info at info level and above', () => {
    expect(shouldLog('error', 'info')).toBe(false);
    expect(shouldLog('warn', 'info')).toBe(false);
    expect(shouldLog('info', 'info')).toBe(true);
    expect(shouldLog('debug', 'info')).toBe(true);
  });

  it('should log debug only at debug level', () => {
    expect(shouldLog('info', 'debug')).toBe(false);
    expect(shouldLog('debug', 'debug')).toBe(true);
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('ERROR')).toBe('error');
    expect(parseLogLevel('Warn')).toBe('warn');
    expect(parseLogLevel('WARNING')).toBe('warn');
    expect(parseLogLevel('info')).toBe('info');
    expect(parseLogLevel('dEbUg')).toBe('debug');
  });

  it('should reject anything else', () => {
    expect(parseLogLevel('trace')).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
  });
});

describe('formatLogLine', () => {
  it('should prefix the upper-cased level', () => {
    expect(formatLogLine('warn', 'Conflict: x')).toBe('[WARN] Conflict: x');
  });
});

describe('createLogger', () => {
  it('should default to info', () => {
    expect(createLogger().level).toBe('info');
  });

  it('should respect log level configuration', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'warn', output });

    logger.error('error message');
    logger.warn('warn message');
    logger.info('info message');
    logger.debug('debug message');

    expect(output).toHaveBeenCalledTimes(2);
    expect(output).toHaveBeenNthCalledWith(1, '[ERROR] error message');
    expect(output).toHaveBeenNthCalledWith(2, '[WARN] warn message');
  });

  it('should write to stderr by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger({ level: 'debug' }).debug('probe');

    expect(spy).toHaveBeenCalledWith('[DEBUG] probe');
    expect(log).not.toHaveBeenCalled();

    spy.mockRestore();
    log.mockRestore();
  });
});
