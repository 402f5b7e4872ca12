/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from '@/shared/utils/logger';

function plainLogger(level: LogLevel = LogLevel.DEBUG): Logger {
  return new Logger({ level, enableColors: false, enableTimestamp: false });
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write level, message and metadata', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    plainLogger().info('Generator registered', { name: 'orders' });

    expect(spy).toHaveBeenCalledWith('INFO  Generator registered {"name":"orders"}');
  });

  it('should route levels to matching console methods', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    const logger = plainLogger();
    logger.warn('careful');
    logger.debug('details');

    expect(warn).toHaveBeenCalledWith('WARN  careful');
    expect(debug).toHaveBeenCalledWith('DEBUG details');
  });

  it('should flatten Error instances', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    plainLogger().error('failed', new Error('bad'));

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^ERROR failed \{"error":\{"name":"Error","message":"bad","stack":/);
  });

  it('should drop messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    const logger = plainLogger(LogLevel.WARN);
    logger.info('hidden');
    logger.debug('hidden');

    expect(log).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();

    logger.setLevel(LogLevel.INFO);
    logger.info('shown');
    expect(log).toHaveBeenCalledWith('INFO  shown');
  });

  it('should colorize the level when colors are on', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const logger = plainLogger();
    logger.setColors(true);
    logger.info('tinted');

    expect(spy).toHaveBeenCalledWith('\x1b[34mINFO \x1b[0m tinted');
  });

  it('should prefix an ISO timestamp when enabled', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const logger = plainLogger();
    logger.setTimestamps(true);
    logger.info('stamped');

    expect(spy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO  stamped$/);
  });

  describe('parseLogLevel', () => {
    it('should accept known levels case-insensitively', () => {
      expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    });

    it('should fall back to info', () => {
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
      expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    });
  });
});
