import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, createLogger, getLogLevel, parseLogLevel, setLogLevel } from '../src/core/logger';
import { applyLogLevel } from '../src/bootstrap';
import { loadConfig } from '../src/config';

describe('Logger', () => {
  afterEach(() => {
    setLogLevel(LogLevel.OFF);
    vi.restoreAllMocks();
  });

  it('prefixes lines with level and name and passes the context along', () => {
    setLogLevel(LogLevel.WARN);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('CacheClient').warn('Cache read failed, treating as miss', { key: 'k' });

    expect(warn).toHaveBeenCalledWith('[WARN] [CacheClient]', 'Cache read failed, treating as miss', { key: 'k' });
  });

  it('drops lines below the global level', () => {
    setLogLevel(LogLevel.WARN);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('Server').info('started');

    expect(log).not.toHaveBeenCalled();
  });

  it('names child loggers after their parent', () => {
    setLogLevel(LogLevel.DEBUG);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('ResilientCaller').child('weatherservice').debug('Attempt 1/3');

    expect(log).toHaveBeenCalledWith('[DEBUG] [ResilientCaller:weatherservice]', 'Attempt 1/3');
  });

  it('parses level names case-insensitively', () => {
    expect(parseLogLevel(' Debug ')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('off')).toBe(LogLevel.OFF);
    expect(parseLogLevel('verbose')).toBeNull();
  });

  it('applies LOG_LEVEL from configuration', () => {
    setLogLevel(LogLevel.INFO);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('Server');

    applyLogLevel(loadConfig({ LOG_LEVEL: 'error' }), logger);
    expect(getLogLevel()).toBe(LogLevel.ERROR);

    setLogLevel(LogLevel.WARN);
    applyLogLevel(loadConfig({ LOG_LEVEL: 'loud' }), logger);
    expect(getLogLevel()).toBe(LogLevel.WARN);
    expect(warn).toHaveBeenCalledWith('[WARN] [Server]', 'Unknown LOG_LEVEL, keeping current level', { logLevel: 'loud' });
  });
});
