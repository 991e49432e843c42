import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logger = new Logger({ useColors: false });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should log info messages to stdout', () => {
    logger.info('info message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('ℹ️ info message'));
  });

  it('should log error messages to stderr', () => {
    logger.error('error message');
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('❌ error message'));
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should filter messages below the configured level', () => {
    logger.setLevel(LogLevel.WARNING);

    logger.debug('debug');
    logger.info('info');
    logger.success('success');
    logger.warning('warning');
    logger.error('error');

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('⚠️ warning'));
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
  });

  it('should prefix child logger output', () => {
    const child = logger.child('My Show S01');
    child.info('listing');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('ℹ️ [My Show S01] listing'));
  });

  it('should nest child prefixes', () => {
    logger.child('batch').child('S02').warning('slow');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('[batch] [S02] slow'));
  });

  it('should use ANSI colors when enabled', () => {
    new Logger({ useColors: true }).info('message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('\x1b[34mmessage\x1b[0m'));
  });

  it('should not emit ANSI codes when colors are disabled', () => {
    logger.info('message');
    const line = consoleLogSpy.mock.lastCall?.[0];
    expect(line).not.toContain('\x1b[');
  });
});

describe('parseLogLevel', () => {
  it('should accept names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Warning')).toBe(LogLevel.WARNING);
  });

  it('should fall back to INFO', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});
