/**
 * Unit tests for logger construction and level parsing
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import winston from 'winston';
import { createLogger, parseLogLevel } from '../../../src/utils/logger.js';

describe('parseLogLevel', () => {
  it.each([
    ['debug', 'debug'],
    ['INFO', 'info'],
    ['warn', 'warn'],
    ['WARNING', 'warn'],
    [' error ', 'error'],
  ])('should map %j to %s', (value, expected) => {
    expect(parseLogLevel(value)).toBe(expected);
  });

  it('should default to warn when unset or unknown', () => {
    expect(parseLogLevel(undefined)).toBe('warn');
    expect(parseLogLevel('')).toBe('warn');
    expect(parseLogLevel('CRITICAL')).toBe('warn');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create a winston logger with the service label and level', () => {
    const createSpy = vi.spyOn(winston, 'createLogger');

    createLogger({ serviceName: 'stop-departures-proxy', level: 'debug', environment: 'test' });

    expect(createSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        level: 'debug',
        defaultMeta: { service: 'stop-departures-proxy', environment: 'test' },
      })
    );
  });

  it('should forward messages and metadata to winston', () => {
    const winstonLogger = winston.createLogger({ silent: true });
    const infoSpy = vi.spyOn(winstonLogger, 'info');
    vi.spyOn(winston, 'createLogger').mockReturnValue(winstonLogger);

    const logger = createLogger({ serviceName: 'stop-departures-proxy' });
    logger.info('HTTP request', { status: 200 });

    expect(infoSpy).toHaveBeenCalledWith('HTTP request', { status: 200 });
  });
});
