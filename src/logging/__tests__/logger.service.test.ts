import { describe, it, expect, beforeEach, afterAll, jest } from '@jest/globals';
import { LoggerService } from '../logger.service.js';
import { LogLevel } from '../../types/log.types.js';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation(() => {});
const mockConsoleWarn = jest.spyOn(console, 'warn').mockImplementation(() => {});
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation(() => {});
const mockConsoleDebug = jest.spyOn(console, 'debug').mockImplementation(() => {});

function lastLine(spy: typeof mockConsoleLog): unknown {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

describe('LoggerService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  it('should write one JSON line with scope, message and context', () => {
    const logger = new LoggerService({});

    logger.info('Startup', 'Listening', { port: 5000 });

    expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    expect(lastLine(mockConsoleLog)).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      scope: 'Startup',
      message: 'Listening',
      context: { port: 5000 }
    });
  });

  it('should omit context when none is given', () => {
    const logger = new LoggerService({});

    logger.info('Startup', 'Ready');

    expect(lastLine(mockConsoleLog)).not.toHaveProperty('context');
  });

  it('should route each level to the matching console method', () => {
    const logger = new LoggerService({ LOG_LEVEL: 'debug' });

    logger.debug('Probe', 'debug line');
    logger.warn('Probe', 'warn line');
    logger.error('Probe', 'error line');

    expect(mockConsoleDebug).toHaveBeenCalledTimes(1);
    expect(mockConsoleWarn).toHaveBeenCalledTimes(1);
    expect(mockConsoleError).toHaveBeenCalledTimes(1);
    expect(mockConsoleLog).not.toHaveBeenCalled();
  });

  it('should drop lines below the configured level', () => {
    const logger = new LoggerService({ LOG_LEVEL: 'WARN' });

    logger.info('Probe', 'skipped');
    logger.warn('Probe', 'kept');

    expect(logger.getMinLevel()).toBe(LogLevel.WARN);
    expect(mockConsoleLog).not.toHaveBeenCalled();
    expect(mockConsoleWarn).toHaveBeenCalledTimes(1);
  });

  it('should ignore an unknown LOG_LEVEL and default to info', () => {
    const logger = new LoggerService({ LOG_LEVEL: 'verbose' });

    expect(logger.getMinLevel()).toBe(LogLevel.INFO);
  });

  it('should write nothing when disabled', () => {
    const logger = new LoggerService({ LOGGING_ENABLED: 'false' });

    logger.error('Probe', 'silenced');

    expect(mockConsoleError).not.toHaveBeenCalled();
  });

  it('should write request logs asynchronously', async () => {
    const logger = new LoggerService({});

    const pending = logger.logRequest({
      correlation_id: 'req-1',
      path: '/health',
      method: 'GET',
      status_code: 200,
      duration: 7,
      timestamp: '2026-03-14T09:26:53.000Z'
    });

    expect(mockConsoleLog).not.toHaveBeenCalled();

    const result = await pending;

    expect(result.success).toBe(true);
    expect(lastLine(mockConsoleLog)).toEqual({
      timestamp: '2026-03-14T09:26:53.000Z',
      level: 'info',
      scope: 'RequestLog',
      message: 'GET /health - 200',
      context: {
        correlation_id: 'req-1',
        method: 'GET',
        path: '/health',
        status_code: 200,
        duration_ms: 7
      }
    });
  });

  it('should report success without writing when disabled', async () => {
    const logger = new LoggerService({});
    logger.setEnabled(false);

    const result = await logger.logRequest({
      correlation_id: 'req-2',
      path: '/',
      method: 'GET',
      status_code: 200,
      duration: 1,
      timestamp: '2026-03-14T09:26:53.000Z'
    });

    expect(result.success).toBe(true);
    expect(mockConsoleLog).not.toHaveBeenCalled();
  });
});
