/**
 * Logger tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  ConsoleLogger,
  JsonLogger,
  LogLevel,
  REDACTED,
  createLogger,
  maskEmail,
  parseLogLevel,
  redactSensitive,
} from './logger.js';

describe('ConsoleLogger', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    vi.unstubAllEnvs();
  });

  it('logs info messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.info('test message', { key: 'value' });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/\[.*\] INFO: test message {"key":"value"}/)
    );
  });

  it('filters out debug messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.debug('debug message');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('logs error with message', () => {
    const logger = new ConsoleLogger(LogLevel.ERROR);
    logger.error('operation failed', new Error('test error'));

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/ERROR: operation failed.*"error":"test error"/)
    );
  });

  it('defaults to INFO without reading the environment', () => {
    vi.stubEnv('LOG_LEVEL', 'ERROR');
    const logger = new ConsoleLogger();

    logger.debug('debug message');
    expect(consoleErrorSpy).not.toHaveBeenCalled();

    logger.info('info message');
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringMatching(/INFO: info message/));
  });

  it('silences all logs at SILENT level', () => {
    const logger = new ConsoleLogger(LogLevel.SILENT);

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('redacts credentials in context', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.info('login', { email: 'person@example.com', password: 'test-secret' });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/INFO: login {"email":"per\*\*\*","password":"\[REDACTED\]"}$/)
    );
  });
});

describe('JsonLogger', () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    vi.unstubAllEnvs();
  });

  it('defaults to INFO without reading the environment', () => {
    vi.stubEnv('LOG_LEVEL', 'SILENT');
    const logger = new JsonLogger();

    logger.debug('hidden');
    logger.info('shown');

    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toMatchObject({ level: 'info', message: 'shown' });
  });

  it('writes one JSON object per line', () => {
    const logger = new JsonLogger(LogLevel.INFO);
    logger.info('tool call', { tool: 'get_accounts' });

    const line = String(consoleErrorSpy.mock.calls[0][0]);
    const parsed: unknown = JSON.parse(line);
    expect(parsed).toMatchObject({ level: 'info', message: 'tool call', tool: 'get_accounts' });
  });

  it('redacts nested secrets', () => {
    const logger = new JsonLogger(LogLevel.DEBUG);
    logger.debug('upstream request', { headers: { Authorization: 'Token abc' } });

    const parsed: unknown = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
    expect(parsed).toMatchObject({ headers: { Authorization: REDACTED } });
  });

  it('includes error message and stack', () => {
    const logger = new JsonLogger(LogLevel.ERROR);
    logger.error('failed', new Error('boom'), { correlationId: 'abc' });

    const parsed: unknown = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
    expect(parsed).toMatchObject({ level: 'error', error: 'boom', correlationId: 'abc' });
  });
});

describe('redactSensitive', () => {
  it('redacts every sensitive key at any depth, case-insensitively', () => {
    const result = redactSensitive({
      password: 'test-secret',
      nested: {
        token: 't',
        mfaCode: '123456',
        mfaSecretKey: 'seed',
        'X-API-Key': 'key',
        list: [{ totp: '000000', keep: 1 }],
      },
      keep: 'visible',
    });

    expect(result).toEqual({
      password: REDACTED,
      nested: {
        token: REDACTED,
        mfaCode: REDACTED,
        mfaSecretKey: REDACTED,
        'X-API-Key': REDACTED,
        list: [{ totp: REDACTED, keep: 1 }],
      },
      keep: 'visible',
    });
  });

  it('masks emails to three characters', () => {
    expect(maskEmail('someone@example.com')).toBe('som***');
    expect(redactSensitive({ email: 'ab@x.io' })).toEqual({ email: 'ab@***' });
  });
});

describe('parseLogLevel', () => {
  it('parses known levels and defaults to INFO', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('ERROR')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
  });
});

describe('createLogger', () => {
  it('selects the implementation from the format', () => {
    expect(createLogger('json', LogLevel.INFO)).toBeInstanceOf(JsonLogger);
    expect(createLogger('console', LogLevel.INFO)).toBeInstanceOf(ConsoleLogger);
  });
});
