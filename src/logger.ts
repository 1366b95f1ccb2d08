/**
 * Logger interfaces and implementations
 *
 * Why: Replaces console.error with structured, level-based logging.
 * Enables production-ready logging with context and proper error handling.
 *
 * Security: credential fields are redacted from every context object before it
 * is written, at any nesting depth.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = new Set([
  'password',
  'token',
  'totp',
  'mfacode',
  'mfasecretkey',
  'authorization',
  'x-api-key',
  'apikey',
]);

/**
 * Mask an email address down to its first three characters
 */
export function maskEmail(email: string): string {
  return `${email.substring(0, 3)}***`;
}

/**
 * Redact credential values from a log context
 */
export function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lower = key.toLowerCase();
    if (SENSITIVE_KEYS.has(lower)) {
      redacted[key] = REDACTED;
    } else if (lower === 'email' && typeof value === 'string') {
      redacted[key] = maskEmail(value);
    } else if (Array.isArray(value)) {
      redacted[key] = value.map(item => isPlainObject(item) ? redactSensitive(item) : item);
    } else if (isPlainObject(value)) {
      redacted[key] = redactSensitive(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse LOG_LEVEL-style strings, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Default logger - writes to stderr; level comes from configuration, INFO when omitted
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? LogLevel.INFO;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('DEBUG', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('INFO', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('WARN', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write('ERROR', message, errorContext);
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context ? ` ${JSON.stringify(redactSensitive(context))}` : '';
    console.error(`[${timestamp}] ${level}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger for production
 *
 * Why: Machine-readable logs for log aggregation systems (ELK, Splunk, etc.)
 */
export class JsonLogger implements Logger {
  private level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? LogLevel.INFO;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.write('error', message, {
        error: error?.message,
        stack: error?.stack,
        ...context,
      });
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const redacted = context ? redactSensitive(context) : undefined;
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...redacted,
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Create a logger from LOG_FORMAT / LOG_LEVEL values
 */
export function createLogger(format: string, level: LogLevel): Logger {
  return format === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
