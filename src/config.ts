/**
 * Process-wide gateway configuration
 *
 * Built once at startup from environment variables and passed by reference
 * into the components that need it. Nothing reads process.env after this.
 */

import { UPSTREAM } from './constants.js';
import { ConfigurationError } from './errors.js';
import { LogLevel, parseLogLevel } from './logger.js';
import type { Credentials } from './credentials.js';
import { isUri } from './validation-utils.js';

export interface GatewayConfig {
  readonly upstreamBaseUrl: string;
  readonly upstreamTimeoutMs: number;
  /** Used when a caller supplies no credentials of its own */
  readonly fallbackCredentials?: Credentials;
  /** Shared secret required on every inbound call; undefined disables the check */
  readonly gatewayKey?: string;
  /** Single CORS origin; undefined allows all origins */
  readonly allowedOrigin?: string;
  /** When false, unexpected internal failures are reduced to a generic message */
  readonly diagnosticErrors: boolean;
  readonly host: string;
  readonly port: number;
  readonly mcpPath: string;
  readonly metricsEnabled: boolean;
  readonly metricsPath: string;
  readonly logFormat: 'console' | 'json';
  readonly logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new ConfigurationError(`Invalid ${name}: expected a non-negative integer`, { name, value });
  }
  return parsed;
}

function parseBaseUrl(value: string | undefined): string {
  const raw = nonEmpty(value) ?? UPSTREAM.DEFAULT_BASE_URL;
  if (!isUri(raw)) {
    throw new ConfigurationError('Invalid MONARCH_API_BASE: expected an absolute URL', { value: raw });
  }
  return raw.replace(/\/+$/, '');
}

function parsePath(name: string, value: string | undefined, fallback: string): string {
  const raw = nonEmpty(value) ?? fallback;
  if (!raw.startsWith('/')) {
    throw new ConfigurationError(`Invalid ${name}: must start with '/'`, { name, value: raw });
  }
  return raw;
}

/**
 * Fallback credentials need both email and password; anything less is ignored
 */
function parseFallbackCredentials(env: Env): Credentials | undefined {
  const email = nonEmpty(env.MONARCH_EMAIL);
  const password = nonEmpty(env.MONARCH_PASSWORD);
  if (!email || !password) {
    return undefined;
  }
  return {
    email,
    password,
    mfaCode: nonEmpty(env.MONARCH_MFA_CODE),
    mfaSecretKey: nonEmpty(env.MONARCH_MFA_SECRET_KEY),
  };
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const diagnosticErrors = env.DIAGNOSTIC_ERRORS === 'true' || env.NODE_ENV === 'development';

  return {
    upstreamBaseUrl: parseBaseUrl(env.MONARCH_API_BASE),
    upstreamTimeoutMs: parseInteger('UPSTREAM_TIMEOUT_MS', env.UPSTREAM_TIMEOUT_MS, 30000),
    fallbackCredentials: parseFallbackCredentials(env),
    gatewayKey: nonEmpty(env.MCP_API_KEY),
    allowedOrigin: nonEmpty(env.ALLOWED_ORIGIN),
    diagnosticErrors,
    host: nonEmpty(env.MCP_HOST) ?? '127.0.0.1',
    port: parseInteger('MCP_PORT', env.MCP_PORT, 3003),
    mcpPath: parsePath('MCP_PATH', env.MCP_PATH, '/mcp'),
    metricsEnabled: env.METRICS_ENABLED === 'true',
    metricsPath: parsePath('METRICS_PATH', env.METRICS_PATH, '/metrics'),
    logFormat: env.LOG_FORMAT === 'json' ? 'json' : 'console',
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
