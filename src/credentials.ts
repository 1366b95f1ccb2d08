/**
 * Upstream credential resolution
 *
 * Callers may send their own upstream credentials as
 * `Authorization: Bearer <base64 of JSON {email, password, mfaCode?, mfaSecretKey?}>`.
 * Those win over the process-wide fallback credentials from configuration.
 */

import { UnauthorizedError } from './errors.js';
import { isRecord } from './validation-utils.js';

export interface Credentials {
  email: string;
  password: string;
  /** Raw 6-digit one-time code */
  mfaCode?: string;
  /** Shared TOTP seed; takes precedence over mfaCode */
  mfaSecretKey?: string;
}

export type CredentialSource = 'caller' | 'fallback';

export interface ResolvedCredentials {
  credentials: Credentials;
  source: CredentialSource;
}

export const CREDENTIAL_ENCODING_HINT =
  'Unauthorized: no upstream credentials. Send Authorization: Bearer <base64 of JSON ' +
  '{"email":"...","password":"...","mfaCode"?:"...","mfaSecretKey"?:"..."}> ' +
  'or configure MONARCH_EMAIL and MONARCH_PASSWORD on the server';

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/**
 * Strip an optional Bearer prefix from an Authorization header value
 */
export function extractBearerValue(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const value = header.trim().replace(/^Bearer\s+/i, '').trim();
  return value || undefined;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

/**
 * Decode caller credentials; returns undefined for anything that is not
 * base64-encoded JSON carrying both an email and a password
 */
export function decodeCallerCredentials(encoded: string): Credentials | undefined {
  if (!BASE64_PATTERN.test(encoded)) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, 'base64').toString('utf8'));
  } catch {
    return undefined;
  }

  if (!isRecord(parsed)) {
    return undefined;
  }

  const email = optionalString(parsed.email);
  const password = typeof parsed.password === 'string' && parsed.password !== ''
    ? parsed.password
    : undefined;

  if (!email || !password) {
    return undefined;
  }

  return {
    email,
    password,
    mfaCode: optionalString(parsed.mfaCode),
    mfaSecretKey: optionalString(parsed.mfaSecretKey),
  };
}

/**
 * Encode credentials the way callers are expected to send them
 */
export function encodeCallerCredentials(credentials: Credentials): string {
  return Buffer.from(JSON.stringify(credentials), 'utf8').toString('base64');
}

/**
 * Pick caller-supplied credentials, then fallback ones
 *
 * @throws UnauthorizedError when neither is available
 */
export function resolveCredentials(
  authorizationHeader: string | undefined,
  fallback: Credentials | undefined
): ResolvedCredentials {
  const bearer = extractBearerValue(authorizationHeader);
  const callerCredentials = bearer ? decodeCallerCredentials(bearer) : undefined;

  if (callerCredentials) {
    return { credentials: callerCredentials, source: 'caller' };
  }

  if (fallback) {
    return { credentials: fallback, source: 'fallback' };
  }

  throw new UnauthorizedError(CREDENTIAL_ENCODING_HINT);
}

/**
 * Presence-only view of credentials, safe to log
 */
export function describeCredentials(resolved: ResolvedCredentials): Record<string, unknown> {
  const { credentials, source } = resolved;
  return {
    source,
    email: credentials.email,
    hasMfaSecretKey: !!credentials.mfaSecretKey,
    hasMfaCode: !!credentials.mfaCode,
  };
}
