/**
 * One-time code derivation
 *
 * Standard RFC 6238 TOTP: 30-second window, 6 digits, base32 seed.
 */

import otplib from 'otplib';

export function deriveOneTimeCode(secretKey: string, epochMs: number = Date.now()): string {
  const authenticator = otplib.authenticator.clone({ epoch: epochMs });
  return authenticator.generate(secretKey.replace(/\s+/g, '').toUpperCase());
}

/**
 * Select the code to send at login: a seed beats a raw code
 */
export function selectOneTimeCode(
  mfaSecretKey: string | undefined,
  mfaCode: string | undefined,
  epochMs?: number
): string | undefined {
  if (mfaSecretKey) {
    return deriveOneTimeCode(mfaSecretKey, epochMs);
  }
  return mfaCode;
}
