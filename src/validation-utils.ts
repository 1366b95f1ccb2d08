/**
 * Validation utilities for untyped values
 *
 * Why: JSON bodies, upstream responses and environment values arrive as
 * `unknown` or `string`; these narrow them without casts.
 */

/**
 * Plain JSON object (not null, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates if a string is an absolute URI
 */
export function isUri(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
