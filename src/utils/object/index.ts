/**
 * Object utilities
 */

/**
 * Check if a value is a plain (non-array) object
 *
 * @param value - Value to check
 * @returns true if value can be read as a string-keyed record
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
