/**
 * Number guards
 *
 * Unlike the global isFinite(), these do NOT coerce to number first:
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 * They narrow `unknown` so parsed JSON can be checked without casts.
 */

/**
 * Check if a value is a finite number
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Check if a value is an integer >= 1
 * @param value - Value to check
 * @returns true if value can be used as a window size or count
 */
export function isPositiveInteger(value: unknown): value is number {
  return isInteger(value) && value >= 1;
}
