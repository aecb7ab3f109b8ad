/**
 * Filter parameter validation
 *
 * Every factory runs its parameters through these guards before
 * allocating state, so an invalid filter is never constructed.
 */

import type { MovingAverageType } from './types';
import { DEFAULTS } from '@config';
import { ConfigurationError } from '$types/errors';
import { isFiniteNumber, isPositiveInteger } from '@utils/number';

/**
 * Moving-average variants, in catalog order
 */
export const MOVING_AVERAGE_TYPES: readonly MovingAverageType[] = ['simple', 'weighted', 'gaussian', 'median'];

/**
 * Check if a value names a moving-average variant
 * @param value - Value to check
 * @returns true if value is a MovingAverageType
 */
export function isMovingAverageType(value: unknown): value is MovingAverageType {
  return typeof value === 'string' && MOVING_AVERAGE_TYPES.some(function (type) { return type === value; });
}

/**
 * Validate a window size
 * @param value - Candidate window size
 * @param field - Parameter name for the error message
 * @returns The validated window size
 * @throws {ConfigurationError} If value is not an integer >= 1
 */
export function requireWindowSize(value: number, field: string): number {
  if (!isPositiveInteger(value)) {
    throw new ConfigurationError(field + ' must be an integer >= 1, got ' + value);
  }
  return value;
}

/**
 * Validate an exponential smoothing factor
 * @throws {ConfigurationError} If value is outside (0, 1]
 */
export function requireAlpha(value: number, field: string): number {
  if (!isFiniteNumber(value) || value <= 0 || value > 1) {
    throw new ConfigurationError(field + ' must be in (0, 1], got ' + value);
  }
  return value;
}

/**
 * Resolve a Gaussian standard deviation, defaulting to a third of the window
 * @param value - Configured standard deviation, if any
 * @param windowSize - Validated window size the default derives from
 * @param field - Parameter name for the error message
 * @returns Positive standard deviation
 * @throws {ConfigurationError} If value is given and not a positive finite number
 */
export function resolveStdDev(value: number | undefined, windowSize: number, field: string): number {
  if (value === undefined) {
    return windowSize / DEFAULTS.GAUSSIAN_STD_DEV_DIVISOR;
  }
  if (!isFiniteNumber(value) || value <= 0) {
    throw new ConfigurationError(field + ' must be a positive finite number, got ' + value);
  }
  return value;
}

/**
 * Validate a deadband threshold
 * @throws {ConfigurationError} If value is negative or not finite
 */
export function requireThreshold(value: number, field: string): number {
  if (!isFiniteNumber(value) || value < 0) {
    throw new ConfigurationError(field + ' must be a non-negative finite number, got ' + value);
  }
  return value;
}

/**
 * Validate a constant offset
 * @throws {ConfigurationError} If value is not finite
 */
export function requireOffset(value: number, field: string): number {
  if (!isFiniteNumber(value)) {
    throw new ConfigurationError(field + ' must be a finite number, got ' + value);
  }
  return value;
}

/**
 * Validate a multi-pass count
 * @throws {ConfigurationError} If value is not an integer >= 1
 */
export function requirePasses(value: number, field: string): number {
  if (!isPositiveInteger(value)) {
    throw new ConfigurationError(field + ' must be an integer >= 1, got ' + value);
  }
  return value;
}

/**
 * Resolve a multi-pass inner type, defaulting to DEFAULTS.MULTI_PASS_TYPE
 * @throws {ConfigurationError} If value is given and not a moving-average variant
 */
export function resolveMovingAverageType(value: unknown, field: string): MovingAverageType {
  if (value === undefined) {
    return DEFAULTS.MULTI_PASS_TYPE;
  }
  if (!isMovingAverageType(value)) {
    throw new ConfigurationError(
      field + ' must be one of ' + MOVING_AVERAGE_TYPES.join(', ') + ', got ' + String(value)
    );
  }
  return value;
}
