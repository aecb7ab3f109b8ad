/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import type { ValidationError, ValidationWarning } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Check if a value is a plain JSON-style object
 * @param value - Value to check
 * @returns true for non-null, non-array objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read an optional numeric field
 * @param entry - Object holding the field
 * @param key - Field key
 * @param field - Field path for error messages
 * @param errors - Array to append errors to
 * @returns The number, or undefined when absent or not a number
 */
export function readNumber(
  entry: Record<string, unknown>,
  key: string,
  field: string,
  errors: ValidationError[]
): number | undefined {
  const value = entry[key];
  if (value === undefined) return undefined;

  if (typeof value !== 'number') {
    addError(errors, field, `${field} must be a number (got ${typeof value})`);
    return undefined;
  }
  return value;
}

/**
 * Read a required numeric field
 * Reports a missing field; a present field of another type is reported by readNumber.
 */
export function requireNumber(
  entry: Record<string, unknown>,
  key: string,
  field: string,
  errors: ValidationError[]
): number | undefined {
  if (entry[key] === undefined) {
    addError(errors, field, `${field} is required`);
    return undefined;
  }
  return readNumber(entry, key, field, errors);
}

/**
 * Validate that a value is one of a fixed set of strings
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param allowed - Accepted values
 * @param errors - Array to append errors to
 * @returns The value when accepted, otherwise undefined
 */
export function validateOneOf<T extends string>(
  value: unknown,
  field: string,
  allowed: readonly T[],
  errors: ValidationError[]
): T | undefined {
  if (value === undefined) return undefined;

  for (const candidate of allowed) {
    if (candidate === value) {
      return candidate;
    }
  }
  addError(errors, field, `${field} must be one of ${allowed.join(', ')} (got ${String(value)})`);
  return undefined;
}

/**
 * Validate that a number is finite
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateFinite(
  value: number | undefined,
  field: string,
  errors: ValidationError[]
): void {
  if (value === undefined) return;

  if (!isFiniteNumber(value)) {
    addError(errors, field, `${field} must be a finite number (got ${value})`);
  }
}

/**
 * Validate that a number is finite and strictly positive
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validatePositive(
  value: number | undefined,
  field: string,
  errors: ValidationError[]
): void {
  if (value === undefined) return;

  if (!isFiniteNumber(value) || value <= 0) {
    addError(errors, field, `${field} must be greater than 0 (got ${value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails)
 * Recommended range violations produce warnings (validation passes)
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateNumberRange(
  value: number | undefined,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  // Check for NaN and Infinity (invalid numeric values)
  if (!isFiniteNumber(value)) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return;
  }

  // Check critical range
  if (value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return; // Don't check recommended if critical failed
  }

  // Check recommended range (only if provided)
  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
      );
    }
  }
}

/**
 * Validate an integer against critical and recommended ranges
 *
 * First checks if the value is an integer, then validates ranges
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateIntegerRange(
  value: number | undefined,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  // Check if integer
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  // Validate range using the number validator
  validateNumberRange(
    value,
    field,
    criticalMin,
    criticalMax,
    errors,
    warnings,
    recommendedMin,
    recommendedMax
  );
}
