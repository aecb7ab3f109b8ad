/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  isRecord,
  readNumber,
  requireNumber,
  validateFinite,
  validateIntegerRange,
  validateNumberRange,
  validateOneOf,
  validatePositive
} from './helpers';
import type { ValidationError, ValidationWarning } from './types';

describe('Validation Helpers', () => {
  let errors: ValidationError[];
  let warnings: ValidationWarning[];

  beforeEach(() => {
    errors = [];
    warnings = [];
  });

  // ═══════════════════════════════════════════════════════════════
  // BUILDERS
  // ═══════════════════════════════════════════════════════════════

  describe('addError / addWarning', () => {
    it('should tag entries with their level', () => {
      addError(errors, 'filters[0].windowSize', 'too small');
      addWarning(warnings, 'filters[0].alpha', 'unusual');

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'filters[0].windowSize', message: 'too small' }]);
      expect(warnings).toEqual([{ level: 'WARNING', field: 'filters[0].alpha', message: 'unusual' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // TYPE VALIDATORS
  // ═══════════════════════════════════════════════════════════════

  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({})).toBe(true);
      expect(isRecord({ type: 'simple' })).toBe(true);
      expect(isRecord(null)).toBe(false);
      expect(isRecord([])).toBe(false);
      expect(isRecord('filters')).toBe(false);
    });
  });

  describe('readNumber', () => {
    it('should return numbers and skip absent fields', () => {
      expect(readNumber({ alpha: 0.5 }, 'alpha', 'alpha', errors)).toBe(0.5);
      expect(readNumber({}, 'alpha', 'alpha', errors)).toBeUndefined();
      expect(errors).toHaveLength(0);
    });

    it('should report values of another type', () => {
      expect(readNumber({ alpha: '0.5' }, 'alpha', 'filters[1].alpha', errors)).toBeUndefined();
      expect(errors[0].message).toBe('filters[1].alpha must be a number (got string)');
    });
  });

  describe('requireNumber', () => {
    it('should report a missing field', () => {
      expect(requireNumber({}, 'windowSize', 'filters[0].windowSize', errors)).toBeUndefined();
      expect(errors[0].message).toBe('filters[0].windowSize is required');
    });

    it('should report a wrong type once', () => {
      requireNumber({ windowSize: true }, 'windowSize', 'windowSize', errors);
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('windowSize must be a number (got boolean)');
    });
  });

  describe('validateOneOf', () => {
    const allowed = ['simple', 'median'] as const;

    it('should return an accepted value', () => {
      expect(validateOneOf('median', 'type', allowed, errors)).toBe('median');
      expect(errors).toHaveLength(0);
    });

    it('should skip undefined', () => {
      expect(validateOneOf(undefined, 'type', allowed, errors)).toBeUndefined();
      expect(errors).toHaveLength(0);
    });

    it('should list the accepted values in the error', () => {
      validateOneOf('mean', 'type', allowed, errors);
      expect(errors[0].message).toBe('type must be one of simple, median (got mean)');
    });
  });

  describe('validateFinite', () => {
    it('should reject NaN and Infinity', () => {
      validateFinite(NaN, 'offset', errors);
      validateFinite(-Infinity, 'offset', errors);
      validateFinite(-3.5, 'offset', errors);
      expect(errors).toHaveLength(2);
    });
  });

  describe('validatePositive', () => {
    it('should reject zero and negative values', () => {
      validatePositive(0, 'stdDev', errors);
      validatePositive(-1, 'stdDev', errors);
      validatePositive(0.1, 'stdDev', errors);
      validatePositive(undefined, 'stdDev', errors);
      expect(errors.map(function (e) { return e.message; })).toEqual([
        'stdDev must be greater than 0 (got 0)',
        'stdDev must be greater than 0 (got -1)'
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // RANGE VALIDATORS
  // ═══════════════════════════════════════════════════════════════

  describe('validateNumberRange', () => {
    it('should skip undefined', () => {
      validateNumberRange(undefined, 'alpha', 0, 1, errors, warnings, 0.01, 0.99);
      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should error outside the critical range', () => {
      validateNumberRange(1.5, 'alpha', 0, 1, errors, warnings, 0.01, 0.99);
      expect(errors[0].message).toBe('alpha must be between 0 and 1 (got 1.5)');
      expect(warnings).toHaveLength(0);
    });

    it('should warn outside the recommended range', () => {
      validateNumberRange(1, 'alpha', 0, 1, errors, warnings, 0.01, 0.99);
      expect(errors).toHaveLength(0);
      expect(warnings[0].message).toBe('alpha is outside recommended range 0.01-0.99 (got 1)');
    });

    it('should accept inclusive bounds without a recommended range', () => {
      validateNumberRange(0, 'alpha', 0, 1, errors, warnings);
      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });
  });

  describe('validateIntegerRange', () => {
    it('should reject fractional values', () => {
      validateIntegerRange(2.5, 'windowSize', 1, 100, errors, warnings);
      expect(errors[0].message).toBe('windowSize must be an integer (got 2.5)');
    });

    it('should apply the ranges to integers', () => {
      validateIntegerRange(0, 'windowSize', 1, 1000, errors, warnings, 1, 500);
      validateIntegerRange(600, 'windowSize', 1, 1000, errors, warnings, 1, 500);
      expect(errors[0].message).toBe('windowSize must be between 1 and 1000 (got 0)');
      expect(warnings[0].message).toBe('windowSize is outside recommended range 1-500 (got 600)');
    });
  });
});
