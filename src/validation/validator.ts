/**
 * Pipeline description validator
 *
 * Walks JSON-shaped input (parsed files, hand-written objects) and
 * collects every problem instead of stopping at the first one. Hard
 * limits become errors; values outside RECOMMENDED_RANGES become
 * warnings. A valid input is returned as a typed PipelineDescription.
 */

import type { FilterSpec, PipelineDescription } from '@core/builder';
import type { FilterKind, MovingAverageType } from '@core/filter';
import { MOVING_AVERAGE_TYPES } from '@core/filter';
import type { Dimension } from '$types/common';
import { RECOMMENDED_RANGES } from '@config';
import type { PipelineValidationResult, ValidationError, ValidationWarning } from './types';
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

// ═══════════════════════════════════════════════════════════════
// PARAMETER TABLE
// ═══════════════════════════════════════════════════════════════

/**
 * Every filter kind a description may name
 */
export const FILTER_KINDS: readonly FilterKind[] = [
  'offset',
  'simple',
  'weighted',
  'gaussian',
  'median',
  'exponential',
  'cumulative',
  'fixation',
  'multi-pass'
];

interface ParameterKeys {
  /** Parameters for every dimensionality */
  shared: readonly string[];
  /** Y-axis parameters, 2D only */
  axisY: readonly string[];
}

const PARAMETER_KEYS: Record<FilterKind, ParameterKeys> = {
  'offset': { shared: ['offset'], axisY: ['offsetY'] },
  'simple': { shared: ['windowSize'], axisY: ['windowSizeY'] },
  'weighted': { shared: ['windowSize'], axisY: ['windowSizeY'] },
  'gaussian': { shared: ['windowSize', 'stdDev'], axisY: ['windowSizeY', 'stdDevY'] },
  'median': { shared: ['windowSize'], axisY: ['windowSizeY'] },
  'exponential': { shared: ['alpha'], axisY: ['alphaY'] },
  'cumulative': { shared: [], axisY: [] },
  'fixation': { shared: ['threshold'], axisY: [] },
  'multi-pass': { shared: ['windowSize', 'passes', 'average', 'stdDev'], axisY: ['windowSizeY', 'passesY', 'averageY', 'stdDevY'] }
};

// ═══════════════════════════════════════════════════════════════
// PARAMETER VALIDATORS
// ═══════════════════════════════════════════════════════════════

interface Issues {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

function checkWindowSize(value: number | undefined, field: string, issues: Issues): void {
  validateIntegerRange(
    value,
    field,
    1,
    Number.MAX_SAFE_INTEGER,
    issues.errors,
    issues.warnings,
    RECOMMENDED_RANGES.WINDOW_SIZE.min,
    RECOMMENDED_RANGES.WINDOW_SIZE.max
  );
}

function checkAlpha(value: number | undefined, field: string, issues: Issues): void {
  if (value !== undefined && value <= 0) {
    addError(issues.errors, field, `${field} must be greater than 0 (got ${value})`);
    return;
  }
  validateNumberRange(
    value,
    field,
    0,
    1,
    issues.errors,
    issues.warnings,
    RECOMMENDED_RANGES.ALPHA.min,
    RECOMMENDED_RANGES.ALPHA.max
  );
}

function checkPasses(value: number | undefined, field: string, issues: Issues): void {
  validateIntegerRange(
    value,
    field,
    1,
    Number.MAX_SAFE_INTEGER,
    issues.errors,
    issues.warnings,
    RECOMMENDED_RANGES.PASSES.min,
    RECOMMENDED_RANGES.PASSES.max
  );
}

function checkThreshold(value: number | undefined, field: string, issues: Issues): void {
  validateFinite(value, field, issues.errors);
  if (value !== undefined && value < 0) {
    addError(issues.errors, field, `${field} must be at least 0 (got ${value})`);
  }
}

/**
 * Warn about parameters the filter does not read
 */
function checkUnknownKeys(
  entry: Record<string, unknown>,
  kind: FilterKind,
  dimension: Dimension | undefined,
  path: string,
  issues: Issues
): void {
  const keys = PARAMETER_KEYS[kind];

  for (const key of Object.keys(entry)) {
    if (key === 'type' || keys.shared.includes(key)) {
      continue;
    }
    if (keys.axisY.includes(key)) {
      if (dimension === 1) {
        addWarning(issues.warnings, `${path}.${key}`, `${path}.${key} only applies to 2D pipelines and is ignored`);
      }
      continue;
    }
    addWarning(issues.warnings, `${path}.${key}`, `${path}.${key} is not a parameter of ${kind} filters and is ignored`);
  }
}

// ═══════════════════════════════════════════════════════════════
// FILTER VALIDATION
// ═══════════════════════════════════════════════════════════════

/**
 * Validate one moving-average variant field (average or averageY)
 */
function readMovingAverageType(
  entry: Record<string, unknown>,
  key: string,
  path: string,
  issues: Issues
): MovingAverageType | undefined {
  return validateOneOf(entry[key], `${path}.${key}`, MOVING_AVERAGE_TYPES, issues.errors);
}

/**
 * Validate one filter entry and build its typed spec
 * @returns The spec, or undefined when the entry has errors
 */
function validateFilter(
  entry: unknown,
  path: string,
  dimension: Dimension | undefined,
  issues: Issues
): FilterSpec | undefined {
  if (!isRecord(entry)) {
    addError(issues.errors, path, `${path} must be an object`);
    return undefined;
  }

  if (entry.type === undefined) {
    addError(issues.errors, `${path}.type`, `${path}.type is required`);
    return undefined;
  }
  const kind = validateOneOf(entry.type, `${path}.type`, FILTER_KINDS, issues.errors);
  if (kind === undefined) {
    return undefined;
  }

  const errorCount = issues.errors.length;
  checkUnknownKeys(entry, kind, dimension, path, issues);
  const record = entry;

  function field(key: string): string {
    return `${path}.${key}`;
  }

  function required(key: string): number | undefined {
    return requireNumber(record, key, field(key), issues.errors);
  }

  function optional(key: string): number | undefined {
    return readNumber(record, key, field(key), issues.errors);
  }

  // Y-axis values are read only for 2D; 1D pipelines ignore them
  function optionalY(key: string): number | undefined {
    return dimension === 2 ? optional(key) : undefined;
  }

  let spec: FilterSpec;

  switch (kind) {
    case 'offset': {
      const offset = required('offset');
      const offsetY = optionalY('offsetY');
      validateFinite(offset, field('offset'), issues.errors);
      validateFinite(offsetY, field('offsetY'), issues.errors);
      spec = { type: kind, offset: offset ?? 0, offsetY: offsetY };
      break;
    }
    case 'simple':
    case 'weighted':
    case 'median': {
      const windowSize = required('windowSize');
      const windowSizeY = optionalY('windowSizeY');
      checkWindowSize(windowSize, field('windowSize'), issues);
      checkWindowSize(windowSizeY, field('windowSizeY'), issues);
      spec = { type: kind, windowSize: windowSize ?? 0, windowSizeY: windowSizeY };
      break;
    }
    case 'gaussian': {
      const windowSize = required('windowSize');
      const windowSizeY = optionalY('windowSizeY');
      const stdDev = optional('stdDev');
      const stdDevY = optionalY('stdDevY');
      checkWindowSize(windowSize, field('windowSize'), issues);
      checkWindowSize(windowSizeY, field('windowSizeY'), issues);
      validatePositive(stdDev, field('stdDev'), issues.errors);
      validatePositive(stdDevY, field('stdDevY'), issues.errors);
      spec = { type: kind, windowSize: windowSize ?? 0, windowSizeY: windowSizeY, stdDev: stdDev, stdDevY: stdDevY };
      break;
    }
    case 'exponential': {
      const alpha = required('alpha');
      const alphaY = optionalY('alphaY');
      checkAlpha(alpha, field('alpha'), issues);
      checkAlpha(alphaY, field('alphaY'), issues);
      spec = { type: kind, alpha: alpha ?? 0, alphaY: alphaY };
      break;
    }
    case 'cumulative':
      spec = { type: kind };
      break;
    case 'fixation': {
      const threshold = required('threshold');
      checkThreshold(threshold, field('threshold'), issues);
      spec = { type: kind, threshold: threshold ?? 0 };
      break;
    }
    case 'multi-pass': {
      const windowSize = required('windowSize');
      const passes = required('passes');
      const stdDev = optional('stdDev');
      const average = readMovingAverageType(entry, 'average', path, issues);
      const windowSizeY = optionalY('windowSizeY');
      const passesY = optionalY('passesY');
      const stdDevY = optionalY('stdDevY');
      const averageY = dimension === 2 ? readMovingAverageType(entry, 'averageY', path, issues) : undefined;
      checkWindowSize(windowSize, field('windowSize'), issues);
      checkWindowSize(windowSizeY, field('windowSizeY'), issues);
      checkPasses(passes, field('passes'), issues);
      checkPasses(passesY, field('passesY'), issues);
      validatePositive(stdDev, field('stdDev'), issues.errors);
      validatePositive(stdDevY, field('stdDevY'), issues.errors);
      if (stdDev !== undefined && average !== 'gaussian' && averageY !== 'gaussian') {
        addWarning(issues.warnings, field('stdDev'), `${field('stdDev')} only applies to gaussian passes and is ignored`);
      }
      spec = {
        type: kind,
        windowSize: windowSize ?? 0,
        passes: passes ?? 0,
        average: average,
        stdDev: stdDev,
        windowSizeY: windowSizeY,
        passesY: passesY,
        averageY: averageY,
        stdDevY: stdDevY
      };
      break;
    }
  }

  return issues.errors.length === errorCount ? spec : undefined;
}

// ═══════════════════════════════════════════════════════════════
// PIPELINE VALIDATION
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a pipeline description
 *
 * @param value - Untyped description, e.g. parsed JSON
 * @returns Errors, warnings and, when valid, the typed description
 *
 * @example
 * ```typescript
 * const result = validatePipelineDescription({ dimension: 1, filters: [{ type: 'simple', windowSize: 0 }] });
 * result.valid;            // false
 * result.errors[0].field;  // "filters[0].windowSize"
 * ```
 */
export function validatePipelineDescription(value: unknown): PipelineValidationResult<PipelineDescription> {
  const issues: Issues = { errors: [], warnings: [] };

  if (!isRecord(value)) {
    addError(issues.errors, 'description', 'description must be an object');
    return { valid: false, errors: issues.errors, warnings: issues.warnings, description: undefined };
  }

  let dimension: Dimension | undefined;
  if (value.dimension === 1 || value.dimension === 2) {
    dimension = value.dimension;
  } else if (value.dimension === undefined) {
    addError(issues.errors, 'dimension', 'dimension is required');
  } else {
    addError(issues.errors, 'dimension', `dimension must be 1 or 2 (got ${String(value.dimension)})`);
  }

  const filters: FilterSpec[] = [];
  if (!Array.isArray(value.filters)) {
    addError(issues.errors, 'filters', 'filters must be an array');
  } else if (value.filters.length === 0) {
    addError(issues.errors, 'filters', 'filters must contain at least one filter');
  } else {
    value.filters.forEach(function (entry: unknown, index: number) {
      const spec = validateFilter(entry, `filters[${index}]`, dimension, issues);
      if (spec !== undefined) {
        filters.push(spec);
      }
    });
  }

  for (const key of Object.keys(value)) {
    if (key !== 'dimension' && key !== 'filters') {
      addWarning(issues.warnings, key, `${key} is not a description field and is ignored`);
    }
  }

  const valid = issues.errors.length === 0;
  return {
    valid: valid,
    errors: issues.errors,
    warnings: issues.warnings,
    description: valid && dimension !== undefined ? { dimension: dimension, filters: filters } : undefined
  };
}
