/**
 * Global error types for the smoothing toolkit
 * Configuration errors are raised at construction/attach time,
 * state errors when a smoother is read before it holds a value.
 */

import type { Dimension } from './common';

/**
 * Validation entry carried by a configuration error
 */
export interface ConfigurationIssue {
  field: string;
  message: string;
}

/**
 * Base error for all smoother modules
 */
export class SmootherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SmootherError';
  }
}

/**
 * Error thrown when construction parameters are invalid
 */
export class ConfigurationError extends SmootherError {
  readonly issues: readonly ConfigurationIssue[];

  constructor(message: string, issues: readonly ConfigurationIssue[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when a filter is attached to a smoother of another dimensionality
 */
export class DimensionMismatchError extends ConfigurationError {
  readonly expected: Dimension;
  readonly actual: Dimension;

  constructor(expected: Dimension, actual: Dimension) {
    super('Cannot attach a ' + actual + 'D filter to a ' + expected + 'D smoother');
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when a smoother is read before any sample was added
 */
export class StateError extends SmootherError {
  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}
