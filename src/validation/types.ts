export interface ValidationError {
  field: string;
  message: string;
  level: 'CRITICAL';
}

export interface ValidationWarning {
  field: string;
  message: string;
  level: 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Result of validating an untyped pipeline description
 * `description` holds the typed copy when, and only when, `valid` is true.
 */
export interface PipelineValidationResult<T> extends ValidationResult {
  description: T | undefined;
}
