export { validatePipelineDescription, FILTER_KINDS } from './validator';
export type { ValidationError, ValidationWarning, ValidationResult, PipelineValidationResult } from './types';
