/**
 * stream-smoother public API
 */

export * from './core';
export { validatePipelineDescription, FILTER_KINDS } from './validation';
export type { ValidationError, ValidationWarning, ValidationResult, PipelineValidationResult } from './validation';
export { createLogger, createNullLogger, createConsoleSink, formatLogMessage, parseLogLevel } from './logging';
export type { Logger, LogLevel, LogLevels, LogSink, ConsoleSink, ConsoleAPI } from './logging';
export { CONFIG, DEFAULTS, RECOMMENDED_RANGES, LOG_LEVELS } from './config';
export * from './types';
