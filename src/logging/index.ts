/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger, createNullLogger)
 * - Console sink (createConsoleSink)
 * - Pure format and parse functions
 */

export { formatLogMessage, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createLogger, createNullLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI
} from './types';
