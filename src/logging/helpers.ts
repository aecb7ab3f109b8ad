/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels } from './types';

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

  return tag + msg;
}

/**
 * Parse a log level from its name or number
 *
 * Accepts "DEBUG", "info", "2" and the like, as found in environment
 * variables.
 *
 * @param value - Raw level text
 * @param logLevels - Log level constants object
 * @returns Parsed level, or undefined when value names no level
 */
export function parseLogLevel(value: string | undefined, logLevels: LogLevels): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  switch (value.trim().toUpperCase()) {
    case 'DEBUG':
    case '0':
      return logLevels.DEBUG;
    case 'INFO':
    case '1':
      return logLevels.INFO;
    case 'WARNING':
    case 'WARN':
    case '2':
      return logLevels.WARNING;
    case 'CRITICAL':
    case '3':
      return logLevels.CRITICAL;
    default:
      return undefined;
  }
}
