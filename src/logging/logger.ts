/**
 * Main logger coordinator
 *
 * Combines level filtering and formatting with output sinks.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Multiple output sinks, each with its own minimum level
 * - Runtime level adjustment
 *
 * Only construction code logs. Filters and the smoother hot path never
 * hold a logger.
 */

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, SinkWithLevel } from './types';
import { formatLogMessage } from './helpers';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level)
 * @param dependencies - External dependencies (sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO },
 *   {
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Smoother built");
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const sinks: readonly SinkWithLevel[] = dependencies.sinks;

  /**
   * Internal log function
   * @param level - Log level (0-3)
   * @param msg - Message to log
   */
  function log(level: LogLevel, msg: string): void {
    if (level < currentLevel) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage);
      } catch (err) {
        // A failing sink must not take down the caller
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  return {
    log: log,
    debug: function (msg: string): void { log(logLevels.DEBUG, msg); },
    info: function (msg: string): void { log(logLevels.INFO, msg); },
    warning: function (msg: string): void { log(logLevels.WARNING, msg); },
    critical: function (msg: string): void { log(logLevels.CRITICAL, msg); },
    setLevel: function (newLevel: LogLevel): void { currentLevel = newLevel; },
    getLevel: function (): LogLevel { return currentLevel; }
  };
}

/**
 * Create a logger that discards every message
 * @returns Logger with no sinks, fixed at CRITICAL
 */
export function createNullLogger(): Logger {
  let level: LogLevel = 3;

  function discard(): void {
    // no sinks
  }

  return {
    log: discard,
    debug: discard,
    info: discard,
    warning: discard,
    critical: discard,
    setLevel: function (newLevel: LogLevel): void { level = newLevel; },
    getLevel: function (): LogLevel { return level; }
  };
}
