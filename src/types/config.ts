/**
 * Type definitions for smoother configuration
 */

import type { LogLevel, LogLevels } from '@logging';
import type { MovingAverageType } from '@core/filter';

/**
 * Default parameters applied when a description leaves them out
 */
export interface SmootherDefaults {
  // ───────── LOGGING ─────────
  readonly LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;

  // ───────── FILTER PARAMETERS ─────────
  readonly MULTI_PASS_TYPE: MovingAverageType;
  readonly GAUSSIAN_STD_DEV_DIVISOR: number;

  // ───────── REPLAY TOOL ─────────
  readonly OUTPUT_PRECISION: number;
}

/**
 * Inclusive range; values outside it produce validation warnings
 */
export interface RecommendedRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Recommended parameter ranges for real-time use
 */
export interface RecommendedRanges {
  readonly WINDOW_SIZE: RecommendedRange;
  readonly ALPHA: RecommendedRange;
  readonly PASSES: RecommendedRange;
}

/**
 * Complete configuration (defaults + ranges + log levels)
 */
export interface SmootherConfig {
  readonly DEFAULTS: SmootherDefaults;
  readonly RECOMMENDED_RANGES: RecommendedRanges;
  readonly LOG_LEVELS: LogLevels;
}
