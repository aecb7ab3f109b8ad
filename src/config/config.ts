import type { SmootherConfig, SmootherDefaults, RecommendedRanges } from '$types/config';
import type { LogLevels } from '@logging';

// ─────────────────────────────────────────────────────────────
// LOG LEVELS
//   Canonical mapping of log level names to numeric codes.
// ─────────────────────────────────────────────────────────────

export const LOG_LEVELS: Readonly<LogLevels> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3,
};

// ─────────────────────────────────────────────────────────────
// DEFAULTS
//   Values used when a filter description leaves a parameter out.
// ─────────────────────────────────────────────────────────────

export const DEFAULTS: Readonly<SmootherDefaults> = {
  // LOG_LEVEL
  //   Role: Minimum level the builder and replay tool log at.
  //   Recommended: 2 (WARNING) in production, 0 (DEBUG) while tuning a pipeline.
  LOG_LEVEL: 2,

  // CONSOLE_BUFFER_SIZE
  //   Role: Number of recent lines a console sink keeps for inspection.
  CONSOLE_BUFFER_SIZE: 50,

  // MULTI_PASS_TYPE
  //   Role: Moving-average variant of every pass when a multi-pass filter omits `average`.
  MULTI_PASS_TYPE: 'simple',

  // GAUSSIAN_STD_DEV_DIVISOR
  //   Role: Default Gaussian sigma is windowSize / divisor.
  //   Recommended: 3; the oldest sample then sits three sigmas from the newest.
  GAUSSIAN_STD_DEV_DIVISOR: 3,

  // OUTPUT_PRECISION
  //   Role: Decimal places the replay tool prints.
  OUTPUT_PRECISION: 3,
};

// ─────────────────────────────────────────────────────────────
// RECOMMENDED RANGES
//   Values outside these ranges are valid but produce warnings.
// ─────────────────────────────────────────────────────────────

export const RECOMMENDED_RANGES: Readonly<RecommendedRanges> = {
  // WINDOW_SIZE
  //   Every update is O(window); beyond a few hundred samples a per-frame
  //   callback stops being low-latency.
  WINDOW_SIZE: { min: 1, max: 500 },

  // ALPHA
  //   Below 0.01 the average barely moves; alpha = 1 passes samples through.
  ALPHA: { min: 0.01, max: 0.99 },

  // PASSES
  //   Each pass adds its own lag.
  PASSES: { min: 1, max: 5 },
};

const CONFIG: SmootherConfig = {
  DEFAULTS: DEFAULTS,
  RECOMMENDED_RANGES: RECOMMENDED_RANGES,
  LOG_LEVELS: LOG_LEVELS,
};

export default CONFIG;
