/**
 * Filter contract type definitions
 *
 * Every filter is a closure over its own private state exposing
 * `update` and `reset`. Filters are discriminated by `dimension`
 * so a smoother can reject a mismatched filter at attach time.
 */

import type { Sample2D } from '$types/common';

// ═══════════════════════════════════════════════════════════════
// FILTER KINDS
// ═══════════════════════════════════════════════════════════════

/**
 * Moving-average variants usable as multi-pass inner filters
 */
export type MovingAverageType = 'simple' | 'weighted' | 'gaussian' | 'median';

/**
 * Every filter variant in the catalog
 */
export type FilterKind =
  | MovingAverageType
  | 'offset'
  | 'exponential'
  | 'cumulative'
  | 'fixation'
  | 'multi-pass';

// ═══════════════════════════════════════════════════════════════
// FILTER CONTRACT
// ═══════════════════════════════════════════════════════════════

/**
 * One-dimensional filter
 */
export interface Filter1D {
  readonly dimension: 1;
  readonly kind: FilterKind;
  /** Consume one sample and return the filtered value */
  update(sample: number): number;
  /** Return to the just-constructed state */
  reset(): void;
}

/**
 * Two-dimensional filter
 */
export interface Filter2D {
  readonly dimension: 2;
  readonly kind: FilterKind;
  /** Consume one [x, y] sample and return the filtered pair */
  update(sample: Sample2D): Sample2D;
  /** Return to the just-constructed state */
  reset(): void;
}

/**
 * Any filter, discriminated by dimension
 */
export type Filter = Filter1D | Filter2D;

// ═══════════════════════════════════════════════════════════════
// 1D CONFIGURATION RECORDS
// ═══════════════════════════════════════════════════════════════

export interface OffsetConfig {
  /** Constant added to every sample */
  offset: number;
}

export interface WindowConfig {
  /** Number of most recent samples the statistic covers (integer >= 1) */
  windowSize: number;
}

export interface GaussianConfig extends WindowConfig {
  /** Standard deviation in samples; defaults to windowSize / 3 */
  stdDev?: number;
}

export interface ExponentialConfig {
  /** Weight of the newest sample, 0 < alpha <= 1 */
  alpha: number;
}

export interface FixationConfig {
  /** Distance a sample must reach to move the held reference (>= 0) */
  threshold: number;
}

export interface MultiPassConfig extends WindowConfig {
  /** Number of chained passes (integer >= 1) */
  passes: number;
  /** Moving-average variant of every pass; defaults to 'simple' */
  average?: MovingAverageType;
  /** Standard deviation for gaussian passes; defaults to windowSize / 3 */
  stdDev?: number;
}

// ═══════════════════════════════════════════════════════════════
// 2D CONFIGURATION RECORDS
// Y-axis parameters default to their x-axis counterparts
// ═══════════════════════════════════════════════════════════════

export interface OffsetConfig2D extends OffsetConfig {
  offsetY?: number;
}

export interface WindowConfig2D extends WindowConfig {
  windowSizeY?: number;
}

export interface GaussianConfig2D extends GaussianConfig {
  windowSizeY?: number;
  stdDevY?: number;
}

export interface ExponentialConfig2D extends ExponentialConfig {
  alphaY?: number;
}

export interface MultiPassConfig2D extends MultiPassConfig {
  windowSizeY?: number;
  passesY?: number;
  averageY?: MovingAverageType;
  stdDevY?: number;
}
