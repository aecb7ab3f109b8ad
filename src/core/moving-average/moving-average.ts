/**
 * Windowed moving-average filters
 *
 * Simple, weighted, Gaussian and median averages share one shape: push
 * the sample into the filter's own window buffer, then reduce the
 * buffered samples. Only the reduction differs, so each variant is a
 * statistic plugged into createWindowedFilter.
 *
 * Partial windows are averaged over the samples present; the first
 * update returns the first sample unchanged for every variant.
 */

import type {
  Filter1D,
  Filter2D,
  FilterKind,
  GaussianConfig,
  GaussianConfig2D,
  MovingAverageType,
  WindowConfig,
  WindowConfig2D
} from '@core/filter';
import { createAxisPairFilter, requireWindowSize, resolveStdDev } from '@core/filter';
import { createWindowBuffer } from '@core/window-buffer';
import type { WindowBuffer } from '@core/window-buffer';
import { buildGaussianKernel, gaussianMean, linearWeightedMean, median, simpleMean } from './helpers';

/**
 * Reduction over a non-empty window
 */
type WindowStatistic = (buffer: WindowBuffer<number>) => number;

/**
 * Create a filter that keeps the last `windowSize` samples and reduces them
 * @param kind - Catalog kind
 * @param windowSize - Validated window size
 * @param statistic - Reduction applied after every push
 * @returns 1D filter
 */
function createWindowedFilter(kind: FilterKind, windowSize: number, statistic: WindowStatistic): Filter1D {
  const buffer = createWindowBuffer<number>(windowSize);

  return {
    dimension: 1,
    kind: kind,
    update: function (sample: number): number {
      buffer.push(sample);
      return statistic(buffer);
    },
    reset: function (): void {
      buffer.clear();
    }
  };
}

// ═══════════════════════════════════════════════════════════════
// 1D FILTERS
// ═══════════════════════════════════════════════════════════════

/**
 * Create a simple moving average (arithmetic mean of the window)
 * @throws {ConfigurationError} If windowSize is not an integer >= 1
 */
export function createSimpleMovingAverageFilter(config: WindowConfig): Filter1D {
  const windowSize = requireWindowSize(config.windowSize, 'windowSize');
  return createWindowedFilter('simple', windowSize, simpleMean);
}

/**
 * Create a linearly weighted moving average (newest sample heaviest)
 * @throws {ConfigurationError} If windowSize is not an integer >= 1
 */
export function createWeightedMovingAverageFilter(config: WindowConfig): Filter1D {
  const windowSize = requireWindowSize(config.windowSize, 'windowSize');
  return createWindowedFilter('weighted', windowSize, linearWeightedMean);
}

/**
 * Create a causal Gaussian-weighted moving average
 *
 * Weights fall off with sample age from the newest sample, so the
 * filter reads no future values and adds no centring delay.
 *
 * @param config - Window size and optional standard deviation (default windowSize / 3)
 * @returns 1D filter
 * @throws {ConfigurationError} If windowSize < 1 or stdDev <= 0
 */
export function createGaussianAverageFilter(config: GaussianConfig): Filter1D {
  const windowSize = requireWindowSize(config.windowSize, 'windowSize');
  const stdDev = resolveStdDev(config.stdDev, windowSize, 'stdDev');
  const kernel = buildGaussianKernel(windowSize, stdDev);

  return createWindowedFilter('gaussian', windowSize, function (buffer) {
    return gaussianMean(buffer, kernel);
  });
}

/**
 * Create a moving median
 * @throws {ConfigurationError} If windowSize is not an integer >= 1
 */
export function createMedianAverageFilter(config: WindowConfig): Filter1D {
  const windowSize = requireWindowSize(config.windowSize, 'windowSize');
  const scratch: number[] = [];

  return createWindowedFilter('median', windowSize, function (buffer) {
    return median(buffer, scratch);
  });
}

/**
 * Create any moving-average variant by type
 * @param type - Moving-average variant
 * @param config - Window size and, for 'gaussian', optional stdDev
 * @returns 1D filter
 */
export function createMovingAverageFilter(type: MovingAverageType, config: GaussianConfig): Filter1D {
  switch (type) {
    case 'simple':
      return createSimpleMovingAverageFilter(config);
    case 'weighted':
      return createWeightedMovingAverageFilter(config);
    case 'gaussian':
      return createGaussianAverageFilter(config);
    case 'median':
      return createMedianAverageFilter(config);
  }
}

// ═══════════════════════════════════════════════════════════════
// 2D FILTERS (axis pairs)
// ═══════════════════════════════════════════════════════════════

function windowSizeY(config: WindowConfig2D): number {
  return config.windowSizeY === undefined ? config.windowSize : config.windowSizeY;
}

export function createSimpleMovingAverageFilter2D(config: WindowConfig2D): Filter2D {
  return createAxisPairFilter(
    'simple',
    createSimpleMovingAverageFilter({ windowSize: config.windowSize }),
    createSimpleMovingAverageFilter({ windowSize: windowSizeY(config) })
  );
}

export function createWeightedMovingAverageFilter2D(config: WindowConfig2D): Filter2D {
  return createAxisPairFilter(
    'weighted',
    createWeightedMovingAverageFilter({ windowSize: config.windowSize }),
    createWeightedMovingAverageFilter({ windowSize: windowSizeY(config) })
  );
}

/**
 * Create a 2D Gaussian average
 *
 * Each axis derives its default sigma from its own window size, so
 * `stdDevY` only falls back to `stdDev` when that was given explicitly.
 */
export function createGaussianAverageFilter2D(config: GaussianConfig2D): Filter2D {
  const stdDevY = config.stdDevY === undefined ? config.stdDev : config.stdDevY;

  return createAxisPairFilter(
    'gaussian',
    createGaussianAverageFilter({ windowSize: config.windowSize, stdDev: config.stdDev }),
    createGaussianAverageFilter({ windowSize: windowSizeY(config), stdDev: stdDevY })
  );
}

export function createMedianAverageFilter2D(config: WindowConfig2D): Filter2D {
  return createAxisPairFilter(
    'median',
    createMedianAverageFilter({ windowSize: config.windowSize }),
    createMedianAverageFilter({ windowSize: windowSizeY(config) })
  );
}
