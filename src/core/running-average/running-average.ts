/**
 * Running averages
 *
 * Recursive filters with O(1) state: the exponential average keeps the
 * previous output, the cumulative average keeps the previous output and
 * the sample count. Both return the first sample unchanged.
 */

import type { ExponentialConfig, ExponentialConfig2D, Filter1D, Filter2D } from '@core/filter';
import { createAxisPairFilter, requireAlpha } from '@core/filter';

/**
 * Create an exponential moving average
 *
 * Formula: smoothed = alpha * sample + (1 - alpha) * smoothed
 *
 * @param config - Smoothing factor
 * @returns 1D filter
 * @throws {ConfigurationError} If alpha is outside (0, 1]
 *
 * @example
 * ```typescript
 * const ema = createExponentialAverageFilter({ alpha: 0.5 });
 * ema.update(10); // 10
 * ema.update(20); // 15
 * ```
 */
export function createExponentialAverageFilter(config: ExponentialConfig): Filter1D {
  const alpha = requireAlpha(config.alpha, 'alpha');
  let smoothed = 0;
  // Explicit flag: a first sample of 0 must still seed the average
  let seeded = false;

  return {
    dimension: 1,
    kind: 'exponential',
    update: function (sample: number): number {
      if (!seeded) {
        smoothed = sample;
        seeded = true;
        return smoothed;
      }
      // Not the difference form: it loses a small sample next to a large state
      smoothed = alpha * sample + (1 - alpha) * smoothed;
      return smoothed;
    },
    reset: function (): void {
      smoothed = 0;
      seeded = false;
    }
  };
}

/**
 * Create a cumulative average (mean of every sample since the last reset)
 * @returns 1D filter
 */
export function createCumulativeAverageFilter(): Filter1D {
  let mean = 0;
  let count = 0;

  return {
    dimension: 1,
    kind: 'cumulative',
    update: function (sample: number): number {
      count++;
      mean += (sample - mean) / count;
      return mean;
    },
    reset: function (): void {
      mean = 0;
      count = 0;
    }
  };
}

/**
 * Create a 2D exponential average (alphaY defaults to alpha)
 */
export function createExponentialAverageFilter2D(config: ExponentialConfig2D): Filter2D {
  const alphaY = config.alphaY === undefined ? config.alpha : config.alphaY;

  return createAxisPairFilter(
    'exponential',
    createExponentialAverageFilter({ alpha: config.alpha }),
    createExponentialAverageFilter({ alpha: alphaY })
  );
}

export function createCumulativeAverageFilter2D(): Filter2D {
  return createAxisPairFilter('cumulative', createCumulativeAverageFilter(), createCumulativeAverageFilter());
}
