/**
 * Multi-pass moving average
 *
 * Chains `passes` independent moving averages of one variant; each pass
 * smooths the previous pass's output. Two simple passes approximate a
 * triangular kernel, more passes approach a Gaussian.
 */

import type { Filter1D, Filter2D, MultiPassConfig, MultiPassConfig2D } from '@core/filter';
import {
  createAxisPairFilter,
  requirePasses,
  requireWindowSize,
  resolveMovingAverageType,
  resolveStdDev
} from '@core/filter';
import { createMovingAverageFilter } from '@core/moving-average';

/**
 * Create a 1D multi-pass moving average
 * @param config - Window size, pass count, inner variant and optional stdDev
 * @returns 1D filter
 * @throws {ConfigurationError} If any parameter is invalid
 */
export function createMultiPassFilter(config: MultiPassConfig): Filter1D {
  const windowSize = requireWindowSize(config.windowSize, 'windowSize');
  const passes = requirePasses(config.passes, 'passes');
  const average = resolveMovingAverageType(config.average, 'average');
  // Checked for every variant, not only the gaussian passes that read it
  const stdDev = resolveStdDev(config.stdDev, windowSize, 'stdDev');

  const stages: Filter1D[] = [];
  for (let i = 0; i < passes; i++) {
    stages.push(createMovingAverageFilter(average, { windowSize: windowSize, stdDev: stdDev }));
  }

  return {
    dimension: 1,
    kind: 'multi-pass',
    update: function (sample: number): number {
      let value = sample;
      for (const stage of stages) {
        value = stage.update(value);
      }
      return value;
    },
    reset: function (): void {
      for (const stage of stages) {
        stage.reset();
      }
    }
  };
}

/**
 * Create a 2D multi-pass moving average
 *
 * Every y parameter defaults to its x counterpart.
 */
export function createMultiPassFilter2D(config: MultiPassConfig2D): Filter2D {
  return createAxisPairFilter(
    'multi-pass',
    createMultiPassFilter({
      windowSize: config.windowSize,
      passes: config.passes,
      average: config.average,
      stdDev: config.stdDev
    }),
    createMultiPassFilter({
      windowSize: config.windowSizeY === undefined ? config.windowSize : config.windowSizeY,
      passes: config.passesY === undefined ? config.passes : config.passesY,
      average: config.averageY === undefined ? config.average : config.averageY,
      stdDev: config.stdDevY === undefined ? config.stdDev : config.stdDevY
    })
  );
}
