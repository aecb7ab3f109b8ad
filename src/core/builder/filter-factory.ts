/**
 * Filter factory
 *
 * Maps a tagged FilterSpec onto the catalog constructors. Parameters are
 * checked again by each constructor, so a spec that skipped
 * validatePipelineDescription still fails fast.
 */

import type { Filter, Filter1D, Filter2D } from '@core/filter';
import type { Dimension } from '$types/common';
import type { FilterSpec } from './types';
import { createOffsetFilter, createOffsetFilter2D } from '@core/offset';
import {
  createGaussianAverageFilter,
  createGaussianAverageFilter2D,
  createMedianAverageFilter,
  createMedianAverageFilter2D,
  createSimpleMovingAverageFilter,
  createSimpleMovingAverageFilter2D,
  createWeightedMovingAverageFilter,
  createWeightedMovingAverageFilter2D
} from '@core/moving-average';
import {
  createCumulativeAverageFilter,
  createCumulativeAverageFilter2D,
  createExponentialAverageFilter,
  createExponentialAverageFilter2D
} from '@core/running-average';
import { createFixationFilter, createFixationFilter2D } from '@core/fixation';
import { createMultiPassFilter, createMultiPassFilter2D } from '@core/multi-pass';

function createFilter1D(spec: FilterSpec): Filter1D {
  switch (spec.type) {
    case 'offset':
      return createOffsetFilter(spec);
    case 'simple':
      return createSimpleMovingAverageFilter(spec);
    case 'weighted':
      return createWeightedMovingAverageFilter(spec);
    case 'gaussian':
      return createGaussianAverageFilter(spec);
    case 'median':
      return createMedianAverageFilter(spec);
    case 'exponential':
      return createExponentialAverageFilter(spec);
    case 'cumulative':
      return createCumulativeAverageFilter();
    case 'fixation':
      return createFixationFilter(spec);
    case 'multi-pass':
      return createMultiPassFilter(spec);
  }
}

function createFilter2D(spec: FilterSpec): Filter2D {
  switch (spec.type) {
    case 'offset':
      return createOffsetFilter2D(spec);
    case 'simple':
      return createSimpleMovingAverageFilter2D(spec);
    case 'weighted':
      return createWeightedMovingAverageFilter2D(spec);
    case 'gaussian':
      return createGaussianAverageFilter2D(spec);
    case 'median':
      return createMedianAverageFilter2D(spec);
    case 'exponential':
      return createExponentialAverageFilter2D(spec);
    case 'cumulative':
      return createCumulativeAverageFilter2D();
    case 'fixation':
      return createFixationFilter2D(spec);
    case 'multi-pass':
      return createMultiPassFilter2D(spec);
  }
}

/**
 * Create a filter from its spec
 *
 * @param spec - Tagged filter parameters
 * @param dimension - Dimensionality of the filter to create
 * @returns New filter instance
 * @throws {ConfigurationError} If a parameter is invalid
 *
 * @example
 * ```typescript
 * const ema = createFilter({ type: 'exponential', alpha: 0.3 }, 1);
 * const trail = createFilter({ type: 'median', windowSize: 5, windowSizeY: 3 }, 2);
 * ```
 */
export function createFilter(spec: FilterSpec, dimension: 1): Filter1D;
export function createFilter(spec: FilterSpec, dimension: 2): Filter2D;
export function createFilter(spec: FilterSpec, dimension: Dimension): Filter;
export function createFilter(spec: FilterSpec, dimension: Dimension): Filter {
  return dimension === 1 ? createFilter1D(spec) : createFilter2D(spec);
}
