/**
 * Axis pair: a 2D filter built from two independent 1D filters
 *
 * Used for every axis-independent filter (moving averages, exponential,
 * cumulative, offset). Distance-based filters need both coordinates at
 * once and implement Filter2D natively instead.
 */

import type { Filter1D, Filter2D, FilterKind } from './types';
import type { Sample2D } from '$types/common';
import { ConfigurationError } from '$types/errors';

/**
 * Combine two 1D filters into a component-wise 2D filter
 *
 * @param kind - Catalog kind reported by the pair
 * @param filterX - Filter applied to the x coordinate (owned by the pair)
 * @param filterY - Filter applied to the y coordinate (owned by the pair)
 * @returns 2D filter
 * @throws {ConfigurationError} If both axes are given the same instance
 */
export function createAxisPairFilter(kind: FilterKind, filterX: Filter1D, filterY: Filter1D): Filter2D {
  if (filterX === filterY) {
    throw new ConfigurationError('Axis pair needs two independent filter instances');
  }

  function update(sample: Sample2D): Sample2D {
    return [filterX.update(sample[0]), filterY.update(sample[1])];
  }

  function reset(): void {
    filterX.reset();
    filterY.reset();
  }

  return {
    dimension: 2,
    kind: kind,
    update: update,
    reset: reset
  };
}
