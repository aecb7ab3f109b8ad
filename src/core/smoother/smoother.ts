/**
 * Smoother pipeline
 *
 * Runs each sample through its filters in order and caches the final
 * output. A smoother owns its filters; nothing else may update them.
 */

import type { PipelineStage, Smoother, Smoother1D, Smoother2D } from './types';
import type { Filter1D, Filter2D } from '@core/filter';
import type { Dimension, SampleOf } from '$types/common';
import { ConfigurationError, StateError } from '$types/errors';

function createPipeline<D extends Dimension>(
  dimension: D,
  filters: readonly PipelineStage<SampleOf<D>>[]
): Smoother<D> {
  if (filters.length === 0) {
    throw new ConfigurationError('A smoother needs at least one filter');
  }

  // Copy so later changes to the caller's array cannot reorder the chain
  const stages = filters.slice();
  let last: SampleOf<D> | undefined;

  function add(sample: SampleOf<D>): void {
    let value = sample;
    for (const stage of stages) {
      value = stage.update(value);
    }
    last = value;
  }

  function get(): SampleOf<D> {
    if (last === undefined) {
      throw new StateError('No sample has been added to the smoother');
    }
    return last;
  }

  function reset(): void {
    for (const stage of stages) {
      stage.reset();
    }
    last = undefined;
  }

  return {
    dimension: dimension,
    add: add,
    get: get,
    addAndGet: function (sample: SampleOf<D>): SampleOf<D> {
      add(sample);
      return get();
    },
    reset: reset,
    size: function () { return stages.length; }
  };
}

/**
 * Create a 1D smoother from filters in application order
 * @param filters - Non-empty list of 1D filters, owned by the smoother afterwards
 * @returns 1D smoother
 * @throws {ConfigurationError} If filters is empty
 */
export function createSmoother1D(filters: readonly Filter1D[]): Smoother1D {
  return createPipeline(1, filters);
}

/**
 * Create a 2D smoother from filters in application order
 * @param filters - Non-empty list of 2D filters, owned by the smoother afterwards
 * @returns 2D smoother
 * @throws {ConfigurationError} If filters is empty
 */
export function createSmoother2D(filters: readonly Filter2D[]): Smoother2D {
  return createPipeline(2, filters);
}
