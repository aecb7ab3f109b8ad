/**
 * Smoother type definitions
 */

import type { Dimension, SampleOf } from '$types/common';

/**
 * Ordered chain of filters of one dimensionality
 *
 * Filters run in attachment order; the output of the last filter is
 * cached and returned by `get` until the next `add`.
 */
export interface Smoother<D extends Dimension> {
  readonly dimension: D;

  /** Feed one sample through every filter */
  add(sample: SampleOf<D>): void;

  /**
   * Last pipeline output, no side effects
   * @throws {StateError} If no sample was added since construction or reset
   */
  get(): SampleOf<D>;

  /** `add` followed by `get` */
  addAndGet(sample: SampleOf<D>): SampleOf<D>;

  /** Reset every filter in order and drop the cached output */
  reset(): void;

  /** Number of filters in the chain */
  size(): number;
}

export type Smoother1D = Smoother<1>;
export type Smoother2D = Smoother<2>;

/**
 * What a smoother needs from a filter
 */
export interface PipelineStage<S> {
  update(sample: S): S;
  reset(): void;
}
