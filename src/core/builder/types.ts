/**
 * Builder type definitions
 *
 * Fluent builder stages and the declarative pipeline description
 * accepted by buildSmoother.
 */

import type {
  ExponentialConfig2D,
  Filter,
  FixationConfig,
  GaussianConfig2D,
  MultiPassConfig2D,
  OffsetConfig2D,
  WindowConfig2D
} from '@core/filter';
import type { Smoother } from '@core/smoother';
import type { Dimension } from '$types/common';

// ═══════════════════════════════════════════════════════════════
// DECLARATIVE DESCRIPTION
// ═══════════════════════════════════════════════════════════════

/**
 * One filter of a pipeline description, tagged by kind
 * Y-axis parameters only apply to 2D pipelines.
 */
export type FilterSpec =
  | ({ type: 'offset' } & OffsetConfig2D)
  | ({ type: 'simple' } & WindowConfig2D)
  | ({ type: 'weighted' } & WindowConfig2D)
  | ({ type: 'gaussian' } & GaussianConfig2D)
  | ({ type: 'median' } & WindowConfig2D)
  | ({ type: 'exponential' } & ExponentialConfig2D)
  | { type: 'cumulative' }
  | ({ type: 'fixation' } & FixationConfig)
  | ({ type: 'multi-pass' } & MultiPassConfig2D);

/**
 * Whole pipeline, filters in application order
 *
 * @example
 * ```json
 * { "dimension": 1, "filters": [{ "type": "gaussian", "windowSize": 5 }] }
 * ```
 */
export interface PipelineDescription {
  dimension: Dimension;
  filters: FilterSpec[];
}

/**
 * Smoother of either dimensionality; narrow on `dimension`
 */
export type AnySmoother = Smoother<1> | Smoother<2>;

// ═══════════════════════════════════════════════════════════════
// FLUENT BUILDER STAGES
// ═══════════════════════════════════════════════════════════════

/**
 * Entry stage: choose the dimensionality
 */
export interface SmootherBuilder {
  oneDimensional(): DimensionedSmootherBuilder<1>;
  twoDimensional(): DimensionedSmootherBuilder<2>;
  /** @throws {ConfigurationError} If dimensions is not 1 or 2 */
  setDimensions(dimensions: number): DimensionedSmootherBuilder<1> | DimensionedSmootherBuilder<2>;
}

/**
 * Dimension chosen: choose the smoother mode
 */
export interface DimensionedSmootherBuilder<D extends Dimension> {
  continuous(): ContinuousSmootherBuilder<D>;
}

/**
 * Collects filters for a continuous smoother
 *
 * Single use: after build() the filters belong to the smoother and the
 * builder rejects further calls.
 */
export interface ContinuousSmootherBuilder<D extends Dimension> {
  /**
   * Append a filter
   * @throws {DimensionMismatchError} If the filter has another dimensionality
   * @throws {ConfigurationError} If the builder was already built
   */
  attachFilter(filter: Filter): ContinuousSmootherBuilder<D>;

  /**
   * Create the smoother
   * @throws {ConfigurationError} If no filter was attached or the builder was already built
   */
  build(): Smoother<D>;
}
