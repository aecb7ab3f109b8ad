/**
 * Fluent smoother builder
 *
 * createSmootherBuilder().oneDimensional().continuous()
 *   .attachFilter(a).attachFilter(b).build()
 *
 * Dimensionality is checked when a filter is attached, so a mismatch
 * points at the offending call rather than at build().
 */

import type { Filter, Filter1D, Filter2D } from '@core/filter';
import type { Smoother } from '@core/smoother';
import { createSmoother1D, createSmoother2D } from '@core/smoother';
import type { Logger } from '@logging';
import { createNullLogger } from '@logging';
import type { Dimension } from '$types/common';
import { ConfigurationError, DimensionMismatchError } from '$types/errors';
import type { ContinuousSmootherBuilder, DimensionedSmootherBuilder, SmootherBuilder } from './types';

function isFilter1D(filter: Filter): filter is Filter1D {
  return filter.dimension === 1;
}

function isFilter2D(filter: Filter): filter is Filter2D {
  return filter.dimension === 2;
}

/**
 * Create the filter-collecting stage for one dimensionality
 *
 * @param dimension - Dimensionality every attached filter must have
 * @param accepts - Narrows an attached filter to this dimensionality
 * @param assemble - Creates the smoother from the collected filters
 * @param logger - Receives attach and build messages
 * @returns Continuous builder stage
 */
function createContinuousBuilder<D extends Dimension, F extends Filter>(
  dimension: D,
  accepts: (filter: Filter) => filter is F,
  assemble: (filters: readonly F[]) => Smoother<D>,
  logger: Logger
): ContinuousSmootherBuilder<D> {
  const filters: F[] = [];
  let consumed = false;

  function ensureOpen(): void {
    if (consumed) {
      throw new ConfigurationError('Builder was already used to build a smoother; create a new builder');
    }
  }

  const builder: ContinuousSmootherBuilder<D> = {
    attachFilter: function (filter: Filter): ContinuousSmootherBuilder<D> {
      ensureOpen();
      if (!accepts(filter)) {
        throw new DimensionMismatchError(dimension, filter.dimension);
      }
      if (filters.includes(filter)) {
        throw new ConfigurationError('Filter ' + filter.kind + ' is already attached; create a new instance');
      }
      filters.push(filter);
      logger.debug('Attached ' + filter.kind + ' filter at position ' + (filters.length - 1));
      return builder;
    },

    build: function (): Smoother<D> {
      ensureOpen();
      if (filters.length === 0) {
        throw new ConfigurationError('Cannot build a smoother without filters');
      }
      const smoother = assemble(filters);
      consumed = true;
      logger.info(
        'Built ' + dimension + 'D smoother: ' + filters.map(function (filter) { return filter.kind; }).join(' -> ')
      );
      return smoother;
    }
  };

  return builder;
}

/**
 * Create a fluent smoother builder
 *
 * @param logger - Optional logger for attach (DEBUG) and build (INFO) messages
 * @returns Entry stage of the builder
 *
 * @example
 * ```typescript
 * const smoother = createSmootherBuilder()
 *   .oneDimensional()
 *   .continuous()
 *   .attachFilter(createOffsetFilter({ offset: -0.5 }))
 *   .attachFilter(createExponentialAverageFilter({ alpha: 0.3 }))
 *   .build();
 *
 * smoother.addAndGet(21.4);
 * ```
 */
export function createSmootherBuilder(logger: Logger = createNullLogger()): SmootherBuilder {
  function oneDimensional(): DimensionedSmootherBuilder<1> {
    return {
      continuous: function () {
        return createContinuousBuilder(1, isFilter1D, createSmoother1D, logger);
      }
    };
  }

  function twoDimensional(): DimensionedSmootherBuilder<2> {
    return {
      continuous: function () {
        return createContinuousBuilder(2, isFilter2D, createSmoother2D, logger);
      }
    };
  }

  return {
    oneDimensional: oneDimensional,
    twoDimensional: twoDimensional,
    setDimensions: function (dimensions: number) {
      if (dimensions === 1) {
        return oneDimensional();
      }
      if (dimensions === 2) {
        return twoDimensional();
      }
      throw new ConfigurationError('Unsupported dimensions ' + dimensions + '; only 1 and 2 are supported');
    }
  };
}
