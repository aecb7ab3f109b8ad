/**
 * Constant offset filter
 *
 * Stateless shift of every sample, e.g. to correct a calibration bias
 * before smoothing.
 */

import type { Filter1D, Filter2D, OffsetConfig, OffsetConfig2D } from '@core/filter';
import { createAxisPairFilter, requireOffset } from '@core/filter';

/**
 * Create a 1D offset filter
 * @param config - Offset configuration
 * @returns Filter that returns `sample + offset`
 * @throws {ConfigurationError} If offset is not finite
 */
export function createOffsetFilter(config: OffsetConfig): Filter1D {
  const offset = requireOffset(config.offset, 'offset');

  return {
    dimension: 1,
    kind: 'offset',
    update: function (sample: number): number {
      return sample + offset;
    },
    reset: function (): void {
      // stateless
    }
  };
}

/**
 * Create a 2D offset filter (offsetY defaults to offset)
 */
export function createOffsetFilter2D(config: OffsetConfig2D): Filter2D {
  const offsetY = config.offsetY === undefined ? config.offset : config.offsetY;

  return createAxisPairFilter(
    'offset',
    createOffsetFilter({ offset: config.offset }),
    createOffsetFilter({ offset: offsetY })
  );
}
