/**
 * Fixation (deadband) filters
 *
 * Hold a reference value and keep returning it while samples stay
 * within `threshold` of it. A sample at or beyond the threshold becomes
 * the new reference and is returned as-is. The first sample after
 * construction or reset seeds the reference.
 *
 * The 2D filter measures Euclidean distance over both coordinates, so
 * it is not an axis pair.
 */

import type { FixationConfig, Filter1D, Filter2D } from '@core/filter';
import { requireThreshold } from '@core/filter';
import type { Sample2D } from '$types/common';

/**
 * Create a 1D fixation filter
 * @param config - Deadband threshold
 * @returns 1D filter
 * @throws {ConfigurationError} If threshold is negative or not finite
 *
 * @example
 * ```typescript
 * const fixation = createFixationFilter({ threshold: 2 });
 * fixation.update(10);   // 10 (seeds)
 * fixation.update(11.5); // 10 (held)
 * fixation.update(12);   // 12 (moved)
 * ```
 */
export function createFixationFilter(config: FixationConfig): Filter1D {
  const threshold = requireThreshold(config.threshold, 'threshold');
  let reference = 0;
  let seeded = false;

  return {
    dimension: 1,
    kind: 'fixation',
    update: function (sample: number): number {
      if (!seeded) {
        reference = sample;
        seeded = true;
        return reference;
      }
      if (Math.abs(sample - reference) < threshold) {
        return reference;
      }
      reference = sample;
      return reference;
    },
    reset: function (): void {
      reference = 0;
      seeded = false;
    }
  };
}

/**
 * Create a 2D fixation filter over Euclidean distance
 * @param config - Deadband radius
 * @returns 2D filter
 * @throws {ConfigurationError} If threshold is negative or not finite
 */
export function createFixationFilter2D(config: FixationConfig): Filter2D {
  const threshold = requireThreshold(config.threshold, 'threshold');
  let reference: Sample2D = [0, 0];
  let seeded = false;

  return {
    dimension: 2,
    kind: 'fixation',
    update: function (sample: Sample2D): Sample2D {
      if (!seeded) {
        reference = [sample[0], sample[1]];
        seeded = true;
        return reference;
      }
      const distance = Math.hypot(sample[0] - reference[0], sample[1] - reference[1]);
      if (distance < threshold) {
        return [reference[0], reference[1]];
      }
      reference = [sample[0], sample[1]];
      return reference;
    },
    reset: function (): void {
      reference = [0, 0];
      seeded = false;
    }
  };
}
