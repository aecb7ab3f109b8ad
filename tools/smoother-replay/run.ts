/**
 * Replay core
 * Pushes parsed rows through a smoother and formats each output
 */

import type { AnySmoother } from '@core/builder'
import type { Sample2D } from '$types/common'

import type { ReplayResult, SampleRow } from './types'

/**
 * Format a 1D or 2D sample with fixed decimals
 */
export function formatSample(sample: number | Sample2D, precision: number): string {
  if (typeof sample === 'number') {
    return sample.toFixed(precision)
  }
  return `(${sample[0].toFixed(precision)}, ${sample[1].toFixed(precision)})`
}

/**
 * Feed every row through the smoother in order
 *
 * @param smoother - Freshly built smoother
 * @param rows - Rows parsed for the smoother's dimensionality
 * @param precision - Decimal places in the output
 * @returns One result per row
 */
export function replaySamples(smoother: AnySmoother, rows: readonly SampleRow[], precision: number): ReplayResult[] {
  return rows.map((row) => {
    if (smoother.dimension === 1) {
      const raw = row.values[0]
      return {
        line: row.line,
        raw: formatSample(raw, precision),
        smoothed: formatSample(smoother.addAndGet(raw), precision),
      }
    }

    const raw: Sample2D = [row.values[0], row.values[1]]
    return {
      line: row.line,
      raw: formatSample(raw, precision),
      smoothed: formatSample(smoother.addAndGet(raw), precision),
    }
  })
}
