/**
 * Sample file parsing
 * One column per row for 1D pipelines, two (x, y) for 2D
 */

import { SmootherError } from '$types/errors'
import type { Dimension } from '$types/common'
import { isFiniteNumber } from '@utils/number'

import type { SampleRow } from './types'

/**
 * Error in a sample file, tied to the offending line
 */
export class SampleFileError extends SmootherError {
  readonly line: number

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`)
    this.name = 'SampleFileError'
    this.line = line
  }
}

/**
 * Parse sample file text
 *
 * Blank lines and lines starting with `#` are skipped.
 *
 * @param text - File contents
 * @param dimension - Expected number of columns
 * @returns Data rows in file order
 * @throws {SampleFileError} On the first malformed row
 */
export function parseSamples(text: string, dimension: Dimension): SampleRow[] {
  const rows: SampleRow[] = []
  const lines = text.split(/\r?\n/)

  lines.forEach((content, index) => {
    const line = index + 1
    const trimmed = content.trim()
    if (trimmed === '' || trimmed.startsWith('#')) {
      return
    }

    const cells = trimmed.split(',').map((cell) => cell.trim())
    if (cells.length !== dimension) {
      throw new SampleFileError(
        line,
        `expected ${dimension} column${dimension === 1 ? '' : 's'}, got ${cells.length}`,
      )
    }

    const values = cells.map((cell) => {
      const value = cell === '' ? NaN : Number(cell)
      if (!isFiniteNumber(value)) {
        throw new SampleFileError(line, `"${cell}" is not a number`)
      }
      return value
    })

    rows.push({ line, values })
  })

  return rows
}
