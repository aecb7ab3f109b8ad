// ==============================================================================
// SMOOTHER REPLAY TYPES
// Type definitions for the replay tool.
// ==============================================================================

import type { LogLevel } from '@logging'

/**
 * Settings read from the environment / .env
 */
export interface ReplayConfig {
  logLevel: LogLevel
  precision: number
}

/**
 * Parsed command line options
 */
export type ReplayOptions = {
  pipeline: string
  input: string
  precision?: string
  quiet?: boolean
}

/**
 * One data row of a sample file
 */
export interface SampleRow {
  /** 1-based line number in the file */
  line: number
  values: readonly number[]
}

/**
 * One replayed sample
 */
export interface ReplayResult {
  line: number
  raw: string
  smoothed: string
}
