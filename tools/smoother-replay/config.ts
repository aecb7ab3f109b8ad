/**
 * Configuration Management
 * Reads replay settings from environment variables and .env
 */

import { fileURLToPath } from 'node:url'

import * as dotenv from 'dotenv'

import { DEFAULTS, LOG_LEVELS } from '@config'
import { parseLogLevel } from '@logging'
import { ConfigurationError } from '$types/errors'
import type { ConfigurationIssue } from '$types/errors'
import { isInteger } from '@utils/number'

import type { ReplayConfig } from './types'

const MAX_PRECISION = 20

/**
 * Load the project .env into process.env
 * ? override:true so .env values take precedence over the shell
 */
export function loadEnvFile(): void {
  dotenv.config({
    path: fileURLToPath(new URL('../../.env', import.meta.url)),
    override: true,
  })
}

/**
 * Parse a decimal-places setting
 * @returns The precision, or undefined when value is not an integer in 0..20
 */
export function parsePrecision(value: string): number | undefined {
  const trimmed = value.trim()
  const precision = trimmed === '' ? NaN : Number(trimmed)
  if (!isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
    return undefined
  }
  return precision
}

class ConfigManager {
  private config: ReplayConfig

  constructor(env: NodeJS.ProcessEnv) {
    this.config = this.loadConfig(env)
  }

  private loadConfig(env: NodeJS.ProcessEnv): ReplayConfig {
    const issues: ConfigurationIssue[] = []

    let logLevel = DEFAULTS.LOG_LEVEL
    if (env.SMOOTHER_LOG_LEVEL !== undefined) {
      const parsed = parseLogLevel(env.SMOOTHER_LOG_LEVEL, LOG_LEVELS)
      if (parsed === undefined) {
        issues.push({
          field: 'SMOOTHER_LOG_LEVEL',
          message: `SMOOTHER_LOG_LEVEL must be DEBUG, INFO, WARNING or CRITICAL (got ${env.SMOOTHER_LOG_LEVEL})`,
        })
      } else {
        logLevel = parsed
      }
    }

    let precision = DEFAULTS.OUTPUT_PRECISION
    if (env.SMOOTHER_PRECISION !== undefined) {
      const parsed = parsePrecision(env.SMOOTHER_PRECISION)
      if (parsed === undefined) {
        issues.push({
          field: 'SMOOTHER_PRECISION',
          message: `SMOOTHER_PRECISION must be an integer between 0 and ${MAX_PRECISION} (got ${env.SMOOTHER_PRECISION})`,
        })
      } else {
        precision = parsed
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid replay configuration', issues)
    }

    return { logLevel, precision }
  }

  get(): ReplayConfig {
    return { ...this.config }
  }
}

export { ConfigManager, MAX_PRECISION }
