#!/usr/bin/env node
/**
 * Smoother Replay Tool
 * Replays recorded samples through a pipeline described in JSON
 */

import * as fs from 'node:fs'

import chalk from 'chalk'
import { program } from 'commander'

import { buildSmoother } from '@core/builder'
import { LOG_LEVELS, DEFAULTS } from '@config'
import { createConsoleSink, createLogger } from '@logging'
import { ConfigurationError } from '$types/errors'

import { ConfigManager, MAX_PRECISION, loadEnvFile, parsePrecision } from './config'
import { parseSamples } from './csv'
import { replaySamples } from './run'
import type { ReplayOptions } from './types'

program
  .name('smoother-replay')
  .description('Replay recorded samples through a smoothing pipeline')
  .requiredOption('-p, --pipeline <file>', 'Pipeline description (JSON)')
  .requiredOption('-i, --input <file>', 'Sample file (CSV, one or two columns)')
  .option('--precision <digits>', 'Decimal places in the output')
  .option('-q, --quiet', 'Print smoothed values only')
  .parse(process.argv)

const options = program.opts<ReplayOptions>()

function readJson(file: string): unknown {
  const text = fs.readFileSync(file, 'utf-8')
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }
}

function main(): void {
  loadEnvFile()
  const config = new ConfigManager(process.env).get()

  let precision = config.precision
  if (options.precision !== undefined) {
    const parsed = parsePrecision(options.precision)
    if (parsed === undefined) {
      throw new ConfigurationError(`--precision must be an integer between 0 and ${MAX_PRECISION} (got ${options.precision})`)
    }
    precision = parsed
  }

  // Log lines go to stderr so stdout carries only replay output
  const consoleSink = createConsoleSink(
    {
      log: (message) => console.error(chalk.gray(message)),
      warn: (message) => console.warn(chalk.yellow(message)),
    },
    { bufferSize: DEFAULTS.CONSOLE_BUFFER_SIZE },
  )
  const logger = createLogger(
    { level: options.quiet ? LOG_LEVELS.WARNING : config.logLevel },
    { sinks: [{ sink: consoleSink, minLevel: LOG_LEVELS.DEBUG }] },
    LOG_LEVELS,
  )

  const smoother = buildSmoother(readJson(options.pipeline), logger)
  const rows = parseSamples(fs.readFileSync(options.input, 'utf-8'), smoother.dimension)
  const results = replaySamples(smoother, rows, precision)

  for (const result of results) {
    if (options.quiet) {
      console.log(result.smoothed)
    } else {
      console.log(`${chalk.gray(result.raw)} -> ${chalk.green(result.smoothed)}`)
    }
  }

  if (!options.quiet) {
    logger.info(`Replayed ${results.length} samples through ${smoother.size()} filters`)
  }
}

try {
  main()
} catch (error) {
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    console.error(chalk.red('✗ Error: invalid configuration'))
    for (const issue of error.issues) {
      console.error(chalk.red(`  - ${issue.message}`))
    }
  } else {
    console.error(chalk.red('✗ Error:'), error instanceof Error ? error.message : String(error))
  }
  process.exit(1)
}
