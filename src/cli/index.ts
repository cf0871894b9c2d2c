/**
 * Command-line batch resolver
 * @module cli
 */

import { join } from 'node:path'
import { Command, InvalidArgumentError } from 'commander'
import chalk from 'chalk'
import type { Logger } from '../services/types.js'
import type { ResolverConfig } from '../types/config.js'
import { HkAddress } from '../builder/resolver-builder.js'
import { createFileLogger } from '../services/file-logger.js'
import { createTeeLogger, defaultLogger } from '../services/execution-context.js'
import { DEFAULT_ADDRESS_COLUMN, readAddresses, writeRecords } from '../io/csv.js'

/**
 * Log file written under `--log-path`
 */
export const LOG_FILE_NAME = 'addresses_fetcher.log'

/**
 * Parsed command-line options
 */
export interface ResolveCommandOptions {
  inputPath: string
  outputPath: string
  logPath: string
  startIndex?: number
  stopIndex?: number
  column: string
  rateLimit?: number
  maxInFlight?: number
  maxRetries?: number
  endpoint?: string
  verbose?: boolean
}

/**
 * Where the command prints its summary
 */
export interface CliOutput {
  log(message: string): void
  error(message: string): void
}

function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.')
  }
  return parsed
}

/**
 * Runs one batch: reads the input CSV, resolves every address and writes
 * the records.
 *
 * @returns Process exit code
 */
export async function runResolve(
  options: ResolveCommandOptions,
  output: CliOutput = console
): Promise<number> {
  let logger: Logger
  try {
    const fileLogger = createFileLogger(join(options.logPath, LOG_FILE_NAME), {
      minLevel: options.verbose ? 'DEBUG' : 'INFO',
    })
    logger = options.verbose ? createTeeLogger(fileLogger, defaultLogger) : fileLogger
  } catch (error) {
    output.error(chalk.red(`Cannot open log file: ${String(error)}`))
    return 1
  }

  const config: Partial<ResolverConfig> = {
    rateLimit: options.rateLimit,
    maxInFlight: options.maxInFlight,
    maxRetries: options.maxRetries,
    endpoint: options.endpoint,
  }

  try {
    const addresses = await readAddresses(options.inputPath, options.column)
    const resolver = HkAddress.create().config(config).logger(logger).build()

    try {
      const { records, stats } = await resolver.resolveAll(addresses, {
        startIndex: options.startIndex,
        stopIndex: options.stopIndex,
      })

      output.log(`Amount of addresses: ${chalk.bold(stats.total)}`)
      output.log(
        `Fetching from lookup endpoint took ${(stats.durationMs / 1000).toFixed(1)} secs, of len=${stats.total}`
      )

      const target = await writeRecords(options.outputPath, records)
      output.log(
        chalk.green(`Wrote ${records.length} record(s) to ${target}`) +
          (stats.dropped > 0 ? chalk.yellow(` (${stats.dropped} dropped)`) : '')
      )
    } finally {
      resolver.close()
    }
    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error('Run failed', { error })
    output.error(chalk.red(`Error: ${message}`))
    return 1
  }
}

/**
 * Builds the command-line program. The action sets `process.exitCode`.
 */
export function createProgram(): Command {
  return new Command('hk-address-resolver')
    .description('Resolve free-text Hong Kong addresses against the Address Lookup Service')
    .version('1.0.0')
    .requiredOption('-i, --input-path <path>', 'CSV file with an address column')
    .requiredOption('-o, --output-path <path>', 'Output CSV file or directory')
    .option('-l, --log-path <dir>', 'Directory for the log file', '.')
    .option('--start-index <n>', 'First row to resolve (needs --stop-index)', parseNonNegativeInteger)
    .option('--stop-index <n>', 'Row to stop before (needs --start-index)', parseNonNegativeInteger)
    .option('--column <name>', 'Name of the address column', DEFAULT_ADDRESS_COLUMN)
    .option('--rate-limit <n>', 'Requests per second', parsePositiveNumber)
    .option('--max-in-flight <n>', 'Concurrent lookups', parsePositiveInteger)
    .option('--max-retries <n>', 'Attempts per address', parsePositiveInteger)
    .option('--endpoint <url>', 'Lookup endpoint URL')
    .option('-v, --verbose', 'Also log to the console, including debug entries')
    .action(async (options: ResolveCommandOptions) => {
      process.exitCode = await runResolve(options)
    })
}
