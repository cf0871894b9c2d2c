/**
 * Batch input and output in CSV
 * @module io/csv
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises'
import { dirname, join, sep } from 'node:path'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import type { OutputRecord } from '../types/output.js'
import { OUTPUT_FIELD_SOURCES } from '../core/field-extractor.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Default name of the address column in input files
 */
export const DEFAULT_ADDRESS_COLUMN = 'address'

/**
 * File name used when the output path is a directory
 */
export const DEFAULT_OUTPUT_FILE = 'scanned_addresses.csv'

/**
 * Output columns in order, as record key and CSV header
 */
export const OUTPUT_COLUMNS: ReadonlyArray<{ key: keyof OutputRecord; header: string }> = [
  { key: 'inputAddress', header: 'input_address' },
  { key: 'score', header: 'score' },
  ...OUTPUT_FIELD_SOURCES.map(({ field, header }) => ({ key: field, header })),
]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Extracts one column from CSV text with a header row.
 *
 * @param text - CSV content
 * @param column - Header of the column to read (default: 'address')
 * @returns The column's cells in row order; blank cells are kept as ''
 * @throws ConfigurationError if the column does not exist
 *
 * @example
 * ```typescript
 * parseAddressCsv('id,address\n1,彌敦道594號\n') // ['彌敦道594號']
 * ```
 */
export function parseAddressCsv(text: string, column = DEFAULT_ADDRESS_COLUMN): string[] {
  const rows: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
  })

  if (!Array.isArray(rows)) {
    return []
  }

  const addresses: string[] = []
  for (const row of rows) {
    if (!isRecord(row)) continue
    if (!(column in row)) {
      throw new ConfigurationError(`Input has no '${column}' column`, 'column', {
        columns: Object.keys(row),
      })
    }
    const cell = row[column]
    addresses.push(typeof cell === 'string' ? cell : '')
  }
  return addresses
}

/**
 * Reads the address column of a CSV file.
 */
export async function readAddresses(
  filePath: string,
  column = DEFAULT_ADDRESS_COLUMN
): Promise<string[]> {
  const text = await readFile(filePath, 'utf8')
  return parseAddressCsv(text, column)
}

/**
 * Renders records as CSV with a header row, in OUTPUT_COLUMNS order.
 */
export function formatRecordsCsv(records: readonly OutputRecord[]): string {
  return stringify([...records], {
    header: true,
    columns: OUTPUT_COLUMNS.map(({ key, header }) => ({ key, header })),
  })
}

/**
 * Resolves the output file path. A directory (existing, or written with a
 * trailing separator) gets `scanned_addresses.csv` appended.
 */
export async function resolveOutputPath(outputPath: string): Promise<string> {
  if (outputPath.endsWith(sep) || outputPath.endsWith('/')) {
    return join(outputPath, DEFAULT_OUTPUT_FILE)
  }
  try {
    const info = await stat(outputPath)
    return info.isDirectory() ? join(outputPath, DEFAULT_OUTPUT_FILE) : outputPath
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return outputPath
    }
    throw error
  }
}

/**
 * Writes records to `outputPath` as CSV, creating parent directories.
 *
 * @returns The path of the file written
 */
export async function writeRecords(
  outputPath: string,
  records: readonly OutputRecord[]
): Promise<string> {
  const target = await resolveOutputPath(outputPath)
  await mkdir(dirname(target), { recursive: true })
  await writeFile(target, formatRecordsCsv(records), 'utf8')
  return target
}
