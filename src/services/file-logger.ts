/**
 * JSON Lines file logger
 * @module services/file-logger
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type { Logger } from './types.js'

/**
 * Log levels written to the file
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

/**
 * One line of the log file
 */
export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  context?: Record<string, unknown>
}

/**
 * Options for the file logger
 */
export interface FileLoggerOptions {
  /** Minimum level written (default: 'INFO') */
  minLevel?: LogLevel
  /** Keep existing content instead of truncating on open (default: false) */
  append?: boolean
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
}

function serializeContext(
  context: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!context) return undefined
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(context)) {
    out[key] =
      value instanceof Error ? { name: value.name, message: value.message } : value
  }
  return out
}

/**
 * Creates a logger that appends one JSON object per line to `filePath`.
 * The file is truncated when the logger is created unless `append` is set.
 */
export function createFileLogger(
  filePath: string,
  options: FileLoggerOptions = {}
): Logger {
  const minLevel = LEVEL_ORDER[options.minLevel ?? 'INFO']

  mkdirSync(dirname(filePath), { recursive: true })
  if (!options.append) {
    writeFileSync(filePath, '', 'utf8')
  }

  const write = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ) => {
    if (LEVEL_ORDER[level] < minLevel) return
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: serializeContext(context),
    }
    appendFileSync(filePath, JSON.stringify(entry) + '\n', 'utf8')
  }

  return {
    debug: (message, context) => write('DEBUG', message, context),
    info: (message, context) => write('INFO', message, context),
    warn: (message, context) => write('WARN', message, context),
    error: (message, context) => write('ERROR', message, context),
  }
}
