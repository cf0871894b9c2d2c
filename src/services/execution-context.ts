/**
 * Execution context and logging helpers for lookups
 * @module services/execution-context
 */

import type { Logger, LookupContext } from './types.js'

/**
 * Generates a unique correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36)
  const random = Math.random().toString(36).substring(2, 10)
  return `addr-${timestamp}-${random}`
}

/**
 * Builds the diagnostic context for one address of a batch
 */
export function createLookupContext(options: {
  address: string
  index: number
  correlationId?: string
}): LookupContext {
  return {
    correlationId: options.correlationId ?? generateCorrelationId(),
    address: options.address,
    index: options.index,
  }
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  debug: (message: string, context?: Record<string, unknown>) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message: string, context?: Record<string, unknown>) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message: string, context?: Record<string, unknown>) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(name: string, baseLogger: Logger): Logger {
  const prefix = `[${name}]`
  return {
    debug: (message, context) => baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) => baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) => baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) => baseLogger.error(`${prefix} ${message}`, context),
  }
}

/**
 * Creates a logger that forwards every entry to all given loggers
 */
export function createTeeLogger(...loggers: Logger[]): Logger {
  return {
    debug: (message, context) => loggers.forEach((l) => l.debug(message, context)),
    info: (message, context) => loggers.forEach((l) => l.info(message, context)),
    warn: (message, context) => loggers.forEach((l) => l.warn(message, context)),
    error: (message, context) => loggers.forEach((l) => l.error(message, context)),
  }
}
