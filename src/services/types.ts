/**
 * Lookup service type definitions
 * @module services/types
 */

/**
 * Error types that can occur during a lookup attempt.
 */
export type ServiceErrorType =
  | 'timeout'
  | 'network'
  | 'server'
  | 'malformed'
  | 'exhausted'
  | 'unknown'

/**
 * Logger interface for pipeline diagnostics
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Retry policy for lookups.
 *
 * The delay after the n-th failed attempt is one unit for n = 1 and
 * `sleepMultiplier * (n - 1)` units afterwards. There is no jitter and no cap.
 */
export interface RetryConfig {
  /** Total number of attempts */
  maxRetries: number

  /** Units of delay added per earlier failure */
  sleepMultiplier: number

  /** Length of one unit in milliseconds */
  backoffUnitMs: number
}

/**
 * Issues one lookup and resolves with the parsed JSON body.
 * Rejects with a ServiceError on any transport-level failure.
 */
export type LookupTransport = (
  query: string,
  signal: AbortSignal
) => Promise<unknown>

/**
 * Suggestions exactly as the provider returned them, not yet validated.
 */
export type RawResponse = readonly unknown[]

/**
 * How a lookup for one query ended.
 * - `'resolved'` - the service returned at least one suggestion
 * - `'empty'` - the service answered with no suggestions
 * - `'exhausted'` - every attempt failed
 * - `'aborted'` - a non-retryable condition (e.g. closed rate limiter) stopped the lookup
 */
export type LookupStatus = 'resolved' | 'empty' | 'exhausted' | 'aborted'

/**
 * Outcome of one orchestrated lookup
 */
export interface LookupOutcome {
  status: LookupStatus

  /** Non-null only when `status` is `'resolved'` */
  suggestions: RawResponse | null

  /** Number of attempts made */
  attempts: number
}

/**
 * Per-address context threaded through the pipeline for diagnostics
 */
export interface LookupContext {
  /** Unique correlation ID for tracing one address through the logs */
  correlationId: string

  /** The address as given in the input, before normalization */
  address: string

  /** Position of the address in the batch */
  index: number
}
