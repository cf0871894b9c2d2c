/**
 * Retry utility for wrapping async operations with linear backoff
 * @module services/resilience/retry
 */

import type { RetryConfig } from '../types.js'
import { RetryExhaustedError } from '../service-error.js'

/**
 * Retry configuration with failure hooks
 */
export interface ExtendedRetryConfig extends RetryConfig {
  /**
   * Decides whether a failure may be retried. Errors rejected here are
   * rethrown as-is instead of being wrapped in `RetryExhaustedError`.
   */
  shouldRetry?: (error: Error, attempt: number) => boolean

  /** Called after every failed attempt, including the last one */
  onAttemptFailed?: (error: Error, attempt: number, delayMs: number) => void
}

/**
 * Result from a retried operation
 */
export interface RetryResult<T> {
  /** The result value */
  result: T

  /** Number of attempts made (1 = success on first try) */
  attempts: number
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 10,
  sleepMultiplier: 2,
  backoffUnitMs: 1000,
}

/**
 * Resolves after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Calculate the delay after a failed attempt.
 *
 * @param failedAttempt - Number of the attempt that just failed (1-based)
 * @param config - Retry configuration
 * @returns Delay in milliseconds
 *
 * @example
 * ```typescript
 * const config = { maxRetries: 10, sleepMultiplier: 2, backoffUnitMs: 1000 }
 * calculateRetryDelay(1, config) // 1000
 * calculateRetryDelay(2, config) // 2000
 * calculateRetryDelay(4, config) // 6000
 * ```
 */
export function calculateRetryDelay(failedAttempt: number, config: RetryConfig): number {
  const units = failedAttempt <= 1 ? 1 : config.sleepMultiplier * (failedAttempt - 1)
  return units * config.backoffUnitMs
}

/**
 * Wraps an async function with retry logic
 *
 * @param fn - The async function to retry; receives the 1-based attempt number
 * @param config - Retry configuration
 * @returns The result and the number of attempts made
 * @throws RetryExhaustedError once `maxRetries` attempts have failed
 *
 * @example
 * ```typescript
 * const { result, attempts } = await withRetryDetailed(
 *   () => lookup('彌敦道594號'),
 *   { maxRetries: 10, sleepMultiplier: 2, backoffUnitMs: 1000 }
 * )
 * ```
 */
export async function withRetryDetailed<T>(
  fn: (attempt: number) => Promise<T>,
  config: ExtendedRetryConfig
): Promise<RetryResult<T>> {
  let lastError: Error = new Error('No attempts were made')

  for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
    try {
      return { result: await fn(attempt), attempts: attempt }
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))

      if (config.shouldRetry && !config.shouldRetry(lastError, attempt)) {
        throw lastError
      }

      const isLastAttempt = attempt === config.maxRetries
      const delayMs = isLastAttempt ? 0 : calculateRetryDelay(attempt, config)
      config.onAttemptFailed?.(lastError, attempt, delayMs)

      if (!isLastAttempt) {
        await sleep(delayMs)
      }
    }
  }

  throw new RetryExhaustedError(config.maxRetries, lastError)
}
