/**
 * Resilience patterns for lookup calls
 * @module services/resilience
 *
 * - Rate limiting: leaky-bucket admission of outbound requests
 * - Retry: linear backoff with a fixed attempt budget
 * - Timeout: bound the duration of one attempt
 */

export {
  RateLimiter,
  MIN_SLEEP_MS,
  bucketCapacity,
  refillIntervalMs,
  calculateRefill,
  type RateLimiterOptions,
  type RefillResult,
} from './rate-limiter.js'

export {
  withRetryDetailed,
  calculateRetryDelay,
  sleep,
  DEFAULT_RETRY_CONFIG,
  type ExtendedRetryConfig,
  type RetryResult,
} from './retry.js'

export { executeWithAbortableTimeout } from './timeout.js'

export type { RetryConfig } from '../types.js'
