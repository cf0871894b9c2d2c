/**
 * Leaky-bucket rate limiter for outbound lookups
 * @module services/resilience/rate-limiter
 */

import { ConfigurationError, RateLimiterClosedError } from '../../utils/errors.js'

/** Timer ID type for cross-environment compatibility */
type TimerId = ReturnType<typeof setTimeout>

/**
 * Options for the rate limiter
 */
export interface RateLimiterOptions {
  /** Monotonic clock in milliseconds (default: performance.now) */
  clock?: () => number
}

/**
 * Result of converting elapsed time into bucket tokens
 */
export interface RefillResult {
  /** Whole tokens earned in this refill */
  whole: number

  /** Fractional remainder carried into the next refill, in [0, 1) */
  fraction: number
}

/**
 * Floor on the refill cadence in milliseconds
 */
export const MIN_SLEEP_MS = 100

/**
 * Bucket capacity for a given rate.
 * Kept at two or fewer so the limiter enforces a steady rate rather than bursts.
 */
export function bucketCapacity(rateLimit: number): number {
  return Math.min(2, Math.floor(rateLimit) + 1)
}

/**
 * Delay between refill attempts for a given rate, in milliseconds
 */
export function refillIntervalMs(rateLimit: number): number {
  return Math.max(1000 / rateLimit, MIN_SLEEP_MS)
}

/**
 * Converts elapsed time into tokens, carrying the fractional part of each
 * increment so slow refills do not systematically lose tokens to truncation.
 *
 * @param rateLimit - Tokens per second
 * @param elapsedMs - Time since the previous refill
 * @param carried - Fraction carried from the previous refill
 */
export function calculateRefill(
  rateLimit: number,
  elapsedMs: number,
  carried: number
): RefillResult {
  const increment = (rateLimit * elapsedMs) / 1000
  const fraction = carried + (increment % 1)
  const extra = Math.floor(fraction)
  return {
    whole: Math.floor(increment) + extra,
    fraction: fraction % 1,
  }
}

interface Waiter {
  resolve: () => void
  reject: (error: Error) => void
}

/**
 * Admits at most `rateLimit` operations per second.
 *
 * A background refill loop runs from construction until `close()`. Each call
 * to `acquire()` consumes one token, waiting in FIFO order when the bucket is
 * empty. Closing the limiter rejects every pending `acquire()` with
 * `RateLimiterClosedError`.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter(20)
 * try {
 *   await limiter.acquire()
 *   await fetch(url)
 * } finally {
 *   limiter.close()
 * }
 * ```
 */
export class RateLimiter {
  readonly rateLimit: number
  readonly capacity: number
  readonly intervalMs: number

  private tokens: number
  private fraction = 0
  private updatedAt: number
  private closed = false
  private timer: TimerId | undefined
  private readonly waiters: Waiter[] = []
  private readonly clock: () => number

  constructor(rateLimit: number, options: RateLimiterOptions = {}) {
    if (typeof rateLimit !== 'number' || !Number.isFinite(rateLimit) || rateLimit <= 0) {
      throw new ConfigurationError(
        `rateLimit must be a positive finite number, got ${rateLimit}`,
        'rateLimit',
        { rateLimit }
      )
    }

    this.rateLimit = rateLimit
    this.capacity = bucketCapacity(rateLimit)
    this.intervalMs = refillIntervalMs(rateLimit)
    this.clock = options.clock ?? (() => performance.now())
    this.tokens = this.capacity
    this.updatedAt = this.clock()
    this.timer = setInterval(() => this.refill(), this.intervalMs)
  }

  /** Tokens currently in the bucket */
  get available(): number {
    return this.tokens
  }

  /** Callers currently waiting for a token */
  get pending(): number {
    return this.waiters.length
  }

  /** Whether `close()` has been called */
  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Waits until a token is available and consumes it.
   *
   * @throws RateLimiterClosedError if the limiter is or becomes closed
   */
  acquire(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new RateLimiterClosedError())
    }
    if (this.tokens > 0) {
      this.tokens--
      return Promise.resolve()
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  /**
   * Stops the refill loop and rejects every pending `acquire()`.
   * Safe to call more than once.
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    if (this.timer !== undefined) {
      clearInterval(this.timer)
      this.timer = undefined
    }
    const error = new RateLimiterClosedError()
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error)
    }
  }

  private refill(): void {
    // While the bucket is full the clock is not advanced, so the next refill
    // after a drain sees the whole idle period and is capped by capacity.
    if (this.tokens >= this.capacity) return

    const now = this.clock()
    const { whole, fraction } = calculateRefill(
      this.rateLimit,
      now - this.updatedAt,
      this.fraction
    )
    this.fraction = fraction
    this.updatedAt = now

    let toAdd = Math.min(this.capacity - this.tokens, whole)
    while (toAdd > 0) {
      toAdd--
      const waiter = this.waiters.shift()
      if (waiter) {
        waiter.resolve()
      } else {
        this.tokens++
      }
    }
  }
}
