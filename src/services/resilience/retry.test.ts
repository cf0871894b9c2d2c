/**
 * Tests for retry utilities
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  withRetryDetailed,
  calculateRetryDelay,
  sleep,
  DEFAULT_RETRY_CONFIG,
} from './retry.js'
import { RetryExhaustedError, ServiceServerError } from '../service-error.js'

const FAST = { maxRetries: 5, sleepMultiplier: 2, backoffUnitMs: 100 }

describe('Retry', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('calculateRetryDelay', () => {
    it('sleeps one unit after the first failure', () => {
      expect(calculateRetryDelay(1, DEFAULT_RETRY_CONFIG)).toBe(1000)
    })

    it('grows linearly with the number of earlier failures', () => {
      expect(calculateRetryDelay(2, DEFAULT_RETRY_CONFIG)).toBe(2000)
      expect(calculateRetryDelay(3, DEFAULT_RETRY_CONFIG)).toBe(4000)
      expect(calculateRetryDelay(4, DEFAULT_RETRY_CONFIG)).toBe(6000)
      expect(calculateRetryDelay(10, DEFAULT_RETRY_CONFIG)).toBe(18000)
    })

    it('respects multiplier and unit', () => {
      const config = { maxRetries: 3, sleepMultiplier: 3, backoffUnitMs: 10 }
      expect(calculateRetryDelay(1, config)).toBe(10)
      expect(calculateRetryDelay(3, config)).toBe(60)
    })
  })

  describe('DEFAULT_RETRY_CONFIG', () => {
    it('allows ten attempts with a multiplier of two', () => {
      expect(DEFAULT_RETRY_CONFIG).toEqual({
        maxRetries: 10,
        sleepMultiplier: 2,
        backoffUnitMs: 1000,
      })
    })
  })

  describe('sleep', () => {
    it('resolves after the given delay', async () => {
      let done = false
      const promise = sleep(500).then(() => {
        done = true
      })

      await vi.advanceTimersByTimeAsync(499)
      expect(done).toBe(false)
      await vi.advanceTimersByTimeAsync(1)
      await promise
      expect(done).toBe(true)
    })
  })

  describe('withRetryDetailed', () => {
    it('returns on first success without sleeping', async () => {
      const fn = vi.fn(async (_attempt: number) => 'ok')

      const result = await withRetryDetailed(fn, FAST)

      expect(result.result).toBe('ok')
      expect(result.attempts).toBe(1)
      expect(fn).toHaveBeenCalledTimes(1)
      expect(fn).toHaveBeenCalledWith(1)
    })

    it('retries failures until an attempt succeeds', async () => {
      const fn = vi.fn(async (attempt: number) => {
        if (attempt < 3) throw new ServiceServerError('als-lookup', 'busy', 503)
        return 'ok'
      })

      const promise = withRetryDetailed(fn, FAST)
      await vi.advanceTimersByTimeAsync(100)
      expect(fn).toHaveBeenCalledTimes(2)
      await vi.advanceTimersByTimeAsync(200)
      const result = await promise

      expect(result.result).toBe('ok')
      expect(result.attempts).toBe(3)
      expect(fn).toHaveBeenCalledTimes(3)
    })

    it('reports every failure, with no delay after the last one', async () => {
      const delays: number[] = []
      const attempts: number[] = []
      const fn = vi.fn(async (_attempt: number): Promise<string> => {
        throw new Error('down')
      })

      const promise = withRetryDetailed(fn, {
        maxRetries: 3,
        sleepMultiplier: 2,
        backoffUnitMs: 100,
        onAttemptFailed: (_error, attempt, delayMs) => {
          attempts.push(attempt)
          delays.push(delayMs)
        },
      })
      const assertion = expect(promise).rejects.toBeInstanceOf(RetryExhaustedError)
      await vi.runAllTimersAsync()
      await assertion

      expect(fn).toHaveBeenCalledTimes(3)
      expect(attempts).toEqual([1, 2, 3])
      expect(delays).toEqual([100, 200, 0])
    })

    it('carries attempt count and last error on exhaustion', async () => {
      let calls = 0
      const promise = withRetryDetailed(async () => {
        calls++
        throw new Error(`failure ${calls}`)
      }, { ...FAST, maxRetries: 2 })
      const caught = promise.catch((error: unknown) => error)
      await vi.runAllTimersAsync()
      const error = await caught

      expect(error).toBeInstanceOf(RetryExhaustedError)
      if (error instanceof RetryExhaustedError) {
        expect(error.attempts).toBe(2)
        expect(error.lastError.message).toBe('failure 2')
      }
    })

    it('rethrows errors that shouldRetry rejects', async () => {
      const fatal = new Error('fatal')
      const fn = vi.fn(async (_attempt: number): Promise<string> => {
        throw fatal
      })

      await expect(
        withRetryDetailed(fn, { ...FAST, shouldRetry: (error) => error !== fatal })
      ).rejects.toBe(fatal)
      expect(fn).toHaveBeenCalledTimes(1)
    })

  })
})
