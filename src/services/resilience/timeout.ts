/**
 * Timeout utility for bounding a single lookup attempt
 * @module services/resilience/timeout
 */

import { ServiceTimeoutError } from '../service-error.js'

/** Timer ID type for cross-environment compatibility */
type TimerId = ReturnType<typeof setTimeout>

/**
 * Execute an operation with timeout and automatic cancellation
 *
 * The operation receives an abort signal. When the timeout expires the signal
 * fires and the returned promise rejects with `ServiceTimeoutError` at once,
 * whether or not the operation reacts to the signal. Whatever the operation
 * does after that is ignored.
 *
 * @param fn - Function that receives an abort signal
 * @param timeoutMs - Timeout in milliseconds
 * @param serviceName - Service name for error messages
 * @returns The result of the function
 *
 * @example
 * ```typescript
 * const body = await executeWithAbortableTimeout(
 *   (signal) => fetch(url, { signal }).then((r) => r.json()),
 *   30000,
 *   'als'
 * )
 * ```
 */
export async function executeWithAbortableTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  serviceName: string = 'unknown'
): Promise<T> {
  if (timeoutMs <= 0) {
    throw new Error('Timeout must be a positive number')
  }

  const controller = new AbortController()

  return new Promise<T>((resolve, reject) => {
    let settled = false

    const timeoutId: TimerId = setTimeout(() => {
      if (settled) return
      settled = true
      controller.abort()
      reject(new ServiceTimeoutError(serviceName, timeoutMs))
    }, timeoutMs)

    const onResolve = (value: T) => {
      if (settled) return
      settled = true
      clearTimeout(timeoutId)
      resolve(value)
    }

    const onReject = (error: unknown) => {
      if (settled) return
      settled = true
      clearTimeout(timeoutId)
      reject(error)
    }

    let operation: Promise<T>
    try {
      operation = fn(controller.signal)
    } catch (error) {
      onReject(error)
      return
    }
    operation.then(onResolve, onReject)
  })
}
