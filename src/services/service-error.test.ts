/**
 * Tests for service error classes
 */

import { describe, it, expect } from 'vitest'
import {
  ServiceError,
  ServiceTimeoutError,
  ServiceNetworkError,
  ServiceServerError,
  ServiceMalformedResponseError,
  RetryExhaustedError,
  toServiceError,
} from './service-error.js'

describe('ServiceError', () => {
  it('creates base error with all properties', () => {
    const error = new ServiceError(
      'Test error message',
      'TEST_ERROR',
      'unknown',
      { extra: 'context' }
    )

    expect(error.message).toBe('Test error message')
    expect(error.code).toBe('TEST_ERROR')
    expect(error.type).toBe('unknown')
    expect(error.context).toEqual({ extra: 'context' })
    expect(error.name).toBe('ServiceError')
    expect(error).toBeInstanceOf(Error)
  })
})

describe('ServiceTimeoutError', () => {
  it('creates timeout error with timeout info', () => {
    const error = new ServiceTimeoutError('als-lookup', 30000)

    expect(error.message).toBe("Service 'als-lookup' timed out after 30000ms")
    expect(error.code).toBe('SERVICE_TIMEOUT')
    expect(error.type).toBe('timeout')
    expect(error.timeoutMs).toBe(30000)
    expect(error.name).toBe('ServiceTimeoutError')
  })
})

describe('ServiceNetworkError', () => {
  it('keeps the original error as cause', () => {
    const cause = new Error('ECONNRESET')
    const error = new ServiceNetworkError('als-lookup', 'connection reset', cause)

    expect(error.message).toBe("Network error in service 'als-lookup': connection reset")
    expect(error.type).toBe('network')
    expect(error.cause).toBe(cause)
  })
})

describe('ServiceServerError', () => {
  it('includes the status code in the message', () => {
    const error = new ServiceServerError('als-lookup', 'Service Unavailable', 503)

    expect(error.message).toBe(
      "Server error in service 'als-lookup' (HTTP 503): Service Unavailable"
    )
    expect(error.statusCode).toBe(503)
    expect(error.type).toBe('server')
  })

  it('omits the status when not given', () => {
    const error = new ServiceServerError('als-lookup', 'bad gateway')
    expect(error.message).toBe("Server error in service 'als-lookup': bad gateway")
  })
})

describe('ServiceMalformedResponseError', () => {
  it('records the reason', () => {
    const error = new ServiceMalformedResponseError('als-lookup', 'body is not valid JSON', {
      query: '彌敦道594號',
    })

    expect(error.message).toBe("Malformed response from service 'als-lookup': body is not valid JSON")
    expect(error.reason).toBe('body is not valid JSON')
    expect(error.type).toBe('malformed')
    expect(error.context).toEqual({
      serviceName: 'als-lookup',
      reason: 'body is not valid JSON',
      query: '彌敦道594號',
    })
  })
})

describe('RetryExhaustedError', () => {
  it('keeps the attempt count and the last error', () => {
    const last = new Error('boom')
    const error = new RetryExhaustedError(10, last)

    expect(error.message).toBe('Gave up after 10 attempt(s): boom')
    expect(error.attempts).toBe(10)
    expect(error.lastError).toBe(last)
    expect(error.type).toBe('exhausted')
  })
})

describe('toServiceError', () => {
  it('returns service errors unchanged', () => {
    const original = new ServiceServerError('s', 'x', 500)
    expect(toServiceError(original, 'other')).toBe(original)
  })

  it('treats a timeout-like message as a network failure, not a timeout', () => {
    const error = toServiceError(new Error('Request timed out'), 'als-lookup')

    expect(error).toBeInstanceOf(ServiceNetworkError)
    expect(error.message).toBe("Network error in service 'als-lookup': Request timed out")
  })

  it('maps fetch failures to ServiceNetworkError', () => {
    const cause = new TypeError('fetch failed')
    const error = toServiceError(cause, 'als-lookup')

    expect(error).toBeInstanceOf(ServiceNetworkError)
    expect(error.type).toBe('network')
    expect(error.cause).toBe(cause)
  })

  it('wraps non-Error values', () => {
    const error = toServiceError(42, 'als-lookup')

    expect(error).toBeInstanceOf(ServiceNetworkError)
    expect(error.message).toBe("Network error in service 'als-lookup': 42")
  })
})
