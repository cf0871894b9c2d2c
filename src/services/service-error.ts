/**
 * Service-specific error classes for lookup calls
 * @module services/service-error
 */

import type { ServiceErrorType } from './types.js'

/**
 * Base error class for all service-related errors
 */
export class ServiceError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string

  /** Error type for categorization */
  public readonly type: ServiceErrorType

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    type: ServiceErrorType,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ServiceError'
    this.code = code
    this.type = type
    this.context = context

    // Maintains proper stack trace for where error was thrown (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a lookup attempt times out
 */
export class ServiceTimeoutError extends ServiceError {
  /** Timeout duration in milliseconds */
  public readonly timeoutMs: number

  /** Service name that timed out */
  public readonly serviceName: string

  constructor(
    serviceName: string,
    timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Service '${serviceName}' timed out after ${timeoutMs}ms`,
      'SERVICE_TIMEOUT',
      'timeout',
      { serviceName, timeoutMs, ...context }
    )
    this.name = 'ServiceTimeoutError'
    this.serviceName = serviceName
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error thrown when a network error occurs during a lookup
 */
export class ServiceNetworkError extends ServiceError {
  /** Service name that experienced network error */
  public readonly serviceName: string

  /** Original network error */
  public readonly cause?: Error

  constructor(
    serviceName: string,
    message: string,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(
      `Network error in service '${serviceName}': ${message}`,
      'SERVICE_NETWORK_ERROR',
      'network',
      { serviceName, originalMessage: message, ...context }
    )
    this.name = 'ServiceNetworkError'
    this.serviceName = serviceName
    this.cause = cause
  }
}

/**
 * Error thrown when the service answers with a non-success status
 */
export class ServiceServerError extends ServiceError {
  /** Service name */
  public readonly serviceName: string

  /** HTTP status code if applicable */
  public readonly statusCode?: number

  constructor(
    serviceName: string,
    message: string,
    statusCode?: number,
    context?: Record<string, unknown>
  ) {
    const statusInfo = statusCode ? ` (HTTP ${statusCode})` : ''
    super(
      `Server error in service '${serviceName}'${statusInfo}: ${message}`,
      'SERVICE_SERVER_ERROR',
      'server',
      { serviceName, statusCode, originalMessage: message, ...context }
    )
    this.name = 'ServiceServerError'
    this.serviceName = serviceName
    this.statusCode = statusCode
  }
}

/**
 * Error thrown when a response body is not JSON or not a JSON object
 */
export class ServiceMalformedResponseError extends ServiceError {
  /** Service name */
  public readonly serviceName: string

  /** What was wrong with the body */
  public readonly reason: string

  constructor(
    serviceName: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Malformed response from service '${serviceName}': ${reason}`,
      'SERVICE_MALFORMED_RESPONSE',
      'malformed',
      { serviceName, reason, ...context }
    )
    this.name = 'ServiceMalformedResponseError'
    this.serviceName = serviceName
    this.reason = reason
  }
}

/**
 * Error thrown when every allowed attempt of an operation has failed
 */
export class RetryExhaustedError extends ServiceError {
  /** Number of attempts made */
  public readonly attempts: number

  /** Error from the final attempt */
  public readonly lastError: Error

  constructor(
    attempts: number,
    lastError: Error,
    context?: Record<string, unknown>
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError.message}`,
      'RETRY_EXHAUSTED',
      'exhausted',
      { attempts, lastError: lastError.message, ...context }
    )
    this.name = 'RetryExhaustedError'
    this.attempts = attempts
    this.lastError = lastError
  }
}

/**
 * Normalizes whatever a failed request threw into a ServiceError.
 * Errors that are not ServiceErrors already are treated as network failures.
 */
export function toServiceError(error: unknown, serviceName: string): ServiceError {
  if (error instanceof ServiceError) {
    return error
  }
  if (error instanceof Error) {
    return new ServiceNetworkError(serviceName, error.message, error)
  }
  return new ServiceNetworkError(serviceName, String(error))
}
