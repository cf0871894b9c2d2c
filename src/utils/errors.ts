/**
 * Central error classes and validation utilities for hk-address-resolver
 * @module utils/errors
 */

/**
 * Base error class for all hk-address-resolver errors
 */
export class AddressResolverError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'AddressResolverError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends AddressResolverError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid.
 * Always raised before any network activity takes place.
 */
export class ConfigurationError extends AddressResolverError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a suggestion returned by the lookup service lacks a
 * nested path the flattener requires
 */
export class CandidateStructureError extends AddressResolverError {
  /** Dotted path that could not be resolved */
  public readonly path: string

  /** Provider rank of the offending suggestion */
  public readonly rank: number

  constructor(path: string, rank: number, context?: Record<string, unknown>) {
    super(
      `Suggestion at rank ${rank} is missing required path '${path}'`,
      'CANDIDATE_STRUCTURE_ERROR',
      { path, rank, ...context }
    )
    this.name = 'CandidateStructureError'
    this.path = path
    this.rank = rank
  }
}

/**
 * Error thrown when best-candidate selection is asked to rank nothing
 */
export class EmptyCandidatesError extends AddressResolverError {
  constructor(address: string) {
    super(
      `No candidates to score for address '${address}'`,
      'EMPTY_CANDIDATES',
      { address }
    )
    this.name = 'EmptyCandidatesError'
  }
}

/**
 * Error delivered to callers still waiting on a rate limiter when it closes
 */
export class RateLimiterClosedError extends AddressResolverError {
  constructor() {
    super('Rate limiter has been closed', 'RATE_LIMITER_CLOSED')
    this.name = 'RateLimiterClosedError'
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a number is a positive integer
 */
export function requirePositiveInteger(
  value: number,
  parameterName: string
): number {
  requirePositive(value, parameterName)
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be an integer')
  }
  return value
}

/**
 * Validates that a number is non-negative (>= 0)
 */
export function requireNonNegative(value: number, parameterName: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(parameterName, value, 'must be a string')
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}
