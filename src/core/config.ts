/**
 * Resolver defaults and configuration validation
 * @module core/config
 */

import type { ResolverConfig } from '../types/config.js'
import { ConfigurationError } from '../utils/errors.js'
import { DEFAULT_ALS_ENDPOINT, DEFAULT_ALS_HEADERS } from '../services/lookup/als-transport.js'
import { DEFAULT_RETRY_CONFIG } from '../services/resilience/retry.js'
import {
  DEFAULT_MAX_IN_FLIGHT,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '../services/fetch-orchestrator.js'

/**
 * Default resolver configuration
 */
export const DEFAULT_RESOLVER_CONFIG: Readonly<ResolverConfig> = Object.freeze({
  endpoint: DEFAULT_ALS_ENDPOINT,
  headers: DEFAULT_ALS_HEADERS,
  maxSuggestions: 1,
  rateLimit: 20,
  maxInFlight: DEFAULT_MAX_IN_FLIGHT,
  maxRetries: DEFAULT_RETRY_CONFIG.maxRetries,
  sleepMultiplier: DEFAULT_RETRY_CONFIG.sleepMultiplier,
  backoffUnitMs: DEFAULT_RETRY_CONFIG.backoffUnitMs,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
})

function checkNumber(
  config: ResolverConfig,
  field: keyof ResolverConfig,
  value: number,
  rule: 'positive' | 'positive-integer' | 'non-negative'
): void {
  const valid =
    typeof value === 'number' &&
    Number.isFinite(value) &&
    (rule === 'non-negative' ? value >= 0 : value > 0) &&
    (rule !== 'positive-integer' || Number.isInteger(value))

  if (!valid) {
    const expected =
      rule === 'positive-integer'
        ? 'a positive integer'
        : rule === 'positive'
          ? 'a positive number'
          : 'a non-negative number'
    throw new ConfigurationError(`${field} must be ${expected}, got ${value}`, field, {
      endpoint: config.endpoint,
    })
  }
}

/**
 * Checks a full configuration before any network activity.
 *
 * @throws ConfigurationError naming the first invalid field
 */
export function validateResolverConfig(config: ResolverConfig): ResolverConfig {
  checkNumber(config, 'rateLimit', config.rateLimit, 'positive')
  checkNumber(config, 'maxInFlight', config.maxInFlight, 'positive-integer')
  checkNumber(config, 'maxRetries', config.maxRetries, 'positive-integer')
  checkNumber(config, 'maxSuggestions', config.maxSuggestions, 'positive-integer')
  checkNumber(config, 'sleepMultiplier', config.sleepMultiplier, 'non-negative')
  checkNumber(config, 'backoffUnitMs', config.backoffUnitMs, 'non-negative')
  checkNumber(config, 'requestTimeoutMs', config.requestTimeoutMs, 'positive')

  if (!URL.canParse(config.endpoint)) {
    throw new ConfigurationError(
      `endpoint must be an absolute URL, got '${config.endpoint}'`,
      'endpoint'
    )
  }

  return config
}

/**
 * Merges overrides over the defaults and validates the result.
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ rateLimit: 5, maxRetries: 3 })
 * ```
 */
export function resolveConfig(overrides: Partial<ResolverConfig> = {}): ResolverConfig {
  const merged: ResolverConfig = { ...DEFAULT_RESOLVER_CONFIG }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value })
    }
  }
  return validateResolverConfig(merged)
}
