import type { ResolverConfig } from '../types/config.js'
import type { Logger, LookupTransport, RetryConfig } from '../services/types.js'
import type { AdmissionGate } from '../services/fetch-orchestrator.js'
import { AddressResolver } from '../core/resolver.js'
import {
  requireNonEmptyString,
  requireNonNegative,
  requirePositive,
  requirePositiveInteger,
} from '../utils/errors.js'

/**
 * Fluent builder for configuring and creating an AddressResolver.
 *
 * Setters validate their argument immediately; `build()` validates the
 * assembled configuration as a whole.
 *
 * @example
 * ```typescript
 * const resolver = HkAddress.create()
 *   .rateLimit(10)
 *   .maxInFlight(5)
 *   .retries({ maxRetries: 5, sleepMultiplier: 2 })
 *   .logger(createFileLogger('logs/addresses_fetcher.log'))
 *   .build()
 * ```
 */
export class ResolverBuilder {
  private readonly overrides: Partial<ResolverConfig> = {}
  private lookupTransport?: LookupTransport
  private admissionGate?: AdmissionGate
  private diagnostics?: Logger

  /**
   * Set the lookup service URL.
   *
   * @param url - Absolute URL of the lookup endpoint
   * @returns This builder for chaining
   */
  endpoint(url: string): this {
    this.overrides.endpoint = requireNonEmptyString(url, 'endpoint')
    return this
  }

  /**
   * Replace the fixed request headers.
   *
   * @returns This builder for chaining
   */
  headers(headers: Readonly<Record<string, string>>): this {
    this.overrides.headers = { ...headers }
    return this
  }

  /**
   * Set how many suggestions are requested per query.
   *
   * @returns This builder for chaining
   */
  maxSuggestions(count: number): this {
    this.overrides.maxSuggestions = requirePositiveInteger(count, 'maxSuggestions')
    return this
  }

  /**
   * Set the sustained request rate in requests per second.
   *
   * @returns This builder for chaining
   */
  rateLimit(requestsPerSecond: number): this {
    this.overrides.rateLimit = requirePositive(requestsPerSecond, 'rateLimit')
    return this
  }

  /**
   * Set the cap on lookups in flight at once.
   *
   * @returns This builder for chaining
   */
  maxInFlight(count: number): this {
    this.overrides.maxInFlight = requirePositiveInteger(count, 'maxInFlight')
    return this
  }

  /**
   * Configure the retry policy. Omitted fields keep their defaults.
   *
   * @example
   * ```typescript
   * .retries({ maxRetries: 3, backoffUnitMs: 500 })
   * ```
   */
  retries(config: Partial<RetryConfig>): this {
    if (config.maxRetries !== undefined) {
      this.overrides.maxRetries = requirePositiveInteger(config.maxRetries, 'maxRetries')
    }
    if (config.sleepMultiplier !== undefined) {
      this.overrides.sleepMultiplier = requireNonNegative(
        config.sleepMultiplier,
        'sleepMultiplier'
      )
    }
    if (config.backoffUnitMs !== undefined) {
      this.overrides.backoffUnitMs = requireNonNegative(config.backoffUnitMs, 'backoffUnitMs')
    }
    return this
  }

  /**
   * Set the per-attempt timeout in milliseconds.
   *
   * @returns This builder for chaining
   */
  requestTimeout(ms: number): this {
    this.overrides.requestTimeoutMs = requirePositive(ms, 'requestTimeoutMs')
    return this
  }

  /**
   * Merge a partial configuration, e.g. one assembled from CLI flags.
   * Undefined fields are ignored.
   */
  config(config: Partial<ResolverConfig>): this {
    for (const [key, value] of Object.entries(config)) {
      if (value !== undefined) {
        Object.assign(this.overrides, { [key]: value })
      }
    }
    return this
  }

  /**
   * Use a custom lookup transport instead of the HTTP one.
   */
  transport(transport: LookupTransport): this {
    this.lookupTransport = transport
    return this
  }

  /**
   * Share an existing admission gate instead of creating a rate limiter.
   * The caller stays responsible for closing it.
   */
  rateLimiter(gate: AdmissionGate): this {
    this.admissionGate = gate
    return this
  }

  /**
   * Send diagnostics to the given logger.
   */
  logger(logger: Logger): this {
    this.diagnostics = logger
    return this
  }

  /**
   * Build the configured resolver.
   *
   * @throws ConfigurationError if the assembled configuration is invalid
   */
  build(): AddressResolver {
    return new AddressResolver({
      config: { ...this.overrides },
      transport: this.lookupTransport,
      rateLimiter: this.admissionGate,
      logger: this.diagnostics,
    })
  }
}

/**
 * Main entry point.
 *
 * @example
 * ```typescript
 * const resolver = HkAddress.create().rateLimit(20).build()
 * ```
 */
export const HkAddress = {
  /**
   * Create a new resolver builder.
   */
  create(): ResolverBuilder {
    return new ResolverBuilder()
  },
}
