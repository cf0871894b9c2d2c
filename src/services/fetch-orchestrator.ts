/**
 * Bounded-concurrency, rate-limited, retrying lookup dispatcher
 * @module services/fetch-orchestrator
 */

import pLimit, { type LimitFunction } from 'p-limit'
import type {
  Logger,
  LookupContext,
  LookupOutcome,
  LookupTransport,
  RawResponse,
  RetryConfig,
} from './types.js'
import { ServiceMalformedResponseError, RetryExhaustedError } from './service-error.js'
import { withRetryDetailed, DEFAULT_RETRY_CONFIG } from './resilience/retry.js'
import { executeWithAbortableTimeout } from './resilience/timeout.js'
import { createPrefixedLogger, createSilentLogger } from './execution-context.js'
import { RateLimiterClosedError } from '../utils/errors.js'

/**
 * Anything that hands out one admission per call, e.g. a `RateLimiter`
 */
export interface AdmissionGate {
  acquire(): Promise<void>
}

/**
 * Options for the fetch orchestrator
 */
export interface FetchOrchestratorOptions {
  /** Issues the actual lookup */
  transport: LookupTransport

  /** Sustained-rate control shared by every lookup */
  rateLimiter: AdmissionGate

  /** Maximum attempts in flight at once (default: 20) */
  maxInFlight?: number

  /** Retry policy (default: DEFAULT_RETRY_CONFIG) */
  retry?: Partial<RetryConfig>

  /** Per-attempt timeout in milliseconds (default: 30000) */
  requestTimeoutMs?: number

  /** Service name used in errors and logs (default: 'lookup') */
  serviceName?: string

  /** Diagnostics sink (default: silent) */
  logger?: Logger
}

/**
 * Default cap on concurrent attempts
 */
export const DEFAULT_MAX_IN_FLIGHT = 20

/**
 * Default per-attempt timeout in milliseconds
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Extracts the suggestion list from a well-formed body.
 * Returns null when the service answered but suggested nothing.
 */
export function extractSuggestions(body: Record<string, unknown>): RawResponse | null {
  const suggestions = body['SuggestedAddress']
  if (!Array.isArray(suggestions) || suggestions.length === 0) {
    return null
  }
  return suggestions
}

/**
 * Resolves queries to raw suggestion lists.
 *
 * Every attempt first takes a concurrency slot, then a rate-limiter token,
 * and releases the slot as soon as the attempt settles, so neither is held
 * across a backoff sleep. Any failure is retried until `maxRetries` attempts
 * have been made; a reachable service with no suggestions is not retried.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter(20)
 * const orchestrator = new FetchOrchestrator({
 *   transport: createAlsTransport(),
 *   rateLimiter: limiter,
 *   logger: defaultLogger,
 * })
 * const outcome = await orchestrator.fetch('彌敦道594號')
 * if (outcome.status === 'resolved') {
 *   console.log(outcome.suggestions)
 * }
 * limiter.close()
 * ```
 */
export class FetchOrchestrator {
  private readonly transport: LookupTransport
  private readonly rateLimiter: AdmissionGate
  private readonly limit: LimitFunction
  private readonly retry: RetryConfig
  private readonly requestTimeoutMs: number
  private readonly serviceName: string
  private readonly logger: Logger

  constructor(options: FetchOrchestratorOptions) {
    this.transport = options.transport
    this.rateLimiter = options.rateLimiter
    this.limit = pLimit(options.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT)
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...options.retry }
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.serviceName = options.serviceName ?? 'lookup'
    this.logger = createPrefixedLogger(
      'fetch',
      options.logger ?? createSilentLogger()
    )
  }

  /** Attempts currently holding a concurrency slot */
  get activeCount(): number {
    return this.limit.activeCount
  }

  /** Attempts waiting for a concurrency slot */
  get pendingCount(): number {
    return this.limit.pendingCount
  }

  /**
   * Resolves one query. Never rejects: every failure is logged and reported
   * through the outcome's status.
   *
   * @param query - The normalized query sent to the service
   * @param context - Diagnostic context for the address being resolved
   */
  async fetch(query: string, context?: LookupContext): Promise<LookupOutcome> {
    const logContext = { stage: 'fetch', query, ...context }
    let attemptsMade = 0

    try {
      const { result, attempts } = await withRetryDetailed(
        (attempt) => {
          attemptsMade = attempt
          return this.limit(() => this.attempt(query))
        },
        {
          ...this.retry,
          shouldRetry: (error) => !(error instanceof RateLimiterClosedError),
          onAttemptFailed: (error, attempt, delayMs) => {
            this.logger.warn('Lookup attempt failed', {
              ...logContext,
              attempt,
              maxRetries: this.retry.maxRetries,
              delayMs,
              errorName: error.name,
              error: error.message,
            })
          },
        }
      )

      if (result === null) {
        this.logger.info('Lookup returned no suggestions', {
          ...logContext,
          attempts,
        })
        return { status: 'empty', suggestions: null, attempts }
      }

      return { status: 'resolved', suggestions: result, attempts }
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        this.logger.error('Lookup retries exhausted', {
          ...logContext,
          attempts: error.attempts,
          maxRetries: this.retry.maxRetries,
          error: error.lastError.message,
        })
        return { status: 'exhausted', suggestions: null, attempts: error.attempts }
      }

      const message = error instanceof Error ? error.message : String(error)
      this.logger.error('Lookup aborted', {
        ...logContext,
        attempts: attemptsMade,
        error: message,
      })
      return { status: 'aborted', suggestions: null, attempts: attemptsMade }
    }
  }

  /**
   * Resolves every query concurrently. The outcome at position i belongs to
   * the query at position i.
   */
  fetchAll(
    queries: readonly string[],
    contexts?: readonly LookupContext[]
  ): Promise<LookupOutcome[]> {
    return Promise.all(queries.map((q, i) => this.fetch(q, contexts?.[i])))
  }

  private async attempt(query: string): Promise<RawResponse | null> {
    await this.rateLimiter.acquire()

    const body = await executeWithAbortableTimeout(
      (signal) => this.transport(query, signal),
      this.requestTimeoutMs,
      this.serviceName
    )

    if (!isJsonObject(body)) {
      throw new ServiceMalformedResponseError(
        this.serviceName,
        'body is not a JSON object',
        { query }
      )
    }

    return extractSuggestions(body)
  }
}
