/**
 * Per-address resolution pipeline and batch join
 * @module core/resolver
 */

import type { ResolverConfig, BatchRange } from '../types/config.js'
import type { ScoredCandidate } from '../types/match.js'
import type { DroppedAddress, OutputRecord, ResolutionStage } from '../types/output.js'
import type { Logger, LookupContext, LookupOutcome, LookupTransport } from '../services/types.js'
import { FetchOrchestrator, type AdmissionGate } from '../services/fetch-orchestrator.js'
import { RateLimiter } from '../services/resilience/rate-limiter.js'
import { createAlsTransport, ALS_SERVICE_NAME } from '../services/lookup/als-transport.js'
import {
  createLookupContext,
  createPrefixedLogger,
  createSilentLogger,
} from '../services/execution-context.js'
import { InvalidParameterError } from '../utils/errors.js'
import { stripFloorSuffix } from './normalizer.js'
import { flattenSuggestions } from './flattener.js'
import { selectBestCandidate } from './similarity.js'
import { extractFields } from './field-extractor.js'
import { resolveConfig } from './config.js'

/**
 * Options for constructing an AddressResolver
 */
export interface AddressResolverOptions {
  /** Configuration overrides, merged over DEFAULT_RESOLVER_CONFIG */
  config?: Partial<ResolverConfig>

  /** Lookup transport (default: HTTP transport built from `config`) */
  transport?: LookupTransport

  /**
   * Admission gate shared by all lookups. When omitted the resolver creates
   * and owns a RateLimiter at `config.rateLimit`, closed by `close()`.
   */
  rateLimiter?: AdmissionGate

  /** Diagnostics sink (default: silent) */
  logger?: Logger
}

/**
 * Outcome of resolving one address
 */
export type AddressResolution =
  | {
      ok: true
      index: number
      record: OutputRecord
      best: ScoredCandidate
      attempts: number
    }
  | {
      ok: false
      dropped: DroppedAddress
    }

/**
 * Counters for one batch run
 */
export interface BatchStats {
  /** Entries considered after slicing */
  total: number
  resolved: number
  dropped: number
  durationMs: number
}

/**
 * Result of a batch run. `records` follows input order.
 */
export interface BatchResult {
  records: OutputRecord[]
  dropped: DroppedAddress[]
  stats: BatchStats
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function fetchFailureReason(outcome: LookupOutcome): string {
  switch (outcome.status) {
    case 'empty':
      return 'no suggestions returned'
    case 'exhausted':
      return `retries exhausted after ${outcome.attempts} attempt(s)`
    case 'aborted':
      return 'lookup aborted'
    case 'resolved':
      return 'resolved'
  }
}

/**
 * Resolves free-text addresses to structured records.
 *
 * Each address is normalized, looked up (rate limited, concurrency capped,
 * retried), flattened into candidates, scored, and projected onto an
 * `OutputRecord`. A failure at any stage drops that address only; it is
 * logged and reported in `BatchResult.dropped`.
 *
 * @example
 * ```typescript
 * const resolver = new AddressResolver({ config: { rateLimit: 10 }, logger: defaultLogger })
 * try {
 *   const { records, dropped } = await resolver.resolveAll(addresses)
 * } finally {
 *   resolver.close()
 * }
 * ```
 */
export class AddressResolver {
  readonly config: ResolverConfig
  private readonly orchestrator: FetchOrchestrator
  private readonly ownedLimiter: RateLimiter | undefined
  private readonly logger: Logger

  constructor(options: AddressResolverOptions = {}) {
    this.config = resolveConfig(options.config)
    this.logger = createPrefixedLogger('resolver', options.logger ?? createSilentLogger())

    const transport =
      options.transport ??
      createAlsTransport({
        endpoint: this.config.endpoint,
        headers: this.config.headers,
        maxSuggestions: this.config.maxSuggestions,
      })

    let rateLimiter: AdmissionGate
    if (options.rateLimiter) {
      rateLimiter = options.rateLimiter
      this.ownedLimiter = undefined
    } else {
      this.ownedLimiter = new RateLimiter(this.config.rateLimit)
      rateLimiter = this.ownedLimiter
    }

    this.orchestrator = new FetchOrchestrator({
      transport,
      rateLimiter,
      maxInFlight: this.config.maxInFlight,
      retry: {
        maxRetries: this.config.maxRetries,
        sleepMultiplier: this.config.sleepMultiplier,
        backoffUnitMs: this.config.backoffUnitMs,
      },
      requestTimeoutMs: this.config.requestTimeoutMs,
      serviceName: ALS_SERVICE_NAME,
      logger: options.logger,
    })
  }

  /**
   * Resolves a single address.
   *
   * @param address - Free-text address
   * @param index - Position reported in diagnostics (default: 0)
   */
  resolveOne(address: string, index = 0): Promise<AddressResolution> {
    return this.resolveEntry(address, index)
  }

  /**
   * Resolves a batch of addresses concurrently.
   *
   * When both `startIndex` and `stopIndex` are given, only the half-open
   * slice `[startIndex, stopIndex)` is resolved. Entries that are not
   * strings, or are blank, are dropped at the `normalize` stage.
   *
   * @throws InvalidParameterError if a slice bound is not a non-negative integer
   */
  async resolveAll(addresses: readonly unknown[], range: BatchRange = {}): Promise<BatchResult> {
    const startTime = Date.now()
    const entries = this.applyRange(addresses, range)

    this.logger.info('Resolving batch', { total: entries.length, ...range })

    const resolutions = await Promise.all(
      entries.map((entry, index) => this.resolveEntry(entry, index))
    )

    const records: OutputRecord[] = []
    const dropped: DroppedAddress[] = []
    for (const resolution of resolutions) {
      if (resolution.ok) {
        records.push(resolution.record)
      } else {
        dropped.push(resolution.dropped)
      }
    }

    const stats: BatchStats = {
      total: entries.length,
      resolved: records.length,
      dropped: dropped.length,
      durationMs: Date.now() - startTime,
    }
    this.logger.info('Batch complete', { ...stats })

    return { records, dropped, stats }
  }

  /**
   * Stops the owned rate limiter. Lookups still waiting for a token end as
   * dropped. Safe to call more than once.
   */
  close(): void {
    this.ownedLimiter?.close()
  }

  private applyRange(addresses: readonly unknown[], range: BatchRange): readonly unknown[] {
    const { startIndex, stopIndex } = range
    if (startIndex === undefined || stopIndex === undefined) {
      return addresses
    }
    for (const [name, value] of [
      ['startIndex', startIndex],
      ['stopIndex', stopIndex],
    ] as const) {
      if (!Number.isInteger(value) || value < 0) {
        throw new InvalidParameterError(name, value, 'must be a non-negative integer')
      }
    }
    return addresses.slice(startIndex, stopIndex)
  }

  private drop(
    context: LookupContext,
    stage: ResolutionStage,
    reason: string
  ): AddressResolution {
    return {
      ok: false,
      dropped: { index: context.index, address: context.address, stage, reason },
    }
  }

  private async resolveEntry(entry: unknown, index: number): Promise<AddressResolution> {
    if (typeof entry !== 'string' || entry.trim() === '') {
      const context = createLookupContext({ address: String(entry), index })
      this.logger.warn('Skipping entry that is not an address', {
        stage: 'normalize',
        ...context,
      })
      return this.drop(context, 'normalize', 'not a non-empty string')
    }

    const context = createLookupContext({ address: entry, index })
    const query = stripFloorSuffix(entry)
    this.logger.debug('Normalized address', { stage: 'normalize', ...context, query })

    const outcome = await this.orchestrator.fetch(query, context)
    if (outcome.status !== 'resolved' || outcome.suggestions === null) {
      return this.drop(context, 'fetch', fetchFailureReason(outcome))
    }

    let stage: ResolutionStage = 'flatten'
    try {
      const candidates = flattenSuggestions(outcome.suggestions)
      stage = 'score'
      const best = selectBestCandidate(candidates, entry)
      stage = 'extract'
      const record = extractFields(best, entry)

      this.logger.debug('Address resolved', {
        stage,
        ...context,
        similarity: best.match.score,
        rank: best.rank,
      })
      return { ok: true, index, record, best, attempts: outcome.attempts }
    } catch (error) {
      const reason = describeError(error)
      this.logger.error('Address dropped', { stage, ...context, error })
      return this.drop(context, stage, reason)
    }
  }
}
