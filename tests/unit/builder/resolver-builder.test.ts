import { describe, it, expect, vi } from 'vitest'
import { HkAddress, ResolverBuilder } from '../../../src/builder/resolver-builder.js'
import { AddressResolver } from '../../../src/core/resolver.js'
import { DEFAULT_RESOLVER_CONFIG } from '../../../src/core/config.js'
import { ConfigurationError, InvalidParameterError } from '../../../src/utils/errors.js'
import { makeResponse, queensRoadSuggestion } from '../../fixtures/suggestions.js'

const openGate = { acquire: async (): Promise<void> => {} }

describe('HkAddress.create', () => {
  it('should return a fresh builder', () => {
    expect(HkAddress.create()).toBeInstanceOf(ResolverBuilder)
    expect(HkAddress.create()).not.toBe(HkAddress.create())
  })

  it('should build a resolver with default configuration', () => {
    const resolver = HkAddress.create().build()
    try {
      expect(resolver).toBeInstanceOf(AddressResolver)
      expect(resolver.config).toEqual(DEFAULT_RESOLVER_CONFIG)
    } finally {
      resolver.close()
    }
  })
})

describe('ResolverBuilder', () => {
  it('should apply every setter', () => {
    const resolver = HkAddress.create()
      .endpoint('http://localhost:8080/lookup')
      .headers({ Accept: 'application/json' })
      .maxSuggestions(3)
      .rateLimit(5)
      .maxInFlight(4)
      .retries({ maxRetries: 2, backoffUnitMs: 250 })
      .requestTimeout(1500)
      .rateLimiter(openGate)
      .build()

    expect(resolver.config).toEqual({
      endpoint: 'http://localhost:8080/lookup',
      headers: { Accept: 'application/json' },
      maxSuggestions: 3,
      rateLimit: 5,
      maxInFlight: 4,
      maxRetries: 2,
      sleepMultiplier: DEFAULT_RESOLVER_CONFIG.sleepMultiplier,
      backoffUnitMs: 250,
      requestTimeoutMs: 1500,
    })
  })

  it('should merge a partial config and skip undefined fields', () => {
    const resolver = HkAddress.create()
      .rateLimit(7)
      .config({ rateLimit: undefined, maxRetries: 9 })
      .rateLimiter(openGate)
      .build()

    expect(resolver.config.rateLimit).toBe(7)
    expect(resolver.config.maxRetries).toBe(9)
  })

  it('should reject invalid setter arguments immediately', () => {
    const builder = HkAddress.create()

    expect(() => builder.rateLimit(0)).toThrow(InvalidParameterError)
    expect(() => builder.maxInFlight(2.5)).toThrow(InvalidParameterError)
    expect(() => builder.maxSuggestions(-1)).toThrow(InvalidParameterError)
    expect(() => builder.retries({ sleepMultiplier: -1 })).toThrow(InvalidParameterError)
    expect(() => builder.endpoint('')).toThrow(InvalidParameterError)
  })

  it('should validate the assembled configuration on build', () => {
    const builder = HkAddress.create().config({ maxInFlight: 0 }).rateLimiter(openGate)
    expect(() => builder.build()).toThrow(ConfigurationError)
  })

  it('should route lookups through the given transport and logger', async () => {
    const transport = vi.fn(async () => makeResponse(queensRoadSuggestion))
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }

    const resolver = HkAddress.create()
      .transport(transport)
      .rateLimiter(openGate)
      .logger(logger)
      .build()

    const result = await resolver.resolveAll(['香港中環皇后大道中99號'])

    expect(transport).toHaveBeenCalledTimes(1)
    expect(transport).toHaveBeenCalledWith('香港中環皇后大道中99號', expect.any(AbortSignal))
    expect(result.records).toHaveLength(1)
    expect(logger.info).toHaveBeenCalledWith('[resolver] Resolving batch', { total: 1 })
  })
})
