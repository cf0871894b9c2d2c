/**
 * Tests for logging helpers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createFileLogger } from './file-logger.js'
import {
  createLookupContext,
  createPrefixedLogger,
  createSilentLogger,
  createTeeLogger,
  generateCorrelationId,
} from './execution-context.js'

function readEntries(filePath: string): unknown[] {
  return readFileSync(filePath, 'utf8')
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line))
}

describe('createFileLogger', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hk-address-log-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('writes one JSON entry per line at or above INFO', () => {
    const filePath = join(dir, 'addresses_fetcher.log')
    const logger = createFileLogger(filePath)

    logger.debug('hidden')
    logger.info('Resolving batch', { total: 3 })
    logger.error('Address dropped', { stage: 'flatten', address: '青麟路3號' })

    const entries = readEntries(filePath)
    expect(entries).toHaveLength(2)
    expect(entries[0]).toMatchObject({
      level: 'INFO',
      message: 'Resolving batch',
      context: { total: 3 },
    })
    expect(entries[1]).toMatchObject({
      level: 'ERROR',
      message: 'Address dropped',
      context: { stage: 'flatten', address: '青麟路3號' },
    })
  })

  it('truncates an existing file unless append is set', () => {
    const filePath = join(dir, 'run.log')
    writeFileSync(filePath, '{"old":true}\n', 'utf8')

    createFileLogger(filePath).warn('fresh')
    expect(readEntries(filePath)).toHaveLength(1)

    createFileLogger(filePath, { append: true }).warn('more')
    expect(readEntries(filePath)).toHaveLength(2)
  })

  it('serializes errors by name and message', () => {
    const filePath = join(dir, 'run.log')
    const logger = createFileLogger(filePath, { minLevel: 'DEBUG' })

    logger.debug('failed', { error: new TypeError('fetch failed') })

    expect(readEntries(filePath)[0]).toMatchObject({
      context: { error: { name: 'TypeError', message: 'fetch failed' } },
    })
  })

  it('creates missing parent directories', () => {
    const filePath = join(dir, 'nested', 'logs', 'run.log')
    createFileLogger(filePath).info('ok')
    expect(readEntries(filePath)).toHaveLength(1)
  })
})

describe('logger helpers', () => {
  it('prefixes messages with the component name', () => {
    const base = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const logger = createPrefixedLogger('fetch', base)

    logger.warn('Lookup attempt failed', { attempt: 1 })

    expect(base.warn).toHaveBeenCalledWith('[fetch] Lookup attempt failed', { attempt: 1 })
  })

  it('forwards entries to every tee target', () => {
    const first = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const second = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }

    createTeeLogger(first, second).error('boom')

    expect(first.error).toHaveBeenCalledWith('boom', undefined)
    expect(second.error).toHaveBeenCalledWith('boom', undefined)
  })

  it('silent logger accepts every level', () => {
    const logger = createSilentLogger()
    expect(() => logger.error('ignored', { a: 1 })).not.toThrow()
  })

  it('builds lookup contexts with unique correlation IDs', () => {
    const a = createLookupContext({ address: '彌敦道594號', index: 0 })
    const b = createLookupContext({ address: '彌敦道594號', index: 1 })

    expect(a.correlationId).toMatch(/^addr-/)
    expect(a.correlationId).not.toBe(b.correlationId)
    expect(createLookupContext({ address: 'x', index: 2, correlationId: 'fixed' })).toEqual({
      correlationId: 'fixed',
      address: 'x',
      index: 2,
    })
    expect(generateCorrelationId()).toMatch(/^addr-[0-9a-z]+-[0-9a-z]+$/)
  })
})
