/**
 * HTTP transport for the Address Lookup Service
 * @module services/lookup/als-transport
 */

import type { LookupTransport } from '../types.js'
import {
  ServiceMalformedResponseError,
  ServiceServerError,
  toServiceError,
} from '../service-error.js'

/**
 * Service name used in errors and logs
 */
export const ALS_SERVICE_NAME = 'als-lookup'

/**
 * Default lookup endpoint
 */
export const DEFAULT_ALS_ENDPOINT = 'https://www.als.gov.hk/lookup'

/**
 * Headers the lookup service expects
 */
export const DEFAULT_ALS_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json',
  'Accept-Language': 'en,zh-Hant',
  'Accept-Encoding': 'gzip',
}

/**
 * Configuration for the HTTP transport
 */
export interface AlsTransportConfig {
  /** Lookup endpoint (default: DEFAULT_ALS_ENDPOINT) */
  endpoint?: string

  /** Request headers (default: DEFAULT_ALS_HEADERS) */
  headers?: Readonly<Record<string, string>>

  /** Suggestions requested per query (default: 1) */
  maxSuggestions?: number

  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch
}

/**
 * Builds the request URL for one query
 */
export function buildLookupUrl(
  endpoint: string,
  query: string,
  maxSuggestions: number
): URL {
  const url = new URL(endpoint)
  url.searchParams.set('q', query)
  url.searchParams.set('n', String(maxSuggestions))
  return url
}

/**
 * Creates a transport that issues `GET <endpoint>?q=<query>&n=<maxSuggestions>`
 * and resolves with the parsed JSON body.
 *
 * Failures are mapped onto the service error taxonomy: connection problems
 * become `ServiceNetworkError`, non-2xx statuses `ServiceServerError`, and a
 * body that cannot be parsed `ServiceMalformedResponseError`.
 *
 * @example
 * ```typescript
 * const transport = createAlsTransport({ maxSuggestions: 3 })
 * const body = await transport('彌敦道594號', AbortSignal.timeout(30000))
 * ```
 */
export function createAlsTransport(config: AlsTransportConfig = {}): LookupTransport {
  const endpoint = config.endpoint ?? DEFAULT_ALS_ENDPOINT
  const headers = { ...(config.headers ?? DEFAULT_ALS_HEADERS) }
  const maxSuggestions = config.maxSuggestions ?? 1
  const fetchImpl = config.fetch ?? fetch

  return async (query: string, signal: AbortSignal): Promise<unknown> => {
    const url = buildLookupUrl(endpoint, query, maxSuggestions)

    let response: Response
    try {
      response = await fetchImpl(url, { headers, signal })
    } catch (error) {
      if (signal.aborted) {
        throw error
      }
      throw toServiceError(error, ALS_SERVICE_NAME)
    }

    if (!response.ok) {
      throw new ServiceServerError(
        ALS_SERVICE_NAME,
        response.statusText || 'Request failed',
        response.status,
        { query }
      )
    }

    const text = await response.text()
    try {
      const body: unknown = JSON.parse(text)
      return body
    } catch {
      throw new ServiceMalformedResponseError(
        ALS_SERVICE_NAME,
        'body is not valid JSON',
        { query, bodyLength: text.length }
      )
    }
  }
}
