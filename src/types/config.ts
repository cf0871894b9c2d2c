/**
 * Settings for a batch resolution run.
 * Every field has a default in `DEFAULT_RESOLVER_CONFIG`.
 */
export interface ResolverConfig {
  /** Lookup service URL */
  endpoint: string
  /** Fixed headers sent with every lookup */
  headers: Readonly<Record<string, string>>
  /** Number of suggestions requested per query (`n` parameter) */
  maxSuggestions: number
  /** Sustained request rate, in requests per second */
  rateLimit: number
  /** Maximum lookups in flight at once */
  maxInFlight: number
  /** Attempts per address before giving up */
  maxRetries: number
  /** Backoff grows by this many units per earlier failure */
  sleepMultiplier: number
  /** Length of one backoff unit in milliseconds */
  backoffUnitMs: number
  /** Per-attempt timeout in milliseconds */
  requestTimeoutMs: number
}

/**
 * Optional start/stop slice applied to a batch before resolution.
 * Slicing only happens when both bounds are given.
 */
export interface BatchRange {
  startIndex?: number
  stopIndex?: number
}
