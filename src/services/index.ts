/**
 * Lookup services - transport, admission control, retry and diagnostics
 * @module services
 */

// Types
export type {
  ServiceErrorType,
  Logger,
  RetryConfig,
  LookupTransport,
  RawResponse,
  LookupStatus,
  LookupOutcome,
  LookupContext,
} from './types.js'

// Error classes
export {
  ServiceError,
  ServiceTimeoutError,
  ServiceNetworkError,
  ServiceServerError,
  ServiceMalformedResponseError,
  RetryExhaustedError,
  toServiceError,
} from './service-error.js'

// Execution context and logging
export {
  generateCorrelationId,
  createLookupContext,
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  createTeeLogger,
} from './execution-context.js'

export {
  createFileLogger,
  type LogLevel,
  type LogEntry,
  type FileLoggerOptions,
} from './file-logger.js'

// Resilience patterns
export {
  RateLimiter,
  MIN_SLEEP_MS,
  bucketCapacity,
  refillIntervalMs,
  calculateRefill,
  withRetryDetailed,
  calculateRetryDelay,
  sleep,
  DEFAULT_RETRY_CONFIG,
  executeWithAbortableTimeout,
  type RateLimiterOptions,
  type RefillResult,
  type ExtendedRetryConfig,
  type RetryResult,
} from './resilience/index.js'

// Lookup transport
export {
  createAlsTransport,
  buildLookupUrl,
  ALS_SERVICE_NAME,
  DEFAULT_ALS_ENDPOINT,
  DEFAULT_ALS_HEADERS,
  type AlsTransportConfig,
} from './lookup/als-transport.js'

// Orchestration
export {
  FetchOrchestrator,
  extractSuggestions,
  DEFAULT_MAX_IN_FLIGHT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type AdmissionGate,
  type FetchOrchestratorOptions,
} from './fetch-orchestrator.js'
