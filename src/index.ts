// Main entry point
export { HkAddress, ResolverBuilder } from './builder/resolver-builder.js'

// Core classes
export {
  AddressResolver,
  type AddressResolverOptions,
  type AddressResolution,
  type BatchResult,
  type BatchStats,
} from './core/resolver.js'
export { SimilarityResult } from './core/similarity-result.js'

// Configuration
export {
  DEFAULT_RESOLVER_CONFIG,
  validateResolverConfig,
  resolveConfig,
} from './core/config.js'

// Algorithms
export { stripFloorSuffix, FLOOR_SUFFIX_PATTERN } from './core/normalizer.js'
export { matchStr, matchChiStreetOrVillage, matchDict } from './core/matching.js'
export {
  getSimilarity,
  rankCandidates,
  selectBestCandidate,
  fieldWeight,
  FIELD_WEIGHTS,
  UNMATCHED_FIELD_PENALTY,
} from './core/similarity.js'
export { flattenSuggestions, buildFieldTree, SUGGESTION_PATHS } from './core/flattener.js'
export {
  extractFields,
  lookupField,
  coerceScore,
  OUTPUT_FIELD_SOURCES,
  type OutputFieldSource,
} from './core/field-extractor.js'

// Types
export type {
  StreetContainerKey,
  StreetNameField,
  TextFieldNode,
  GroupFieldNode,
  StreetFieldNode,
  AddressFieldNode,
  AddressFieldTree,
  ProviderScore,
  Candidate,
  MatchSpan,
  FieldMatch,
  ScoredCandidate,
  OutputRecord,
  OutputTextField,
  ResolutionStage,
  DroppedAddress,
  ResolverConfig,
  BatchRange,
} from './types/index.js'

// CSV
export {
  parseAddressCsv,
  readAddresses,
  formatRecordsCsv,
  writeRecords,
  resolveOutputPath,
  OUTPUT_COLUMNS,
  DEFAULT_ADDRESS_COLUMN,
  DEFAULT_OUTPUT_FILE,
} from './io/csv.js'

// Errors
export {
  AddressResolverError,
  InvalidParameterError,
  ConfigurationError,
  CandidateStructureError,
  EmptyCandidatesError,
  RateLimiterClosedError,
} from './utils/errors.js'

// Services
export * from './services/index.js'
