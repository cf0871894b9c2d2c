import type { Candidate } from './candidate.js'
import type { SimilarityResult } from '../core/similarity-result.js'

/**
 * Half-open character range `[start, end)` into the query, counted in
 * Unicode code points.
 */
export type MatchSpan = readonly [start: number, end: number]

/**
 * Result of testing one candidate field against the query string.
 */
export interface FieldMatch {
  /** Provider field name, e.g. `StreetName` or `BuildingNoFrom` */
  fieldName: string
  /** Value the provider returned for the field */
  fieldValue: string
  /** Where the value was found in the query, or null when it was not */
  matchSpan: MatchSpan | null
  /** Match quality in [-1, 1], or null when no match was attempted */
  goodness: number | null
}

/**
 * A candidate together with its similarity against the query.
 */
export interface ScoredCandidate extends Candidate {
  match: SimilarityResult
}
