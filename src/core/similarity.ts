/**
 * Candidate scoring and best-candidate selection
 * @module core/similarity
 */

import type { AddressFieldTree, Candidate } from '../types/candidate.js'
import type { ScoredCandidate } from '../types/match.js'
import { EmptyCandidatesError } from '../utils/errors.js'
import { matchDict } from './matching.js'
import { SimilarityResult } from './similarity-result.js'

/**
 * Points awarded for a full match of each field. Fields not listed score 0
 * when matched but are still penalized when unmatched.
 */
export const FIELD_WEIGHTS: Readonly<Record<string, number>> = Object.freeze({
  Region: 10,
  StreetName: 20,
  VillageName: 20,
  EstateName: 20,
  BuildingNoFrom: 30,
  BuildingNoTo: 30,
  BuildingName: 40,
})

/**
 * Penalty applied for every field that could not be located in the query
 */
export const UNMATCHED_FIELD_PENALTY = 1

/**
 * Weight of a field name, 0 when it carries no weight.
 */
export function fieldWeight(fieldName: string): number {
  return Object.prototype.hasOwnProperty.call(FIELD_WEIGHTS, fieldName)
    ? FIELD_WEIGHTS[fieldName] ?? 0
    : 0
}

/**
 * Scores a candidate's Chinese structured address against a query.
 *
 * Each located field adds `weight × goodness`; each field that was not
 * located subtracts one. Characters covered by any located field are marked
 * in the coverage mask.
 *
 * @param address - The original (un-normalized) query
 * @param chineseFields - The candidate's Chinese-script field tree
 *
 * @example
 * ```typescript
 * const result = getSimilarity('香港中環皇后大道中99號', candidate.chineseFields)
 * console.log(result.describe())
 * ```
 */
export function getSimilarity(address: string, chineseFields: AddressFieldTree): SimilarityResult {
  const matches = matchDict(address, chineseFields)
  const coverage: boolean[] = Array.from(address, () => false)
  let score = 0

  for (const match of matches) {
    if (match.matchSpan === null) {
      score -= UNMATCHED_FIELD_PENALTY
      continue
    }

    score += fieldWeight(match.fieldName) * (match.goodness ?? 0)
    const [start, end] = match.matchSpan
    for (let i = start; i < end; i++) {
      coverage[i] = true
    }
  }

  return new SimilarityResult(address, score, coverage, matches)
}

/**
 * Scores every candidate and orders them by score, highest first. Equal
 * scores keep the provider's order.
 */
export function rankCandidates(
  candidates: readonly Candidate[],
  address: string
): ScoredCandidate[] {
  const scored: ScoredCandidate[] = candidates.map((candidate) => ({
    ...candidate,
    match: getSimilarity(address, candidate.chineseFields),
  }))
  // Array.prototype.sort is stable
  return scored.sort((a, b) => b.match.score - a.match.score)
}

/**
 * Picks the candidate that best matches the query.
 *
 * @throws EmptyCandidatesError if `candidates` is empty
 */
export function selectBestCandidate(
  candidates: readonly Candidate[],
  address: string
): ScoredCandidate {
  const [best] = rankCandidates(candidates, address)
  if (best === undefined) {
    throw new EmptyCandidatesError(address)
  }
  return best
}
