/**
 * Converts raw lookup suggestions into typed candidates
 * @module core/flattener
 */

import type {
  AddressFieldNode,
  AddressFieldTree,
  Candidate,
  ProviderScore,
  StreetContainerKey,
  StreetNameField,
} from '../types/candidate.js'
import { CandidateStructureError } from '../utils/errors.js'

/**
 * Fixed nested paths read from every suggestion
 */
export const SUGGESTION_PATHS = {
  chineseFields: ['Address', 'PremisesAddress', 'ChiPremisesAddress'],
  englishFields: ['Address', 'PremisesAddress', 'EngPremisesAddress'],
  geo: ['Address', 'PremisesAddress', 'GeospatialInformation'],
  providerScore: ['ValidationInformation', 'Score'],
} as const satisfies Record<string, readonly string[]>

const STREET_CONTAINERS: readonly StreetContainerKey[] = ['ChiStreet', 'ChiVillage']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStreetContainer(key: string): key is StreetContainerKey {
  return STREET_CONTAINERS.some((container) => container === key)
}

/**
 * Reads a required nested value.
 *
 * @throws CandidateStructureError if any segment of the path is missing
 */
function requirePath(entry: unknown, path: readonly string[], rank: number): unknown {
  let current: unknown = entry
  for (const segment of path) {
    if (!isRecord(current) || !(segment in current)) {
      throw new CandidateStructureError(path.join('.'), rank)
    }
    current = current[segment]
  }
  return current
}

function toProviderScore(value: unknown): ProviderScore {
  if (typeof value === 'number' || typeof value === 'string') {
    return value
  }
  return null
}

function buildStreetNode(
  key: StreetContainerKey,
  value: unknown,
  path: string,
  rank: number
): AddressFieldNode {
  if (!isRecord(value)) {
    throw new CandidateStructureError(path, rank, { reason: 'not an object' })
  }

  let nameField: StreetNameField | undefined
  if ('StreetName' in value) nameField = 'StreetName'
  if ('VillageName' in value) nameField = 'VillageName'
  if (nameField === undefined || typeof value[nameField] !== 'string') {
    throw new CandidateStructureError(`${path}.StreetName`, rank, {
      reason: 'street container has no string StreetName or VillageName',
    })
  }

  const fields: Record<string, string> = {}
  for (const [field, fieldValue] of Object.entries(value)) {
    if (typeof fieldValue === 'string') {
      fields[field] = fieldValue
    }
  }

  return { kind: 'street', name: key, nameField, fields }
}

/**
 * Builds the tagged field tree for one structured address.
 *
 * String values become text leaves, objects become groups, and
 * `ChiStreet`/`ChiVillage` become street nodes. Values of any other shape
 * are left out.
 *
 * @param value - A `ChiPremisesAddress` or `EngPremisesAddress` object
 * @param path - Dotted path of `value`, used in error messages
 * @param rank - Suggestion rank, used in error messages
 */
export function buildFieldTree(value: unknown, path: string, rank: number): AddressFieldTree {
  if (!isRecord(value)) {
    throw new CandidateStructureError(path, rank, { reason: 'not an object' })
  }

  const nodes: AddressFieldNode[] = []
  for (const [name, child] of Object.entries(value)) {
    const childPath = `${path}.${name}`
    if (isStreetContainer(name)) {
      nodes.push(buildStreetNode(name, child, childPath, rank))
    } else if (isRecord(child)) {
      nodes.push({ kind: 'group', name, children: buildFieldTree(child, childPath, rank) })
    } else if (typeof child === 'string') {
      nodes.push({ kind: 'text', name, value: child })
    }
  }
  return nodes
}

/**
 * Flattens the provider's suggestion list into candidates, keeping the
 * provider's order in `rank`.
 *
 * @param suggestions - The `SuggestedAddress` array of a lookup response
 * @throws CandidateStructureError if any suggestion lacks a required path
 *
 * @example
 * ```typescript
 * const candidates = flattenSuggestions(body.SuggestedAddress)
 * candidates[0].rank // 0
 * ```
 */
export function flattenSuggestions(suggestions: readonly unknown[]): Candidate[] {
  return suggestions.map((entry, rank) => ({
    rank,
    chineseFields: buildFieldTree(
      requirePath(entry, SUGGESTION_PATHS.chineseFields, rank),
      SUGGESTION_PATHS.chineseFields.join('.'),
      rank
    ),
    englishFields: buildFieldTree(
      requirePath(entry, SUGGESTION_PATHS.englishFields, rank),
      SUGGESTION_PATHS.englishFields.join('.'),
      rank
    ),
    geo: requirePath(entry, SUGGESTION_PATHS.geo, rank),
    providerScore: toProviderScore(
      requirePath(entry, SUGGESTION_PATHS.providerScore, rank)
    ),
  }))
}
