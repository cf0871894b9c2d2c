/**
 * Field matching primitives used by the similarity scorer
 * @module core/matching
 */

import type {
  AddressFieldNode,
  AddressFieldTree,
  StreetFieldNode,
} from '../types/candidate.js'
import type { FieldMatch, MatchSpan } from '../types/match.js'

/**
 * Building number or range directly after a street name, e.g. `99號`,
 * `591-593號`, `12A至12C號`.
 */
const BUILDING_NUMBER_PATTERN = /^([0-9A-Za-z]+)[至及-]*([0-9A-Za-z]*)號/

/**
 * Suffix stripping stops once this many characters or fewer remain.
 */
const MIN_SUFFIX_LENGTH = 3

function codePointLength(text: string): number {
  return Array.from(text).length
}

/**
 * Code-point index of `needle` in `haystack`, or -1.
 */
function codePointIndexOf(haystack: string, needle: string): number {
  const unitIndex = haystack.indexOf(needle)
  if (unitIndex < 0) return -1
  return codePointLength(haystack.slice(0, unitIndex))
}

/**
 * Finds `value` inside `address`, tolerating a leading qualifier in `value`
 * that the free-text address omits.
 *
 * The full value is tried first, then progressively shorter suffixes. The
 * search gives up once the remaining suffix is three characters or shorter,
 * or once half of the value has been stripped. Goodness is
 * `(used / total - 0.5) * 2`: 1 for a full match, 0 for a half match.
 *
 * Positions are counted in Unicode code points.
 *
 * @param address - The free-text query
 * @param fieldName - Provider field name recorded on the match
 * @param value - Provider field value to look for
 *
 * @example
 * ```typescript
 * matchStr('屯門兆康站', 'BuildingName', '港鐵兆康站')
 * // { fieldName: 'BuildingName', fieldValue: '港鐵兆康站',
 * //   matchSpan: [2, 5], goodness: 0.2 }
 * ```
 */
export function matchStr(address: string, fieldName: string, value: string): FieldMatch {
  const chars = Array.from(value)
  const total = chars.length

  for (let i = 0; i < total; i++) {
    const suffix = chars.slice(i).join('')
    const start = codePointIndexOf(address, suffix)
    if (start >= 0) {
      const used = total - i
      return {
        fieldName,
        fieldValue: value,
        matchSpan: [start, start + used],
        goodness: (used / total - 0.5) * 2,
      }
    }

    if (total - i <= MIN_SUFFIX_LENGTH) break
    if (i >= Math.floor(total / 2)) break
  }

  return { fieldName, fieldValue: value, matchSpan: null, goodness: null }
}

interface ParsedBuildingNumber {
  span: MatchSpan | null
  from: string
  to: string
}

function parseBuildingNumberAfter(address: string, streetSpan: MatchSpan | null): ParsedBuildingNumber {
  if (streetSpan === null) {
    return { span: null, from: '', to: '' }
  }

  const end = streetSpan[1]
  const rest = Array.from(address).slice(end).join('')
  const found = BUILDING_NUMBER_PATTERN.exec(rest)
  if (!found) {
    return { span: null, from: '', to: '' }
  }

  return {
    span: [end, end + codePointLength(found[0])],
    from: found[1] ?? '',
    to: found[2] ?? '',
  }
}

/**
 * Matches a street or village container together with its building-number range.
 *
 * Only the last whitespace-separated segment of the name is looked for (the
 * provider writes e.g. `屯門 青麟路` where queries usually carry `青麟路`).
 * When the candidate has a `BuildingNoFrom`, the text right after the matched
 * street is parsed as a building number. Ranges are compared as strings; when
 * they do not overlap the building-number match gets no span.
 *
 * @returns The street match, followed by a `BuildingNoFrom` and a
 *   `BuildingNoTo` match for whichever of those the candidate carries
 */
export function matchChiStreetOrVillage(address: string, street: StreetFieldNode): FieldMatch[] {
  const { fields, nameField } = street
  const segments = (fields[nameField] ?? '').split(/\s+/).filter((s) => s.length > 0)
  const streetMatch = matchStr(address, nameField, segments[segments.length - 1] ?? '')
  const matches: FieldMatch[] = [streetMatch]

  const candidateFrom = fields['BuildingNoFrom'] ?? ''
  if (candidateFrom === '') {
    return matches
  }

  const parsed = parseBuildingNumberAfter(address, streetMatch.matchSpan)
  const candidateTo = fields['BuildingNoTo'] || candidateFrom
  const addressFrom = parsed.from
  const addressTo = parsed.to || addressFrom

  const overlaps = !(candidateTo < addressFrom || candidateFrom > addressTo)
  const span = overlaps ? parsed.span : null

  matches.push({
    fieldName: 'BuildingNoFrom',
    fieldValue: candidateFrom,
    matchSpan: span,
    goodness: addressFrom === candidateFrom ? 1 : 0.5,
  })

  if ('BuildingNoTo' in fields) {
    matches.push({
      fieldName: 'BuildingNoTo',
      fieldValue: candidateTo,
      matchSpan: span,
      goodness: addressTo === candidateTo ? 1 : 0.5,
    })
  }

  return matches
}

function matchNode(address: string, node: AddressFieldNode): FieldMatch[] {
  switch (node.kind) {
    case 'street':
      return matchChiStreetOrVillage(address, node)
    case 'group':
      return matchDict(address, node.children)
    case 'text':
      return [matchStr(address, node.name, node.value)]
  }
}

/**
 * Matches every field of a structured address against the query, in field
 * order. Street and village containers go through
 * {@link matchChiStreetOrVillage}; nested groups are walked recursively.
 */
export function matchDict(address: string, tree: AddressFieldTree): FieldMatch[] {
  return tree.flatMap((node) => matchNode(address, node))
}
