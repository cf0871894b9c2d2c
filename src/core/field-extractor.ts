/**
 * Projection of a resolved candidate onto the flat output record
 * @module core/field-extractor
 */

import type { AddressFieldTree, Candidate, ProviderScore } from '../types/candidate.js'
import type { OutputRecord, OutputTextField } from '../types/output.js'

/**
 * Where one text column of the output record comes from
 */
export interface OutputFieldSource {
  field: OutputTextField
  /** Column header in CSV output */
  header: string
  source: 'chinese' | 'english'
  path: readonly string[]
}

/**
 * Every text column, in output order. A column whose path is absent on the
 * candidate is written as an empty string.
 */
export const OUTPUT_FIELD_SOURCES: readonly OutputFieldSource[] = [
  { field: 'chiRegion', header: 'CHI_Region', source: 'chinese', path: ['Region'] },
  { field: 'chiDistrict', header: 'CHI_District', source: 'chinese', path: ['ChiDistrict', 'DcDistrict'] },
  { field: 'chiEstate', header: 'CHI_Estate', source: 'chinese', path: ['ChiEstate', 'EstateName'] },
  { field: 'chiBuildingName', header: 'CHI_BuildingName', source: 'chinese', path: ['BuildingName'] },
  { field: 'chiStreetName', header: 'CHI_StreetName', source: 'chinese', path: ['ChiStreet', 'StreetName'] },
  { field: 'chiBuildingNo', header: 'CHI_BuildingNo', source: 'chinese', path: ['ChiStreet', 'BuildingNoFrom'] },
  { field: 'chiBlock', header: 'CHI_Block', source: 'chinese', path: ['ChiBlock', 'BlockNo'] },
  { field: 'engRegion', header: 'ENG_Region', source: 'english', path: ['Region'] },
  { field: 'engDistrict', header: 'ENG_District', source: 'english', path: ['EngDistrict', 'DcDistrict'] },
  { field: 'engEstate', header: 'ENG_Estate', source: 'english', path: ['EngEstate', 'EstateName'] },
  { field: 'engBuildingName', header: 'ENG_BuildingName', source: 'english', path: ['BuildingName'] },
  { field: 'engStreetName', header: 'ENG_StreetName', source: 'english', path: ['EngStreet', 'StreetName'] },
  { field: 'engBuildingNo', header: 'ENG_BuildingNo', source: 'english', path: ['EngStreet', 'BuildingNoFrom'] },
  { field: 'engBlock', header: 'ENG_Block', source: 'english', path: ['EngBlock', 'BlockNo'] },
]

/**
 * Reads a string value from a field tree by path.
 *
 * @returns The value, or undefined when any segment is missing or the
 *   value at the end of the path is not a string
 *
 * @example
 * ```typescript
 * lookupField(candidate.chineseFields, ['ChiDistrict', 'DcDistrict']) // '中西區'
 * ```
 */
export function lookupField(tree: AddressFieldTree, path: readonly string[]): string | undefined {
  const [head, ...rest] = path
  if (head === undefined) return undefined

  const node = tree.find((n) => n.name === head)
  if (node === undefined) return undefined

  switch (node.kind) {
    case 'text':
      return rest.length === 0 ? node.value : undefined
    case 'group':
      return rest.length === 0 ? undefined : lookupField(node.children, rest)
    case 'street':
      return rest.length === 1 && rest[0] !== undefined ? node.fields[rest[0]] : undefined
  }
}

/**
 * Truncates a provider score to an integer; 0 when absent or not numeric.
 */
export function coerceScore(score: ProviderScore): number {
  if (typeof score === 'number') {
    return Number.isFinite(score) ? Math.trunc(score) : 0
  }
  if (typeof score === 'string' && score.trim() !== '') {
    const parsed = Number(score)
    return Number.isFinite(parsed) ? Math.trunc(parsed) : 0
  }
  return 0
}

/**
 * Builds the output record for a resolved candidate.
 *
 * @param candidate - The best candidate for the address
 * @param inputAddress - The address as it appeared in the input
 */
export function extractFields(candidate: Candidate, inputAddress: string): OutputRecord {
  const record: OutputRecord = {
    inputAddress,
    score: coerceScore(candidate.providerScore),
    chiRegion: '',
    chiDistrict: '',
    chiEstate: '',
    chiBuildingName: '',
    chiStreetName: '',
    chiBuildingNo: '',
    chiBlock: '',
    engRegion: '',
    engDistrict: '',
    engEstate: '',
    engBuildingName: '',
    engStreetName: '',
    engBuildingNo: '',
    engBlock: '',
  }

  for (const { field, source, path } of OUTPUT_FIELD_SOURCES) {
    const tree = source === 'chinese' ? candidate.chineseFields : candidate.englishFields
    record[field] = lookupField(tree, path) ?? ''
  }

  return record
}
