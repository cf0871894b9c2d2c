/**
 * Keys whose values carry a street or village name plus an optional
 * building-number range. Only the Chinese-script containers are scored.
 */
export type StreetContainerKey = 'ChiStreet' | 'ChiVillage'

/**
 * Which sub-field of a street container holds the name to match.
 */
export type StreetNameField = 'StreetName' | 'VillageName'

/**
 * A leaf string value in a structured address, e.g. `Region: '九龍'`.
 */
export interface TextFieldNode {
  kind: 'text'
  name: string
  value: string
}

/**
 * A nested container, e.g. `ChiDistrict: { DcDistrict: '油尖旺區' }`.
 */
export interface GroupFieldNode {
  kind: 'group'
  name: string
  children: readonly AddressFieldNode[]
}

/**
 * A street or village container with its building-number range.
 *
 * `fields` holds every string-valued sub-field as returned by the provider,
 * so `BuildingNoFrom` / `BuildingNoTo` are present exactly when the provider
 * sent them.
 */
export interface StreetFieldNode {
  kind: 'street'
  name: StreetContainerKey
  nameField: StreetNameField
  fields: Readonly<Record<string, string>>
}

/**
 * Tagged address-field tree built once from the raw provider payload.
 */
export type AddressFieldNode = TextFieldNode | GroupFieldNode | StreetFieldNode

/**
 * Root of a structured address in one script.
 */
export type AddressFieldTree = readonly AddressFieldNode[]

/**
 * Raw provider score as found in the payload. Coerced to an integer only
 * when projected into an output record.
 */
export type ProviderScore = number | string | null

/**
 * One ranked suggestion returned by the lookup service.
 */
export interface Candidate {
  /** Position in the provider's suggestion list (0-based) */
  rank: number
  /** Structured address in Chinese script */
  chineseFields: AddressFieldTree
  /** Structured address in English */
  englishFields: AddressFieldTree
  /** Geospatial payload, passed through untouched */
  geo: unknown
  /** Validation score reported by the provider */
  providerScore: ProviderScore
}
