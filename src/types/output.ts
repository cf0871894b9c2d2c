/**
 * Flat record produced for every address that resolved to a candidate.
 * Every text field defaults to an empty string when the provider did not
 * send the corresponding value.
 */
export interface OutputRecord {
  /** The address exactly as it appeared in the input */
  inputAddress: string
  /** Provider validation score, truncated to an integer */
  score: number
  chiRegion: string
  chiDistrict: string
  chiEstate: string
  chiBuildingName: string
  chiStreetName: string
  chiBuildingNo: string
  chiBlock: string
  engRegion: string
  engDistrict: string
  engEstate: string
  engBuildingName: string
  engStreetName: string
  engBuildingNo: string
  engBlock: string
}

/**
 * Text columns of an output record (everything except the input and score).
 */
export type OutputTextField = Exclude<keyof OutputRecord, 'inputAddress' | 'score'>

/**
 * Pipeline stage at which an address was given up on.
 */
export type ResolutionStage = 'normalize' | 'fetch' | 'flatten' | 'score' | 'extract'

/**
 * An input address that produced no output record, with the reason why.
 */
export interface DroppedAddress {
  /** Position in the (sliced) input */
  index: number
  /** The input value; non-string inputs are rendered with String() */
  address: string
  stage: ResolutionStage
  reason: string
}
