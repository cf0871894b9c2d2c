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
} from './candidate.js'

export type { MatchSpan, FieldMatch, ScoredCandidate } from './match.js'

export type {
  OutputRecord,
  OutputTextField,
  ResolutionStage,
  DroppedAddress,
} from './output.js'

export type { ResolverConfig, BatchRange } from './config.js'
