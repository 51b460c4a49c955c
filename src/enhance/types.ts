import { ConfidenceLevel, ControlCatalog, ServiceMapping } from '../mapping/types'

export interface EnhancementContext {
  serviceName: string
  threatNote: string
  /** Documentation as handed to the mapper. */
  documentText: string
  /** Security-relevant passages the mapper extracted from `documentText`. */
  securityText: string
  controls: ControlCatalog
  /** Upper bound on the number of controls sent to the enhancer. */
  maxControls: number
}

export interface EnrichedControl {
  confidence: ConfidenceLevel
  /** BM25 level before enhancement; differs from `confidence` when the enhancer overrode it. */
  baseConfidence: ConfidenceLevel
  applicable: boolean
  justification: string
  /** `bm25` or the name of the enhancer that produced this entry. */
  source: string
}

/** `{ [serviceName]: { [controlId]: EnrichedControl } }` */
export type EnrichedMapping = Record<string, Record<string, EnrichedControl>>

export interface Enhancer {
  readonly name: string
  enhance(mapping: ServiceMapping, context: EnhancementContext): Promise<EnrichedMapping>
}

export interface DetailedControl extends EnrichedControl {
  description: string
}

export type DetailedResults = Record<string, Record<string, DetailedControl>>
