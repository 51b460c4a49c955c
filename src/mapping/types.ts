export type ConfidenceLevel = 'high' | 'medium' | 'low'

export const CONFIDENCE_LEVELS: readonly ConfidenceLevel[] = ['high', 'medium', 'low']

export interface ControlRecord {
  id: string
  description: string
  /** Every other catalog column, carried through unused. */
  attributes: Readonly<Record<string, string>>
  /** 1-based source line. */
  row: number
}

export type ControlCatalog = readonly Readonly<ControlRecord>[]

/** Control id -> raw relevance score, in catalog order. */
export type ScoreVector = ReadonlyMap<string, number>

export type ConfidenceMapping = Readonly<Record<string, ConfidenceLevel>>

/** Output artifact: `{ "<service-name>": { "<control-id>": level } }` */
export type ServiceMapping = Readonly<Record<string, ConfidenceMapping>>

export interface MappingInput {
  serviceName: string
  threatNote: string
  /** Plain text, already converted from any binary format. */
  documentText: string
}

export interface RankedControl {
  id: string
  description: string
  score: number
  normalizedScore: number
  level: ConfidenceLevel
  /** 1-based position after sorting by score, ties in catalog order. */
  rank: number
}

export interface Bm25Parameters {
  k1: number
  b: number
}

/**
 * Bands over the max-normalized score: `> high` is high, `> medium` is medium,
 * everything else is low.
 */
export interface ConfidenceThresholds {
  high: number
  medium: number
}

export interface MappingConfig {
  idColumn: string
  descriptionColumn: string
  bm25: Bm25Parameters
  thresholds: ConfidenceThresholds
  minTokenLength: number
  /** JSON list of stop words, relative to the project root. */
  stopwordsFile: string
  /** JSON list of security-relevance regex sources, relative to the project root. */
  patternsFile: string
  /** Explicit pattern list; takes precedence over `patternsFile`. */
  securityPatterns?: readonly string[]
  /** Cap on extracted documentation text placed in the query. */
  maxDocumentChars: number
  /** Cap on the full-text fallback when no security pattern matches. */
  maxFallbackChars: number
}
