import { debug } from '../logger'
import { Bm25Index } from './bm25'
import { classifyScores, normalizeScores } from './classifier'
import { mergeConfig, MappingConfigOverrides } from './config'
import { CatalogFormatError, EmptyQueryError, UnknownControlError } from './errors'
import { compilePatterns, Extraction, extractSecurityText } from './extractor'
import { readStopwords, readStringList } from './resources'
import { tokenizeToArray, TokenizerOptions } from './tokenizer'
import {
  ConfidenceLevel,
  ControlCatalog,
  ControlRecord,
  MappingConfig,
  MappingInput,
  RankedControl,
  ScoreVector,
  ServiceMapping
} from './types'

export interface MappingAnalysis {
  query: Query
  scores: ScoreVector
  /** Control id -> level in catalog order, whatever the ids look like. */
  levels: ReadonlyMap<string, ConfidenceLevel>
  mapping: ServiceMapping
  ranked: RankedControl[]
}

export interface Query {
  /** `<service name> <threat note> <extracted documentation>` before tokenization. */
  text: string
  terms: readonly string[]
  extraction: Extraction
}

/**
 * Maps one service's documentation onto a control catalog.
 *
 * The BM25 index is built once in the constructor from the catalog; every
 * mapping call is pure computation over its inputs.
 */
export class ControlMapper {
  readonly config: MappingConfig
  readonly controls: ControlCatalog
  readonly index: Bm25Index

  private readonly byId: ReadonlyMap<string, Readonly<ControlRecord>>
  private readonly tokenizerOptions: TokenizerOptions
  private readonly patterns: readonly RegExp[]

  constructor(controls: ControlCatalog, config: MappingConfigOverrides = {}) {
    if (controls.length === 0) {
      throw new CatalogFormatError('Control catalog is empty', {})
    }
    this.config = mergeConfig(config)
    this.controls = controls
    this.byId = new Map(controls.map((c) => [c.id, c]))
    this.tokenizerOptions = {
      minTokenLength: this.config.minTokenLength,
      stopwords: readStopwords(this.config.stopwordsFile)
    }
    this.patterns = compilePatterns(this.config.securityPatterns ?? readStringList(this.config.patternsFile))
    this.index = Bm25Index.fromControls(controls, this.config.bm25, this.tokenizerOptions)
    debug('Index built', {
      controls: this.index.documentCount,
      averageDocumentLength: this.index.averageDocumentLength
    })
  }

  getControl(controlId: string): Readonly<ControlRecord> {
    const control = this.byId.get(controlId)
    if (!control) throw new UnknownControlError(controlId)
    return control
  }

  tokenize(text: string): string[] {
    return tokenizeToArray(text, this.tokenizerOptions)
  }

  extract(documentText: string): Extraction {
    return extractSecurityText(documentText, {
      patterns: this.patterns,
      maxFallbackChars: this.config.maxFallbackChars
    })
  }

  buildQuery(input: MappingInput): Query {
    const extraction = this.extract(input.documentText)
    const text = `${input.serviceName} ${input.threatNote} ${extraction.text.slice(0, this.config.maxDocumentChars)}`
    const terms = this.tokenize(text)
    if (terms.length === 0) throw new EmptyQueryError(input)
    debug('Query built', {
      terms: terms.length,
      matchedSentences: extraction.matchedSentences,
      usedFallback: extraction.usedFallback
    })
    return { text, terms, extraction }
  }

  /** Control id -> level, in catalog order. */
  classify(input: MappingInput): Map<string, ConfidenceLevel> {
    const query = this.buildQuery(input)
    return classifyScores(this.index.scoreAll(query.terms), this.config.thresholds)
  }

  /** One scoring pass producing the mapping and the ranked view together. */
  analyze(input: MappingInput): MappingAnalysis {
    const query = this.buildQuery(input)
    const scores = this.index.scoreAll(query.terms)
    const normalized = normalizeScores(scores)
    const levels = classifyScores(scores, this.config.thresholds)

    const ranked = this.index.rank(query.terms).map(({ id, score }, i) => ({
      id,
      description: this.getControl(id).description,
      score,
      normalizedScore: normalized.get(id) ?? 0,
      level: levels.get(id) ?? 'low',
      rank: i + 1
    }))
    const mapping = Object.freeze({ [input.serviceName]: Object.freeze(Object.fromEntries(levels)) })
    return { query, scores, levels, mapping, ranked }
  }

  /**
   * `{ [serviceName]: { [controlId]: level } }` with one entry per control.
   * Object keys that look like integers enumerate in ascending numeric order,
   * as they always do in JavaScript; `analyze().levels` and `rankControls`
   * keep catalog order.
   */
  mapControls(input: MappingInput): ServiceMapping {
    return this.analyze(input).mapping
  }

  rankControls(input: MappingInput): RankedControl[] {
    return this.analyze(input).ranked
  }
}
