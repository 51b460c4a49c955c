import defaultConfig, { validateBm25Parameters } from './config'
import { CatalogFormatError, UnknownControlError } from './errors'
import { termFrequencies, tokenizeToArray, TokenizerOptions } from './tokenizer'
import { Bm25Parameters, ControlCatalog, ScoreVector } from './types'

export interface IndexedDocument {
  id: string
  terms: readonly string[]
}

export interface RankedScore {
  id: string
  score: number
  /** Catalog position, used as the tie-break. */
  position: number
}

/**
 * Okapi BM25 over a fixed corpus, one document per control.
 *
 * ```
 * score(t,d) = IDF(t) * f(t,d) * (k1 + 1) / (f(t,d) + k1 * (1 - b + b * |d| / avgdl))
 * IDF(t)     = ln((N - df(t) + 0.5) / (df(t) + 0.5) + 1)
 * ```
 *
 * Corpus statistics are computed once in the constructor and never patched;
 * a changed catalog needs a new index.
 */
export class Bm25Index {
  readonly k1: number
  readonly b: number
  readonly documentCount: number
  readonly averageDocumentLength: number

  private readonly ids: readonly string[]
  private readonly positions: ReadonlyMap<string, number>
  private readonly frequencies: readonly ReadonlyMap<string, number>[]
  private readonly lengths: readonly number[]
  private readonly documentFrequencies: ReadonlyMap<string, number>
  private readonly idf: ReadonlyMap<string, number>

  constructor(documents: readonly IndexedDocument[], params: Partial<Bm25Parameters> = {}) {
    const k1 = params.k1 ?? defaultConfig.bm25.k1
    const b = params.b ?? defaultConfig.bm25.b
    validateBm25Parameters({ k1, b })
    this.k1 = k1
    this.b = b

    const positions = new Map<string, number>()
    const documentFrequencies = new Map<string, number>()
    const frequencies: Map<string, number>[] = []
    const lengths: number[] = []

    documents.forEach((doc, position) => {
      if (positions.has(doc.id)) {
        throw new CatalogFormatError(`Duplicate control id in index: ${JSON.stringify(doc.id)}`, { controlId: doc.id })
      }
      positions.set(doc.id, position)
      const tf = termFrequencies(doc.terms)
      frequencies.push(tf)
      lengths.push(doc.terms.length)
      for (const term of tf.keys()) {
        documentFrequencies.set(term, (documentFrequencies.get(term) ?? 0) + 1)
      }
    })

    const n = documents.length
    const totalLength = lengths.reduce((sum, len) => sum + len, 0)
    this.documentCount = n
    this.averageDocumentLength = n > 0 ? totalLength / n : 0

    const idf = new Map<string, number>()
    for (const [term, df] of documentFrequencies) {
      idf.set(term, Math.log((n - df + 0.5) / (df + 0.5) + 1))
    }

    this.ids = documents.map((d) => d.id)
    this.positions = positions
    this.frequencies = frequencies
    this.lengths = lengths
    this.documentFrequencies = documentFrequencies
    this.idf = idf
  }

  static fromControls(
    controls: ControlCatalog,
    params: Partial<Bm25Parameters> = {},
    tokenizer: TokenizerOptions = {}
  ): Bm25Index {
    const documents = controls.map((c) => ({ id: c.id, terms: tokenizeToArray(c.description, tokenizer) }))
    return new Bm25Index(documents, params)
  }

  get controlIds(): readonly string[] {
    return this.ids
  }

  has(controlId: string) {
    return this.positions.has(controlId)
  }

  documentFrequency(term: string) {
    return this.documentFrequencies.get(term) ?? 0
  }

  documentLength(controlId: string) {
    return this.lengths[this.positionOf(controlId)]
  }

  inverseDocumentFrequency(term: string) {
    return this.idf.get(term) ?? 0
  }

  /** Sum of per-term scores; repeated query terms count every time they occur. */
  score(query: Iterable<string>, controlId: string): number {
    return this.scoreAt(Array.from(query), this.positionOf(controlId))
  }

  scoreAll(query: Iterable<string>): ScoreVector {
    const terms = Array.from(query)
    const scores = new Map<string, number>()
    this.ids.forEach((id, position) => scores.set(id, this.scoreAt(terms, position)))
    return scores
  }

  /** Highest score first; equal scores keep catalog order. */
  rank(query: Iterable<string>): RankedScore[] {
    const scores = this.scoreAll(query)
    return this.ids
      .map((id, position) => ({ id, score: scores.get(id) ?? 0, position }))
      .sort((a, b) => b.score - a.score || a.position - b.position)
  }

  private positionOf(controlId: string): number {
    const position = this.positions.get(controlId)
    if (position === undefined) throw new UnknownControlError(controlId)
    return position
  }

  private scoreAt(terms: readonly string[], position: number): number {
    const tf = this.frequencies[position]
    const lengthRatio = this.averageDocumentLength > 0 ? this.lengths[position] / this.averageDocumentLength : 0
    const norm = this.k1 * (1 - this.b + this.b * lengthRatio)

    let total = 0
    for (const term of terms) {
      const f = tf.get(term)
      if (!f) continue
      total += (this.inverseDocumentFrequency(term) * (f * (this.k1 + 1))) / (f + norm)
    }
    return total
  }
}
