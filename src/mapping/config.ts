import { MappingConfigError } from './errors'
import { packageDataPath } from './resources'
import { MappingConfig } from './types'

export const defaultConfig: MappingConfig = {
  idColumn: 'id',
  descriptionColumn: 'description',
  // conventional BM25 defaults
  bm25: { k1: 1.5, b: 0.75 },
  thresholds: { high: 0.7, medium: 0.4 },
  minTokenLength: 2,
  stopwordsFile: packageDataPath('stopwords.json'),
  patternsFile: packageDataPath('security-patterns.json'),
  maxDocumentChars: 5000,
  maxFallbackChars: 40000
}

export type MappingConfigOverrides = Partial<Omit<MappingConfig, 'bm25' | 'thresholds'>> & {
  bm25?: Partial<MappingConfig['bm25']>
  thresholds?: Partial<MappingConfig['thresholds']>
}

export function mergeConfig(...partials: Array<MappingConfigOverrides | undefined>): MappingConfig {
  let cfg = defaultConfig
  for (const partial of partials) {
    if (!partial) continue
    cfg = {
      idColumn: partial.idColumn ?? cfg.idColumn,
      descriptionColumn: partial.descriptionColumn ?? cfg.descriptionColumn,
      bm25: {
        k1: partial.bm25?.k1 ?? cfg.bm25.k1,
        b: partial.bm25?.b ?? cfg.bm25.b
      },
      thresholds: {
        high: partial.thresholds?.high ?? cfg.thresholds.high,
        medium: partial.thresholds?.medium ?? cfg.thresholds.medium
      },
      minTokenLength: partial.minTokenLength ?? cfg.minTokenLength,
      stopwordsFile: partial.stopwordsFile ?? cfg.stopwordsFile,
      patternsFile: partial.patternsFile ?? cfg.patternsFile,
      securityPatterns: partial.securityPatterns ?? cfg.securityPatterns,
      maxDocumentChars: partial.maxDocumentChars ?? cfg.maxDocumentChars,
      maxFallbackChars: partial.maxFallbackChars ?? cfg.maxFallbackChars
    }
  }
  return validateConfig(cfg)
}

export function validateBm25Parameters({ k1, b }: MappingConfig['bm25']) {
  if (!Number.isFinite(k1) || k1 < 0) {
    throw new MappingConfigError(`BM25 k1 must be a non-negative number, got ${k1}`, { k1 })
  }
  if (!Number.isFinite(b) || b < 0 || b > 1) {
    throw new MappingConfigError(`BM25 b must be within [0, 1], got ${b}`, { b })
  }
}

/**
 * `medium` must stay below 1 so the top-scoring control always lands above
 * the low band when any score is positive.
 */
export function validateThresholds({ high, medium }: MappingConfig['thresholds']) {
  if (!Number.isFinite(high) || !Number.isFinite(medium)) {
    throw new MappingConfigError('Confidence thresholds must be numbers', { high, medium })
  }
  if (medium < 0 || medium > high || medium >= 1) {
    throw new MappingConfigError(`Confidence thresholds must satisfy 0 <= medium <= high and medium < 1, got high=${high} medium=${medium}`, {
      high,
      medium
    })
  }
}

export function validateConfig(cfg: MappingConfig): MappingConfig {
  validateBm25Parameters(cfg.bm25)
  validateThresholds(cfg.thresholds)
  if (!Number.isInteger(cfg.minTokenLength) || cfg.minTokenLength < 1) {
    throw new MappingConfigError(`minTokenLength must be a positive integer, got ${cfg.minTokenLength}`, {
      minTokenLength: cfg.minTokenLength
    })
  }
  for (const key of ['maxDocumentChars', 'maxFallbackChars'] as const) {
    if (!Number.isInteger(cfg[key]) || cfg[key] < 1) {
      throw new MappingConfigError(`${key} must be a positive integer, got ${cfg[key]}`, { [key]: cfg[key] })
    }
  }
  if (!cfg.idColumn.trim() || !cfg.descriptionColumn.trim()) {
    throw new MappingConfigError('Catalog column names must not be empty', {
      idColumn: cfg.idColumn,
      descriptionColumn: cfg.descriptionColumn
    })
  }
  return cfg
}

export default defaultConfig
