import defaultConfig from './config'
import { MappingConfigError } from './errors'
import { readStringList } from './resources'

export interface ExtractionOptions {
  /** Compiled security-relevance patterns; defaults to the project pattern file. */
  patterns?: readonly RegExp[]
  maxFallbackChars?: number
}

export interface Extraction {
  text: string
  matchedSentences: number
  totalSentences: number
  /** True when nothing matched and the full text was returned instead. */
  usedFallback: boolean
}

export function normalizeText(text: string) {
  return text.replace(/\r\n?/g, '\n')
}

/** Rule-based splitter: sentence punctuation followed by whitespace, or a line break. */
export function splitSentences(text: string): string[] {
  return normalizeText(text)
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
}

/**
 * Compile regex sources case-insensitively. Sources are plain strings so new
 * keywords can be added to the pattern file without touching code.
 */
export function compilePatterns(sources: readonly string[]): RegExp[] {
  return sources.map((source) => {
    try {
      return new RegExp(source, 'i')
    } catch (err) {
      throw new MappingConfigError(`Invalid security pattern ${JSON.stringify(source)}`, { pattern: source }, { cause: err })
    }
  })
}

export function defaultSecurityPatterns(): RegExp[] {
  return compilePatterns(readStringList(defaultConfig.patternsFile))
}

export function isSecurityRelevant(sentence: string, patterns: readonly RegExp[]) {
  return patterns.some((p) => p.test(sentence))
}

/**
 * Keep the sentences of `rawText` that match any security-relevance pattern,
 * in document order and without repeats. When none match the (normalized)
 * full text is returned, so non-empty input never extracts to nothing.
 */
export function extractSecurityText(rawText: string, options: ExtractionOptions = {}): Extraction {
  const patterns = options.patterns ?? defaultSecurityPatterns()
  const maxFallbackChars = options.maxFallbackChars ?? defaultConfig.maxFallbackChars

  const sentences = splitSentences(rawText)
  const seen = new Set<string>()
  const matched: string[] = []
  for (const sentence of sentences) {
    if (!isSecurityRelevant(sentence, patterns)) continue
    const key = sentence.toLowerCase()
    if (seen.has(key)) continue
    seen.add(key)
    matched.push(sentence)
  }

  if (matched.length > 0) {
    return {
      text: matched.join('\n\n'),
      matchedSentences: matched.length,
      totalSentences: sentences.length,
      usedFallback: false
    }
  }

  const fullText = normalizeText(rawText).trim()
  return {
    text: fullText.slice(0, maxFallbackChars),
    matchedSentences: 0,
    totalSentences: sentences.length,
    usedFallback: fullText.length > 0
  }
}
