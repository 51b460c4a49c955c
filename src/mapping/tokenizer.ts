import defaultConfig from './config'
import { MappingConfigError } from './errors'
import { readStopwords } from './resources'

export interface TokenizerOptions {
  minTokenLength?: number
  stopwords?: ReadonlySet<string>
}

// letters (with their combining marks) and digits; everything else separates terms
const TERM = /[\p{L}\p{M}\p{N}]+/gu

export function defaultStopwords(): ReadonlySet<string> {
  return readStopwords(defaultConfig.stopwordsFile)
}

/**
 * Lowercase, strip punctuation, drop short tokens and stop words.
 *
 * The returned sequence is lazy and restartable: every iteration re-scans
 * `text` from the start and yields the same terms in the same order.
 */
export function tokenize(text: string, options: TokenizerOptions = {}): Iterable<string> {
  const minLength = options.minTokenLength ?? defaultConfig.minTokenLength
  if (!Number.isInteger(minLength) || minLength < 1) {
    throw new MappingConfigError(`minTokenLength must be a positive integer, got ${minLength}`, { minTokenLength: minLength })
  }
  const stopwords = options.stopwords ?? defaultStopwords()

  return {
    *[Symbol.iterator]() {
      for (const match of text.toLowerCase().matchAll(TERM)) {
        const term = match[0]
        if (term.length < minLength) continue
        if (stopwords.has(term)) continue
        yield term
      }
    }
  }
}

export function tokenizeToArray(text: string, options: TokenizerOptions = {}): string[] {
  return Array.from(tokenize(text, options))
}

export function termFrequencies(terms: Iterable<string>): Map<string, number> {
  const frequencies = new Map<string, number>()
  for (const term of terms) {
    frequencies.set(term, (frequencies.get(term) ?? 0) + 1)
  }
  return frequencies
}
