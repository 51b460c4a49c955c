import path from 'path'
import { describe, expect, it } from 'vitest'
import { defaultConfig, mergeConfig } from './config'
import { MappingConfigError } from './errors'
import { readStringList, resolveFromRoot } from './resources'

describe('mergeConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(mergeConfig()).toEqual(defaultConfig)
  })

  it('merges nested values and ignores undefined ones', () => {
    const cfg = mergeConfig({ thresholds: { high: 0.8, medium: undefined }, bm25: { k1: undefined } })
    expect(cfg.thresholds).toEqual({ high: 0.8, medium: 0.4 })
    expect(cfg.bm25).toEqual({ k1: 1.5, b: 0.75 })
  })

  it('lets later overrides win', () => {
    const cfg = mergeConfig({ idColumn: 'control_id', bm25: { b: 0.5 } }, { idColumn: 'ctrl', bm25: { k1: 1.2 } })
    expect(cfg.idColumn).toBe('ctrl')
    expect(cfg.bm25).toEqual({ k1: 1.2, b: 0.5 })
  })

  it('validates the result', () => {
    expect(() => mergeConfig({ bm25: { b: 2 } })).toThrow(MappingConfigError)
    expect(() => mergeConfig({ thresholds: { medium: 0.9 } })).toThrow(MappingConfigError)
    expect(() => mergeConfig({ minTokenLength: 0 })).toThrow(MappingConfigError)
    expect(() => mergeConfig({ maxDocumentChars: 0 })).toThrow(MappingConfigError)
    expect(() => mergeConfig({ idColumn: ' ' })).toThrow(MappingConfigError)
  })
})

describe('defaultConfig', () => {
  it('points at the word lists shipped with the package', () => {
    const dataDir = path.resolve(__dirname, '..', '..', 'data')
    expect(defaultConfig.stopwordsFile).toBe(path.join(dataDir, 'stopwords.json'))
    expect(defaultConfig.patternsFile).toBe(path.join(dataDir, 'security-patterns.json'))
    expect(readStringList(defaultConfig.stopwordsFile)).toContain('the')
    expect(readStringList(defaultConfig.patternsFile).length).toBeGreaterThan(0)
  })

  it('keeps absolute list paths independent of the application root', () => {
    expect(resolveFromRoot(defaultConfig.patternsFile)).toBe(defaultConfig.patternsFile)
  })
})
