import { describe, expect, it } from 'vitest'
import { configFromEnv, llmSettingsFromEnv } from './env'
import { MappingConfigError } from './mapping/errors'

describe('configFromEnv', () => {
  it('reads numeric and column settings', () => {
    const cfg = configFromEnv({ CTRL_MAPPER_K1: '1.2', CTRL_MAPPER_HIGH: '0.8', CTRL_MAPPER_ID_COLUMN: 'control_id' })
    expect(cfg.bm25).toEqual({ k1: 1.2, b: undefined })
    expect(cfg.thresholds).toEqual({ high: 0.8, medium: undefined })
    expect(cfg.idColumn).toBe('control_id')
    expect(cfg.descriptionColumn).toBeUndefined()
  })

  it('treats blank variables as unset', () => {
    expect(configFromEnv({ CTRL_MAPPER_B: ' ', CTRL_MAPPER_PATTERNS: '' }).bm25?.b).toBeUndefined()
  })

  it('rejects values that are not numbers', () => {
    expect(() => configFromEnv({ CTRL_MAPPER_MEDIUM: 'abc' })).toThrow(MappingConfigError)
  })
})

describe('llmSettingsFromEnv', () => {
  it('reads endpoint and model', () => {
    expect(llmSettingsFromEnv({ LLM_ENDPOINT: 'http://127.0.0.1:11434', LLM_MODEL: 'llama3.1:8b' })).toEqual({
      endpoint: 'http://127.0.0.1:11434',
      model: 'llama3.1:8b'
    })
  })
})
