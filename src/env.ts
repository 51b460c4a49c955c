import { MappingConfigOverrides } from './mapping/config'
import { MappingConfigError } from './mapping/errors'

export interface LlmSettings {
  endpoint?: string
  model?: string
}

export function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new MappingConfigError(`${name} must be a number, got ${JSON.stringify(raw)}`, { [name]: raw })
  }
  return value
}

function nonEmpty(raw: string | undefined) {
  const value = raw?.trim()
  return value ? value : undefined
}

/** Mapping overrides from `CTRL_MAPPER_*` variables. Unset variables leave defaults alone. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): MappingConfigOverrides {
  return {
    idColumn: nonEmpty(env.CTRL_MAPPER_ID_COLUMN),
    descriptionColumn: nonEmpty(env.CTRL_MAPPER_DESCRIPTION_COLUMN),
    patternsFile: nonEmpty(env.CTRL_MAPPER_PATTERNS),
    bm25: {
      k1: parseNumber('CTRL_MAPPER_K1', env.CTRL_MAPPER_K1),
      b: parseNumber('CTRL_MAPPER_B', env.CTRL_MAPPER_B)
    },
    thresholds: {
      high: parseNumber('CTRL_MAPPER_HIGH', env.CTRL_MAPPER_HIGH),
      medium: parseNumber('CTRL_MAPPER_MEDIUM', env.CTRL_MAPPER_MEDIUM)
    }
  }
}

export function llmSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): LlmSettings {
  return { endpoint: nonEmpty(env.LLM_ENDPOINT), model: nonEmpty(env.LLM_MODEL) }
}
