import ollama, { Ollama } from 'ollama'
import { debug, warn } from './logger'

const modelSettings: Record<string, { maxContext: number }> = {
  'llama3.1:70b': {
    maxContext: 128000
  },
  'llama3.1:8b': {
    maxContext: 64000
  },
  'llama3.2': {
    maxContext: 128000
  }
}

const MODEL_MAX_CTX = 128000

export const DEFAULT_MODEL = 'llama3.1:8b'

export type LLMResponse = {
  success: boolean
  data?: string
  error?: string
}

export interface LLMOptions {
  model?: string
  /** Ollama host, e.g. http://127.0.0.1:11434. The library default is used when unset. */
  endpoint?: string
  retries?: number
}

export type LLMCaller = (systemPrompt: string, userQuery: string, opts?: LLMOptions) => Promise<LLMResponse>

export function wrapAsJSONCodeFence(obj: unknown): string {
  const pretty = JSON.stringify(obj, null, 2)
  return '\n\n```json\n' + pretty + '\n```\n'
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Models often wrap their answer in prose or a fence. Prefer an object that
 * carries a `confidence` key, then any non-empty object, then the raw text.
 */
export function extractOrCreateJSON(fullMessage: string): unknown {
  const direct = tryParse(fullMessage)
  if (direct !== undefined) return direct

  const candidates = Array.from(fullMessage.matchAll(/(\{[\s\S]*?\})/g))
    .map((m) => tryParse(m[1]))
    .filter(isRecord)
  const assessment = candidates.find((c) => 'confidence' in c)
  if (assessment) return assessment
  const nonEmpty = candidates.find((c) => Object.keys(c).length > 0)
  if (nonEmpty) return nonEmpty

  return { text: fullMessage }
}

export function parseFencedJSON(fenced: string): unknown {
  if (!fenced) return null
  const m = fenced.match(/```(?:json\n)?([\s\S]*?)```/i)
  if (!m) return null
  return tryParse(m[1]) ?? null
}

async function callOllama(systemPrompt: string, userQuery: string, model: string, endpoint?: string): Promise<string> {
  const client = endpoint ? new Ollama({ host: endpoint }) : ollama
  const response = await client.chat({
    model,
    options: {
      num_ctx: modelSettings[model]?.maxContext || MODEL_MAX_CTX
    },
    stream: true,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userQuery }
    ]
  })

  let fullMessage = ''
  for await (const chunk of response) {
    if (chunk.message?.content) {
      fullMessage += chunk.message.content
    }
  }
  return fullMessage
}

/**
 * callLLM - Ollama chat with retries.
 * The returned `data` always holds a JSON code fence so callers can parse it
 * with `parseFencedJSON`.
 */
export const callLLM: LLMCaller = async (systemPrompt, userQuery, opts = {}) => {
  const model = opts.model ?? DEFAULT_MODEL
  const retries = opts.retries ?? 2
  const tokenCount = `${systemPrompt}\n${userQuery}`.length / 4 // rough estimate

  debug('LLM token count', tokenCount)
  const maxContext = modelSettings[model]?.maxContext ?? MODEL_MAX_CTX
  if (tokenCount > maxContext) {
    warn(`LLM prompt token count (${tokenCount}) exceeds model max context (${maxContext}). Prompt may be truncated or rejected.`)
  }

  let lastErr: unknown = null
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      const raw = await callOllama(systemPrompt, userQuery, model, opts.endpoint)
      debug('LLM raw response', raw)
      return { success: true, data: wrapAsJSONCodeFence(extractOrCreateJSON(raw)) }
    } catch (err) {
      lastErr = err
      debug(`LLM attempt ${attempt} failed`, err)
      if (attempt < retries) {
        // small backoff
        await new Promise((r) => setTimeout(r, 200 * (attempt + 1)))
      }
    }
  }

  return { success: false, error: String(lastErr) }
}
