import { afterEach, describe, expect, it, vi } from 'vitest'

// Mock the ollama module used in llm.ts
vi.mock('ollama', () => {
  return {
    default: {
      chat: vi.fn(() => {
        async function* gen() {
          // simulate streaming chunks
          yield { message: { content: 'Assessment: {"is_applicable": true, ' } }
          yield { message: { content: '"confidence": "HIGH", "justification": "Firewall rules are in scope."} done' } }
        }
        return gen()
      })
    },
    Ollama: vi.fn()
  }
})

import ollama from 'ollama'
import { callLLM, extractOrCreateJSON, parseFencedJSON, wrapAsJSONCodeFence } from './llm'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('callLLM', () => {
  it('returns a JSON code-fence from the streamed reply', async () => {
    const res = await callLLM('system', 'user prompt', { model: 'llama3.1:8b' })
    expect(res.success).toBe(true)
    expect(res.data).toContain('```json')
    expect(parseFencedJSON(res.data ?? '')).toEqual({
      is_applicable: true,
      confidence: 'HIGH',
      justification: 'Firewall rules are in scope.'
    })
  })

  it('reports failure once retries are exhausted', async () => {
    vi.mocked(ollama.chat).mockRejectedValueOnce(new Error('connection refused'))
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    const res = await callLLM('system', 'user prompt', { retries: 0 })
    expect(res).toEqual({ success: false, error: 'Error: connection refused' })
  })
})

describe('extractOrCreateJSON', () => {
  it('parses a bare JSON reply', () => {
    expect(extractOrCreateJSON('{"confidence":"LOW"}')).toEqual({ confidence: 'LOW' })
  })

  it('prefers the object carrying a confidence', () => {
    expect(extractOrCreateJSON('notes {"a": 1} then {"confidence": "MEDIUM"}')).toEqual({ confidence: 'MEDIUM' })
  })

  it('wraps plain prose', () => {
    expect(extractOrCreateJSON('no json here')).toEqual({ text: 'no json here' })
  })
})

describe('parseFencedJSON', () => {
  it('reads what wrapAsJSONCodeFence writes', () => {
    expect(parseFencedJSON(wrapAsJSONCodeFence({ ok: true }))).toEqual({ ok: true })
  })

  it('returns null without a fence', () => {
    expect(parseFencedJSON('{"ok": true}')).toBeNull()
  })
})
