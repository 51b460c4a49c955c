import { callLLM, LLMCaller, LLMOptions, parseFencedJSON } from '../llm'
import { debug, describeError, warn } from '../logger'
import { ConfidenceLevel, ServiceMapping } from '../mapping/types'
import { ASSESSMENT_SYSTEM_PROMPT, buildAssessmentQuery } from './prompt'
import { selectControls } from './select'
import { EnhancementContext, Enhancer, EnrichedControl, EnrichedMapping } from './types'

export type Assessment = {
  applicable: boolean
  confidence: ConfidenceLevel
  justification: string
}

function toLevel(value: unknown): ConfidenceLevel | undefined {
  if (typeof value !== 'string') return undefined
  const lower = value.trim().toLowerCase()
  return lower === 'high' || lower === 'medium' || lower === 'low' ? lower : undefined
}

/** Validate `{ is_applicable, confidence, justification }` from a model reply. */
export function parseAssessment(parsed: unknown): Assessment | null {
  if (!parsed || typeof parsed !== 'object') return null
  const confidence = 'confidence' in parsed ? toLevel(parsed.confidence) : undefined
  if (!confidence) return null
  const applicable = 'is_applicable' in parsed ? parsed.is_applicable : undefined
  const justification = 'justification' in parsed ? parsed.justification : undefined
  return {
    confidence,
    applicable: typeof applicable === 'boolean' ? applicable : applicable === 'true',
    justification: typeof justification === 'string' ? justification.trim() : ''
  }
}

export interface LlmEnhancerOptions extends LLMOptions {
  /** Injected for tests; defaults to the Ollama-backed `callLLM`. */
  call?: LLMCaller
}

/**
 * Asks a model, one control at a time, whether the control applies. A failed
 * call or an unreadable reply keeps the BM25 confidence for that control.
 */
export class LlmEnhancer implements Enhancer {
  readonly name = 'llm'
  private readonly call: LLMCaller
  private readonly llmOptions: LLMOptions

  constructor(options: LlmEnhancerOptions = {}) {
    const { call, ...llmOptions } = options
    this.call = call ?? callLLM
    this.llmOptions = llmOptions
  }

  async assess(
    context: EnhancementContext,
    controlDescription: string
  ): Promise<{ assessment: Assessment | null; error?: string }> {
    const query = buildAssessmentQuery({
      serviceName: context.serviceName,
      securityText: context.securityText,
      threatNote: context.threatNote,
      controlDescription
    })
    const res = await this.call(ASSESSMENT_SYSTEM_PROMPT, query, this.llmOptions)
    if (!res.success || !res.data) return { assessment: null, error: res.error ?? 'LLM call returned no data' }
    const assessment = parseAssessment(parseFencedJSON(res.data))
    return assessment ? { assessment } : { assessment: null, error: 'LLM reply did not contain a valid assessment' }
  }

  async enhance(mapping: ServiceMapping, context: EnhancementContext): Promise<EnrichedMapping> {
    const selected = selectControls(mapping, context.serviceName, context.controls, context.maxControls)
    const enriched = new Map<string, EnrichedControl>()

    for (const control of selected) {
      let outcome: { assessment: Assessment | null; error?: string }
      try {
        outcome = await this.assess(context, control.description)
      } catch (err) {
        outcome = { assessment: null, error: describeError(err) }
      }

      if (outcome.assessment) {
        debug('LLM assessment', control.id, outcome.assessment)
        enriched.set(control.id, {
          ...outcome.assessment,
          baseConfidence: control.baseConfidence,
          justification: outcome.assessment.justification || 'No justification given.',
          source: this.name
        })
      } else {
        warn(`LLM assessment unavailable for control ${control.id}: ${outcome.error}`)
        enriched.set(control.id, {
          confidence: control.baseConfidence,
          baseConfidence: control.baseConfidence,
          applicable: true,
          justification: `LLM assessment unavailable (${outcome.error}); based on BM25 retrieval score`,
          source: 'bm25'
        })
      }
    }

    return { [context.serviceName]: Object.fromEntries(enriched) }
  }
}
