import { selectControls } from './select'
import { EnhancementContext, Enhancer, EnrichedControl, EnrichedMapping } from './types'
import { ServiceMapping } from '../mapping/types'

function words(text: string) {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean))
}

export function sharedWordCount(a: string, b: string): number {
  const right = words(b)
  let count = 0
  for (const w of words(a)) if (right.has(w)) count++
  return count
}

/**
 * Offline stand-in for an LLM assessment: counts distinct whitespace-separated
 * words shared by the control description and the security text.
 */
export function assessByOverlap(
  controlDescription: string,
  securityText: string
): Omit<EnrichedControl, 'baseConfidence'> {
  const shared = sharedWordCount(controlDescription, securityText)
  if (shared > 5) {
    return {
      confidence: 'high',
      applicable: true,
      justification: 'Strong keyword match between control and documentation.',
      source: 'keyword-overlap'
    }
  }
  if (shared > 2) {
    return {
      confidence: 'medium',
      applicable: true,
      justification: 'Moderate keyword match between control and documentation.',
      source: 'keyword-overlap'
    }
  }
  return {
    confidence: 'low',
    applicable: false,
    justification: 'Minimal keyword match between control and documentation.',
    source: 'keyword-overlap'
  }
}

export class KeywordOverlapEnhancer implements Enhancer {
  readonly name = 'keyword-overlap'

  async enhance(mapping: ServiceMapping, context: EnhancementContext): Promise<EnrichedMapping> {
    const selected = selectControls(mapping, context.serviceName, context.controls, context.maxControls)
    const enriched = selected.map((control): [string, EnrichedControl] => [
      control.id,
      { ...assessByOverlap(control.description, context.securityText), baseConfidence: control.baseConfidence }
    ])
    return { [context.serviceName]: Object.fromEntries(enriched) }
  }
}
