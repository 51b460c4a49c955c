import { ConfidenceLevel, ControlCatalog, ServiceMapping } from '../mapping/types'
import { ownValue } from '../utils/records'
import { DetailedControl, DetailedResults, EnrichedMapping } from './types'

export const BM25_JUSTIFICATION = 'Based on BM25 retrieval score'

/**
 * Combine the BM25 mapping with enhancer output. Enhanced controls take the
 * enhancer's verdict; the rest keep their BM25 level and count as applicable.
 * Controls absent from `mapping` are left out.
 */
export function mergeEnhancements(
  serviceName: string,
  mapping: ServiceMapping,
  enriched: EnrichedMapping,
  controls: ControlCatalog
): DetailedResults {
  const levels = ownValue(mapping, serviceName)
  const enhanced = ownValue(enriched, serviceName)
  const detailed: Array<[string, DetailedControl]> = []

  for (const control of controls) {
    const confidence = ownValue(levels, control.id)
    if (!confidence) continue
    const extra = ownValue(enhanced, control.id)
    detailed.push([
      control.id,
      extra
        ? { ...extra, description: control.description }
        : {
            confidence,
            baseConfidence: confidence,
            applicable: true,
            description: control.description,
            justification: BM25_JUSTIFICATION,
            source: 'bm25'
          }
    ])
  }

  return { [serviceName]: Object.fromEntries(detailed) }
}

/** `{ service: { id: level } }` restricted to applicable controls. */
export function simplifyResults(detailed: DetailedResults): Record<string, Record<string, ConfidenceLevel>> {
  return Object.fromEntries(
    Object.entries(detailed).map(([service, controls]): [string, Record<string, ConfidenceLevel>] => [
      service,
      Object.fromEntries(
        Object.entries(controls)
          .filter(([, control]) => control.applicable)
          .map(([id, control]): [string, ConfidenceLevel] => [id, control.confidence])
      )
    ])
  )
}
