import { ConfidenceLevel, ControlCatalog, ServiceMapping } from '../mapping/types'
import { ownValue } from '../utils/records'

const LEVEL_ORDER: Record<ConfidenceLevel, number> = { high: 0, medium: 1, low: 2 }

export interface SelectedControl {
  id: string
  description: string
  baseConfidence: ConfidenceLevel
}

/**
 * Controls of `serviceName` ordered high → medium → low, catalog order within
 * a level, capped at `max`.
 */
export function selectControls(
  mapping: ServiceMapping,
  serviceName: string,
  controls: ControlCatalog,
  max: number
): SelectedControl[] {
  const levels = ownValue(mapping, serviceName)
  const selected: Array<SelectedControl & { position: number }> = []
  controls.forEach((control, position) => {
    const level = ownValue(levels, control.id)
    if (level) selected.push({ id: control.id, description: control.description, baseConfidence: level, position })
  })
  return selected
    .sort((a, b) => LEVEL_ORDER[a.baseConfidence] - LEVEL_ORDER[b.baseConfidence] || a.position - b.position)
    .slice(0, Math.max(0, max))
    .map(({ id, description, baseConfidence }) => ({ id, description, baseConfidence }))
}
