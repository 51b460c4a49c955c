import defaultConfig, { validateThresholds } from './config'
import { ConfidenceLevel, ConfidenceThresholds, ScoreVector } from './types'

/**
 * Scale every score by the vector's maximum. Raw BM25 magnitudes depend on
 * corpus and query length, so only the relative position within one query
 * means anything. A vector whose maximum is not positive normalizes to zeros.
 */
export function normalizeScores(scores: ScoreVector): Map<string, number> {
  let max = 0
  for (const score of scores.values()) if (score > max) max = score

  const normalized = new Map<string, number>()
  for (const [id, score] of scores) normalized.set(id, max > 0 ? score / max : 0)
  return normalized
}

export function levelFor(normalizedScore: number, thresholds: ConfidenceThresholds = defaultConfig.thresholds): ConfidenceLevel {
  if (normalizedScore > thresholds.high) return 'high'
  if (normalizedScore > thresholds.medium) return 'medium'
  return 'low'
}

/**
 * Map every score to a confidence level, preserving the vector's key order.
 *
 * With the default thresholds a control is `high` above 0.7 of the top score,
 * `medium` above 0.4 and `low` otherwise. All-zero vectors classify as `low`.
 */
export function classifyScores(
  scores: ScoreVector,
  thresholds: ConfidenceThresholds = defaultConfig.thresholds
): Map<string, ConfidenceLevel> {
  validateThresholds(thresholds)
  const levels = new Map<string, ConfidenceLevel>()
  for (const [id, normalized] of normalizeScores(scores)) levels.set(id, levelFor(normalized, thresholds))
  return levels
}

export function countLevels(levels: Iterable<ConfidenceLevel>): Record<ConfidenceLevel, number> {
  const counts: Record<ConfidenceLevel, number> = { high: 0, medium: 0, low: 0 }
  for (const level of levels) counts[level]++
  return counts
}
