import { readTextFile, resolveProjectPath } from './csv'
import { mergeEnhancements, simplifyResults } from './enhance/merge'
import { DetailedResults, Enhancer, EnrichedMapping } from './enhance/types'
import { writeJson } from './interfaces/atomicWrite'
import { info } from './logger'
import { loadCatalogFromFile } from './mapping/catalog'
import { countLevels } from './mapping/classifier'
import { MappingConfigOverrides } from './mapping/config'
import { ControlMapper } from './mapping/mapper'
import { ConfidenceLevel, RankedControl, ServiceMapping } from './mapping/types'
import { ownValue } from './utils/records'

export interface PipelineOptions {
  controlsFile: string
  docFile: string
  serviceName: string
  threatNote: string
  /** Detailed results are written here as JSON when set. */
  outputFile?: string
  config?: MappingConfigOverrides
  /** Post-processing stage; BM25 results only when unset. */
  enhancer?: Enhancer
  /** Only the top N BM25 candidates are enhanced and reported. */
  bm25Top?: number
  maxEnhancedControls?: number
  onProgress?: (message: string) => void
}

export interface PipelineResult {
  /** Every catalog control with its BM25 level. */
  mapping: ServiceMapping
  /** `mapping` restricted to the top `bm25Top` controls by rank. */
  candidates: ServiceMapping
  ranked: RankedControl[]
  enriched: EnrichedMapping
  detailed: DetailedResults
  simple: Record<string, Record<string, ConfidenceLevel>>
  outputPath?: string
}

export const DEFAULT_BM25_TOP = 10
export const DEFAULT_MAX_ENHANCED_CONTROLS = 5

/**
 * Load catalog and documentation, map with BM25, keep the top `bm25Top`
 * candidates, optionally enhance, merge, and write the detailed result.
 */
export async function runMappingPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  const progress = opts.onProgress ?? ((m: string) => info(m))
  const maxEnhanced = opts.maxEnhancedControls ?? DEFAULT_MAX_ENHANCED_CONTROLS
  const bm25Top = opts.bm25Top ?? DEFAULT_BM25_TOP

  progress(`Initializing pipeline for ${opts.serviceName}`)
  const controls = await loadCatalogFromFile(opts.controlsFile, {
    idColumn: opts.config?.idColumn,
    descriptionColumn: opts.config?.descriptionColumn
  })
  progress(`Loaded ${controls.length} control policies`)
  const documentText = await readTextFile(opts.docFile)

  const mapper = new ControlMapper(controls, opts.config)
  const input = { serviceName: opts.serviceName, threatNote: opts.threatNote, documentText }
  const { query, mapping, ranked } = mapper.analyze(input)
  const counts = countLevels(ranked.map((r) => r.level))
  progress(`BM25 mapping: ${counts.high} high, ${counts.medium} medium, ${counts.low} low`)

  const top = ranked.slice(0, Math.max(0, bm25Top))
  const candidates: ServiceMapping = {
    [opts.serviceName]: Object.fromEntries(top.map((r): [string, ConfidenceLevel] => [r.id, r.level]))
  }
  progress(`Identified ${top.length} candidate controls`)

  let enriched: EnrichedMapping = { [opts.serviceName]: {} }
  if (opts.enhancer) {
    progress(`Enhancing top ${maxEnhanced} controls with ${opts.enhancer.name}`)
    enriched = await opts.enhancer.enhance(candidates, {
      serviceName: opts.serviceName,
      threatNote: opts.threatNote,
      documentText,
      securityText: query.extraction.text,
      controls,
      maxControls: maxEnhanced
    })
  }

  const detailed = mergeEnhancements(opts.serviceName, candidates, enriched, controls)
  const simple = simplifyResults(detailed)

  let outputPath: string | undefined
  if (opts.outputFile) {
    outputPath = resolveProjectPath(opts.outputFile)
    await writeJson(outputPath, detailed)
    progress(`Results saved to: ${outputPath}`)
  }

  logSummary(opts.serviceName, controls.length, top, enriched, simple, progress)
  return { mapping, candidates, ranked, enriched, detailed, simple, outputPath }
}

function logSummary(
  serviceName: string,
  total: number,
  candidates: RankedControl[],
  enriched: EnrichedMapping,
  simple: Record<string, Record<string, ConfidenceLevel>>,
  log: (message: string) => void
) {
  log(`Cloud service: ${serviceName}`)
  log(`Total controls analyzed: ${total}`)
  log(`Controls matched by BM25: ${candidates.length}`)
  log(`Controls enhanced: ${Object.keys(ownValue(enriched, serviceName) ?? {}).length}`)
  log(`Applicable controls: ${Object.keys(ownValue(simple, serviceName) ?? {}).length}`)
  for (const control of candidates.slice(0, 5)) {
    log(`#${control.rank} control ${control.id} [${control.level}] score=${control.score.toFixed(3)}: ${control.description}`)
  }
}
