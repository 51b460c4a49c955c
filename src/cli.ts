#!/usr/bin/env node
import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import { parseArgs } from 'node:util'
import { KeywordOverlapEnhancer } from './enhance/keywordOverlap'
import { LlmEnhancer } from './enhance/llmEnhancer'
import { Enhancer } from './enhance/types'
import { configFromEnv, llmSettingsFromEnv, parseNumber } from './env'
import { writeJson } from './interfaces/atomicWrite'
import { describeError, error } from './logger'
import { loadCatalogFromFile } from './mapping/catalog'
import { MappingConfigOverrides, mergeConfig } from './mapping/config'
import { MappingConfigError } from './mapping/errors'
import { ControlMapper } from './mapping/mapper'
import { ServiceMapping } from './mapping/types'
import { readTextFile, resolveProjectPath } from './csv'
import { DEFAULT_BM25_TOP, DEFAULT_MAX_ENHANCED_CONTROLS, PipelineResult, runMappingPipeline } from './pipeline'

const OPTIONS = {
  controls: { type: 'string' },
  service: { type: 'string' },
  doc: { type: 'string' },
  note: { type: 'string' },
  output: { type: 'string' },
  'id-column': { type: 'string' },
  'description-column': { type: 'string' },
  patterns: { type: 'string' },
  high: { type: 'string' },
  medium: { type: 'string' },
  k1: { type: 'string' },
  b: { type: 'string' },
  'bm25-top': { type: 'string' },
  'llm-top': { type: 'string' },
  enhancer: { type: 'string' },
  'llm-endpoint': { type: 'string' },
  model: { type: 'string' }
} as const

export type CliFlags = {
  controls: string
  service: string
  doc: string
  note: string
  output?: string
  config: MappingConfigOverrides
  bm25Top: number
  llmTop: number
  enhancer: 'none' | 'keyword' | 'llm'
  llmEndpoint?: string
  model?: string
}

function required(values: Record<string, string | undefined>, name: string): string {
  const value = values[name]
  if (!value) throw new Error(`Missing required flag --${name}`)
  return value
}

function parseEnhancer(raw: string | undefined): CliFlags['enhancer'] {
  if (raw === undefined) return 'llm'
  if (raw === 'none' || raw === 'keyword' || raw === 'llm') return raw
  throw new Error(`--enhancer must be one of none, keyword, llm (got ${JSON.stringify(raw)})`)
}

function count(flag: string, raw: string | undefined, fallback: number): number {
  const value = parseNumber(flag, raw) ?? fallback
  if (!Number.isInteger(value) || value < 0) {
    throw new MappingConfigError(`${flag} must be a non-negative integer, got ${raw}`, { [flag]: raw })
  }
  return value
}

export function parseFlags(args: string[], env: NodeJS.ProcessEnv = process.env): CliFlags {
  const { values } = parseArgs({ args, options: OPTIONS, strict: true, allowPositionals: false })
  const fromEnv = configFromEnv(env)
  const llm = llmSettingsFromEnv(env)

  const bm25Top = count('--bm25-top', values['bm25-top'], DEFAULT_BM25_TOP)
  const llmTop = count('--llm-top', values['llm-top'], DEFAULT_MAX_ENHANCED_CONTROLS)

  const fromFlags: MappingConfigOverrides = {
    idColumn: values['id-column'],
    descriptionColumn: values['description-column'],
    patternsFile: values.patterns,
    bm25: { k1: parseNumber('--k1', values.k1), b: parseNumber('--b', values.b) },
    thresholds: { high: parseNumber('--high', values.high), medium: parseNumber('--medium', values.medium) }
  }
  // validate the combined settings up front; the mapper merges them again
  const config = mergeConfig(fromEnv, fromFlags)

  return {
    controls: required(values, 'controls'),
    service: required(values, 'service'),
    doc: required(values, 'doc'),
    note: required(values, 'note'),
    output: values.output,
    config,
    bm25Top,
    llmTop,
    enhancer: parseEnhancer(values.enhancer),
    llmEndpoint: values['llm-endpoint'] ?? llm.endpoint,
    model: values.model ?? llm.model
  }
}

export function createEnhancer(flags: Pick<CliFlags, 'enhancer' | 'llmEndpoint' | 'model'>): Enhancer | undefined {
  if (flags.enhancer === 'keyword') return new KeywordOverlapEnhancer()
  if (flags.enhancer === 'llm') return new LlmEnhancer({ endpoint: flags.llmEndpoint, model: flags.model })
  return undefined
}

async function cmdMap(args: string[]): Promise<ServiceMapping> {
  const flags = parseFlags(args)
  const controls = await loadCatalogFromFile(flags.controls, flags.config)
  const documentText = await readTextFile(flags.doc)
  const mapper = new ControlMapper(controls, flags.config)
  const mapping = mapper.mapControls({ serviceName: flags.service, threatNote: flags.note, documentText })

  console.log(JSON.stringify(mapping, null, 2))
  if (flags.output) {
    const outputPath = resolveProjectPath(flags.output)
    await writeJson(outputPath, mapping)
    console.log('Mapping written to', outputPath)
  }
  return mapping
}

async function cmdPipeline(args: string[]): Promise<PipelineResult> {
  const flags = parseFlags(args)
  const result = await runMappingPipeline({
    controlsFile: flags.controls,
    docFile: flags.doc,
    serviceName: flags.service,
    threatNote: flags.note,
    outputFile: flags.output,
    config: flags.config,
    enhancer: createEnhancer(flags),
    bm25Top: flags.bm25Top,
    maxEnhancedControls: flags.llmTop
  })
  console.log(JSON.stringify(result.simple, null, 2))
  return result
}

function usage() {
  console.log('Usage: ctrl-mapper <command> [flags]')
  console.log('Commands:')
  console.log('  map       --controls <catalog.csv> --service <name> --doc <doc.txt> --note <text> [--output <file.json>]')
  console.log('  pipeline  same flags as map, plus [--bm25-top <n>] [--enhancer none|keyword|llm] [--llm-top <n>]')
  console.log('            [--llm-endpoint <url>] [--model <name>]')
  console.log('Tuning:')
  console.log('  --id-column <name> --description-column <name> --patterns <patterns.json>')
  console.log('  --k1 <n> --b <n> --high <0-1> --medium <0-1>')
}

async function main(argv: string[]) {
  dotenv.config({ path: appRootPath.path, silent: true })
  const [cmd, ...rest] = argv
  try {
    if (cmd === 'map') await cmdMap(rest)
    else if (cmd === 'pipeline') await cmdPipeline(rest)
    else {
      usage()
      process.exitCode = 1
    }
  } catch (err) {
    error(`Error: ${describeError(err)}`)
    process.exitCode = 1
  }
}

if (require.main === module) {
  void main(process.argv.slice(2))
}

export { cmdMap, cmdPipeline, main }
