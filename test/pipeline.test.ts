import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { KeywordOverlapEnhancer } from '../src/enhance/keywordOverlap'
import { runMappingPipeline } from '../src/pipeline'

const base = {
  controlsFile: 'test/fixtures/controls.csv',
  docFile: 'test/fixtures/service-doc.txt',
  serviceName: 'AWS Timestream',
  threatNote: 'Unauthorized access through misconfigured firewall rules'
}

let dir: string
let messages: string[]
const onProgress = (m: string) => {
  messages.push(m)
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ctrl-mapper-'))
  messages = []
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

describe('runMappingPipeline', () => {
  it('maps with BM25 only when no enhancer is given', async () => {
    const res = await runMappingPipeline({ ...base, onProgress })
    expect(res.mapping).toEqual({ 'AWS Timestream': { '1': 'high', '2': 'medium', '3': 'medium', '4': 'low' } })
    expect(res.simple).toEqual(res.mapping)
    expect(res.candidates).toEqual(res.mapping)
    expect(res.enriched).toEqual({ 'AWS Timestream': {} })
    expect(res.outputPath).toBeUndefined()
    expect(res.ranked.map((r) => r.id)).toEqual(['1', '2', '3', '4'])
    expect(res.ranked[2].normalizedScore).toBeCloseTo(0.5, 6)
  })

  it('enhances, merges and writes the detailed results', async () => {
    const outputFile = path.join(dir, 'out', 'results.json')
    const res = await runMappingPipeline({ ...base, outputFile, enhancer: new KeywordOverlapEnhancer(), onProgress })

    expect(messages.slice(0, 6)).toEqual([
      'Initializing pipeline for AWS Timestream',
      'Loaded 4 control policies',
      'BM25 mapping: 1 high, 2 medium, 1 low',
      'Identified 4 candidate controls',
      'Enhancing top 5 controls with keyword-overlap',
      `Results saved to: ${outputFile}`
    ])
    expect(messages).toContain('Controls matched by BM25: 4')
    expect(messages).toContain('Applicable controls: 1')
    expect(res.simple).toEqual({ 'AWS Timestream': { '2': 'medium' } })
    expect(res.detailed['AWS Timestream']['2']).toEqual({
      confidence: 'medium',
      baseConfidence: 'medium',
      applicable: true,
      justification: 'Moderate keyword match between control and documentation.',
      source: 'keyword-overlap',
      description: 'encryption at rest and in transit'
    })

    const written = JSON.parse(await fs.readFile(outputFile, 'utf-8'))
    expect(written).toEqual(res.detailed)
    expect(await fs.readdir(path.dirname(outputFile))).toEqual(['results.json'])
  })

  it('keeps BM25 levels for controls beyond the enhancement cap', async () => {
    const res = await runMappingPipeline({
      ...base,
      enhancer: new KeywordOverlapEnhancer(),
      maxEnhancedControls: 2,
      onProgress
    })
    expect(Object.keys(res.enriched['AWS Timestream'])).toEqual(['1', '2'])
    expect(res.simple).toEqual({ 'AWS Timestream': { '2': 'medium', '3': 'medium', '4': 'low' } })
    expect(res.detailed['AWS Timestream']['3'].source).toBe('bm25')
  })

  it('limits the results to the top BM25 candidates', async () => {
    const res = await runMappingPipeline({ ...base, bm25Top: 3, onProgress })
    expect(res.candidates).toEqual({ 'AWS Timestream': { '1': 'high', '2': 'medium', '3': 'medium' } })
    expect(res.simple).toEqual(res.candidates)
    expect(Object.keys(res.detailed['AWS Timestream'])).toEqual(['1', '2', '3'])
    expect(Object.keys(res.mapping['AWS Timestream'])).toEqual(['1', '2', '3', '4'])
    expect(messages).toContain('Identified 3 candidate controls')
    expect(messages).toContain('Controls matched by BM25: 3')
  })

  it('enhances only controls inside the candidate cap', async () => {
    const res = await runMappingPipeline({ ...base, bm25Top: 2, enhancer: new KeywordOverlapEnhancer(), onProgress })
    expect(Object.keys(res.enriched['AWS Timestream'])).toEqual(['1', '2'])
    expect(res.detailed['AWS Timestream']['1']).toMatchObject({ confidence: 'low', baseConfidence: 'high', applicable: false })
    expect(res.simple).toEqual({ 'AWS Timestream': { '2': 'medium' } })
  })
})
