import { describe, expect, it } from 'vitest'
import { Bm25Index } from './bm25'
import { CatalogFormatError, MappingConfigError, UnknownControlError } from './errors'

const docs = [
  { id: '1', terms: ['network', 'firewall', 'access', 'control'] },
  { id: '2', terms: ['encryption', 'rest', 'transit'] }
]

// idf for a term found in one of two documents: ln((2 - 1 + 0.5) / (1 + 0.5) + 1) = ln 2
const single = (len: number) => (Math.log(2) * 2.5) / (1 + 1.5 * (0.25 + (0.75 * len) / 3.5))

describe('Bm25Index', () => {
  it('computes corpus statistics', () => {
    const index = new Bm25Index(docs)
    expect(index.documentCount).toBe(2)
    expect(index.averageDocumentLength).toBe(3.5)
    expect(index.documentFrequency('firewall')).toBe(1)
    expect(index.documentFrequency('unknown')).toBe(0)
    expect(index.documentLength('2')).toBe(3)
    expect(index.inverseDocumentFrequency('rest')).toBeCloseTo(Math.log(2), 12)
  })

  it('scores a term with the BM25 formula', () => {
    const index = new Bm25Index(docs)
    expect(index.score(['firewall'], '1')).toBeCloseTo(single(4), 12)
    expect(index.score(['rest'], '2')).toBeCloseTo(single(3), 12)
    expect(index.score(['firewall'], '2')).toBe(0)
  })

  it('counts repeated query terms each time', () => {
    const index = new Bm25Index(docs)
    expect(index.score(['firewall', 'firewall'], '1')).toBeCloseTo(2 * single(4), 12)
  })

  it('uses the configured k1 and b', () => {
    const index = new Bm25Index(docs, { k1: 1.2, b: 0 })
    // b = 0 removes length normalization: ln2 * 2.2 / (1 + 1.2)
    expect(index.score(['firewall'], '1')).toBeCloseTo(Math.log(2), 12)
  })

  it('keeps idf positive for a term in every document', () => {
    const index = new Bm25Index([
      { id: 'a', terms: ['x'] },
      { id: 'b', terms: ['x'] },
      { id: 'c', terms: ['x', 'y'] }
    ])
    expect(index.inverseDocumentFrequency('x')).toBeCloseTo(Math.log(0.5 / 3.5 + 1), 12)
    expect(index.score(['x'], 'a')).toBeGreaterThan(0)
  })

  it('returns every control in catalog order from scoreAll', () => {
    const index = new Bm25Index(docs)
    expect([...index.scoreAll(['rest']).keys()]).toEqual(['1', '2'])
  })

  it('ranks by score and breaks ties by catalog order', () => {
    const index = new Bm25Index([
      { id: 'a', terms: ['audit'] },
      { id: 'b', terms: ['firewall'] },
      { id: 'c', terms: ['firewall'] }
    ])
    expect(index.rank(['firewall']).map((r) => r.id)).toEqual(['b', 'c', 'a'])
    expect(index.rank(['nothing']).map((r) => r.id)).toEqual(['a', 'b', 'c'])
  })

  it('rejects unknown control ids', () => {
    const index = new Bm25Index(docs)
    expect(() => index.score(['firewall'], '99')).toThrow(UnknownControlError)
    expect(() => index.documentLength('99')).toThrow(UnknownControlError)
  })

  it('rejects duplicate ids and invalid parameters', () => {
    expect(() => new Bm25Index([docs[0], docs[0]])).toThrow(CatalogFormatError)
    expect(() => new Bm25Index(docs, { b: 1.5 })).toThrow(MappingConfigError)
    expect(() => new Bm25Index(docs, { k1: -1 })).toThrow(MappingConfigError)
  })

  it('scores zero over a corpus of empty descriptions', () => {
    const index = new Bm25Index([
      { id: 'a', terms: [] },
      { id: 'b', terms: [] }
    ])
    expect(index.averageDocumentLength).toBe(0)
    expect([...index.scoreAll(['x']).values()]).toEqual([0, 0])
  })

  it('tokenizes control descriptions in fromControls', () => {
    const index = Bm25Index.fromControls([
      { id: '1', description: 'Network firewall access control', attributes: {}, row: 2 },
      { id: '2', description: 'Encryption at rest and in transit', attributes: {}, row: 3 }
    ])
    expect(index.controlIds).toEqual(['1', '2'])
    expect(index.documentLength('2')).toBe(3)
    expect(index.score(['firewall'], '1')).toBeCloseTo(single(4), 12)
  })
})
