import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../src/errors'
import { chunkDocument, chunkId, countChunks, estimateTokens } from '../src/kb/chunking'

const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe('chunkDocument', () => {
  it('splits a 1000 character document into three overlapping windows', () => {
    const text = 'x'.repeat(1000)
    const chunks = Array.from(chunkDocument({ source: 'guide.md', text }, { chunkSize: 512, overlap: 50 }))
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 512],
      [462, 974],
      [924, 1000],
    ])
    expect(chunks.map((c) => c.chunkIndex)).toEqual([0, 1, 2])
    expect(chunks.every((c) => c.source === 'guide.md')).toBe(true)
  })

  it('returns nothing for an empty document and one chunk for a short one', () => {
    expect(chunkDocument({ source: 'empty.md', text: '' }, { chunkSize: 10, overlap: 3 }).count).toBe(0)
    const short = Array.from(chunkDocument({ source: 'short.md', text: 'hello' }, { chunkSize: 10, overlap: 3 }))
    expect(short).toHaveLength(1)
    expect(short[0]).toMatchObject({ text: 'hello', start: 0, end: 5, chunkIndex: 0 })
  })

  it('shares exactly `overlap` characters between neighbours and covers the whole text', () => {
    const opts = { chunkSize: 10, overlap: 3 }
    for (let length = 1; length <= 60; length++) {
      const text = Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join('')
      const chunks = Array.from(chunkDocument({ source: 'a', text }, opts))
      expect(chunks).toHaveLength(countChunks(length, opts))
      expect(chunks[0].start).toBe(0)
      expect(chunks[chunks.length - 1].end).toBe(length)
      for (let i = 1; i < chunks.length; i++) {
        expect(chunks[i - 1].text.slice(-3)).toBe(chunks[i].text.slice(0, 3))
        expect(chunks[i].start).toBe(chunks[i - 1].end - 3)
      }
      expect(chunks.every((c) => c.text.length <= 10 && c.text === text.slice(c.start, c.end))).toBe(true)
    }
  })

  it('produces disjoint windows when overlap is zero', () => {
    const chunks = Array.from(chunkDocument({ source: 'a', text: 'abcdefghij' }, { chunkSize: 4, overlap: 0 }))
    expect(chunks.map((c) => c.text)).toEqual(['abcd', 'efgh', 'ij'])
  })

  it('can be iterated more than once with identical results', () => {
    const seq = chunkDocument({ source: 'notes.md', text: 'y'.repeat(40) }, { chunkSize: 16, overlap: 4 })
    const first = Array.from(seq).map((c) => c.id)
    const second = Array.from(seq).map((c) => c.id)
    expect(first).toEqual(second)
    expect(seq.count).toBe(first.length)
    expect(first).toHaveLength(4)
  })

  it.each([
    [{ chunkSize: 0, overlap: 0 }],
    [{ chunkSize: 10, overlap: -1 }],
    [{ chunkSize: 10, overlap: 10 }],
    [{ chunkSize: 10, overlap: 12 }],
    [{ chunkSize: 10.5, overlap: 1 }],
  ])('rejects invalid options %j', (opts) => {
    expect(() => chunkDocument({ source: 'a', text: 'abc' }, opts)).toThrow(ConfigurationError)
  })
})

describe('chunkId', () => {
  it('is a stable uuid v5 per source and position', () => {
    const id = chunkId('guide.md', 0)
    expect(id).toMatch(UUID_V5)
    expect(chunkId('guide.md', 0)).toBe(id)
    expect(chunkId('guide.md', 1)).not.toBe(id)
    expect(chunkId('other.md', 0)).not.toBe(id)
  })
})

describe('estimateTokens', () => {
  it('scales the whitespace word count', () => {
    expect(estimateTokens('one two three four five')).toBe(6)
    expect(estimateTokens('')).toBe(2)
  })
})
