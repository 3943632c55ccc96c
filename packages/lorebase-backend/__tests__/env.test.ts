import { describe, expect, it, vi } from 'vitest'
import { loadEnvConfig } from '../src/env'

function quietLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}

describe('loadEnvConfig', () => {
  it('falls back to single-node defaults', () => {
    const config = loadEnvConfig({}, quietLogger())
    expect(config.index).toEqual({
      name: 'rag_documents',
      dimension: 384,
      spaceType: 'cosine',
      precision: 'int8d',
      m: 16,
      efConstruction: 128,
    })
    expect(config.chunking).toEqual({ chunkSize: 512, overlap: 50 })
    expect(config.retrieval).toEqual({ topK: 5, ef: 128, relevanceFloor: 0.5 })
    expect(config.generation.order).toEqual(['openai', 'groq', 'local'])
    expect(config.generation.timeoutMs).toBe(30000)
    expect(config.embedding.provider).toBe('local')
    expect(config.vectorStore.kind).toBe('memory')
    expect(config.local.baseUrl).toBe('http://localhost:11434')
  })

  it('picks postgres when a connection string is present', () => {
    const config = loadEnvConfig({ POSTGRES_URL: 'postgres://localhost/kb' }, quietLogger())
    expect(config.vectorStore).toMatchObject({ kind: 'postgres', postgresUrl: 'postgres://localhost/kb' })
  })

  it('falls back to memory when the http store has no URL', () => {
    const logger = quietLogger()
    const config = loadEnvConfig({ VECTOR_STORE: 'http' }, logger)
    expect(config.vectorStore.kind).toBe('memory')
    expect(logger.warn).toHaveBeenCalledWith('[env] VECTOR_STORE=http but VECTOR_STORE_URL is not set; using in-memory index.')
  })

  it('replaces unknown enum values with the default and warns', () => {
    const logger = quietLogger()
    const config = loadEnvConfig({ KB_SPACE_TYPE: 'hamming', KB_PRECISION: 'FLOAT16' }, logger)
    expect(config.index.spaceType).toBe('cosine')
    expect(config.index.precision).toBe('float16')
    expect(logger.warn).toHaveBeenCalledWith('[env] KB_SPACE_TYPE=hamming is not one of cosine, l2, ip; using cosine')
  })

  it('keeps only known generation providers, in the given order', () => {
    const logger = quietLogger()
    const config = loadEnvConfig({ GENERATION_PROVIDERS: 'local, bogus ,ECHO' }, logger)
    expect(config.generation.order).toEqual(['local', 'echo'])
    expect(logger.warn).toHaveBeenCalledWith('[env] ignoring unknown generation providers: bogus')
  })

  it('parses numeric settings and ignores garbage', () => {
    const config = loadEnvConfig({ CHUNK_SIZE: '256', CHUNK_OVERLAP: 'lots', RETRIEVAL_RELEVANCE_FLOOR: '0.35' }, quietLogger())
    expect(config.chunking).toEqual({ chunkSize: 256, overlap: 50 })
    expect(config.retrieval.relevanceFloor).toBe(0.35)
  })
})
