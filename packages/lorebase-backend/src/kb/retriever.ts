import { ConfigurationError, errorMessage, isAbortError, StoreUnavailableError } from '../errors'
import { isRecord, pick } from '../ai/providers/http'
import { CallOptions, Logger } from '../types'
import { EmbeddingClient } from './embeddings'
import { IndexManager } from './index-manager'
import { RawMatch, RetrievedChunk, SpaceType, VectorFilter } from './types'

export const MAX_TOP_K = 512
export const MAX_EF = 1024

export interface RetrieveOptions extends CallOptions {
  topK?: number
  /** HNSW search breadth. */
  ef?: number
  minScore?: number
  filter?: VectorFilter
}

export interface RetrieverOptions {
  indexName: string
  spaceType: SpaceType
  defaultTopK?: number
  defaultEf?: number
  logger?: Logger
}

function checkRange(label: string, value: number, max: number) {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new ConfigurationError(`${label} must be an integer between 1 and ${max} (got ${value})`)
  }
}

/**
 * Maps whatever relevance figure the store returned onto [0, 1] (cosine, l2)
 * or the raw dot product (ip). Similarity wins over score, score over distance.
 */
export function normalizeScore(match: RawMatch, spaceType: SpaceType): number {
  const score = rawScore(match, spaceType)
  // NaN would make the ranking comparator inconsistent
  return Number.isFinite(score) ? score : 0
}

function rawScore(match: RawMatch, spaceType: SpaceType): number {
  if (typeof match.similarity === 'number') return match.similarity
  if (typeof match.score === 'number') return match.score
  if (typeof match.distance === 'number') {
    const d = match.distance
    switch (spaceType) {
      case 'cosine':
        return 1 - d
      case 'l2':
        return 1 / (1 + d)
      case 'ip':
        // pgvector reports the negated inner product as a distance
        return -d
    }
  }
  return 0
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

export function toRetrievedChunk(match: RawMatch, score: number): RetrievedChunk | null {
  const meta = match.metadata
  if (!isRecord(meta)) return null
  const text = pick(meta, 'text')
  const source = pick(meta, 'source')
  const chunkIndex = pick(meta, 'chunkIndex')
  if (typeof text !== 'string' || typeof source !== 'string') return null
  return {
    id: match.id,
    text,
    source,
    chunkIndex: typeof chunkIndex === 'number' ? chunkIndex : 0,
    score,
    tags: stringArray(pick(meta, 'tags')),
  }
}

export function rankChunks(chunks: RetrievedChunk[]): RetrievedChunk[] {
  return [...chunks].sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
}

/**
 * Top-k similarity search over one index. Absent indexes and unreachable
 * stores degrade to an empty result so that a query can still produce the
 * no-context answer; embedding failures and an index built for another
 * embedding model are not swallowed.
 */
export class Retriever {
  private readonly logger: Logger
  private readonly defaultTopK: number
  private readonly defaultEf: number
  // set once the live index has been checked against the embedding dimension
  private verified = false

  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly indexes: IndexManager,
    private readonly opts: RetrieverOptions,
  ) {
    this.logger = opts.logger ?? console
    this.defaultTopK = opts.defaultTopK ?? 5
    this.defaultEf = opts.defaultEf ?? 128
    checkRange('topK', this.defaultTopK, MAX_TOP_K)
    checkRange('ef', this.defaultEf, MAX_EF)
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievedChunk[]> {
    const topK = options.topK ?? this.defaultTopK
    const ef = options.ef ?? this.defaultEf
    checkRange('topK', topK, MAX_TOP_K)
    checkRange('ef', ef, MAX_EF)
    if (!query.trim()) return []

    const started = Date.now()
    const vector = await this.embeddings.embedQuery(query, options)

    let matches: RawMatch[]
    try {
      const handle = await this.indexes.getIndex(this.opts.indexName, options)
      if (!handle) {
        this.verified = false
        this.logger.warn('[retrieve] index absent; returning no results', { index: this.opts.indexName })
        return []
      }
      if (!this.verified) {
        await this.indexes.verifyIndex(
          handle,
          { name: this.opts.indexName, dimension: this.embeddings.dimension, spaceType: this.opts.spaceType },
          options,
        )
        this.verified = true
      }
      matches = await handle.query({ vector, topK, ef, filter: options.filter }, { signal: options.signal })
    } catch (err) {
      if (isAbortError(err) || options.signal?.aborted) throw err
      if (err instanceof ConfigurationError) throw err
      this.logger.warn('[retrieve] vector store unavailable; returning no results', {
        index: this.opts.indexName,
        store: err instanceof StoreUnavailableError ? err.provider : this.indexes.storeName,
        error: errorMessage(err),
      })
      return []
    }

    const chunks: RetrievedChunk[] = []
    for (const match of matches) {
      const chunk = toRetrievedChunk(match, normalizeScore(match, this.opts.spaceType))
      if (!chunk) continue
      if (options.minScore !== undefined && chunk.score < options.minScore) continue
      chunks.push(chunk)
    }
    const ranked = rankChunks(chunks).slice(0, topK)
    this.logger.debug?.('[retrieve] done', { index: this.opts.indexName, results: ranked.length, ms: Date.now() - started })
    return ranked
  }
}
