import { ConfigurationError, IndexConflictError, IndexNotFoundError } from '../errors'
import { isRecord } from '../ai/providers/http'
import {
  IndexDescriptor,
  RawMatch,
  SpaceType,
  VectorFilter,
  VectorIndexHandle,
  VectorQuery,
  VectorRecord,
  VectorStoreClient,
} from './types'

interface MemoryIndex {
  descriptor: IndexDescriptor
  records: Map<string, VectorRecord>
  createdAt: string
}

export function matchesFilter(metadata: unknown, filter: VectorFilter | undefined): boolean {
  if (!filter) return true
  if (!isRecord(metadata)) return false
  if (filter.source !== undefined && metadata.source !== filter.source) return false
  if (filter.fromChunkIndex !== undefined) {
    const index = metadata.chunkIndex
    if (typeof index !== 'number' || index < filter.fromChunkIndex) return false
  }
  if (filter.tags?.length) {
    const tags = Array.isArray(metadata.tags) ? metadata.tags : []
    if (!filter.tags.every((tag) => tags.includes(tag))) return false
  }
  return true
}

function dot(a: number[], b: number[]) {
  let sum = 0
  for (let i = 0; i < Math.min(a.length, b.length); i++) sum += a[i] * b[i]
  return sum
}

export function cosineSimilarity(a: number[], b: number[]) {
  const denom = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b))
  return denom === 0 ? 0 : dot(a, b) / denom
}

function euclidean(a: number[], b: number[]) {
  let sum = 0
  for (let i = 0; i < Math.min(a.length, b.length); i++) sum += (a[i] - b[i]) ** 2
  return Math.sqrt(sum)
}

function scoreMatch(spaceType: SpaceType, query: number[], record: VectorRecord): RawMatch {
  switch (spaceType) {
    case 'cosine':
      return { id: record.id, similarity: cosineSimilarity(query, record.vector), metadata: record.metadata }
    case 'l2':
      return { id: record.id, distance: euclidean(query, record.vector), metadata: record.metadata }
    case 'ip':
      return { id: record.id, score: dot(query, record.vector), metadata: record.metadata }
  }
}

function rankValue(match: RawMatch) {
  return match.similarity ?? match.score ?? -(match.distance ?? 0)
}

/**
 * In-process vector store with exact (brute force) search. Used by tests and
 * single-node development; nothing survives a restart.
 */
export class MemoryVectorStore implements VectorStoreClient {
  readonly name = 'memory'
  private readonly indexes = new Map<string, MemoryIndex>()

  constructor(readonly maxUpsertBatch = 1000) {}

  async createIndex(descriptor: IndexDescriptor): Promise<void> {
    if (this.indexes.has(descriptor.name)) throw new IndexConflictError(descriptor.name)
    this.indexes.set(descriptor.name, { descriptor: { ...descriptor }, records: new Map(), createdAt: new Date().toISOString() })
  }

  async getIndex(name: string): Promise<VectorIndexHandle> {
    const index = this.indexes.get(name)
    if (!index) throw new IndexNotFoundError(name)
    return new MemoryIndexHandle(name, () => this.live(name, index), this.maxUpsertBatch)
  }

  async listIndexes(): Promise<unknown> {
    return {
      indexes: Array.from(this.indexes.values()).map((index) => ({
        name: index.descriptor.name,
        dimension: index.descriptor.dimension,
        count: index.records.size,
      })),
    }
  }

  async deleteIndex(name: string): Promise<void> {
    if (!this.indexes.delete(name)) throw new IndexNotFoundError(name)
  }

  /** A handle outlives its index only until the next call on it. */
  private live(name: string, index: MemoryIndex): MemoryIndex {
    if (this.indexes.get(name) !== index) throw new IndexNotFoundError(name)
    return index
  }
}

class MemoryIndexHandle implements VectorIndexHandle {
  constructor(
    readonly name: string,
    private readonly resolve: () => MemoryIndex,
    private readonly maxUpsertBatch: number,
  ) {}

  async describe(): Promise<unknown> {
    const { descriptor, records, createdAt } = this.resolve()
    return {
      name: descriptor.name,
      dimension: descriptor.dimension,
      space_type: descriptor.spaceType,
      precision: descriptor.precision,
      M: descriptor.m,
      ef_con: descriptor.efConstruction,
      total_elements: records.size,
      created_at: createdAt,
    }
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    const index = this.resolve()
    if (records.length > this.maxUpsertBatch) {
      throw new ConfigurationError(`upsert of ${records.length} records exceeds the store limit of ${this.maxUpsertBatch}`)
    }
    for (const record of records) {
      if (record.vector.length !== index.descriptor.dimension) {
        throw new ConfigurationError(
          `record ${record.id} has dimension ${record.vector.length}; index ${this.name} expects ${index.descriptor.dimension}`,
        )
      }
    }
    for (const record of records) {
      index.records.set(record.id, { id: record.id, vector: [...record.vector], metadata: { ...record.metadata } })
    }
  }

  async query(query: VectorQuery): Promise<RawMatch[]> {
    const index = this.resolve()
    if (query.vector.length !== index.descriptor.dimension) {
      throw new ConfigurationError(
        `query vector has dimension ${query.vector.length}; index ${this.name} expects ${index.descriptor.dimension}`,
      )
    }
    const matches: RawMatch[] = []
    for (const record of index.records.values()) {
      if (!matchesFilter(record.metadata, query.filter)) continue
      matches.push(scoreMatch(index.descriptor.spaceType, query.vector, record))
    }
    return matches
      .sort((a, b) => rankValue(b) - rankValue(a) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, query.topK)
  }

  async deleteVectors(filter: VectorFilter): Promise<number> {
    const index = this.resolve()
    let removed = 0
    for (const [id, record] of index.records) {
      if (!matchesFilter(record.metadata, filter)) continue
      index.records.delete(id)
      removed++
    }
    return removed
  }

  async listRecords(options: { limit: number }): Promise<{ id: string; metadata: unknown }[]> {
    return Array.from(this.resolve().records.values())
      .slice(0, options.limit)
      .map((record) => ({ id: record.id, metadata: record.metadata }))
  }
}
