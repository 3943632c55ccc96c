import { HttpClient, HttpRequestOptions, isRecord, pick } from '../ai/providers/http'
import { ProviderHooks } from '../ai/providers/types'
import { CallOptions } from '../types'
import {
  IndexDescriptor,
  RawMatch,
  VectorFilter,
  VectorIndexHandle,
  VectorQuery,
  VectorRecord,
  VectorStoreClient,
} from './types'

export interface HttpVectorStoreConfig {
  baseUrl: string
  authToken?: string
  timeoutMs?: number
  hooks?: ProviderHooks
}

type Send = (options: Omit<HttpRequestOptions, 'url'> & { path: string }, call?: CallOptions) => Promise<unknown>

/** Filter in the `[{ field: { $op: value } }]` form the vector server understands. */
export function toServerFilter(filter: VectorFilter | undefined): Record<string, Record<string, unknown>>[] | undefined {
  if (!filter) return undefined
  const clauses: Record<string, Record<string, unknown>>[] = []
  if (filter.source !== undefined) clauses.push({ source: { $eq: filter.source } })
  if (filter.fromChunkIndex !== undefined) clauses.push({ chunkIndex: { $gte: filter.fromChunkIndex } })
  for (const tag of filter.tags ?? []) clauses.push({ tags: { $contains: tag } })
  return clauses.length ? clauses : undefined
}

function resultRows(data: unknown): unknown[] {
  if (Array.isArray(data)) return data
  for (const key of ['results', 'matches', 'data', 'items']) {
    const rows = pick(data, key)
    if (Array.isArray(rows)) return rows
  }
  return []
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

/**
 * REST vector server client. Transport retries and the circuit breaker live
 * in the shared HttpClient; status codes (409, 404) are left for the index
 * manager to interpret.
 */
export class HttpVectorStore implements VectorStoreClient {
  readonly name = 'http'
  readonly maxUpsertBatch = 1000
  private readonly send: Send

  constructor(http: HttpClient, config: HttpVectorStoreConfig) {
    const base = config.baseUrl.replace(/\/+$/, '')
    this.send = async ({ path, ...options }, call) => {
      const res = await http.request(
        {
          ...options,
          url: `${base}/api/v1${path}`,
          headers: config.authToken ? { Authorization: config.authToken } : {},
          timeoutMs: config.timeoutMs,
          signal: call?.signal,
        },
        config.hooks,
      )
      return res.data
    }
  }

  async createIndex(descriptor: IndexDescriptor, options?: CallOptions): Promise<void> {
    await this.send(
      {
        path: '/index/create',
        body: {
          index_name: descriptor.name,
          dim: descriptor.dimension,
          space_type: descriptor.spaceType,
          precision: descriptor.precision,
          M: descriptor.m,
          ef_con: descriptor.efConstruction,
        },
        expectedStatus: [200, 201],
        // a retried create can race itself into a 409
        retries: 0,
      },
      options,
    )
  }

  async getIndex(name: string, options?: CallOptions): Promise<VectorIndexHandle> {
    // 404 when the index is absent
    await this.send({ path: `/index/${encodeURIComponent(name)}/info`, method: 'GET' }, options)
    return new HttpIndexHandle(name, this.send)
  }

  async listIndexes(options?: CallOptions): Promise<unknown> {
    return this.send({ path: '/index/list', method: 'GET' }, options)
  }

  async deleteIndex(name: string, options?: CallOptions): Promise<void> {
    await this.send({ path: `/index/${encodeURIComponent(name)}/delete`, method: 'DELETE', expectedStatus: [200, 204] }, options)
  }
}

class HttpIndexHandle implements VectorIndexHandle {
  private readonly path: string

  constructor(readonly name: string, private readonly send: Send) {
    this.path = `/index/${encodeURIComponent(name)}`
  }

  async describe(options?: CallOptions): Promise<unknown> {
    return this.send({ path: `${this.path}/info`, method: 'GET' }, options)
  }

  async upsert(records: VectorRecord[], options?: CallOptions): Promise<void> {
    await this.send(
      {
        path: `${this.path}/vector/insert`,
        body: records.map((record) => ({ id: record.id, vector: record.vector, meta: record.metadata })),
        expectedStatus: [200, 201],
        retries: 0,
      },
      options,
    )
  }

  async query(query: VectorQuery, options?: CallOptions): Promise<RawMatch[]> {
    const data = await this.send(
      {
        path: `${this.path}/search`,
        body: { vector: query.vector, k: query.topK, ef: query.ef, filter: toServerFilter(query.filter) },
      },
      options,
    )
    const matches: RawMatch[] = []
    for (const row of resultRows(data)) {
      const id = pick(row, 'id')
      if (typeof id !== 'string' && typeof id !== 'number') continue
      matches.push({
        id: String(id),
        similarity: optionalNumber(pick(row, 'similarity')),
        score: optionalNumber(pick(row, 'score')),
        distance: optionalNumber(pick(row, 'distance')),
        metadata: pick(row, 'meta') ?? pick(row, 'metadata'),
      })
    }
    return matches
  }

  async deleteVectors(filter: VectorFilter, options?: CallOptions): Promise<number> {
    const data = await this.send({ path: `${this.path}/vector/delete`, body: { filter: toServerFilter(filter) ?? [] } }, options)
    return optionalNumber(pick(data, 'deleted')) ?? 0
  }

  async listRecords(options: { limit: number } & CallOptions): Promise<{ id: string; metadata: unknown }[]> {
    const data = await this.send({ path: `${this.path}/vector/list?limit=${options.limit}`, method: 'GET' }, options)
    return resultRows(data)
      .filter(isRecord)
      .map((row) => ({ id: String(row.id), metadata: row.meta ?? row.metadata }))
  }
}
