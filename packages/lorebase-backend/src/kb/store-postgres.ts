import { IndexNotFoundError } from '../errors'
import { pick } from '../ai/providers/http'
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

export interface PgResult {
  rows: unknown[]
  rowCount?: number | null
}

/** The subset of `pg.Pool` the store uses; lets tests substitute an in-process fake. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<PgResult>
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgQueryable & { release(): void }>
}

const OPERATORS: Record<SpaceType, { ops: string; distance: string }> = {
  cosine: { ops: 'vector_cosine_ops', distance: '<=>' },
  l2: { ops: 'vector_l2_ops', distance: '<->' },
  ip: { ops: 'vector_ip_ops', distance: '<#>' },
}

function tableName(index: string) {
  // index names are validated to [A-Za-z0-9_-] before they reach here
  return `"kb_vectors_${index}"`
}

export function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(',')}]`
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value
  if (typeof value === 'string' && value !== '') return Number(value)
  return undefined
}

async function withTransaction<T>(pool: PgPoolLike, fn: (client: PgQueryable) => Promise<T>): Promise<T> {
  const client = await pool.connect()
  try {
    await client.query('begin')
    const result = await fn(client)
    await client.query('commit')
    return result
  } catch (e) {
    await client.query('rollback')
    throw e
  } finally {
    client.release()
  }
}

export function filterClause(filter: VectorFilter | undefined, values: unknown[]): string {
  const clauses: string[] = []
  if (filter?.source !== undefined) {
    values.push(filter.source)
    clauses.push(`source = $${values.length}`)
  }
  if (filter?.fromChunkIndex !== undefined) {
    values.push(filter.fromChunkIndex)
    clauses.push(`chunk_index >= $${values.length}`)
  }
  if (filter?.tags?.length) {
    values.push(filter.tags)
    clauses.push(`tags @> $${values.length}::text[]`)
  }
  return clauses.length ? `where ${clauses.join(' and ')}` : ''
}

/**
 * pgvector-backed store. A registry table records each index's descriptor;
 * every index gets its own table with an HNSW index over the embedding column.
 */
export class PostgresVectorStore implements VectorStoreClient {
  readonly name = 'postgres'
  readonly maxUpsertBatch = 1000
  private ready?: Promise<void>

  constructor(private readonly pool: PgPoolLike) {}

  init(): Promise<void> {
    this.ready ??= this.pool
      .query(
        `create extension if not exists vector;
        create table if not exists kb_indexes (
          name text primary key,
          dimension integer not null,
          space_type text not null,
          precision text not null,
          m integer not null,
          ef_construction integer not null,
          created_at timestamptz not null default now()
        );`,
      )
      .then(
        () => undefined,
        (err: unknown) => {
          this.ready = undefined
          throw err
        },
      )
    return this.ready
  }

  async createIndex(descriptor: IndexDescriptor): Promise<void> {
    await this.init()
    const table = tableName(descriptor.name)
    const { ops } = OPERATORS[descriptor.spaceType]
    await withTransaction(this.pool, async (client) => {
      // a concurrent creator makes this insert fail with 23505
      await client.query(
        `insert into kb_indexes(name, dimension, space_type, precision, m, ef_construction) values ($1,$2,$3,$4,$5,$6)`,
        [descriptor.name, descriptor.dimension, descriptor.spaceType, descriptor.precision, descriptor.m, descriptor.efConstruction],
      )
      await client.query(
        `create table ${table} (
          id text primary key,
          source text not null,
          chunk_index integer not null,
          tags text[] not null default '{}',
          metadata jsonb not null,
          embedding vector(${descriptor.dimension}) not null
        )`,
      )
      await client.query(
        `create index on ${table} using hnsw (embedding ${ops}) with (m = ${descriptor.m}, ef_construction = ${descriptor.efConstruction})`,
      )
      await client.query(`create index on ${table} (source, chunk_index)`)
    })
  }

  async getIndex(name: string): Promise<VectorIndexHandle> {
    await this.init()
    const { rows } = await this.pool.query('select name, space_type from kb_indexes where name = $1', [name])
    const spaceType = pick(rows[0], 'space_type')
    if (!rows.length) throw new IndexNotFoundError(name)
    return new PostgresIndexHandle(this.pool, name, spaceType === 'l2' || spaceType === 'ip' ? spaceType : 'cosine')
  }

  async listIndexes(): Promise<unknown> {
    await this.init()
    const { rows } = await this.pool.query('select name from kb_indexes order by name')
    return rows
  }

  async deleteIndex(name: string): Promise<void> {
    await this.init()
    await withTransaction(this.pool, async (client) => {
      const { rowCount } = await client.query('delete from kb_indexes where name = $1', [name])
      if (!rowCount) throw new IndexNotFoundError(name)
      await client.query(`drop table if exists ${tableName(name)}`)
    })
  }
}

class PostgresIndexHandle implements VectorIndexHandle {
  private readonly table: string

  constructor(private readonly pool: PgPoolLike, readonly name: string, private readonly spaceType: SpaceType) {
    this.table = tableName(name)
  }

  async describe(): Promise<unknown> {
    const { rows } = await this.pool.query(
      `select name, dimension, space_type, precision, m, ef_construction,
         (select count(*) from ${this.table}) as total_elements
         from kb_indexes where name = $1`,
      [this.name],
    )
    if (!rows.length) throw new IndexNotFoundError(this.name)
    return rows[0]
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (!records.length) return
    const values: unknown[] = []
    const tuples = records.map((record) => {
      values.push(
        record.id,
        record.metadata.source,
        record.metadata.chunkIndex,
        record.metadata.tags,
        JSON.stringify(record.metadata),
        toVectorLiteral(record.vector),
      )
      const n = values.length
      return `($${n - 5},$${n - 4},$${n - 3},$${n - 2},$${n - 1}::jsonb,$${n}::vector)`
    })
    await this.pool.query(
      `insert into ${this.table} (id, source, chunk_index, tags, metadata, embedding) values ${tuples.join(',')}
       on conflict (id) do update set
         source = excluded.source,
         chunk_index = excluded.chunk_index,
         tags = excluded.tags,
         metadata = excluded.metadata,
         embedding = excluded.embedding`,
      values,
    )
  }

  async query(query: VectorQuery): Promise<RawMatch[]> {
    const { distance } = OPERATORS[this.spaceType]
    const values: unknown[] = [toVectorLiteral(query.vector)]
    const where = filterClause(query.filter, values)
    values.push(query.topK)
    const limit = `$${values.length}`
    const { rows } = await withTransaction(this.pool, async (client) => {
      await client.query(`select set_config('hnsw.ef_search', $1, true)`, [String(query.ef)])
      return client.query(
        `select id, metadata, embedding ${distance} $1::vector as distance from ${this.table} ${where}
         order by embedding ${distance} $1::vector limit ${limit}`,
        values,
      )
    })
    return rows.map((row) => {
      const d = toNumber(pick(row, 'distance')) ?? Number.POSITIVE_INFINITY
      return { id: String(pick(row, 'id')), distance: d, metadata: pick(row, 'metadata') }
    })
  }

  async deleteVectors(filter: VectorFilter): Promise<number> {
    const values: unknown[] = []
    const { rowCount } = await this.pool.query(`delete from ${this.table} ${filterClause(filter, values)}`, values)
    return rowCount ?? 0
  }

  async listRecords(options: { limit: number }): Promise<{ id: string; metadata: unknown }[]> {
    const { rows } = await this.pool.query(`select id, metadata from ${this.table} order by source, chunk_index limit $1`, [
      options.limit,
    ])
    return rows.map((row) => ({ id: String(pick(row, 'id')), metadata: pick(row, 'metadata') }))
  }
}
