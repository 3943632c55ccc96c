import {
  ConfigurationError,
  HttpError,
  IndexConflictError,
  IndexNotFoundError,
  StoreUnavailableError,
  errorMessage,
  isAbortError,
  isNetworkError,
  isTransientError,
} from '../errors'
import { isRecord, pick } from '../ai/providers/http'
import { withRetry } from '../ai/providers/resilience'
import { CallOptions, Logger } from '../types'
import { IndexDescriptor, Precision, SpaceType, VectorIndexHandle, VectorStoreClient } from './types'

export interface IndexManagerOptions {
  logger?: Logger
  retries?: number
  retryDelayMs?: number
}

const INDEX_NAME = /^[A-Za-z0-9_-]{1,64}$/
// Codes various backends use for "already exists" / "does not exist".
const CONFLICT_CODES = new Set(['23505', '42P07', '42710', 'index_exists'])
const NOT_FOUND_CODES = new Set(['42P01', 'index_not_found'])

function codeOf(err: unknown): string | undefined {
  const code = pick(err, 'code')
  return typeof code === 'string' ? code : undefined
}

export function isConflictError(err: unknown): boolean {
  if (err instanceof IndexConflictError) return true
  if (err instanceof HttpError) return err.status === 409 || /already exists/i.test(JSON.stringify(err.data ?? ''))
  const code = codeOf(err)
  if (code && CONFLICT_CODES.has(code)) return true
  return err instanceof Error && /already exists/i.test(err.message)
}

export function isNotFoundError(err: unknown): boolean {
  if (err instanceof IndexNotFoundError) return true
  if (err instanceof HttpError) return err.status === 404
  if (isNetworkError(err)) return false
  const code = codeOf(err)
  if (code && NOT_FOUND_CODES.has(code)) return true
  return err instanceof Error && /\b(not found|does not exist|no such index)\b/i.test(err.message)
}

export function validateDescriptor(descriptor: IndexDescriptor): void {
  if (!INDEX_NAME.test(descriptor.name)) {
    throw new ConfigurationError(`index name must match ${INDEX_NAME} (got ${JSON.stringify(descriptor.name)})`)
  }
  if (!Number.isInteger(descriptor.dimension) || descriptor.dimension < 1) {
    throw new ConfigurationError(`index dimension must be a positive integer (got ${descriptor.dimension})`)
  }
  if (!Number.isInteger(descriptor.m) || descriptor.m < 2) {
    throw new ConfigurationError(`HNSW m must be an integer >= 2 (got ${descriptor.m})`)
  }
  if (!Number.isInteger(descriptor.efConstruction) || descriptor.efConstruction < 1) {
    throw new ConfigurationError(`HNSW efConstruction must be a positive integer (got ${descriptor.efConstruction})`)
  }
}

function nameOf(entry: unknown): string | undefined {
  if (typeof entry === 'string') return entry
  for (const key of ['name', 'index_name', 'indexName', 'id']) {
    const value = pick(entry, key)
    if (typeof value === 'string') return value
  }
  return undefined
}

/**
 * Backends disagree on how they list indexes: a bare array of names, an array
 * of descriptor objects, or either of those wrapped in an envelope. This is
 * the only place that knows about those shapes.
 */
export function normalizeIndexNames(raw: unknown): string[] {
  let entries: unknown[] = []
  if (Array.isArray(raw)) {
    entries = raw
  } else if (typeof raw === 'string') {
    entries = [raw]
  } else if (isRecord(raw)) {
    const envelope = ['indexes', 'indices', 'data', 'results', 'items', 'names'].map((k) => raw[k]).find(Array.isArray)
    if (envelope) entries = envelope
    else if (nameOf(raw)) entries = [raw]
    // keyed by index name: { docs: { dimension: 384 }, ... }
    else if (Object.values(raw).every(isRecord)) entries = Object.keys(raw)
  }
  const names = new Set<string>()
  for (const entry of entries) {
    const name = nameOf(entry)
    if (name) names.add(name)
  }
  return Array.from(names).sort()
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

function firstDefined(source: unknown, keys: string[]): unknown {
  for (const key of keys) {
    const value = pick(source, key)
    if (value !== undefined && value !== null) return value
  }
  return undefined
}

export function normalizeSpaceType(value: unknown): SpaceType | undefined {
  if (typeof value !== 'string') return undefined
  const v = value.toLowerCase()
  if (v === 'cosine' || v === 'cos') return 'cosine'
  if (v === 'l2' || v === 'euclidean') return 'l2'
  if (v === 'ip' || v === 'dot' || v === 'inner_product' || v === 'innerproduct') return 'ip'
  return undefined
}

function normalizePrecision(value: unknown): Precision | undefined {
  if (typeof value !== 'string') return undefined
  const v = value.toLowerCase()
  if (v === 'binary' || v === 'binary2') return 'binary'
  if (v === 'int8d' || v === 'int16d' || v === 'float16' || v === 'float32') return v
  return undefined
}

export type IndexInfo = Partial<Omit<IndexDescriptor, 'name'>> & { name: string }

/** What a caller needs from an existing index; tuning fields are compared only when given. */
export type IndexExpectation = Pick<IndexDescriptor, 'name' | 'dimension' | 'spaceType'> &
  Partial<Pick<IndexDescriptor, 'precision' | 'm' | 'efConstruction'>>

export function normalizeIndexInfo(raw: unknown, fallbackName: string): IndexInfo {
  const body = firstDefined(raw, ['index', 'info', 'data']) ?? raw
  const name = nameOf(body)
  return {
    name: name ?? fallbackName,
    dimension: toNumber(firstDefined(body, ['dimension', 'dim', 'dimensions'])),
    spaceType: normalizeSpaceType(firstDefined(body, ['spaceType', 'space_type', 'metric', 'space'])),
    precision: normalizePrecision(firstDefined(body, ['precision', 'quantization'])),
    m: toNumber(firstDefined(body, ['m', 'M'])),
    efConstruction: toNumber(firstDefined(body, ['efConstruction', 'ef_construction', 'ef_con'])),
  }
}

function sameDescriptor(a: IndexDescriptor, b: IndexDescriptor): boolean {
  return (
    a.dimension === b.dimension &&
    a.spaceType === b.spaceType &&
    a.precision === b.precision &&
    a.m === b.m &&
    a.efConstruction === b.efConstruction
  )
}

/**
 * Owns the lifecycle of named vector indexes. All lifecycle calls are
 * idempotent: creating an index that appears concurrently, or deleting one
 * that is already gone, is not an error.
 */
export class IndexManager {
  private readonly logger: Logger
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly inflight = new Map<string, { descriptor: IndexDescriptor; run: Promise<VectorIndexHandle> }>()

  constructor(private readonly store: VectorStoreClient, opts: IndexManagerOptions = {}) {
    this.logger = opts.logger ?? console
    this.retries = opts.retries ?? 3
    this.retryDelayMs = opts.retryDelayMs ?? 200
  }

  get storeName(): string {
    return this.store.name
  }

  get maxUpsertBatch(): number | undefined {
    return this.store.maxUpsertBatch
  }

  /**
   * Concurrent calls for the same name share one round trip. A call whose
   * descriptor differs from the one in flight still has its own descriptor
   * checked against the index that round trip produces.
   */
  ensureIndex(descriptor: IndexDescriptor, options: CallOptions = {}): Promise<VectorIndexHandle> {
    try {
      validateDescriptor(descriptor)
    } catch (err) {
      return Promise.reject(err)
    }
    const pending = this.inflight.get(descriptor.name)
    if (pending) {
      if (sameDescriptor(pending.descriptor, descriptor)) return pending.run
      return pending.run.then(async (handle) => {
        await this.verifyIndex(handle, descriptor, options)
        return handle
      })
    }
    const run = this.createOrFetch(descriptor, options).finally(() => this.inflight.delete(descriptor.name))
    this.inflight.set(descriptor.name, { descriptor, run })
    return run
  }

  async getIndex(name: string, options: CallOptions = {}): Promise<VectorIndexHandle | null> {
    try {
      return await this.call('getIndex', () => this.store.getIndex(name, options), options)
    } catch (err) {
      if (isNotFoundError(err)) return null
      throw err
    }
  }

  async describeIndex(name: string, options: CallOptions = {}): Promise<IndexInfo | null> {
    const handle = await this.getIndex(name, options)
    if (!handle) return null
    const raw = await this.call('describe', () => handle.describe(options), options)
    return normalizeIndexInfo(raw, name)
  }

  async listIndexes(options: CallOptions = {}): Promise<string[]> {
    const raw = await this.call('listIndexes', () => this.store.listIndexes(options), options)
    return normalizeIndexNames(raw)
  }

  /** Resolves false when there was nothing to delete. */
  async deleteIndex(name: string, options: CallOptions = {}): Promise<boolean> {
    try {
      await this.call('deleteIndex', () => this.store.deleteIndex(name, options), options)
    } catch (err) {
      if (isNotFoundError(err)) {
        this.logger.info('[index] delete skipped; index absent', { name })
        return false
      }
      throw err
    }
    this.logger.info('[index] deleted', { name })
    return true
  }

  private async createOrFetch(descriptor: IndexDescriptor, options: CallOptions): Promise<VectorIndexHandle> {
    const existing = await this.listIndexes(options)
    if (!existing.includes(descriptor.name)) {
      try {
        await this.call('createIndex', () => this.store.createIndex(descriptor, options), options)
        this.logger.info('[index] created', {
          name: descriptor.name,
          dimension: descriptor.dimension,
          spaceType: descriptor.spaceType,
          precision: descriptor.precision,
        })
      } catch (err) {
        if (!isConflictError(err)) throw err
        // lost the race between list and create
        this.logger.warn('[index] created concurrently elsewhere; reusing it', { name: descriptor.name })
      }
    }

    const handle = await this.getIndex(descriptor.name, options)
    if (!handle) {
      throw new StoreUnavailableError(`Index ${descriptor.name} disappeared while it was being initialized`, {
        provider: this.store.name,
        attempts: 1,
      })
    }
    await this.verifyIndex(handle, descriptor, options)
    return handle
  }

  /** Fails with ConfigurationError when the live index cannot serve `descriptor`. */
  async verifyIndex(handle: VectorIndexHandle, descriptor: IndexExpectation, options: CallOptions = {}): Promise<void> {
    const info = normalizeIndexInfo(await this.call('describe', () => handle.describe(options), options), descriptor.name)
    if (info.dimension === undefined) {
      this.logger.warn('[index] backend did not report a dimension; skipping verification', { name: descriptor.name })
    } else if (info.dimension !== descriptor.dimension) {
      throw new ConfigurationError(
        `Index ${descriptor.name} has dimension ${info.dimension} but ${descriptor.dimension} was requested; ` +
          'delete and recreate the index to change embedding models',
      )
    }
    if (info.spaceType && info.spaceType !== descriptor.spaceType) {
      throw new ConfigurationError(
        `Index ${descriptor.name} uses ${info.spaceType} similarity but ${descriptor.spaceType} was requested`,
      )
    }
    const drift = (['precision', 'm', 'efConstruction'] as const).filter(
      (key) => descriptor[key] !== undefined && info[key] !== undefined && info[key] !== descriptor[key],
    )
    if (drift.length) {
      this.logger.warn('[index] existing index parameters differ from requested; keeping existing', {
        name: descriptor.name,
        fields: drift,
      })
    }
  }

  /**
   * Retries transient store failures, then reports them as
   * StoreUnavailableError. Conflicts, not-found and configuration errors pass
   * through untouched so callers can act on them.
   */
  private async call<T>(operation: string, fn: () => Promise<T>, options: CallOptions): Promise<T> {
    let attempts = 0
    try {
      return await withRetry(
        fn,
        {
          retries: this.retries,
          baseDelayMs: this.retryDelayMs,
          shouldRetry: isTransientError,
          signal: options.signal,
          onAttempt: (n) => (attempts = n),
        },
        { logger: this.logger },
      )
    } catch (err) {
      if (isConflictError(err) || isNotFoundError(err) || err instanceof ConfigurationError || isAbortError(err)) throw err
      this.logger.error(`[index] ${operation} failed`, { store: this.store.name, attempts, error: errorMessage(err) })
      throw new StoreUnavailableError(`Vector store ${operation} failed after ${attempts} attempt(s): ${errorMessage(err)}`, {
        provider: this.store.name,
        attempts,
        cause: err,
      })
    }
  }
}
