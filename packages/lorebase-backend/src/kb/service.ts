import { ConfigurationError, EmbeddingProviderError, PartialUpsertFailure, errorMessage } from '../errors'
import type { EnvConfig } from '../env'
import { CircuitBreaker } from '../ai/providers/resilience'
import { FetchHttpClient, HttpClient, isRecord } from '../ai/providers/http'
import { ProviderRegistry, buildProviderRegistry } from '../ai/providers/registry'
import { EmbeddingProvider, ProviderHealth, ProviderHooks } from '../ai/providers/types'
import { CallOptions, Logger, MetricsHooks } from '../types'
import { AnswerGenerator } from './answer-generator'
import { ChunkingOptions, chunkDocument, validateChunking } from './chunking'
import { EmbeddingClient } from './embeddings'
import { IndexManager } from './index-manager'
import { RetrieveOptions, Retriever } from './retriever'
import { MemoryVectorStore } from './store-memory'
import { HttpVectorStore } from './store-http'
import { PgPoolLike, PostgresVectorStore } from './store-postgres'
import { BatchUpserter } from './upserter'
import {
  Answer,
  DocumentIngestResult,
  DocumentSummary,
  EmbeddedChunk,
  IndexDescriptor,
  IngestReport,
  KnowledgeDocument,
  SearchResult,
  TopicSummary,
  VectorFilter,
  VectorIndexHandle,
  VectorStoreClient,
} from './types'

/** Records scanned when aggregating documents; the largest page vector stores commonly serve. */
export const DOCUMENT_SCAN_LIMIT = 512

export interface KnowledgeBaseOptions {
  store: VectorStoreClient
  embedder: EmbeddingProvider
  providers: ProviderRegistry
  index: IndexDescriptor
  chunking: ChunkingOptions
  embedding?: { model?: string; batchSize?: number; concurrency?: number; retries?: number; retryDelayMs?: number }
  upsert?: { batchSize?: number; concurrency?: number; retries?: number; retryDelayMs?: number }
  storeRetry?: { retries?: number; retryDelayMs?: number }
  retrieval?: { topK?: number; ef?: number; relevanceFloor?: number }
  generation?: { systemPrompt?: string; temperature?: number; maxTokens?: number; timeoutMs?: number }
  logger?: Logger
  metrics?: MetricsHooks
  hooks?: ProviderHooks
}

export type DocumentInput = Omit<KnowledgeDocument, 'discoveredAt'> & { discoveredAt?: string }

export interface QueryOptions extends CallOptions {
  topK?: number
  ef?: number
  filter?: VectorFilter
}

export interface SearchOptions extends QueryOptions {
  /** Minimum score a result needs to be returned. */
  threshold?: number
}

export interface SummarizeOptions extends QueryOptions {
  maxWords?: number
}

export interface KnowledgeBaseHealth {
  ok: boolean
  store: { name: string; ok: boolean; index: string; indexExists: boolean; error?: string }
  providers: ProviderHealth[]
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

/**
 * Caller-facing operations over one knowledge base (one vector index):
 * ingestion, grounded question answering, plain search and housekeeping.
 */
export class KnowledgeBaseService {
  readonly indexes: IndexManager
  readonly embeddings: EmbeddingClient
  readonly upserter: BatchUpserter
  readonly retriever: Retriever
  readonly generator: AnswerGenerator
  readonly descriptor: IndexDescriptor
  private readonly chunking: ChunkingOptions
  private readonly relevanceFloor: number
  private readonly logger: Logger

  constructor(private readonly opts: KnowledgeBaseOptions) {
    validateChunking(opts.chunking)
    this.logger = opts.logger ?? console
    this.descriptor = { ...opts.index }
    this.chunking = { ...opts.chunking }
    this.relevanceFloor = opts.retrieval?.relevanceFloor ?? 0.5

    this.indexes = new IndexManager(opts.store, { logger: this.logger, ...opts.storeRetry })
    this.embeddings = new EmbeddingClient(opts.embedder, {
      dimension: opts.index.dimension,
      model: opts.embedding?.model,
      maxBatchSize: opts.embedding?.batchSize,
      concurrency: opts.embedding?.concurrency,
      retries: opts.embedding?.retries,
      retryDelayMs: opts.embedding?.retryDelayMs,
      logger: this.logger,
      hooks: opts.hooks,
    })
    const storeCeiling = opts.store.maxUpsertBatch ?? Number.POSITIVE_INFINITY
    this.upserter = new BatchUpserter({
      maxBatchSize: Math.min(opts.upsert?.batchSize ?? 1000, storeCeiling),
      concurrency: opts.upsert?.concurrency,
      retries: opts.upsert?.retries,
      retryDelayMs: opts.upsert?.retryDelayMs,
      logger: this.logger,
      hooks: opts.hooks,
    })
    this.retriever = new Retriever(this.embeddings, this.indexes, {
      indexName: opts.index.name,
      spaceType: opts.index.spaceType,
      defaultTopK: opts.retrieval?.topK,
      defaultEf: opts.retrieval?.ef,
      logger: this.logger,
    })
    this.generator = new AnswerGenerator(opts.providers, {
      systemPrompt: opts.generation?.systemPrompt,
      temperature: opts.generation?.temperature,
      maxTokens: opts.generation?.maxTokens,
      providerTimeoutMs: opts.generation?.timeoutMs,
      logger: this.logger,
      hooks: opts.hooks,
    })
  }

  async ingest(documents: readonly DocumentInput[], options: CallOptions = {}): Promise<IngestReport> {
    const started = Date.now()
    for (const doc of documents) {
      if (!doc.source.trim()) throw new ConfigurationError('every document needs a non-empty source')
    }
    const handle = await this.indexes.ensureIndex(this.descriptor, options)
    const results: DocumentIngestResult[] = []

    for (const input of documents) {
      const doc: KnowledgeDocument = { ...input, discoveredAt: input.discoveredAt ?? new Date().toISOString() }
      if (options.signal?.aborted) {
        const chunks = [...chunkDocument(doc, this.chunking)].length
        results.push({ source: doc.source, chunks, written: 0, failed: chunks, staleRemoved: 0, error: 'cancelled before processing' })
        continue
      }
      results.push(await this.ingestDocument(handle, doc, options))
    }

    const report: IngestReport = {
      indexName: this.descriptor.name,
      chunksWritten: results.reduce((sum, r) => sum + r.written, 0),
      chunksFailed: results.reduce((sum, r) => sum + r.failed, 0),
      documents: results,
      timingMs: Date.now() - started,
      ...(options.signal?.aborted ? { cancelled: true } : {}),
    }
    this.opts.metrics?.onIngest?.({ chunksWritten: report.chunksWritten, chunksFailed: report.chunksFailed, documents: results.length })
    this.logger.info('[kb] ingest finished', {
      index: report.indexName,
      documents: results.length,
      written: report.chunksWritten,
      failed: report.chunksFailed,
      cancelled: report.cancelled ?? false,
      ms: report.timingMs,
    })
    return report
  }

  async query(question: string, options: QueryOptions = {}): Promise<Answer> {
    const started = Date.now()
    const chunks = await this.retriever.retrieve(question, this.retrieveOptions(options))
    const retrievalMs = Date.now() - started
    const answer = await this.generator.generate(question, chunks, options)
    const generationMs = Date.now() - started - retrievalMs
    const result: Answer = { ...answer, timings: { retrievalMs, generationMs, totalMs: Date.now() - started } }
    this.opts.metrics?.onQuery?.({ provider: result.provider, status: result.status, retrievalMs, generationMs })
    return result
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const chunks = await this.retriever.retrieve(query, {
      ...this.retrieveOptions({ ...options, topK: options.topK ?? 10 }),
      minScore: options.threshold ?? 0,
    })
    return chunks.map((chunk) => ({ ...chunk, relevant: chunk.score >= this.relevanceFloor }))
  }

  async summarize(topic: string, options: SummarizeOptions = {}): Promise<TopicSummary> {
    const started = Date.now()
    const chunks = await this.retriever.retrieve(topic, this.retrieveOptions({ ...options, topK: options.topK ?? 10 }))
    const retrievalMs = Date.now() - started
    const summary = await this.generator.summarize(topic, chunks, { maxWords: options.maxWords ?? 500, signal: options.signal })
    const generationMs = Date.now() - started - retrievalMs
    return { ...summary, timings: { retrievalMs, generationMs, totalMs: Date.now() - started } }
  }

  async listDocuments(limit = 100, options: CallOptions = {}): Promise<DocumentSummary[]> {
    const handle = await this.indexes.getIndex(this.descriptor.name, options)
    if (!handle) return []
    const records = await handle.listRecords({ limit: DOCUMENT_SCAN_LIMIT, signal: options.signal })
    const bySource = new Map<string, DocumentSummary>()
    for (const record of records) {
      const meta = record.metadata
      if (!isRecord(meta) || typeof meta.source !== 'string') continue
      const entry = bySource.get(meta.source) ?? { source: meta.source, chunkCount: 0, tags: [] }
      entry.chunkCount += 1
      for (const tag of stringArray(meta.tags)) if (!entry.tags.includes(tag)) entry.tags.push(tag)
      if (entry.discoveredAt === undefined && typeof meta.discoveredAt === 'string') entry.discoveredAt = meta.discoveredAt
      bySource.set(meta.source, entry)
    }
    return Array.from(bySource.values())
      .sort((a, b) => a.source.localeCompare(b.source))
      .slice(0, Math.max(0, limit))
  }

  async deleteDocument(source: string, options: CallOptions = {}): Promise<{ source: string; deleted: number }> {
    const handle = await this.indexes.getIndex(this.descriptor.name, options)
    if (!handle) return { source, deleted: 0 }
    const deleted = await handle.deleteVectors({ source }, options)
    this.logger.info('[kb] document removed', { source, chunks: deleted })
    return { source, deleted }
  }

  async deleteKnowledgeBase(name = this.descriptor.name, options: CallOptions = {}): Promise<{ ok: true; deleted: boolean; indexName: string }> {
    const deleted = await this.indexes.deleteIndex(name, options)
    return { ok: true, deleted, indexName: name }
  }

  async health(options: CallOptions = {}): Promise<KnowledgeBaseHealth> {
    const store: KnowledgeBaseHealth['store'] = { name: this.indexes.storeName, ok: true, index: this.descriptor.name, indexExists: false }
    try {
      store.indexExists = (await this.indexes.listIndexes(options)).includes(this.descriptor.name)
    } catch (err) {
      store.ok = false
      store.error = errorMessage(err)
    }
    const providers = await this.opts.providers.health({ logger: this.logger, ...this.opts.hooks })
    const ok = store.ok && (providers.length === 0 || providers.some((p) => p.ok))
    this.opts.metrics?.onHealthcheck?.(ok ? 'ok' : 'fail', { store: store.ok, providers: providers.length })
    return { ok, store, providers }
  }

  private retrieveOptions(options: QueryOptions): RetrieveOptions {
    return { topK: options.topK, ef: options.ef, filter: options.filter, signal: options.signal }
  }

  private async ingestDocument(handle: VectorIndexHandle, doc: KnowledgeDocument, options: CallOptions): Promise<DocumentIngestResult> {
    const chunks = [...chunkDocument(doc, this.chunking)]
    const result: DocumentIngestResult = { source: doc.source, chunks: chunks.length, written: 0, failed: 0, staleRemoved: 0 }

    try {
      const vectors = await this.embeddings.embed(
        chunks.map((c) => c.text),
        options,
      )
      const embedded: EmbeddedChunk[] = chunks.map((chunk, i) => ({
        ...chunk,
        vector: vectors[i],
        tags: doc.tags ?? [],
        metadata: { ...doc.metadata, totalChunks: chunks.length, discoveredAt: doc.discoveredAt },
      }))
      const report = await this.upserter.upsert(handle, embedded, { dimension: this.descriptor.dimension, signal: options.signal })
      result.written = report.chunksWritten
    } catch (err) {
      if (err instanceof PartialUpsertFailure) {
        result.written = err.report.chunksWritten
        result.failed = err.report.chunksFailed
        result.error = err.message
        return result
      }
      if (options.signal?.aborted) {
        result.failed = chunks.length - result.written
        result.error = 'cancelled'
        this.logger.warn('[kb] ingest cancelled', { source: doc.source, written: result.written })
        return result
      }
      if (err instanceof EmbeddingProviderError) {
        result.failed = chunks.length
        result.error = err.message
        this.logger.error('[kb] document not embedded', { source: doc.source, error: err.message })
        return result
      }
      throw err
    }

    // an edited document may have shrunk; drop chunks past its new end
    try {
      result.staleRemoved = await handle.deleteVectors({ source: doc.source, fromChunkIndex: chunks.length }, options)
    } catch (err) {
      this.logger.warn('[kb] could not remove stale chunks', { source: doc.source, error: errorMessage(err) })
    }
    return result
  }
}

export interface KnowledgeBaseOverrides {
  http?: HttpClient
  providers?: ProviderRegistry
  pool?: PgPoolLike
  metrics?: MetricsHooks
}

function buildStore(env: EnvConfig, http: HttpClient, pool: PgPoolLike | undefined): VectorStoreClient {
  const { vectorStore } = env
  if (vectorStore.kind === 'postgres') {
    if (!pool) throw new ConfigurationError('VECTOR_STORE=postgres needs a connection pool')
    return new PostgresVectorStore(pool)
  }
  if (vectorStore.kind === 'http' && vectorStore.baseUrl) {
    return new HttpVectorStore(http, { baseUrl: vectorStore.baseUrl, authToken: vectorStore.authToken, timeoutMs: env.generation.timeoutMs })
  }
  return new MemoryVectorStore()
}

export function createKnowledgeBase(env: EnvConfig, logger: Logger = console, overrides: KnowledgeBaseOverrides = {}): KnowledgeBaseService {
  const http = overrides.http ?? new FetchHttpClient(new CircuitBreaker(), env.generation.timeoutMs)
  const providers = overrides.providers ?? buildProviderRegistry(env, http, logger)
  const embedder = providers.embedder(env.embedding.provider)
  if (!embedder) {
    throw new ConfigurationError(`embedding provider ${env.embedding.provider} is not available; check its credentials`)
  }
  return new KnowledgeBaseService({
    store: buildStore(env, http, overrides.pool),
    embedder,
    providers,
    index: env.index,
    chunking: env.chunking,
    embedding: {
      model: env.embedding.model,
      batchSize: env.embedding.batchSize,
      concurrency: env.embedding.concurrency,
      retries: env.embedding.retries,
    },
    upsert: env.upsert,
    retrieval: env.retrieval,
    generation: {
      temperature: env.generation.temperature,
      maxTokens: env.generation.maxTokens,
      timeoutMs: env.generation.timeoutMs,
    },
    logger,
    metrics: overrides.metrics,
  })
}
