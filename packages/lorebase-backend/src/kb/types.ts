import type { CallOptions } from '../types'

export type SpaceType = 'cosine' | 'l2' | 'ip'
export type Precision = 'binary' | 'int8d' | 'int16d' | 'float16' | 'float32'

export interface KnowledgeDocument {
  /** Document identity, typically the file name. */
  source: string
  text: string
  discoveredAt: string
  tags?: string[]
  metadata?: Record<string, unknown>
}

export interface Chunk {
  id: string
  source: string
  chunkIndex: number
  /** Character offsets into the document text, end exclusive. */
  start: number
  end: number
  text: string
  tokenEstimate: number
}

export interface EmbeddedChunk extends Chunk {
  vector: number[]
  tags?: string[]
  metadata?: Record<string, unknown>
}

export interface IndexDescriptor {
  name: string
  dimension: number
  spaceType: SpaceType
  precision: Precision
  /** HNSW graph connectivity. */
  m: number
  /** HNSW construction breadth. */
  efConstruction: number
}

/** Metadata stored beside every vector; enough to rebuild a RetrievedChunk. */
export interface ChunkMetadata {
  source: string
  chunkIndex: number
  text: string
  tags: string[]
  totalChunks?: number
  discoveredAt?: string
  [key: string]: unknown
}

export interface VectorRecord {
  id: string
  vector: number[]
  metadata: ChunkMetadata
}

export interface VectorFilter {
  source?: string
  /** Matches records carrying every listed tag. */
  tags?: string[]
  /** Matches records whose chunkIndex is at least this value. */
  fromChunkIndex?: number
}

export interface VectorQuery {
  vector: number[]
  topK: number
  ef: number
  filter?: VectorFilter
}

/**
 * Match as the backend reports it. Depending on the store the relevance comes
 * back as a similarity, a score or a distance; the retriever normalizes it.
 */
export interface RawMatch {
  id: string
  similarity?: number
  score?: number
  distance?: number
  metadata?: unknown
}

export interface VectorIndexHandle {
  readonly name: string
  /** Raw backend description; normalized by the index manager. */
  describe(options?: CallOptions): Promise<unknown>
  upsert(records: VectorRecord[], options?: CallOptions): Promise<void>
  query(query: VectorQuery, options?: CallOptions): Promise<RawMatch[]>
  deleteVectors(filter: VectorFilter, options?: CallOptions): Promise<number>
  listRecords(options: { limit: number } & CallOptions): Promise<{ id: string; metadata: unknown }[]>
}

/**
 * Vector store boundary. `listIndexes` and `describeIndex` deliberately return
 * whatever the backend sends; every other module goes through IndexManager.
 */
export interface VectorStoreClient {
  readonly name: string
  createIndex(descriptor: IndexDescriptor, options?: CallOptions): Promise<void>
  getIndex(name: string, options?: CallOptions): Promise<VectorIndexHandle>
  listIndexes(options?: CallOptions): Promise<unknown>
  deleteIndex(name: string, options?: CallOptions): Promise<void>
  /** Maximum records accepted by a single upsert call. */
  readonly maxUpsertBatch?: number
}

export interface RetrievedChunk {
  id: string
  text: string
  source: string
  chunkIndex: number
  score: number
  tags: string[]
}

export interface ProviderAttempt {
  provider: string
  ok: boolean
  kind?: string
  message?: string
  durationMs: number
}

export type AnswerStatus = 'answered' | 'no_context' | 'providers_exhausted'

export interface Answer {
  answer: string
  sources: RetrievedChunk[]
  provider: string | null
  status: AnswerStatus
  attempts: ProviderAttempt[]
  timings?: { retrievalMs: number; generationMs: number; totalMs: number }
}

export interface DocumentIngestResult {
  source: string
  chunks: number
  written: number
  failed: number
  staleRemoved: number
  error?: string
}

export interface IngestReport {
  indexName: string
  chunksWritten: number
  chunksFailed: number
  documents: DocumentIngestResult[]
  timingMs: number
  /** Set when the caller's signal aborted the run; unprocessed documents are listed as failed. */
  cancelled?: boolean
}

export interface SearchResult extends RetrievedChunk {
  relevant: boolean
}

export interface DocumentSummary {
  source: string
  chunkCount: number
  tags: string[]
  discoveredAt?: string
}

export interface TopicSummary {
  topic: string
  summary: string
  chunkCount: number
  sources: string[]
  provider: string | null
  status: AnswerStatus
  attempts: ProviderAttempt[]
  timings?: { retrievalMs: number; generationMs: number; totalMs: number }
}
