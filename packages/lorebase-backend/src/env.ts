import { Pool } from 'pg'
import { ProviderName } from './ai/providers/types'
import { IndexDescriptor, Precision, SpaceType } from './kb/types'
import { Logger } from './types'

export type VectorStoreKind = 'memory' | 'postgres' | 'http'

export type EnvConfig = {
  port: number
  host: string
  bearerToken?: string
  vectorStore: {
    kind: VectorStoreKind
    postgresUrl?: string
    baseUrl?: string
    authToken?: string
  }
  index: IndexDescriptor
  chunking: { chunkSize: number; overlap: number }
  embedding: {
    provider: ProviderName
    model?: string
    batchSize: number
    concurrency: number
    retries: number
  }
  upsert: { batchSize: number; concurrency: number; retries: number }
  retrieval: { topK: number; ef: number; relevanceFloor: number }
  generation: {
    order: ProviderName[]
    temperature: number
    maxTokens: number
    timeoutMs: number
  }
  openai: { apiKey?: string; baseUrl?: string; model?: string; embeddingModel?: string; embeddingDimensions?: number }
  groq: { apiKey?: string; baseUrl?: string; model?: string }
  local: { baseUrl: string; model?: string; embeddingModel?: string }
}

const PROVIDERS: ProviderName[] = ['openai', 'groq', 'local', 'echo']
const SPACES: SpaceType[] = ['cosine', 'l2', 'ip']
const PRECISIONS: Precision[] = ['binary', 'int8d', 'int16d', 'float16', 'float32']

function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((p) => p === value)
}

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, fallback: T, logger: Logger, key: string): T {
  if (value === undefined || value === '') return fallback
  const normalized = value.trim().toLowerCase()
  const match = allowed.find((a) => a === normalized)
  if (match) return match
  logger.warn(`[env] ${key}=${value} is not one of ${allowed.join(', ')}; using ${fallback}`)
  return fallback
}

/**
 * Environment loader with defaults tuned for a single-node deployment. It
 * never throws: bad values fall back to defaults with a warning, and range
 * checks that matter (chunk overlap, dimensions) are enforced where the
 * values are used.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env, logger: Logger = console): EnvConfig {
  const toInt = (value: string | undefined, fallback: number) => {
    if (value === undefined || value === '') return fallback
    const parsed = Number.parseInt(value, 10)
    return Number.isNaN(parsed) ? fallback : parsed
  }
  const toFloat = (value: string | undefined, fallback: number) => {
    if (value === undefined || value === '') return fallback
    const parsed = Number.parseFloat(value)
    return Number.isNaN(parsed) ? fallback : parsed
  }
  const optionalInt = (value: string | undefined) => {
    const parsed = toInt(value, Number.NaN)
    return Number.isNaN(parsed) ? undefined : parsed
  }

  const postgresUrl = env.POSTGRES_URL || env.DATABASE_URL
  const storeDefault: VectorStoreKind = postgresUrl ? 'postgres' : env.VECTOR_STORE_URL ? 'http' : 'memory'
  const order = (env.GENERATION_PROVIDERS || 'openai,groq,local')
    .split(',')
    .map((p) => p.trim().toLowerCase())
    .filter(Boolean)

  const parsed: EnvConfig = {
    port: toInt(env.PORT, 3001),
    host: env.HOST || '0.0.0.0',
    bearerToken: env.BEARER_TOKEN,
    vectorStore: {
      kind: oneOf<VectorStoreKind>(['memory', 'postgres', 'http'], env.VECTOR_STORE, storeDefault, logger, 'VECTOR_STORE'),
      postgresUrl,
      baseUrl: env.VECTOR_STORE_URL,
      authToken: env.VECTOR_STORE_TOKEN,
    },
    index: {
      name: env.KB_INDEX_NAME || 'rag_documents',
      dimension: toInt(env.KB_DIMENSION, 384),
      spaceType: oneOf(SPACES, env.KB_SPACE_TYPE, 'cosine', logger, 'KB_SPACE_TYPE'),
      precision: oneOf(PRECISIONS, env.KB_PRECISION, 'int8d', logger, 'KB_PRECISION'),
      m: toInt(env.KB_HNSW_M, 16),
      efConstruction: toInt(env.KB_HNSW_EF_CONSTRUCTION, 128),
    },
    chunking: {
      chunkSize: toInt(env.CHUNK_SIZE, 512),
      overlap: toInt(env.CHUNK_OVERLAP, 50),
    },
    embedding: {
      provider: oneOf(PROVIDERS, env.EMBEDDING_PROVIDER, 'local', logger, 'EMBEDDING_PROVIDER'),
      model: env.EMBEDDING_MODEL,
      batchSize: toInt(env.EMBEDDING_BATCH_SIZE, 1000),
      concurrency: toInt(env.EMBEDDING_CONCURRENCY, 2),
      retries: toInt(env.EMBEDDING_RETRIES, 3),
    },
    upsert: {
      batchSize: toInt(env.UPSERT_BATCH_SIZE, 1000),
      concurrency: toInt(env.UPSERT_CONCURRENCY, 1),
      retries: toInt(env.UPSERT_RETRIES, 3),
    },
    retrieval: {
      topK: toInt(env.RETRIEVAL_TOP_K, 5),
      ef: toInt(env.RETRIEVAL_EF, 128),
      relevanceFloor: toFloat(env.RETRIEVAL_RELEVANCE_FLOOR, 0.5),
    },
    generation: {
      order: order.filter(isProviderName),
      temperature: toFloat(env.LLM_TEMPERATURE, 0.7),
      maxTokens: toInt(env.LLM_MAX_TOKENS, 500),
      timeoutMs: toInt(env.PROVIDER_TIMEOUT_MS, 30_000),
    },
    openai: {
      apiKey: env.OPENAI_API_KEY || undefined,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL,
      embeddingModel: env.OPENAI_EMBEDDING_MODEL,
      embeddingDimensions: optionalInt(env.OPENAI_EMBEDDING_DIMENSIONS),
    },
    groq: {
      apiKey: env.GROQ_API_KEY || undefined,
      baseUrl: env.GROQ_BASE_URL,
      model: env.GROQ_MODEL,
    },
    local: {
      baseUrl: env.LOCAL_LLM_URL || 'http://localhost:11434',
      model: env.LOCAL_LLM_MODEL,
      embeddingModel: env.LOCAL_EMBEDDING_MODEL,
    },
  }

  const unknownProviders = order.filter((p) => !isProviderName(p))
  if (unknownProviders.length) {
    logger.warn(`[env] ignoring unknown generation providers: ${unknownProviders.join(', ')}`)
  }
  if (!parsed.generation.order.length) {
    logger.warn('[env] GENERATION_PROVIDERS is empty; every query will return the provider-exhausted answer.')
  }
  if (parsed.vectorStore.kind === 'memory') {
    logger.warn('[env] no vector store configured; falling back to in-memory index (not durable).')
  }
  if (parsed.vectorStore.kind === 'postgres' && !postgresUrl) {
    logger.warn('[env] VECTOR_STORE=postgres but POSTGRES_URL is not set; using in-memory index.')
    parsed.vectorStore.kind = 'memory'
  }
  if (parsed.vectorStore.kind === 'http' && !parsed.vectorStore.baseUrl) {
    logger.warn('[env] VECTOR_STORE=http but VECTOR_STORE_URL is not set; using in-memory index.')
    parsed.vectorStore.kind = 'memory'
  }
  if (!parsed.bearerToken) {
    logger.warn('[env] BEARER_TOKEN not set; write endpoints run open unless upstream auth is enforced.')
  }

  logger.info('[env] loaded', {
    port: parsed.port,
    host: parsed.host,
    store: parsed.vectorStore.kind,
    index: parsed.index.name,
    dimension: parsed.index.dimension,
    embedding: parsed.embedding.provider,
    generation: parsed.generation.order,
  })

  return parsed
}

export function buildPostgresPool(connectionString?: string): Pool | null {
  if (!connectionString) return null
  return new Pool({ connectionString })
}
