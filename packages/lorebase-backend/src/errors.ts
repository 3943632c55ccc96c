/**
 * Error taxonomy shared by every pipeline stage. Each class carries a stable
 * `code` so the HTTP layer and callers can branch without string matching.
 */

export type ErrorCode =
  | 'configuration_error'
  | 'store_unavailable'
  | 'embedding_provider_error'
  | 'generation_provider_error'
  | 'partial_upsert_failure'
  | 'http_error'
  | 'index_exists'
  | 'index_not_found'

export class LorebaseError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Fatal misconfiguration: the caller must change its input or settings. */
export class ConfigurationError extends LorebaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration_error', message, options)
  }
}

export interface ProviderFailureDetails {
  provider: string
  attempts: number
  cause?: unknown
}

export class StoreUnavailableError extends LorebaseError {
  readonly provider: string
  readonly attempts: number

  constructor(message: string, details: ProviderFailureDetails) {
    super('store_unavailable', message, { cause: details.cause })
    this.provider = details.provider
    this.attempts = details.attempts
  }
}

export class EmbeddingProviderError extends LorebaseError {
  readonly provider: string
  readonly attempts: number

  constructor(message: string, details: ProviderFailureDetails) {
    super('embedding_provider_error', message, { cause: details.cause })
    this.provider = details.provider
    this.attempts = details.attempts
  }
}

export type GenerationFailureKind =
  | 'auth'
  | 'rate_limit'
  | 'timeout'
  | 'network'
  | 'server'
  | 'bad_response'
  | 'cancelled'
  | 'unknown'

export class GenerationProviderError extends LorebaseError {
  readonly provider: string
  readonly attempts: number
  readonly kind: GenerationFailureKind

  constructor(message: string, details: ProviderFailureDetails & { kind: GenerationFailureKind }) {
    super('generation_provider_error', message, { cause: details.cause })
    this.provider = details.provider
    this.attempts = details.attempts
    this.kind = details.kind
  }
}

/** Non-2xx response from an upstream HTTP service. */
export class HttpError extends LorebaseError {
  constructor(
    public readonly status: number,
    public readonly data: unknown,
    public readonly headers: Record<string, string> = {},
  ) {
    super('http_error', `Unexpected status ${status}`)
  }
}

export class IndexConflictError extends LorebaseError {
  constructor(readonly indexName: string) {
    super('index_exists', `Index ${indexName} already exists`)
  }
}

export class IndexNotFoundError extends LorebaseError {
  constructor(readonly indexName: string) {
    super('index_not_found', `Index ${indexName} not found`)
  }
}

export interface SubBatchRange {
  batchIndex: number
  firstId: string
  lastId: string
  size: number
}

export interface FailedSubBatch extends SubBatchRange {
  reason: 'error' | 'aborted'
  message?: string
}

export interface UpsertReport {
  indexName: string
  totalChunks: number
  chunksWritten: number
  chunksFailed: number
  succeeded: SubBatchRange[]
  failed: FailedSubBatch[]
}

/**
 * Raised when at least one sub-batch could not be written. `pendingIds`
 * lists every chunk that still needs writing, in input order.
 */
export class PartialUpsertFailure extends LorebaseError {
  constructor(
    public readonly report: UpsertReport,
    public readonly pendingIds: string[],
    options?: { cause?: unknown },
  ) {
    super(
      'partial_upsert_failure',
      `Upsert into ${report.indexName} stopped: ${report.chunksWritten}/${report.totalChunks} chunks written`,
      options,
    )
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
  const { code } = err
  return typeof code === 'string' ? code : undefined
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined
}

const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  // postgres: connection failure / admin shutdown / cannot connect now
  '08000',
  '08003',
  '08006',
  '57P01',
  '57P03',
])

export function isTimeoutError(err: unknown): boolean {
  const name = errorName(err)
  return name === 'TimeoutError' || errorCode(err) === 'ETIMEDOUT' || errorCode(err) === 'UND_ERR_CONNECT_TIMEOUT'
}

export function isAbortError(err: unknown): boolean {
  return errorName(err) === 'AbortError'
}

export function isNetworkError(err: unknown): boolean {
  const code = errorCode(err)
  if (code && NETWORK_CODES.has(code)) return true
  // undici wraps socket failures as `TypeError: fetch failed` with the real error in `cause`
  if (err instanceof TypeError && err.message === 'fetch failed') return true
  if (err instanceof Error && err.cause && err.cause !== err) return isNetworkError(err.cause)
  return false
}

/**
 * Failures worth retrying: timeouts, dropped connections, 408/429 and 5xx.
 * Caller cancellation is never transient.
 */
export function isTransientError(err: unknown): boolean {
  if (isAbortError(err)) return false
  if (err instanceof HttpError) return err.status === 408 || err.status === 429 || err.status >= 500
  if (err instanceof LorebaseError) return false
  return isTimeoutError(err) || isNetworkError(err)
}

export function classifyGenerationFailure(err: unknown): GenerationFailureKind {
  if (err instanceof GenerationProviderError) return err.kind
  if (isAbortError(err)) return 'cancelled'
  if (isTimeoutError(err)) return 'timeout'
  if (err instanceof HttpError) {
    if (err.status === 401 || err.status === 403) return 'auth'
    if (err.status === 429) return 'rate_limit'
    if (err.status === 408) return 'timeout'
    if (err.status >= 500) return 'server'
    return 'bad_response'
  }
  if (isNetworkError(err)) return 'network'
  return 'unknown'
}
