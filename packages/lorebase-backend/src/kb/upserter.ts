import {
  ConfigurationError,
  FailedSubBatch,
  PartialUpsertFailure,
  SubBatchRange,
  UpsertReport,
  errorMessage,
  isAbortError,
  isTransientError,
} from '../errors'
import { mapWithConcurrency, withRetry } from '../ai/providers/resilience'
import { ProviderHooks } from '../ai/providers/types'
import { CallOptions, Logger } from '../types'
import { ChunkMetadata, EmbeddedChunk, VectorIndexHandle, VectorRecord } from './types'

export const DEFAULT_MAX_UPSERT_BATCH = 1000

export interface BatchUpserterOptions {
  /** Request-size ceiling of the vector store. */
  maxBatchSize?: number
  concurrency?: number
  retries?: number
  retryDelayMs?: number
  logger?: Logger
  hooks?: ProviderHooks
}

export interface UpsertOptions extends CallOptions {
  /** Dimension of the target index; every vector is checked against it before writing. */
  dimension: number
}

type BatchOutcome = { status: 'ok' } | { status: 'error' | 'aborted'; message: string }

export function toVectorRecord(chunk: EmbeddedChunk): VectorRecord {
  const metadata: ChunkMetadata = {
    ...chunk.metadata,
    source: chunk.source,
    chunkIndex: chunk.chunkIndex,
    text: chunk.text,
    tags: chunk.tags ?? [],
    start: chunk.start,
    end: chunk.end,
    tokenEstimate: chunk.tokenEstimate,
  }
  return { id: chunk.id, vector: chunk.vector, metadata }
}

/**
 * Writes embedded chunks in sub-batches no larger than the store accepts.
 * The first sub-batch that still fails after retries stops dispatch; the
 * thrown PartialUpsertFailure describes exactly what landed and what did not.
 */
export class BatchUpserter {
  readonly maxBatchSize: number
  private readonly concurrency: number
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly logger: Logger

  constructor(private readonly opts: BatchUpserterOptions = {}) {
    const size = opts.maxBatchSize ?? DEFAULT_MAX_UPSERT_BATCH
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigurationError(`upsert batch size must be a positive integer (got ${size})`)
    }
    this.maxBatchSize = size
    this.concurrency = Math.max(1, opts.concurrency ?? 1)
    this.retries = Math.max(0, opts.retries ?? 3)
    this.retryDelayMs = opts.retryDelayMs ?? 250
    this.logger = opts.logger ?? console
  }

  async upsert(handle: VectorIndexHandle, chunks: readonly EmbeddedChunk[], options: UpsertOptions): Promise<UpsertReport> {
    this.validate(chunks, options.dimension)
    const report: UpsertReport = {
      indexName: handle.name,
      totalChunks: chunks.length,
      chunksWritten: 0,
      chunksFailed: 0,
      succeeded: [],
      failed: [],
    }
    if (!chunks.length) return report

    const batches: EmbeddedChunk[][] = []
    for (let i = 0; i < chunks.length; i += this.maxBatchSize) {
      batches.push(chunks.slice(i, i + this.maxBatchSize))
    }
    const outcomes = new Array<BatchOutcome | undefined>(batches.length)

    let failure: unknown
    try {
      await mapWithConcurrency(
        batches,
        this.concurrency,
        async (batch, batchIndex) => {
          try {
            await this.writeBatch(handle, batch, batchIndex, options)
            outcomes[batchIndex] = { status: 'ok' }
          } catch (err) {
            const status = isAbortError(err) || options.signal?.aborted ? 'aborted' : 'error'
            outcomes[batchIndex] = { status, message: errorMessage(err) }
            throw err
          }
        },
        options.signal,
      )
    } catch (err) {
      failure = err
    }

    const pendingIds: string[] = []
    batches.forEach((batch, batchIndex) => {
      const range = rangeOf(batch, batchIndex)
      const outcome = outcomes[batchIndex]
      if (outcome?.status === 'ok') {
        report.succeeded.push(range)
        report.chunksWritten += batch.length
        return
      }
      const failed: FailedSubBatch = outcome
        ? { ...range, reason: outcome.status, message: outcome.message }
        : { ...range, reason: 'aborted' }
      report.failed.push(failed)
      report.chunksFailed += batch.length
      pendingIds.push(...batch.map((c) => c.id))
    })

    if (report.failed.length) {
      this.logger.error('[upsert] stopped early', {
        index: handle.name,
        written: report.chunksWritten,
        failed: report.chunksFailed,
        firstFailedBatch: report.failed[0].batchIndex,
      })
      throw new PartialUpsertFailure(report, pendingIds, { cause: failure })
    }
    this.logger.info('[upsert] complete', { index: handle.name, chunks: report.chunksWritten, batches: batches.length })
    return report
  }

  private validate(chunks: readonly EmbeddedChunk[], dimension: number) {
    for (const chunk of chunks) {
      if (chunk.vector.length !== dimension) {
        throw new ConfigurationError(
          `Chunk ${chunk.id} (${chunk.source}#${chunk.chunkIndex}) has a ${chunk.vector.length}-dimensional vector; index expects ${dimension}`,
        )
      }
      if (!chunk.vector.every(Number.isFinite)) {
        throw new ConfigurationError(`Chunk ${chunk.id} has a non-finite vector component`)
      }
    }
  }

  private async writeBatch(handle: VectorIndexHandle, batch: EmbeddedChunk[], batchIndex: number, options: UpsertOptions) {
    const records = batch.map(toVectorRecord)
    let attempts = 0
    try {
      await withRetry(
        () => handle.upsert(records, { signal: options.signal }),
        {
          retries: this.retries,
          baseDelayMs: this.retryDelayMs,
          shouldRetry: isTransientError,
          signal: options.signal,
          onAttempt: (n) => (attempts = n),
        },
        { logger: this.logger, ...this.opts.hooks },
      )
    } catch (err) {
      this.logger.warn('[upsert] sub-batch failed', { index: handle.name, batchIndex, attempts, error: errorMessage(err) })
      throw err
    }
  }
}

function rangeOf(batch: EmbeddedChunk[], batchIndex: number): SubBatchRange {
  return { batchIndex, firstId: batch[0].id, lastId: batch[batch.length - 1].id, size: batch.length }
}
