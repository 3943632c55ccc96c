import { ConfigurationError, EmbeddingProviderError, errorMessage, isTransientError } from '../errors'
import { mapWithConcurrency, withRetry } from '../ai/providers/resilience'
import { EmbeddingProvider, ProviderHooks } from '../ai/providers/types'
import { CallOptions, Logger } from '../types'

export interface EmbeddingClientOptions {
  /** Every returned vector must have exactly this length. */
  dimension: number
  model?: string
  maxBatchSize?: number
  concurrency?: number
  retries?: number
  retryDelayMs?: number
  logger?: Logger
  hooks?: ProviderHooks
}

/**
 * Batches texts through an embedding provider. Sub-batches run through a small
 * worker pool and are stitched back together in input order.
 */
export class EmbeddingClient {
  readonly dimension: number
  private readonly maxBatchSize: number
  private readonly concurrency: number
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly logger: Logger

  constructor(private readonly provider: EmbeddingProvider, private readonly opts: EmbeddingClientOptions) {
    if (!Number.isInteger(opts.dimension) || opts.dimension < 1) {
      throw new ConfigurationError(`embedding dimension must be a positive integer (got ${opts.dimension})`)
    }
    this.dimension = opts.dimension
    this.maxBatchSize = Math.max(1, opts.maxBatchSize ?? 1000)
    this.concurrency = Math.max(1, opts.concurrency ?? 2)
    this.retries = Math.max(0, opts.retries ?? 3)
    this.retryDelayMs = opts.retryDelayMs ?? 250
    this.logger = opts.logger ?? console
  }

  get providerName(): string {
    return this.provider.metadata().name
  }

  async embed(texts: readonly string[], options: CallOptions = {}): Promise<number[][]> {
    if (!texts.length) return []
    const batches: string[][] = []
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      batches.push(texts.slice(i, i + this.maxBatchSize))
    }
    this.logger.debug?.('[embed] embedding texts', { texts: texts.length, batches: batches.length, provider: this.providerName })
    const results = await mapWithConcurrency(batches, this.concurrency, (batch, index) => this.embedBatch(batch, index, options), options.signal)
    return results.flat()
  }

  async embedQuery(text: string, options: CallOptions = {}): Promise<number[]> {
    const [vector] = await this.embed([text], options)
    return vector
  }

  private async embedBatch(batch: string[], batchIndex: number, options: CallOptions): Promise<number[][]> {
    let attempts = 0
    let vectors: number[][]
    try {
      const res = await withRetry(
        () => this.provider.embed({ input: batch, model: this.opts.model, signal: options.signal }, this.opts.hooks),
        {
          retries: this.retries,
          baseDelayMs: this.retryDelayMs,
          shouldRetry: isTransientError,
          signal: options.signal,
          onAttempt: (n) => (attempts = n),
        },
        { logger: this.logger, ...this.opts.hooks },
      )
      vectors = res.vectors
    } catch (err) {
      if (options.signal?.aborted) throw err
      this.logger.error('[embed] batch failed', { batchIndex, attempts, provider: this.providerName, error: errorMessage(err) })
      throw new EmbeddingProviderError(`Embedding batch ${batchIndex} failed after ${attempts} attempt(s): ${errorMessage(err)}`, {
        provider: this.providerName,
        attempts,
        cause: err,
      })
    }

    if (vectors.length !== batch.length) {
      throw new ConfigurationError(
        `${this.providerName} returned ${vectors.length} vectors for ${batch.length} texts in batch ${batchIndex}`,
      )
    }
    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        throw new ConfigurationError(
          `${this.providerName} returned ${vector.length}-dimensional vectors but the index expects ${this.dimension}; ` +
            'the embedding model must match the one the index was built with',
        )
      }
    }
    return vectors
  }
}
