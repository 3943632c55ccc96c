import { v5 as uuidv5 } from 'uuid'
import { ConfigurationError } from '../errors'
import { Chunk, KnowledgeDocument } from './types'

const CHUNK_NAMESPACE = '6f1c2a9e-3b7d-4c4e-9a1f-2d8e7b6c5a40'

export interface ChunkingOptions {
  /** Window size in characters. */
  chunkSize: number
  /** Characters shared by consecutive windows; must be smaller than chunkSize. */
  overlap: number
}

export interface ChunkSequence extends Iterable<Chunk> {
  readonly count: number
}

/**
 * Stable identifier for a chunk position. Re-ingesting the same document
 * yields the same ids, so upserts overwrite instead of duplicating.
 */
export function chunkId(source: string, chunkIndex: number): string {
  return uuidv5(`${source}\u0000${chunkIndex}`, CHUNK_NAMESPACE)
}

export function validateChunking(opts: ChunkingOptions): void {
  const { chunkSize, overlap } = opts
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`chunkSize must be a positive integer (got ${chunkSize})`)
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`overlap must be a non-negative integer (got ${overlap})`)
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`)
  }
}

export function countChunks(length: number, opts: ChunkingOptions): number {
  if (length === 0) return 0
  if (length <= opts.chunkSize) return 1
  return 1 + Math.ceil((length - opts.chunkSize) / (opts.chunkSize - opts.overlap))
}

/**
 * Fixed-size sliding windows over the raw text. Window i starts at
 * i * (chunkSize - overlap); the last window ends at the end of the text.
 * The returned sequence is lazy and can be iterated any number of times.
 */
export function chunkDocument(doc: Pick<KnowledgeDocument, 'source' | 'text'>, opts: ChunkingOptions): ChunkSequence {
  validateChunking(opts)
  const { source, text } = doc
  const stride = opts.chunkSize - opts.overlap
  const count = countChunks(text.length, opts)

  return {
    count,
    *[Symbol.iterator]() {
      for (let chunkIndex = 0; chunkIndex < count; chunkIndex++) {
        const start = chunkIndex * stride
        const end = Math.min(start + opts.chunkSize, text.length)
        const slice = text.slice(start, end)
        yield {
          id: chunkId(source, chunkIndex),
          source,
          chunkIndex,
          start,
          end,
          text: slice,
          tokenEstimate: estimateTokens(slice),
        }
      }
    },
  }
}

export function estimateTokens(text: string): number {
  return Math.max(1, Math.ceil(text.split(/\s+/).length * 1.2))
}
