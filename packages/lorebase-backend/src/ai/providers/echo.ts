import {
  ChatRequest,
  ChatResponse,
  EmbedRequest,
  EmbedResponse,
  EmbeddingProvider,
  GenerationProvider,
  ProviderHealth,
  ProviderMetadata,
} from './types'

function fnv1a(token: string): number {
  let hash = 0x811c9dc5
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193) >>> 0
  }
  return hash
}

/**
 * Hashed bag-of-words vector, L2-normalized. Texts sharing words land close
 * together under cosine similarity, which is enough for development and tests.
 */
export function hashedEmbedding(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0)
  for (const token of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    vector[fnv1a(token) % dimension] += 1
  }
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0))
  return norm === 0 ? vector : vector.map((v) => v / norm)
}

/**
 * Purely deterministic provider used for development and as a safe fallback.
 */
export class EchoProvider implements GenerationProvider, EmbeddingProvider {
  constructor(private readonly dimension = 384) {}

  metadata(): ProviderMetadata {
    return { name: 'echo', models: ['echo'], supportsEmbeddings: true, supportsSystemPrompt: false }
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    return { text: `Echo: ${request.prompt}`, requestId: request.requestId, timingMs: 0 }
  }

  async embed(request: EmbedRequest): Promise<EmbedResponse> {
    return { vectors: request.input.map((text) => hashedEmbedding(text, this.dimension)) }
  }

  async checkHealth(): Promise<ProviderHealth> {
    return { name: 'echo', ok: true, details: 'always-on in-memory provider', lastCheckedAt: new Date().toISOString() }
  }
}
