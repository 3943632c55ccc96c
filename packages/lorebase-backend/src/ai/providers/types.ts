/**
 * Provider-neutral contracts for the embedding and generation services the
 * pipeline talks to. Vendors stay behind these interfaces so the chain and
 * the embedding client can be exercised with in-process fakes.
 */
import type { Logger } from '../../types'

export type ProviderName = 'openai' | 'groq' | 'local' | 'echo'

export interface ChatRequest {
  /** Fully rendered prompt, context included. */
  prompt: string
  systemPrompt?: string
  model?: string
  temperature?: number
  maxTokens?: number
  signal?: AbortSignal
  requestId?: string
}

export interface ChatResponse {
  text: string
  raw?: unknown
  requestId?: string
  timingMs?: number
}

export interface EmbedRequest {
  input: string[]
  model?: string
  signal?: AbortSignal
}

export interface EmbedResponse {
  vectors: number[][]
  raw?: unknown
}

export interface ProviderMetadata {
  name: ProviderName
  models: string[]
  supportsEmbeddings: boolean
  supportsSystemPrompt: boolean
}

export interface ProviderHealth {
  name: ProviderName
  ok: boolean
  details?: string
  lastCheckedAt: string
}

export interface ProviderHooks {
  logger?: Logger
  /** Optional hook to fan out traces for observability tools. */
  onTrace?: (event: { name: string; meta?: Record<string, unknown> }) => void
}

export interface GenerationProvider {
  chat(request: ChatRequest, hooks?: ProviderHooks): Promise<ChatResponse>
  metadata(): ProviderMetadata
  checkHealth?(hooks?: ProviderHooks): Promise<ProviderHealth>
}

export interface EmbeddingProvider {
  embed(request: EmbedRequest, hooks?: ProviderHooks): Promise<EmbedResponse>
  metadata(): ProviderMetadata
  checkHealth?(hooks?: ProviderHooks): Promise<ProviderHealth>
}

export type AiProvider = GenerationProvider & Partial<EmbeddingProvider>

export function isEmbeddingProvider(provider: AiProvider): provider is GenerationProvider & EmbeddingProvider {
  return typeof provider.embed === 'function' && provider.metadata().supportsEmbeddings
}
