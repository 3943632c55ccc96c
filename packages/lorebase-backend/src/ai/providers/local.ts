import { errorMessage } from '../../errors'
import type { EnvConfig } from '../../env'
import { HttpClient, isNumberArray, pick } from './http'
import {
  ChatRequest,
  ChatResponse,
  EmbedRequest,
  EmbedResponse,
  EmbeddingProvider,
  GenerationProvider,
  ProviderHealth,
  ProviderHooks,
  ProviderMetadata,
} from './types'

export interface LocalModelConfig {
  baseUrl: string
  model?: string
  embeddingModel?: string
  timeoutMs?: number
}

const DEFAULT_MODEL = 'llama3.2'
const DEFAULT_EMBEDDING_MODEL = 'all-minilm'

/**
 * Self-hosted model server speaking the Ollama wire format
 * (`/api/generate`, `/api/embed`, `/api/tags`). Last resort in the
 * generation chain and the default embedder.
 */
export class LocalModelProvider implements GenerationProvider, EmbeddingProvider {
  constructor(private readonly http: HttpClient, private readonly config: LocalModelConfig) {}

  metadata(): ProviderMetadata {
    return {
      name: 'local',
      models: [this.config.model || DEFAULT_MODEL, this.config.embeddingModel || DEFAULT_EMBEDDING_MODEL],
      supportsEmbeddings: true,
      supportsSystemPrompt: true,
    }
  }

  private endpoint(path: string) {
    return `${this.config.baseUrl.replace(/\/+$/, '')}${path}`
  }

  async chat(request: ChatRequest, hooks?: ProviderHooks): Promise<ChatResponse> {
    const started = Date.now()
    const res = await this.http.request(
      {
        url: this.endpoint('/api/generate'),
        body: {
          model: request.model || this.config.model || DEFAULT_MODEL,
          prompt: request.prompt,
          system: request.systemPrompt,
          stream: false,
          options: { temperature: request.temperature, num_predict: request.maxTokens },
        },
        retries: 1,
        timeoutMs: this.config.timeoutMs,
        signal: request.signal,
      },
      hooks,
    )
    const text = pick(res.data, 'response')
    return { text: typeof text === 'string' ? text : '', raw: res.data, timingMs: Date.now() - started }
  }

  async embed(request: EmbedRequest, hooks?: ProviderHooks): Promise<EmbedResponse> {
    const res = await this.http.request(
      {
        url: this.endpoint('/api/embed'),
        body: { model: request.model || this.config.embeddingModel || DEFAULT_EMBEDDING_MODEL, input: request.input },
        retries: 0,
        timeoutMs: this.config.timeoutMs,
        signal: request.signal,
      },
      hooks,
    )
    const rows = pick(res.data, 'embeddings')
    if (!Array.isArray(rows)) return { vectors: [], raw: res.data }
    return { vectors: rows.map((row: unknown) => (isNumberArray(row) ? row : [])), raw: res.data }
  }

  async checkHealth(hooks?: ProviderHooks): Promise<ProviderHealth> {
    try {
      await this.http.request({ url: this.endpoint('/api/tags'), method: 'GET', retries: 0 }, hooks)
      return { name: 'local', ok: true, lastCheckedAt: new Date().toISOString() }
    } catch (err) {
      return { name: 'local', ok: false, details: errorMessage(err), lastCheckedAt: new Date().toISOString() }
    }
  }
}

export function buildLocalFromEnv(http: HttpClient, env: EnvConfig): LocalModelProvider {
  return new LocalModelProvider(http, { ...env.local, timeoutMs: env.generation.timeoutMs })
}
