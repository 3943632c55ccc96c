import { ConfigurationError } from '../../errors'
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

export interface OpenAiConfig {
  apiKey: string
  baseUrl?: string
  defaultModel?: string
  embeddingModel?: string
  /** Requested output size for models that support shortening (text-embedding-3-*). */
  embeddingDimensions?: number
  maxRetries?: number
  timeoutMs?: number
}

export class OpenAiProvider implements GenerationProvider, EmbeddingProvider {
  constructor(private readonly http: HttpClient, private readonly config: OpenAiConfig) {}

  metadata(): ProviderMetadata {
    return {
      name: 'openai',
      models: [this.config.defaultModel || 'gpt-3.5-turbo', this.config.embeddingModel || 'text-embedding-3-small'],
      supportsEmbeddings: true,
      supportsSystemPrompt: true,
    }
  }

  private endpoint(path: string) {
    const base = this.config.baseUrl || 'https://api.openai.com/v1'
    return `${base}${path}`
  }

  async chat(request: ChatRequest, hooks?: ProviderHooks): Promise<ChatResponse> {
    const started = Date.now()
    const payload = {
      model: request.model || this.config.defaultModel || 'gpt-3.5-turbo',
      messages: [
        ...(request.systemPrompt ? [{ role: 'system', content: request.systemPrompt }] : []),
        { role: 'user', content: request.prompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    }

    const res = await this.http.request(
      {
        url: this.endpoint('/chat/completions'),
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: payload,
        retries: this.config.maxRetries ?? 2,
        retryDelayMs: 300,
        expectedStatus: [200, 201],
        timeoutMs: this.config.timeoutMs,
        signal: request.signal,
      },
      hooks,
    )

    const content = pick(res.data, 'choices', 0, 'message', 'content')
    return {
      text: typeof content === 'string' ? content : '',
      raw: res.data,
      requestId: res.headers['x-request-id'] || request.requestId,
      timingMs: Date.now() - started,
    }
  }

  async embed(request: EmbedRequest, hooks?: ProviderHooks): Promise<EmbedResponse> {
    const res = await this.http.request(
      {
        url: this.endpoint('/embeddings'),
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: {
          model: request.model || this.config.embeddingModel || 'text-embedding-3-small',
          input: request.input,
          ...(this.config.embeddingDimensions ? { dimensions: this.config.embeddingDimensions } : {}),
        },
        retries: 0,
        timeoutMs: this.config.timeoutMs,
        signal: request.signal,
      },
      hooks,
    )
    const rows = pick(res.data, 'data')
    if (!Array.isArray(rows)) return { vectors: [], raw: res.data }
    // entries carry their input position; the API does not promise ordering
    const ordered = rows
      .map((row: unknown, position) => {
        const index = pick(row, 'index')
        return { index: typeof index === 'number' ? index : position, embedding: pick(row, 'embedding') }
      })
      .sort((a, b) => a.index - b.index)
    return { vectors: ordered.map((r) => (isNumberArray(r.embedding) ? r.embedding : [])), raw: res.data }
  }

  async checkHealth(hooks?: ProviderHooks): Promise<ProviderHealth> {
    try {
      const res = await this.http.request(
        {
          url: this.endpoint('/models'),
          method: 'GET',
          headers: { Authorization: `Bearer ${this.config.apiKey}` },
          retries: 0,
          expectedStatus: [200, 429],
        },
        hooks,
      )
      const ok = res.status === 200
      return { name: 'openai', ok, details: ok ? 'model list reachable' : 'rate limited', lastCheckedAt: new Date().toISOString() }
    } catch (err) {
      return { name: 'openai', ok: false, details: err instanceof Error ? err.message : String(err), lastCheckedAt: new Date().toISOString() }
    }
  }
}

export function buildOpenAiFromEnv(http: HttpClient, env: EnvConfig): OpenAiProvider {
  const { apiKey, baseUrl, model, embeddingModel, embeddingDimensions } = env.openai
  if (!apiKey) throw new ConfigurationError('OPENAI_API_KEY is required')
  return new OpenAiProvider(http, {
    apiKey,
    baseUrl,
    defaultModel: model,
    embeddingModel,
    // text-embedding-3 models can shorten their output to the index dimension
    embeddingDimensions: embeddingDimensions ?? env.index.dimension,
    timeoutMs: env.generation.timeoutMs,
  })
}
