import { ConfigurationError, errorMessage } from '../../errors'
import type { EnvConfig } from '../../env'
import { HttpClient, pick } from './http'
import { ChatRequest, ChatResponse, GenerationProvider, ProviderHealth, ProviderHooks, ProviderMetadata } from './types'

export interface GroqConfig {
  apiKey: string
  baseUrl?: string
  model?: string
  maxRetries?: number
  timeoutMs?: number
}

const DEFAULT_MODEL = 'llama-3.3-70b-versatile'

/** Groq exposes an OpenAI-compatible chat endpoint; generation only. */
export class GroqProvider implements GenerationProvider {
  constructor(private readonly http: HttpClient, private readonly config: GroqConfig) {}

  metadata(): ProviderMetadata {
    return { name: 'groq', models: [this.config.model || DEFAULT_MODEL], supportsEmbeddings: false, supportsSystemPrompt: true }
  }

  private endpoint(path: string) {
    return `${this.config.baseUrl || 'https://api.groq.com/openai/v1'}${path}`
  }

  async chat(request: ChatRequest, hooks?: ProviderHooks): Promise<ChatResponse> {
    const started = Date.now()
    const res = await this.http.request(
      {
        url: this.endpoint('/chat/completions'),
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: {
          model: request.model || this.config.model || DEFAULT_MODEL,
          messages: [
            ...(request.systemPrompt ? [{ role: 'system', content: request.systemPrompt }] : []),
            { role: 'user', content: request.prompt },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        retries: this.config.maxRetries ?? 1,
        timeoutMs: this.config.timeoutMs,
        signal: request.signal,
      },
      hooks,
    )
    const content = pick(res.data, 'choices', 0, 'message', 'content')
    return {
      text: typeof content === 'string' ? content : '',
      raw: res.data,
      requestId: res.headers['x-request-id'],
      timingMs: Date.now() - started,
    }
  }

  async checkHealth(hooks?: ProviderHooks): Promise<ProviderHealth> {
    try {
      await this.http.request(
        { url: this.endpoint('/models'), method: 'GET', headers: { Authorization: `Bearer ${this.config.apiKey}` }, retries: 0 },
        hooks,
      )
      return { name: 'groq', ok: true, lastCheckedAt: new Date().toISOString() }
    } catch (err) {
      return { name: 'groq', ok: false, details: errorMessage(err), lastCheckedAt: new Date().toISOString() }
    }
  }
}

export function buildGroqFromEnv(http: HttpClient, env: EnvConfig): GroqProvider {
  const { apiKey, baseUrl, model } = env.groq
  if (!apiKey) throw new ConfigurationError('GROQ_API_KEY is required')
  return new GroqProvider(http, { apiKey, baseUrl, model, timeoutMs: env.generation.timeoutMs })
}
