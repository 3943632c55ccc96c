import { afterEach, describe, expect, it, vi } from 'vitest'
import { buildProviderRegistry, ProviderRegistry } from '../src/ai/providers/registry'
import { EchoProvider, hashedEmbedding } from '../src/ai/providers/echo'
import { OpenAiProvider } from '../src/ai/providers/openai'
import { GroqProvider } from '../src/ai/providers/groq'
import { LocalModelProvider } from '../src/ai/providers/local'
import { FetchHttpClient } from '../src/ai/providers/http'
import type { HttpClient, HttpRequestOptions } from '../src/ai/providers/http'
import { CircuitBreaker } from '../src/ai/providers/resilience'
import { loadEnvConfig } from '../src/env'
import { HttpError } from '../src/errors'

const noopLogger = { info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }

function fakeHttp(data: unknown, headers: Record<string, string> = {}) {
  const request = vi.fn(async (_options: HttpRequestOptions) => ({ status: 200, headers, data }))
  const http: HttpClient = { request }
  return { http, request }
}

describe('ProviderRegistry', () => {
  it('hands out registered providers in fallback order and skips missing ones', () => {
    const registry = new ProviderRegistry()
    const { http } = fakeHttp({})
    registry.register(new EchoProvider())
    registry.register(new LocalModelProvider(http, { baseUrl: 'http://localhost:11434' }))
    registry.setFallbackOrder(['openai', 'local', 'echo'])
    expect(registry.chain().map((p) => p.metadata().name)).toEqual(['local', 'echo'])
  })

  it('only offers providers that can embed as embedders', () => {
    const registry = new ProviderRegistry()
    const { http } = fakeHttp({})
    registry.register(new GroqProvider(http, { apiKey: 'test-secret' }))
    registry.register(new EchoProvider())
    expect(registry.embedder('groq')).toBeUndefined()
    expect(registry.embedder('echo')?.metadata().name).toBe('echo')
  })

  it('aggregates health checks for registered providers', async () => {
    const registry = new ProviderRegistry()
    registry.register(new EchoProvider())
    const health = await registry.health({ logger: noopLogger })
    expect(health[0]?.ok).toBe(true)
  })

  it('registers providers whose credentials are configured', () => {
    const env = loadEnvConfig({ OPENAI_API_KEY: 'test-secret' }, noopLogger)
    const { http } = fakeHttp({})
    const registry = buildProviderRegistry(env, http, noopLogger)
    expect(registry.listMetadata().map((m) => m.name)).toEqual(['echo', 'openai', 'local'])
    expect(registry.chain().map((p) => p.metadata().name)).toEqual(['openai', 'local'])
  })
})

describe('OpenAiProvider', () => {
  it('sends the system prompt and surfaces request ids', async () => {
    const { http, request } = fakeHttp({ choices: [{ message: { content: 'ok' } }] }, { 'x-request-id': 'req-123' })
    const provider = new OpenAiProvider(http, { apiKey: 'test-secret' })
    const res = await provider.chat({ prompt: 'ping', systemPrompt: 'be brief', temperature: 0.2 })
    expect(res.text).toBe('ok')
    expect(res.requestId).toBe('req-123')
    expect(request.mock.calls[0][0]).toMatchObject({
      url: 'https://api.openai.com/v1/chat/completions',
      headers: { Authorization: 'Bearer test-secret' },
      retries: 2,
      body: {
        model: 'gpt-3.5-turbo',
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: 'ping' },
        ],
        temperature: 0.2,
      },
    })
  })

  it('orders embeddings by their reported index', async () => {
    const { http, request } = fakeHttp({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    })
    const provider = new OpenAiProvider(http, { apiKey: 'test-secret', embeddingDimensions: 2 })
    const res = await provider.embed({ input: ['first', 'second'] })
    expect(res.vectors).toEqual([
      [1, 0],
      [0, 1],
    ])
    expect(request.mock.calls[0][0].body).toEqual({ model: 'text-embedding-3-small', input: ['first', 'second'], dimensions: 2 })
  })

  it('is not built without an API key', () => {
    const env = loadEnvConfig({}, noopLogger)
    const registry = buildProviderRegistry(env, fakeHttp({}).http, noopLogger)
    expect(registry.get('openai')).toBeUndefined()
  })
})

describe('GroqProvider', () => {
  it('talks to the OpenAI-compatible endpoint', async () => {
    const { http, request } = fakeHttp({ choices: [{ message: { content: 'fast answer' } }] })
    const provider = new GroqProvider(http, { apiKey: 'test-secret' })
    expect((await provider.chat({ prompt: 'hi' })).text).toBe('fast answer')
    expect(request.mock.calls[0][0]).toMatchObject({
      url: 'https://api.groq.com/openai/v1/chat/completions',
      retries: 1,
      body: { model: 'llama-3.3-70b-versatile', messages: [{ role: 'user', content: 'hi' }] },
    })
  })
})

describe('LocalModelProvider', () => {
  it('generates through /api/generate without streaming', async () => {
    const { http, request } = fakeHttp({ response: 'local answer' })
    const provider = new LocalModelProvider(http, { baseUrl: 'http://models.internal:11434/' })
    expect((await provider.chat({ prompt: 'hi', systemPrompt: 'sys', maxTokens: 64 })).text).toBe('local answer')
    expect(request.mock.calls[0][0]).toMatchObject({
      url: 'http://models.internal:11434/api/generate',
      body: { model: 'llama3.2', prompt: 'hi', system: 'sys', stream: false, options: { num_predict: 64 } },
    })
  })

  it('embeds through /api/embed', async () => {
    const { http, request } = fakeHttp({ embeddings: [[1, 2], [3, 4]] })
    const provider = new LocalModelProvider(http, { baseUrl: 'http://localhost:11434' })
    expect((await provider.embed({ input: ['a', 'b'] })).vectors).toEqual([
      [1, 2],
      [3, 4],
    ])
    expect(request.mock.calls[0][0].url).toBe('http://localhost:11434/api/embed')
  })
})

describe('EchoProvider', () => {
  it('echoes the prompt', async () => {
    expect((await new EchoProvider().chat({ prompt: 'hi' })).text).toBe('Echo: hi')
  })

  it('embeds into a deterministic unit vector', () => {
    const vector = hashedEmbedding('Alpha alpha', 16)
    expect(vector).toHaveLength(16)
    expect(vector.filter((v) => v !== 0)).toEqual([1])
    expect(hashedEmbedding('Alpha alpha', 16)).toEqual(vector)
    const mixed = hashedEmbedding('one two three', 16)
    expect(Math.sqrt(mixed.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1)
    expect(hashedEmbedding('', 4)).toEqual([0, 0, 0, 0])
  })
})

describe('FetchHttpClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('retries after rate limiting', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response(JSON.stringify({ error: 'slow down' }), { status: 429 }))
      .mockResolvedValueOnce(new Response(JSON.stringify({ ok: true }), { status: 200, headers: { 'x-request-id': 'req-9' } }))
    vi.stubGlobal('fetch', fetchMock)

    const client = new FetchHttpClient(new CircuitBreaker())
    const res = await client.request({ url: 'https://api.example.test/v1/thing', retryDelayMs: 1 }, { logger: noopLogger })
    expect(res.data).toEqual({ ok: true })
    expect(res.headers['x-request-id']).toBe('req-9')
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('does not retry a client error', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify({ error: 'bad' }), { status: 400 }))
    vi.stubGlobal('fetch', fetchMock)

    const client = new FetchHttpClient(new CircuitBreaker())
    const err = await client.request({ url: 'https://api.example.test/v1/thing', retryDelayMs: 1 }, { logger: noopLogger }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(HttpError)
    expect(err).toMatchObject({ status: 400, data: { error: 'bad' } })
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })
})
