import { describe, expect, it, vi } from 'vitest'
import { ChatRequest, ChatResponse, GenerationProvider, ProviderName } from '../src/ai/providers/types'
import { HttpError } from '../src/errors'
import {
  AnswerGenerator,
  buildGroundedPrompt,
  buildSummaryPrompt,
  NO_CONTEXT_ANSWER,
  PROVIDERS_EXHAUSTED_ANSWER,
} from '../src/kb/answer-generator'
import { RetrievedChunk } from '../src/kb/types'

const noopLogger = { info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }

function provider(name: ProviderName, chat: (req: ChatRequest) => Promise<ChatResponse>) {
  const spy = vi.fn(chat)
  const p: GenerationProvider = {
    chat: spy,
    metadata: () => ({ name, models: [], supportsEmbeddings: false, supportsSystemPrompt: true }),
  }
  return { provider: p, spy }
}

function timeoutError() {
  const err = new Error('Request timed out after 30000ms')
  err.name = 'TimeoutError'
  return err
}

const chunks: RetrievedChunk[] = [
  { id: '1', text: 'alpha text', source: 'a.md', chunkIndex: 0, score: 0.9, tags: [] },
  { id: '2', text: 'beta text', source: 'b.md', chunkIndex: 3, score: 0.7, tags: [] },
]

function generator(providers: GenerationProvider[], providerTimeoutMs?: number) {
  return new AnswerGenerator({ chain: () => providers }, { logger: noopLogger, providerTimeoutMs })
}

describe('buildGroundedPrompt', () => {
  it('numbers the context passages and asks for the insufficient-context reply', () => {
    expect(buildGroundedPrompt('What is alpha?', chunks).split('\n')).toEqual([
      'Context information is below:',
      '---',
      '[1] From a.md:',
      'alpha text',
      '',
      '[2] From b.md:',
      'beta text',
      '---',
      '',
      'Answer the question using only the context above. If the context does not contain the answer, say ' +
        '"I don\'t have enough information in the provided context to answer this question."',
      '',
      'Question: What is alpha?',
      '',
      'Answer:',
    ])
  })

  it('states the word limit in summary prompts', () => {
    const prompt = buildSummaryPrompt('alpha', chunks, 50)
    expect(prompt.split('\n').slice(0, 2)).toEqual([
      'Using only the information below, write a comprehensive summary about "alpha".',
      'Maximum length: 50 words.',
    ])
  })
})

describe('AnswerGenerator', () => {
  it('answers without calling a provider when nothing was retrieved', async () => {
    const a = provider('openai', async () => ({ text: 'unused' }))
    const answer = await generator([a.provider]).generate('anything', [])
    expect(answer).toEqual({ answer: NO_CONTEXT_ANSWER, sources: [], provider: null, status: 'no_context', attempts: [] })
    expect(a.spy).not.toHaveBeenCalled()
  })

  it('falls over to the next provider when the first times out', async () => {
    const a = provider('openai', async () => {
      throw timeoutError()
    })
    const b = provider('groq', async () => ({ text: '  Alpha is the first letter.  ' }))
    const answer = await generator([a.provider, b.provider]).generate('What is alpha?', chunks)

    expect(answer.answer).toBe('Alpha is the first letter.')
    expect(answer.provider).toBe('groq')
    expect(answer.status).toBe('answered')
    expect(answer.sources).toEqual(chunks)
    expect(answer.attempts.map((x) => [x.provider, x.ok, x.kind])).toEqual([
      ['openai', false, 'timeout'],
      ['groq', true, undefined],
    ])
    expect(b.spy.mock.calls[0][0].prompt).toBe(buildGroundedPrompt('What is alpha?', chunks))
  })

  it('enforces the per-provider timeout on a provider that never answers', async () => {
    const a = provider('openai', () => new Promise<ChatResponse>(() => {}))
    const b = provider('local', async () => ({ text: 'from local' }))
    const answer = await generator([a.provider, b.provider], 20).generate('What is alpha?', chunks)
    expect(answer.provider).toBe('local')
    expect(answer.attempts[0]).toMatchObject({ provider: 'openai', ok: false, kind: 'timeout' })
  })

  it('treats an empty completion as a failure', async () => {
    const a = provider('openai', async () => ({ text: '   ' }))
    const b = provider('groq', async () => ({ text: 'second' }))
    const answer = await generator([a.provider, b.provider]).generate('q', chunks)
    expect(answer.provider).toBe('groq')
    expect(answer.attempts[0]).toMatchObject({ provider: 'openai', ok: false, kind: 'bad_response' })
  })

  it('accepts the insufficient-context reply as a normal answer', async () => {
    const reply = "I don't have enough information in the provided context to answer this question."
    const a = provider('openai', async () => ({ text: reply }))
    const b = provider('groq', async () => ({ text: 'unused' }))
    const answer = await generator([a.provider, b.provider]).generate('q', chunks)
    expect(answer).toMatchObject({ answer: reply, provider: 'openai', status: 'answered' })
    expect(b.spy).not.toHaveBeenCalled()
  })

  it('returns the exhausted answer once every provider failed', async () => {
    const a = provider('openai', async () => {
      throw new HttpError(401, { error: 'invalid key' })
    })
    const b = provider('groq', async () => {
      throw new HttpError(429, {})
    })
    const c = provider('local', async () => {
      throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })
    })
    const answer = await generator([a.provider, b.provider, c.provider]).generate('q', chunks)
    expect(answer.answer).toBe(PROVIDERS_EXHAUSTED_ANSWER)
    expect(answer.status).toBe('providers_exhausted')
    expect(answer.provider).toBeNull()
    expect(answer.sources).toEqual(chunks)
    expect(answer.attempts.map((x) => x.kind)).toEqual(['auth', 'rate_limit', 'network'])
  })

  it('stops walking the chain once the caller cancels', async () => {
    const controller = new AbortController()
    const a = provider('openai', async () => {
      controller.abort()
      throw new Error('aborted by caller')
    })
    const b = provider('groq', async () => ({ text: 'unused' }))
    const answer = await generator([a.provider, b.provider]).generate('q', chunks, { signal: controller.signal })
    expect(answer.status).toBe('providers_exhausted')
    expect(answer.attempts).toHaveLength(1)
    expect(answer.attempts[0].kind).toBe('cancelled')
    expect(b.spy).not.toHaveBeenCalled()
  })

  it('does not call anything when cancelled up front', async () => {
    const controller = new AbortController()
    controller.abort()
    const a = provider('openai', async () => ({ text: 'unused' }))
    const answer = await generator([a.provider]).generate('q', chunks, { signal: controller.signal })
    expect(answer.attempts).toEqual([])
    expect(a.spy).not.toHaveBeenCalled()
  })

  it('summarizes a topic and lists each source once', async () => {
    const a = provider('openai', async () => ({ text: 'Alpha and beta.' }))
    const summary = await generator([a.provider]).summarize('letters', [...chunks, { ...chunks[0], id: '3' }], { maxWords: 50 })
    expect(summary).toMatchObject({
      topic: 'letters',
      summary: 'Alpha and beta.',
      chunkCount: 3,
      sources: ['a.md', 'b.md'],
      provider: 'openai',
      status: 'answered',
    })
    expect(a.spy.mock.calls[0][0].prompt).toContain('Maximum length: 50 words.')
  })
})
