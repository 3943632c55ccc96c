import { GenerationProviderError, classifyGenerationFailure, errorMessage } from '../errors'
import { abortable, linkSignal } from '../ai/providers/resilience'
import { GenerationProvider, ProviderHooks } from '../ai/providers/types'
import { CallOptions, Logger } from '../types'
import { Answer, ProviderAttempt, RetrievedChunk, TopicSummary } from './types'

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant that answers questions based on the provided context. Be concise and accurate.'
export const INSUFFICIENT_CONTEXT_REPLY =
  "I don't have enough information in the provided context to answer this question."
export const NO_CONTEXT_ANSWER = "I couldn't find any relevant information to answer your question."
export const NO_CONTEXT_SUMMARY = "I couldn't find any relevant information about this topic."
export const PROVIDERS_EXHAUSTED_ANSWER =
  'Sorry, no language model was able to answer right now. Please try again later.'

/** Anything that can hand out generation providers in fallback order. ProviderRegistry is one. */
export interface ProviderChain {
  chain(): GenerationProvider[]
}

export interface AnswerGeneratorOptions {
  systemPrompt?: string
  temperature?: number
  maxTokens?: number
  /** Upper bound on a single provider attempt, retries inside the provider included. */
  providerTimeoutMs?: number
  logger?: Logger
  hooks?: ProviderHooks
}

export type Completion =
  | { text: string; provider: string; attempts: ProviderAttempt[] }
  | { text: null; provider: null; attempts: ProviderAttempt[] }

export function buildGroundedPrompt(query: string, chunks: readonly RetrievedChunk[]): string {
  const context = chunks.map((chunk, i) => `[${i + 1}] From ${chunk.source}:\n${chunk.text}`).join('\n\n')
  return [
    'Context information is below:',
    '---',
    context,
    '---',
    '',
    'Answer the question using only the context above. If the context does not contain the answer, say ' +
      `"${INSUFFICIENT_CONTEXT_REPLY}"`,
    '',
    `Question: ${query}`,
    '',
    'Answer:',
  ].join('\n')
}

export function buildSummaryPrompt(topic: string, chunks: readonly RetrievedChunk[], maxWords: number): string {
  const context = chunks.map((chunk) => chunk.text).join('\n\n')
  return [
    `Using only the information below, write a comprehensive summary about "${topic}".`,
    `Maximum length: ${maxWords} words.`,
    '',
    'Context:',
    context,
    '',
    'Summary:',
  ].join('\n')
}

/**
 * Runs a prompt down the provider chain until one provider returns a
 * non-empty completion. Never throws: exhaustion and cancellation both end in
 * a fixed error answer.
 */
export class AnswerGenerator {
  private readonly logger: Logger

  constructor(private readonly providers: ProviderChain, private readonly opts: AnswerGeneratorOptions = {}) {
    this.logger = opts.logger ?? console
  }

  async generate(query: string, chunks: readonly RetrievedChunk[], options: CallOptions = {}): Promise<Answer> {
    if (!chunks.length) {
      return { answer: NO_CONTEXT_ANSWER, sources: [], provider: null, status: 'no_context', attempts: [] }
    }
    const result = await this.complete(buildGroundedPrompt(query, chunks), options)
    if (result.text === null) {
      return {
        answer: PROVIDERS_EXHAUSTED_ANSWER,
        sources: [...chunks],
        provider: null,
        status: 'providers_exhausted',
        attempts: result.attempts,
      }
    }
    return { answer: result.text, sources: [...chunks], provider: result.provider, status: 'answered', attempts: result.attempts }
  }

  async summarize(
    topic: string,
    chunks: readonly RetrievedChunk[],
    options: CallOptions & { maxWords?: number } = {},
  ): Promise<TopicSummary> {
    const sources = Array.from(new Set(chunks.map((c) => c.source)))
    if (!chunks.length) {
      return { topic, summary: NO_CONTEXT_SUMMARY, chunkCount: 0, sources, provider: null, status: 'no_context', attempts: [] }
    }
    const result = await this.complete(buildSummaryPrompt(topic, chunks, options.maxWords ?? 500), options)
    return {
      topic,
      summary: result.text ?? PROVIDERS_EXHAUSTED_ANSWER,
      chunkCount: chunks.length,
      sources,
      provider: result.provider,
      status: result.text === null ? 'providers_exhausted' : 'answered',
      attempts: result.attempts,
    }
  }

  async complete(prompt: string, options: CallOptions = {}): Promise<Completion> {
    const attempts: ProviderAttempt[] = []
    const chain = this.providers.chain()
    if (!chain.length) this.logger.warn('[answer] no generation providers configured')

    for (const provider of chain) {
      if (options.signal?.aborted) break
      const name = provider.metadata().name
      const started = Date.now()
      const linked = linkSignal(options.signal, this.opts.providerTimeoutMs)
      try {
        const res = await abortable(
          provider.chat(
            {
              prompt,
              systemPrompt: this.opts.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
              temperature: this.opts.temperature,
              maxTokens: this.opts.maxTokens,
              signal: linked.signal,
            },
            { logger: this.logger, ...this.opts.hooks },
          ),
          linked.signal,
        )
        const text = res.text.trim()
        if (!text) {
          throw new GenerationProviderError(`${name} returned an empty completion`, { provider: name, attempts: 1, kind: 'bad_response' })
        }
        attempts.push({ provider: name, ok: true, durationMs: Date.now() - started })
        this.logger.info('[answer] generated', { provider: name, attempt: attempts.length, ms: Date.now() - started })
        return { text, provider: name, attempts }
      } catch (err) {
        const kind = options.signal?.aborted ? 'cancelled' : classifyGenerationFailure(err)
        attempts.push({ provider: name, ok: false, kind, message: errorMessage(err), durationMs: Date.now() - started })
        this.logger.warn('[answer] provider failed', { provider: name, kind, error: errorMessage(err) })
        if (options.signal?.aborted) break
      } finally {
        linked.dispose()
      }
    }

    this.logger.error('[answer] all generation providers failed', {
      attempts: attempts.map((a) => `${a.provider}:${a.kind ?? 'ok'}`),
    })
    return { text: null, provider: null, attempts }
  }
}
