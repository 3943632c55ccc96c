import type { EnvConfig } from '../../env'
import { Logger } from '../../types'
import { EchoProvider } from './echo'
import { buildGroqFromEnv } from './groq'
import { HttpClient } from './http'
import { buildLocalFromEnv } from './local'
import { buildOpenAiFromEnv } from './openai'
import {
  AiProvider,
  EmbeddingProvider,
  GenerationProvider,
  ProviderHealth,
  ProviderHooks,
  ProviderMetadata,
  ProviderName,
  isEmbeddingProvider,
} from './types'

export class ProviderRegistry {
  private readonly providers = new Map<ProviderName, AiProvider>()
  private readonly fallbacks: ProviderName[] = []

  register(provider: AiProvider) {
    this.providers.set(provider.metadata().name, provider)
  }

  setFallbackOrder(order: ProviderName[]) {
    this.fallbacks.splice(0, this.fallbacks.length, ...order)
  }

  get(name: ProviderName): AiProvider | undefined {
    return this.providers.get(name)
  }

  /** Registered generation providers in fallback order; unregistered names are skipped. */
  chain(): GenerationProvider[] {
    const ordered: GenerationProvider[] = []
    for (const name of this.fallbacks) {
      const found = this.providers.get(name)
      if (found) ordered.push(found)
    }
    return ordered
  }

  embedder(name: ProviderName): EmbeddingProvider | undefined {
    const provider = this.providers.get(name)
    return provider && isEmbeddingProvider(provider) ? provider : undefined
  }

  async health(hooks?: ProviderHooks): Promise<ProviderHealth[]> {
    const results: ProviderHealth[] = []
    for (const provider of this.providers.values()) {
      if (!provider.checkHealth) continue
      results.push(await provider.checkHealth(hooks))
    }
    return results
  }

  listMetadata(): ProviderMetadata[] {
    return Array.from(this.providers.values()).map((p) => p.metadata())
  }
}

/**
 * Registers every provider whose credentials are present. The local model
 * server and the echo provider need none, so they are always available.
 */
export function buildProviderRegistry(env: EnvConfig, http: HttpClient, logger: Logger = console): ProviderRegistry {
  const registry = new ProviderRegistry()
  registry.register(new EchoProvider(env.index.dimension))

  const tryRegister = (name: ProviderName, fn: () => AiProvider) => {
    try {
      registry.register(fn())
      logger.info(`[ai] registered provider ${name}`)
    } catch (err) {
      logger.debug?.(`[ai] skipped provider ${name}`, err)
    }
  }

  tryRegister('openai', () => buildOpenAiFromEnv(http, env))
  tryRegister('groq', () => buildGroqFromEnv(http, env))
  tryRegister('local', () => buildLocalFromEnv(http, env))
  registry.setFallbackOrder(env.generation.order)
  return registry
}
