import type { IncomingMessage, ServerResponse } from 'http'
import type { EnvConfig } from './env'
import type { KnowledgeBaseService } from './kb/service'
import type { ProviderRegistry } from './ai/providers/registry'

export interface Logger {
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
  debug?(...args: unknown[]): void
}

export interface MetricsHooks {
  onIngest?(report: { chunksWritten: number; chunksFailed: number; documents: number }): void
  onQuery?(meta: { provider: string | null; status: string; retrievalMs: number; generationMs: number }): void
  onHealthcheck?(status: 'ok' | 'fail', meta?: Record<string, unknown>): void
}

/** Caller-supplied cancellation shared by every network-bound operation. */
export interface CallOptions {
  signal?: AbortSignal
}

export interface KnowledgeServerConfig {
  /** Parsed environment; defaults to `loadEnvConfig(process.env)`. */
  env?: EnvConfig
  /** Fully wired service; built from `env` when omitted. */
  kb?: KnowledgeBaseService
  providerRegistry?: ProviderRegistry
  logger?: Logger
  metrics?: MetricsHooks
  auth?: {
    bearerToken?: string
  }
}

export interface KnowledgeServer {
  handler: (req: IncomingMessage, res: ServerResponse, next?: () => void) => Promise<void>
  kb: KnowledgeBaseService
}
