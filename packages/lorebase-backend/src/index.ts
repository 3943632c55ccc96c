import type { IncomingMessage, ServerResponse } from 'http'
import type { ValidateFunction } from 'ajv'
import {
  ConfigurationError,
  EmbeddingProviderError,
  GenerationProviderError,
  PartialUpsertFailure,
  StoreUnavailableError,
  errorMessage,
  isAbortError,
} from './errors'
import { loadEnvConfig } from './env'
import { createKnowledgeBase, KnowledgeBaseService } from './kb/service'
import { describeErrors, validateIngest, validateQuery, validateSearch, validateSummarize } from './schemas'
import { KnowledgeServer, KnowledgeServerConfig, Logger } from './types'

const MAX_BODY_BYTES = 10 * 1024 * 1024

class RequestError extends Error {
  constructor(readonly status: number, readonly code: string, message: string) {
    super(message)
    this.name = 'RequestError'
  }
}

function getLogger(logger?: Logger): Logger {
  const base: Logger = console
  return { ...base, ...(logger || {}) }
}

function sendJson(res: ServerResponse, payload: unknown, status = 200) {
  res.statusCode = status
  res.setHeader('content-type', 'application/json')
  res.end(JSON.stringify(payload))
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = []
  let size = 0
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    size += buf.length
    if (size > MAX_BODY_BYTES) throw new RequestError(413, 'payload_too_large', `body exceeds ${MAX_BODY_BYTES} bytes`)
    chunks.push(buf)
  }
  const raw = Buffer.concat(chunks).toString('utf8')
  if (!raw.trim()) return {}
  try {
    return JSON.parse(raw)
  } catch {
    throw new RequestError(400, 'invalid_json', 'request body is not valid JSON')
  }
}

async function readBody<T>(req: IncomingMessage, validate: ValidateFunction<T>): Promise<T> {
  const body = await readJson(req)
  if (!validate(body)) throw new RequestError(400, 'validation_failed', describeErrors(validate.errors))
  return body
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    throw new RequestError(400, 'validation_failed', 'malformed percent-encoding in path')
  }
}

function toErrorResponse(err: unknown): { status: number; body: Record<string, unknown> } {
  if (err instanceof RequestError) return { status: err.status, body: { error: err.code, message: err.message } }
  if (err instanceof PartialUpsertFailure) {
    return { status: 207, body: { error: err.code, message: err.message, report: err.report, pendingIds: err.pendingIds } }
  }
  if (err instanceof ConfigurationError) return { status: 400, body: { error: err.code, message: err.message } }
  if (err instanceof StoreUnavailableError) return { status: 503, body: { error: err.code, message: err.message } }
  if (err instanceof EmbeddingProviderError || err instanceof GenerationProviderError) {
    return { status: 502, body: { error: err.code, message: err.message, provider: err.provider } }
  }
  return { status: 500, body: { error: 'internal_error', message: 'unexpected server error' } }
}

/**
 * Framework-agnostic request handler exposing the knowledge base over JSON.
 * Mount it directly on `http.createServer` or as Express/Connect middleware.
 */
export function createKnowledgeServer(config: KnowledgeServerConfig = {}): KnowledgeServer {
  const logger = getLogger(config.logger)
  let bearer = config.auth?.bearerToken ?? config.env?.bearerToken
  let kb: KnowledgeBaseService
  if (config.kb) {
    kb = config.kb
  } else {
    const env = config.env ?? loadEnvConfig(process.env, logger)
    bearer ??= env.bearerToken
    kb = createKnowledgeBase(env, logger, { providers: config.providerRegistry, metrics: config.metrics })
  }

  function ensureAuth(req: IncomingMessage): boolean {
    if (!bearer) return true
    const token = req.headers['authorization']?.replace('Bearer ', '')
    return token === bearer
  }

  const routes = async (req: IncomingMessage, res: ServerResponse, url: URL, signal: AbortSignal): Promise<boolean> => {
    const { pathname } = url
    const method = req.method || 'GET'

    if (method === 'GET' && pathname === '/healthz') {
      sendJson(res, { ok: true })
      return true
    }
    if (method === 'GET' && pathname === '/api/health') {
      const health = await kb.health({ signal })
      sendJson(res, health, health.ok ? 200 : 503)
      return true
    }
    if (!pathname.startsWith('/api/')) return false
    if (!ensureAuth(req)) {
      sendJson(res, { error: 'unauthorized' }, 401)
      return true
    }

    if (method === 'POST' && pathname === '/api/ingest') {
      const body = await readBody(req, validateIngest)
      const report = await kb.ingest(body.documents, { signal })
      sendJson(res, report, report.chunksFailed ? 207 : 200)
      return true
    }
    if (method === 'POST' && pathname === '/api/query') {
      const body = await readBody(req, validateQuery)
      sendJson(res, await kb.query(body.question, { topK: body.topK, ef: body.ef, filter: body.filter, signal }))
      return true
    }
    if (method === 'POST' && pathname === '/api/search') {
      const body = await readBody(req, validateSearch)
      const results = await kb.search(body.query, {
        topK: body.topK,
        ef: body.ef,
        threshold: body.threshold,
        filter: body.filter,
        signal,
      })
      sendJson(res, { query: body.query, results, count: results.length })
      return true
    }
    if (method === 'POST' && pathname === '/api/summarize') {
      const body = await readBody(req, validateSummarize)
      sendJson(res, await kb.summarize(body.topic, { topK: body.topK, maxWords: body.maxWords, filter: body.filter, signal }))
      return true
    }
    if (method === 'GET' && pathname === '/api/documents') {
      const limit = Number.parseInt(url.searchParams.get('limit') || '100', 10)
      if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
        throw new RequestError(400, 'validation_failed', 'limit must be an integer between 1 and 1000')
      }
      const documents = await kb.listDocuments(limit, { signal })
      sendJson(res, { documents, count: documents.length })
      return true
    }
    if (method === 'DELETE' && pathname.startsWith('/api/documents/')) {
      const source = decodePathSegment(pathname.slice('/api/documents/'.length))
      if (!source) throw new RequestError(400, 'validation_failed', 'document source is required')
      sendJson(res, await kb.deleteDocument(source, { signal }))
      return true
    }
    if (method === 'DELETE' && pathname === '/api/knowledge-base') {
      sendJson(res, await kb.deleteKnowledgeBase(undefined, { signal }))
      return true
    }
    return false
  }

  const handler: KnowledgeServer['handler'] = async (req, res, next) => {
    const url = new URL(req.url || '/', 'http://localhost')
    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableEnded) controller.abort()
    })

    try {
      if (await routes(req, res, url, controller.signal)) return
    } catch (err) {
      if (isAbortError(err) && controller.signal.aborted) {
        logger.warn('[http] client went away', { path: url.pathname })
        return
      }
      const { status, body } = toErrorResponse(err)
      if (status >= 500) logger.error('[http] request failed', { path: url.pathname, status, error: errorMessage(err) })
      else logger.warn('[http] request rejected', { path: url.pathname, status, error: body.error })
      sendJson(res, body, status)
      return
    }

    if (next) return next()
    sendJson(res, { error: 'not_found' }, 404)
  }

  return { handler, kb }
}

export { KnowledgeBaseService, createKnowledgeBase } from './kb/service'
export { ProviderRegistry, buildProviderRegistry } from './ai/providers/registry'
export { MemoryVectorStore } from './kb/store-memory'
export { PostgresVectorStore } from './kb/store-postgres'
export { HttpVectorStore } from './kb/store-http'
export { loadEnvConfig } from './env'
export * from './errors'
export type { KnowledgeServer, KnowledgeServerConfig, Logger } from './types'
export type { Answer, IngestReport, RetrievedChunk, SearchResult, TopicSummary } from './kb/types'
