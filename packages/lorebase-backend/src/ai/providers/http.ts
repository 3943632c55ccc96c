import { HttpError, isTransientError } from '../../errors'
import { CircuitBreaker, linkSignal, withRetry } from './resilience'
import { ProviderHooks } from './types'

export interface HttpRequestOptions {
  url: string
  method?: string
  headers?: Record<string, string>
  body?: unknown
  expectedStatus?: number | number[]
  retries?: number
  retryDelayMs?: number
  /** Per-attempt timeout. */
  timeoutMs?: number
  signal?: AbortSignal
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  data: unknown
}

export interface HttpClient {
  request(options: HttpRequestOptions, hooks?: ProviderHooks): Promise<HttpResponse>
}

export class FetchHttpClient implements HttpClient {
  constructor(private breaker = new CircuitBreaker(), private readonly defaultTimeoutMs = 30_000) {}

  async request(options: HttpRequestOptions, hooks?: ProviderHooks): Promise<HttpResponse> {
    const {
      url,
      method = 'POST',
      headers = {},
      body,
      expectedStatus = [200],
      retries = 2,
      retryDelayMs = 200,
      timeoutMs = this.defaultTimeoutMs,
      signal,
    } = options

    const exec = async (): Promise<HttpResponse> => {
      const linked = linkSignal(signal, timeoutMs)
      try {
        const res = await fetch(url, {
          method,
          headers: { 'content-type': 'application/json', ...headers },
          body: body !== undefined ? JSON.stringify(body) : undefined,
          signal: linked.signal,
        })
        const text = await res.text()
        const data = parseBody(text)
        const responseHeaders = Object.fromEntries(res.headers.entries())
        const okStatuses = Array.isArray(expectedStatus) ? expectedStatus : [expectedStatus]
        if (!okStatuses.includes(res.status)) {
          throw new HttpError(res.status, data, responseHeaders)
        }
        return { status: res.status, headers: responseHeaders, data }
      } finally {
        linked.dispose()
      }
    }

    return this.breaker.exec(
      () =>
        withRetry(exec, { retries, baseDelayMs: retryDelayMs, shouldRetry: isTransientError, signal }, hooks).catch((err) => {
          hooks?.logger?.error('[http] request failed', { url: redactUrl(url), method, error: err instanceof Error ? err.message : err })
          throw err
        }),
      hooks,
    )
  }
}

function parseBody(text: string): unknown {
  if (!text) return undefined
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function redactUrl(url: string): string {
  return url.replace(/([?&]key=)[^&]+/i, '$1***')
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Reads a nested property through records and arrays, returning undefined on any miss. */
export function pick(value: unknown, ...path: (string | number)[]): unknown {
  let current = value
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined
      current = current[key]
    } else {
      if (!isRecord(current)) return undefined
      current = current[key]
    }
  }
  return current
}

export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number' && Number.isFinite(v))
}
