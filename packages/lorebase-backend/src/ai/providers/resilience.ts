import { setTimeout as delay } from 'node:timers/promises'
import { ProviderHooks } from './types'

export interface RetryOptions {
  retries: number
  baseDelayMs: number
  factor?: number
  maxDelayMs?: number
  jitter?: boolean
  /** Return false to rethrow immediately instead of backing off. */
  shouldRetry?: (err: unknown, attempt: number) => boolean
  signal?: AbortSignal
  /** Called with the 1-based number of the attempt about to run. */
  onAttempt?: (attempt: number) => void
}

export class CircuitBreaker {
  private failureCount = 0
  private openUntil = 0

  constructor(private readonly failureThreshold = 5, private readonly cooldownMs = 15000) {}

  async exec<T>(fn: () => Promise<T>, hooks?: ProviderHooks): Promise<T> {
    const now = Date.now()
    if (this.openUntil > now) {
      hooks?.logger?.warn('[circuit-breaker] short-circuiting call')
      throw new CircuitOpenError(this.openUntil)
    }
    try {
      const result = await fn()
      this.failureCount = 0
      return result
    } catch (err) {
      this.failureCount += 1
      hooks?.logger?.warn('[circuit-breaker] failure count', this.failureCount, err)
      if (this.failureCount >= this.failureThreshold) {
        this.openUntil = now + this.cooldownMs
        hooks?.onTrace?.({ name: 'circuit_open', meta: { until: this.openUntil } })
      }
      throw err
    }
  }
}

export class CircuitOpenError extends Error {
  // Reported with a network-style code so callers treat it as a transient outage.
  readonly code = 'ECONNREFUSED'

  constructor(readonly openUntil: number) {
    super('circuit_open')
    this.name = 'CircuitOpenError'
  }
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions, hooks?: ProviderHooks): Promise<T> {
  const { retries, baseDelayMs, factor = 2, jitter = true, maxDelayMs = 5000, shouldRetry, signal } = options
  let attempt = 0
  while (true) {
    signal?.throwIfAborted()
    options.onAttempt?.(attempt + 1)
    try {
      const start = Date.now()
      const result = await fn()
      hooks?.onTrace?.({ name: 'retry_success', meta: { attempt, duration: Date.now() - start } })
      return result
    } catch (err) {
      if (attempt >= retries) throw err
      if (shouldRetry && !shouldRetry(err, attempt)) throw err
      if (signal?.aborted) throw err
      const expo = baseDelayMs * Math.pow(factor, attempt)
      const sleep = Math.min(maxDelayMs, jitter ? expo * (0.5 + Math.random()) : expo)
      hooks?.logger?.warn('[retry] transient failure', { attempt, sleep, error: err instanceof Error ? err.message : String(err) })
      hooks?.onTrace?.({ name: 'retry_backoff', meta: { attempt, sleep } })
      await delay(sleep, undefined, { signal })
      attempt += 1
    }
  }
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight and returns the
 * results in input order. Once a call rejects (or `signal` aborts) no new
 * items are started; the first error is rethrown after in-flight calls settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, items.length))
  let next = 0
  const state: { failure?: { error: unknown } } = {}

  const worker = async () => {
    while (!state.failure && next < items.length) {
      if (signal?.aborted) {
        state.failure = { error: signal.reason }
        return
      }
      const index = next++
      try {
        results[index] = await fn(items[index], index)
      } catch (error) {
        state.failure ??= { error }
      }
    }
  }

  await Promise.all(Array.from({ length: width }, () => worker()))
  if (state.failure) throw state.failure.error
  return results
}

/**
 * Combines an optional caller signal with a per-call timeout. The returned
 * `dispose` clears the timer and listeners once the call settles.
 */
export function linkSignal(parent: AbortSignal | undefined, timeoutMs?: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const onAbort = () => controller.abort(parent?.reason)
  if (parent?.aborted) controller.abort(parent.reason)
  else parent?.addEventListener('abort', onAbort, { once: true })

  let timer: NodeJS.Timeout | undefined
  if (timeoutMs && timeoutMs > 0 && !controller.signal.aborted) {
    timer = setTimeout(() => {
      const reason = new Error(`Request timed out after ${timeoutMs}ms`)
      reason.name = 'TimeoutError'
      controller.abort(reason)
    }, timeoutMs)
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer)
      parent?.removeEventListener('abort', onAbort)
    },
  }
}

/** Settles with `promise`, or rejects with the signal's reason as soon as it aborts. */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)
    if (signal.aborted) onAbort()
    else signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}
