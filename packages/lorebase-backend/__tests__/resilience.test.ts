import { describe, expect, it, vi } from 'vitest'
import { abortable, CircuitBreaker, CircuitOpenError, linkSignal, mapWithConcurrency, withRetry } from '../src/ai/providers/resilience'
import {
  ConfigurationError,
  HttpError,
  classifyGenerationFailure,
  isTransientError,
} from '../src/errors'

describe('mapWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let active = 0
    let peak = 0
    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
      active += 1
      peak = Math.max(peak, active)
      await new Promise((resolve) => setTimeout(resolve, ms))
      active -= 1
      return index * 10
    })
    expect(results).toEqual([0, 10, 20, 30, 40])
    expect(peak).toBe(2)
  })

  it('stops dispatching after the first failure', async () => {
    const fn = vi.fn(async (n: number) => {
      if (n === 1) throw new Error('boom')
      return n
    })
    await expect(mapWithConcurrency([0, 1, 2, 3], 1, fn)).rejects.toThrow('boom')
    expect(fn).toHaveBeenCalledTimes(2)
  })
})

describe('withRetry', () => {
  it('returns after a transient failure', async () => {
    let calls = 0
    const result = await withRetry(
      async () => {
        calls += 1
        if (calls < 3) throw new HttpError(503, {})
        return 'ok'
      },
      { retries: 3, baseDelayMs: 1, shouldRetry: isTransientError },
    )
    expect(result).toBe('ok')
    expect(calls).toBe(3)
  })

  it('rethrows at once when the error is not retryable', async () => {
    const fn = vi.fn(async () => {
      throw new HttpError(400, {})
    })
    await expect(withRetry(fn, { retries: 3, baseDelayMs: 1, shouldRetry: isTransientError })).rejects.toBeInstanceOf(HttpError)
    expect(fn).toHaveBeenCalledTimes(1)
  })
})

describe('CircuitBreaker', () => {
  it('opens after repeated failures', async () => {
    const breaker = new CircuitBreaker(2, 60_000)
    const fail = async () => {
      throw new Error('down')
    }
    await expect(breaker.exec(fail)).rejects.toThrow('down')
    await expect(breaker.exec(fail)).rejects.toThrow('down')
    await expect(breaker.exec(async () => 'never')).rejects.toBeInstanceOf(CircuitOpenError)
  })
})

describe('linkSignal and abortable', () => {
  it('aborts with a TimeoutError once the timeout passes', async () => {
    const linked = linkSignal(undefined, 10)
    const err = await abortable(new Promise(() => {}), linked.signal).catch((e: unknown) => e)
    linked.dispose()
    expect(err).toBeInstanceOf(Error)
    expect(err).toMatchObject({ name: 'TimeoutError' })
    expect(classifyGenerationFailure(err)).toBe('timeout')
  })

  it('follows the parent signal', () => {
    const parent = new AbortController()
    const linked = linkSignal(parent.signal)
    parent.abort()
    expect(linked.signal.aborted).toBe(true)
    linked.dispose()
  })

  it('settles normally when the promise wins', async () => {
    const controller = new AbortController()
    expect(await abortable(Promise.resolve(7), controller.signal)).toBe(7)
  })
})

describe('error classification', () => {
  it.each([
    [new HttpError(503, {}), true],
    [new HttpError(429, {}), true],
    [new HttpError(404, {}), false],
    [Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }), true],
    [new TypeError('fetch failed'), true],
    [new ConfigurationError('bad'), false],
    [Object.assign(new Error('aborted'), { name: 'AbortError' }), false],
  ])('isTransientError(%s) is %s', (err, expected) => {
    expect(isTransientError(err)).toBe(expected)
  })

  it('classifies generation failures', () => {
    expect(classifyGenerationFailure(new HttpError(401, {}))).toBe('auth')
    expect(classifyGenerationFailure(new HttpError(429, {}))).toBe('rate_limit')
    expect(classifyGenerationFailure(new HttpError(502, {}))).toBe('server')
    expect(classifyGenerationFailure(new HttpError(422, {}))).toBe('bad_response')
    expect(classifyGenerationFailure(new Error('mystery'))).toBe('unknown')
  })
})
