// Tests for retry, bounded concurrency and googleapis error classification.

import { afterEach, describe, expect, test, vi } from 'vitest'
import {
  AuthError,
  NotFoundError,
  RateLimitError,
  TransportError,
  ValidationError,
  backoffDelay,
  chunk,
  isRetryable,
  mapConcurrent,
  toRemoteError,
  withRetry,
} from './api-utils.js'

afterEach(() => {
  vi.useRealTimers()
})

// ---------------------------------------------------------------------------
// chunk / mapConcurrent
// ---------------------------------------------------------------------------

test('chunk splits into consecutive groups', () => {
  expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
  expect(chunk([], 3)).toEqual([])
})

describe('mapConcurrent', () => {
  test('keeps input order and respects the concurrency bound', async () => {
    let inFlight = 0
    let peak = 0
    const result = await mapConcurrent([30, 10, 20, 5], async (ms) => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await new Promise((resolve) => setTimeout(resolve, ms))
      inFlight--
      return ms * 2
    }, 2)

    expect(result).toEqual([60, 20, 40, 10])
    expect(peak).toBe(2)
  })

  test('stops starting work after a callback returns an error', async () => {
    const seen: number[] = []
    const result = await mapConcurrent([1, 2, 3, 4], async (n) => {
      seen.push(n)
      if (n === 2) return new ValidationError({ field: 'n', reason: 'two' })
      return n
    }, 1)

    expect(result).toBeInstanceOf(ValidationError)
    expect(seen).toEqual([1, 2])
  })
})

// ---------------------------------------------------------------------------
// withRetry
// ---------------------------------------------------------------------------

describe('withRetry', () => {
  test('backoff doubles per attempt', () => {
    expect([1, 2, 3].map((a) => backoffDelay(a, 100))).toEqual([100, 200, 400])
  })

  test('retries throttling until success', async () => {
    const results: Array<string | RateLimitError> = [
      new RateLimitError({ operation: 'list', reason: '429' }),
      new RateLimitError({ operation: 'list', reason: '429' }),
      'ok',
    ]
    const onRetry = vi.fn()
    const fn = vi.fn(async () => results.shift() ?? 'unexpected')

    const result = await withRetry(fn, { attempts: 3, delayMs: 0 }, { onRetry })

    expect(result).toBe('ok')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(onRetry.mock.calls.map(([info]) => [info.attempt, info.waitMs])).toEqual([[1, 0], [2, 0]])
  })

  test('returns the last error after the final attempt', async () => {
    const fn = vi.fn(async () => new TransportError({ operation: 'get', reason: 'reset' }))
    const result = await withRetry(fn, { attempts: 2, delayMs: 0 })
    expect(result).toBeInstanceOf(TransportError)
    expect(fn).toHaveBeenCalledTimes(2)
  })

  test('does not retry non-retryable errors', async () => {
    const fn = vi.fn(async () => new AuthError({ email: 'me@example.com', reason: 'revoked' }))
    const result = await withRetry(fn, { attempts: 5, delayMs: 0 })
    expect(result).toBeInstanceOf(AuthError)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  test('shouldRetry narrows the retried set', async () => {
    const fn = vi.fn(async () => new TransportError({ operation: 'trash', reason: '500' }))
    await withRetry(fn, { attempts: 3, delayMs: 0 }, { shouldRetry: (e) => e instanceof RateLimitError })
    expect(fn).toHaveBeenCalledTimes(1)
  })

  test('waits between attempts', async () => {
    vi.useFakeTimers()
    const results: Array<string | RateLimitError> = [new RateLimitError({ operation: 'x', reason: '429' }), 'ok']
    const pending = withRetry(async () => results.shift() ?? 'unexpected', { attempts: 2, delayMs: 1000 })

    await vi.advanceTimersByTimeAsync(999)
    expect(results).toHaveLength(1)
    await vi.advanceTimersByTimeAsync(1)
    await expect(pending).resolves.toBe('ok')
  })
})

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

describe('toRemoteError', () => {
  const gaxiosError = (status: number, reason?: string) =>
    Object.assign(new Error(`Request failed with status ${status}`), {
      code: status,
      response: { status, data: { error: { errors: reason ? [{ reason }] : [] } } },
    })

  test('429 is throttling', () => {
    expect(toRemoteError('messages.list', 'me@example.com', gaxiosError(429))).toBeInstanceOf(RateLimitError)
  })

  test('403 with a quota reason is throttling', () => {
    expect(toRemoteError('messages.get', 'me@example.com', gaxiosError(403, 'userRateLimitExceeded'))).toBeInstanceOf(RateLimitError)
  })

  test('401 and other 403s are auth failures', () => {
    expect(toRemoteError('messages.get', 'me@example.com', gaxiosError(401))).toBeInstanceOf(AuthError)
    expect(toRemoteError('messages.get', 'me@example.com', gaxiosError(403, 'insufficientPermissions'))).toBeInstanceOf(AuthError)
  })

  test('invalid_grant is an auth failure', () => {
    expect(toRemoteError('getProfile', 'me@example.com', new Error('invalid_grant'))).toBeInstanceOf(AuthError)
  })

  test('404 is not found', () => {
    expect(toRemoteError('messages.get', 'me@example.com', gaxiosError(404))).toBeInstanceOf(NotFoundError)
  })

  test('anything else is a transport failure', () => {
    const err = toRemoteError('messages.list', 'me@example.com', new Error('socket hang up'))
    expect(err).toBeInstanceOf(TransportError)
    expect(err.message).toBe('Remote call messages.list failed: Error: socket hang up')
    expect(isRetryable(err)).toBe(true)
  })
})
