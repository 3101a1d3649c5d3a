// Shared API utilities for the sync engine.
// Tagged error classes, retry with exponential backoff, a bounded concurrency
// helper, and classification of googleapis exceptions.
//
// Error handling follows the errore pattern (errors as values):
// - Components return error instances instead of throwing
// - Callers narrow with instanceof, no try/catch or string matching needed
// - See https://errore.org/ for the philosophy

import * as errore from 'errore'

const MAX_CONCURRENCY = 10
export const DEFAULT_RETRY_ATTEMPTS = 3
const DEFAULT_RETRY_DELAY_MS = 1000

// ---------------------------------------------------------------------------
// Errors (errore pattern: errors as values, not exceptions)
// ---------------------------------------------------------------------------

/** Credentials are invalid, expired or revoked. Fatal to a sync run, never retried. */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed for $email: $reason',
}) {}

/** The remote service signalled throttling (429, or 403 with a quota reason). */
export class RateLimitError extends errore.createTaggedError({
  name: 'RateLimitError',
  message: 'Rate limited during $operation: $reason',
}) {}

/** A remote call failed for any other reason (network, 5xx, unexpected 4xx). */
export class TransportError extends errore.createTaggedError({
  name: 'TransportError',
  message: 'Remote call $operation failed: $reason',
}) {}

/** Local persistence failed. Fatal to the operation that hit it. */
export class StorageError extends errore.createTaggedError({
  name: 'StorageError',
  message: 'Cache storage failed during $operation: $reason',
}) {}

/** Some ids in a batch failed while the rest succeeded. Informational, not fatal. */
export class PartialBatchFailure extends errore.createTaggedError({
  name: 'PartialBatchFailure',
  message: '$failed of $total ids failed during $operation',
}) {}

/** Returned when a requested message no longer exists remotely. */
export class NotFoundError extends errore.createTaggedError({
  name: 'NotFoundError',
  message: '$resource not found',
}) {}

/** Returned when required data is missing from an API response. */
export class MissingDataError extends errore.createTaggedError({
  name: 'MissingDataError',
  message: 'Missing $what for $resource',
}) {}

/** Returned when input fails validation (config values, stats filters, delete ids). */
export class ValidationError extends errore.createTaggedError({
  name: 'ValidationError',
  message: 'Invalid $field: $reason',
}) {}

/** Returned by start() while a sync run is in progress. */
export class SyncAlreadyRunningError extends errore.createTaggedError({
  name: 'SyncAlreadyRunningError',
  message: 'Sync already running since $startedAt',
}) {}

// ---------------------------------------------------------------------------
// Concurrency
// ---------------------------------------------------------------------------

/** Exclude Error subtypes from a union. Used by mapConcurrent to strip
 *  error return types from the success array; errors are returned separately. */
type ExcludeError<T> = T extends Error ? never : T

/** Extract Error subtypes from a union. Used by mapConcurrent for the error branch. */
type ExtractError<T> = T extends Error ? T : never

/** Run promises with bounded concurrency, keeping input order in the result.
 *  Error-aware: if any callback returns an Error instance, no new work is
 *  started and that error is returned as a value. Callbacks should return
 *  Error for fatal failures and null for skip. */
export async function mapConcurrent<T, R>(
  items: T[],
  fn: (item: T) => Promise<R>,
  concurrency = MAX_CONCURRENCY,
): Promise<ExcludeError<R>[] | ExtractError<R>> {
  const results: ExcludeError<R>[] = []
  const queue = items.map((item, index) => ({ item, index }))
  let fatalError: ExtractError<R> | null = null

  async function worker() {
    while (!fatalError) {
      const next = queue.shift()
      if (!next) return
      const result = await fn(next.item)
      if (result instanceof Error) {
        fatalError = result as ExtractError<R>
        return
      }
      results[next.index] = result as ExcludeError<R>
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker())
  await Promise.all(workers)
  if (fatalError) return fatalError
  return results
}

/** Split a list into consecutive chunks of at most `size` items. */
export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve) => setTimeout(resolve, ms))
}

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

export type RetryableError = RateLimitError | TransportError

export interface RetryOptions {
  /** Total attempts including the first call. */
  attempts?: number
  /** Delay before the second attempt; doubles on every further attempt. */
  delayMs?: number
}

export interface RetryHooks {
  /** Narrow the retryable set, e.g. throttling only. */
  shouldRetry?: (error: RetryableError) => boolean
  onRetry?: (info: { attempt: number; error: RetryableError; waitMs: number }) => void
}

export function isRetryable(value: unknown): value is RetryableError {
  return value instanceof RateLimitError || value instanceof TransportError
}

export function backoffDelay(attempt: number, delayMs = DEFAULT_RETRY_DELAY_MS): number {
  return delayMs * Math.pow(2, attempt - 1)
}

/** Retry a call that returns errors as values. Only RateLimitError and
 *  TransportError are retried; any other result is returned immediately.
 *  After the last attempt the last error is returned. */
export async function withRetry<T>(
  fn: () => Promise<T>,
  { attempts = DEFAULT_RETRY_ATTEMPTS, delayMs = DEFAULT_RETRY_DELAY_MS }: RetryOptions = {},
  { shouldRetry, onRetry }: RetryHooks = {},
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    const result = await fn()
    if (!isRetryable(result)) return result
    if (attempt >= attempts) return result
    if (shouldRetry && !shouldRetry(result)) return result
    const waitMs = backoffDelay(attempt, delayMs)
    onRetry?.({ attempt, error: result, waitMs })
    await sleep(waitMs)
  }
}

// ---------------------------------------------------------------------------
// Classification of googleapis exceptions
// NOTE: this is the boundary layer that converts untyped library exceptions
// into typed error values, so inspecting status codes and reasons is expected.
// ---------------------------------------------------------------------------

const RATE_LIMIT_REASONS = [
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

export function errorStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined
  const response = isRecord(err.response) ? err.response : undefined
  for (const candidate of [err.code, err.status, response?.status]) {
    if (typeof candidate === 'number') return candidate
    if (typeof candidate === 'string' && /^\d+$/.test(candidate)) return Number(candidate)
  }
  return undefined
}

function errorReasons(err: unknown): string[] {
  if (!isRecord(err)) return []
  const response = isRecord(err.response) ? err.response : undefined
  const data = isRecord(response?.data) ? response.data : undefined
  const body = isRecord(data?.error) ? data.error : undefined
  const list = Array.isArray(err.errors) ? err.errors : Array.isArray(body?.errors) ? body.errors : []
  return list.flatMap((e: unknown) => (isRecord(e) && typeof e.reason === 'string' ? [e.reason] : []))
}

export function isRateLimitError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 429) return true
  if (status === 403) {
    return errorReasons(err).some((reason) => RATE_LIMIT_REASONS.includes(reason))
  }
  return false
}

export function isAuthLikeError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid credentials') || msg.includes('Unauthorized') || msg.includes('invalid_grant')
}

/** Map a googleapis exception to the error value a caller should see. */
export function toRemoteError(
  operation: string,
  email: string,
  err: unknown,
): AuthError | RateLimitError | TransportError | NotFoundError {
  if (isRateLimitError(err)) return new RateLimitError({ operation, reason: String(err), cause: err })
  if (isAuthLikeError(err)) return new AuthError({ email, reason: String(err), cause: err })
  if (errorStatus(err) === 404) return new NotFoundError({ resource: operation, cause: err })
  return new TransportError({ operation, reason: String(err), cause: err })
}
