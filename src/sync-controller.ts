// Background mailbox scan that fills the message cache.
// One run lists message ids page by page, skips ids already cached (unless
// stale, or a full refresh was asked for), fetches headers for the rest in
// bounded batches through the rate limiter, and writes each batch to the
// cache before moving on. Batches are handled in listing order, so progress
// only moves forward and the cache is always a prefix of the full scan.
//
// State machine: idle → running → complete | error. stop() is cooperative:
// the loop checks the cancellation token between batches and ends as
// complete; an in-flight batch is allowed to finish.

import {
  AuthError,
  DEFAULT_RETRY_ATTEMPTS,
  PartialBatchFailure,
  RateLimitError,
  StorageError,
  SyncAlreadyRunningError,
  backoffDelay,
  chunk,
  isRetryable,
  sleep,
  withRetry,
} from './api-utils.js'
import type { SyncOptions } from './config.js'
import type { FetchFailure, MailClient, MessageRecord, Scheduler } from './mail-client.js'
import type { MessageCache } from './message-cache.js'
import { silentLogger, type Logger } from './output.js'
import type { RateLimiter } from './rate-limiter.js'

const MAX_RECORDED_ERRORS = 20

export type SyncStatus = 'idle' | 'running' | 'complete' | 'error'

export interface SyncState {
  status: SyncStatus
  /** Listed ids handled so far (fetched, already cached, or skipped). */
  scannedCount: number
  /** Ids discovered so far, capped at the scan ceiling. */
  totalToScan: number
  /** True once the listing is exhausted or the ceiling was reached. */
  totalKnown: boolean
  /** Page token for the next listing page. */
  cursor: string | null
  startedAt: number | null
  finishedAt: number | null
  /** Current phase, or the failure reason once status is 'error'. */
  message: string
  fetchedCount: number
  cachedCount: number
  skippedIds: number
  errors: string[]
  stopRequested: boolean
}

export interface StartOptions {
  /** Re-fetch every listed id, ignoring what is cached. */
  full?: boolean
  /** Continue listing from the cursor saved by a stopped run. */
  resume?: boolean
}

export class CancellationToken {
  private requested = false

  cancel(): void {
    this.requested = true
  }

  get cancelled(): boolean {
    return this.requested
  }
}

function initialState(): SyncState {
  return {
    status: 'idle',
    scannedCount: 0,
    totalToScan: 0,
    totalKnown: false,
    cursor: null,
    startedAt: null,
    finishedAt: null,
    message: 'Idle',
    fetchedCount: 0,
    cachedCount: 0,
    skippedIds: 0,
    errors: [],
    stopRequested: false,
  }
}

/** Outcome of one batch: nothing on success, an error that ends the run otherwise. */
type BatchFailure = AuthError | StorageError

export class SyncController {
  private client: MailClient
  private store: MessageCache
  private limiter: RateLimiter
  private options: SyncOptions
  private logger: Logger
  private state: SyncState = initialState()
  private token: CancellationToken | null = null
  private run: Promise<void> | null = null
  /** Ids the bulk mutator trashed in this process; never written back. */
  private trashed: ReadonlySet<string>
  // Every per-id header request takes its own limiter slot
  private schedule: Scheduler = (request) => this.limiter.schedule(request)

  constructor({
    client,
    store,
    limiter,
    options,
    trashed = new Set<string>(),
    logger = silentLogger,
  }: {
    client: MailClient
    store: MessageCache
    limiter: RateLimiter
    options: SyncOptions
    trashed?: ReadonlySet<string>
    logger?: Logger
  }) {
    this.client = client
    this.store = store
    this.limiter = limiter
    this.options = options
    this.trashed = trashed
    this.logger = logger
  }

  // =========================================================================
  // Public surface
  // =========================================================================

  get isRunning(): boolean {
    return this.state.status === 'running'
  }

  /**
   * Begin a run in the background. Returns SyncAlreadyRunningError (leaving
   * the current run's progress untouched) while one is in progress.
   */
  start({ full = false, resume = false }: StartOptions = {}): SyncState | SyncAlreadyRunningError | StorageError {
    if (this.isRunning) {
      return new SyncAlreadyRunningError({ startedAt: new Date(this.state.startedAt ?? Date.now()).toISOString() })
    }

    let cursor: string | null = null
    if (resume) {
      const saved = this.store.loadCursor()
      if (saved instanceof Error) return saved
      cursor = saved ?? null
    }

    const token = new CancellationToken()
    this.token = token
    this.state = {
      ...initialState(),
      status: 'running',
      startedAt: Date.now(),
      cursor,
      message: cursor ? 'Resuming listing...' : 'Listing messages...',
    }
    this.logger.info(`Sync started${full ? ' (full refresh)' : ''}${cursor ? ' from saved cursor' : ''}`)

    this.run = this.scan(token, { full, cursor }).catch((err: unknown) => {
      // scan() returns failures as values; reaching here means a bug, still surface it
      this.finishWithError(String(err))
    })
    return this.status()
  }

  /** Request cancellation. Returns false when nothing is running. */
  stop(): boolean {
    if (!this.isRunning || !this.token) return false
    this.token.cancel()
    this.state.stopRequested = true
    this.state.message = 'Stopping...'
    return true
  }

  /** Snapshot of the current (or last) run. Never blocks. */
  status(): SyncState {
    return { ...this.state, errors: [...this.state.errors] }
  }

  /**
   * Integer percent. Once the total is known it is scanned/total; before
   * that the configured ceiling is the denominator.
   */
  progress(): number {
    const { scannedCount, totalToScan, totalKnown } = this.state
    const denominator = totalKnown ? totalToScan : this.options.maxMessages
    if (denominator <= 0) return totalKnown ? 100 : 0
    return Math.min(100, Math.floor((scannedCount / denominator) * 100))
  }

  /** Resolves when the current run (if any) has ended. */
  async waitForIdle(): Promise<void> {
    await this.run
  }

  // =========================================================================
  // Scan loop
  // =========================================================================

  private async scan(token: CancellationToken, { full, cursor: startCursor }: { full: boolean; cursor: string | null }): Promise<void> {
    const { maxMessages, pageSize, fetchBatchSize, staleAfterMs } = this.options
    const staleBefore = staleAfterMs === undefined ? undefined : Date.now() - staleAfterMs

    let pageCursor = startCursor
    let discovered = 0

    while (!token.cancelled) {
      const page = await withRetry(
        () => this.limiter.schedule(() => this.client.listMessageIds({ cursor: pageCursor, pageSize: Math.min(pageSize, maxMessages - discovered) })),
        this.options.retry,
        { onRetry: (info) => this.onRetry('list', info) },
      )
      if (page instanceof Error) {
        this.saveCursor(pageCursor)
        return this.finishWithError(page.message)
      }

      const ids = page.ids.slice(0, maxMessages - discovered)
      discovered += ids.length
      const exhausted = page.done || page.nextCursor === null
      const reachedCap = discovered >= maxMessages

      this.state.totalToScan = discovered
      this.state.totalKnown = exhausted || reachedCap
      this.state.cursor = page.nextCursor
      this.state.message = `Fetching details... ${this.state.scannedCount}/${discovered}`

      for (const batch of chunk(ids, fetchBatchSize)) {
        if (token.cancelled) break
        const failure = await this.processBatch(batch, { full, staleBefore })
        if (failure) {
          this.saveCursor(pageCursor)
          return this.finishWithError(failure.message)
        }
        this.state.message = `Fetching details... ${this.state.scannedCount}/${discovered}`
      }

      if (token.cancelled) break

      if (exhausted) {
        this.clearCursor()
        return this.finishComplete('Complete')
      }
      if (reachedCap) {
        this.saveCursor(page.nextCursor)
        return this.finishComplete(`Complete (reached ${maxMessages} message limit)`)
      }
      pageCursor = page.nextCursor
    }

    // Stopped: the interrupted page is listed again on resume; its cached ids are cheap to skip
    this.saveCursor(pageCursor)
    this.finishComplete('Stopped by user')
  }

  private async processBatch(
    batch: string[],
    { full, staleBefore }: { full: boolean; staleBefore: number | undefined },
  ): Promise<BatchFailure | undefined> {
    const needed = full ? batch : this.store.missingOrStale(batch, staleBefore)
    if (needed instanceof Error) return needed

    this.state.cachedCount += batch.length - needed.length

    if (needed.length > 0) {
      const fetched = await this.fetchWithRetry(needed)
      if (fetched instanceof Error) return fetched

      // A delete may have landed while these headers were in flight
      const records = fetched.records.filter((r) => !this.trashed.has(r.id) && !r.labelIds.includes('TRASH'))
      const written = this.store.upsert(records)
      if (written instanceof Error) return written

      this.state.fetchedCount += records.length
      this.state.skippedIds += fetched.skipped.length
    }

    // Monotonic, and never past totalToScan since the batch came from the counted page
    this.state.scannedCount += batch.length
    return undefined
  }

  /**
   * Fetch headers, retrying only the ids that failed with a retryable error.
   * Ids that still fail after the last attempt (or fail permanently, e.g. the
   * message was deleted meanwhile) are skipped. AuthError aborts.
   */
  private async fetchWithRetry(ids: string[]): Promise<{ records: MessageRecord[]; skipped: string[] } | AuthError> {
    const attempts = this.options.retry.attempts ?? DEFAULT_RETRY_ATTEMPTS
    const records: MessageRecord[] = []
    const skipped: string[] = []
    let pending = ids

    for (let attempt = 1; pending.length > 0; attempt++) {
      const result = await this.client.fetchHeaders(pending, this.schedule)
      if (result instanceof AuthError) return result

      let failures: Map<string, FetchFailure>
      if (result instanceof Error) {
        // Whole-batch transport failure: every pending id failed the same way
        failures = new Map<string, FetchFailure>(pending.map((id) => [id, result]))
      } else {
        records.push(...result.records)
        failures = result.failures
      }

      for (const failure of failures.values()) {
        if (failure instanceof AuthError) return failure
      }

      const retryable = [...failures].filter(([, failure]) => isRetryable(failure)).map(([id]) => id)
      skipped.push(...[...failures.keys()].filter((id) => !retryable.includes(id)))

      if (retryable.length === 0) break
      if (attempt >= attempts) {
        skipped.push(...retryable)
        break
      }

      const waitMs = backoffDelay(attempt, this.options.retry.delayMs)
      const throttled = [...failures.values()].some((failure) => failure instanceof RateLimitError)
      if (throttled) this.limiter.backoff(waitMs)
      this.logger.debug(`Retrying ${retryable.length} header fetch(es) in ${waitMs}ms (attempt ${attempt + 1}/${attempts})`)
      await sleep(waitMs)
      pending = retryable
    }

    if (skipped.length > 0) {
      const partial = new PartialBatchFailure({ failed: String(skipped.length), total: String(ids.length), operation: 'fetchHeaders' })
      this.recordError(partial.message)
      this.logger.warn(partial.message)
    }

    // Listing order within the batch
    const position = new Map(ids.map((id, i) => [id, i]))
    records.sort((a, b) => (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0))
    return { records, skipped }
  }

  // =========================================================================
  // Helpers
  // =========================================================================

  private onRetry(what: string, { attempt, error, waitMs }: { attempt: number; error: Error; waitMs: number }) {
    if (error instanceof RateLimitError) this.limiter.backoff(waitMs)
    this.recordError(error.message)
    this.logger.debug(`Retrying ${what} in ${waitMs}ms after attempt ${attempt}: ${error.message}`)
  }

  private recordError(message: string) {
    this.state.errors.push(message)
    if (this.state.errors.length > MAX_RECORDED_ERRORS) {
      this.state.errors.splice(0, this.state.errors.length - MAX_RECORDED_ERRORS)
    }
  }

  private saveCursor(cursor: string | null) {
    const result = cursor ? this.store.saveCursor(cursor) : this.store.clearCursor()
    if (result instanceof Error) this.logger.warn(result.message)
  }

  private clearCursor() {
    const result = this.store.clearCursor()
    if (result instanceof Error) this.logger.warn(result.message)
  }

  private finishComplete(message: string) {
    this.state.status = 'complete'
    this.state.totalKnown = true
    this.finish(message)
    this.logger.info(`${message}: scanned ${this.state.scannedCount}, fetched ${this.state.fetchedCount}, skipped ${this.state.skippedIds}`)
  }

  private finishWithError(message: string) {
    this.state.status = 'error'
    this.finish(message)
    this.recordError(message)
    this.logger.error(`Sync failed: ${message}`)
  }

  private finish(message: string) {
    this.state.message = message
    this.state.finishedAt = Date.now()
    this.token = null
    const saved = this.store.saveSyncSummary({
      status: this.state.status,
      scannedCount: this.state.scannedCount,
      totalToScan: this.state.totalToScan,
      startedAt: this.state.startedAt,
      finishedAt: this.state.finishedAt,
      message,
    })
    if (saved instanceof Error) this.logger.warn(saved.message)
  }
}
