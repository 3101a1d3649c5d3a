// Boundary operations of the sync engine.
// Wires one MailClient, one MessageCache and one shared RateLimiter into a
// SyncController and a BulkMutator, and exposes the operations a front end
// calls. Inputs are validated with zod; results are plain snake_case objects
// and expected failures come back as `{ error }`, never as exceptions.

import { z } from 'zod'
import { SyncAlreadyRunningError, ValidationError } from './api-utils.js'
import { BulkMutator } from './bulk-mutator.js'
import type { SyncOptions, TrashOptions } from './config.js'
import { CATEGORIES, type MailClient } from './mail-client.js'
import type { MessageCache } from './message-cache.js'
import { silentLogger, type Logger } from './output.js'
import { RateLimiter, type RateLimiterOptions } from './rate-limiter.js'
import { computeStats, parseDay } from './stats.js'
import { SyncController, type StartOptions, type SyncStatus } from './sync-controller.js'

export const DEFAULT_MAX_RESULTS = 2000

const statsQuerySchema = z.object({
  before: z.string().optional(),
  category: z.union([z.literal('all'), z.enum(CATEGORIES)]).optional(),
  max_results: z.coerce.number().int().positive().default(DEFAULT_MAX_RESULTS),
})

/** Raw query as a front end sends it; validated by getStats. */
export interface StatsQuery {
  before?: string
  category?: string
  max_results?: number | string
}

const deleteInputSchema = z.object({
  ids: z.array(z.string().min(1)),
})

export type DeleteInput = z.input<typeof deleteInputSchema>

export interface ErrorPayload {
  error: string
}

export interface SyncStatusPayload {
  status: SyncStatus
  scanned_count: number
  total_to_scan: number
  is_running: boolean
  progress: number
  message: string
}

export interface SenderStatsPayload {
  email: string
  name: string
  count: number
  /** Epoch ms of the sender's newest matching message. */
  last_date: number
  ids: string[]
}

export interface StatsPayload {
  stats: SenderStatsPayload[]
  meta: { total_scanned: number; oldest_date: string | null }
}

export interface DeletePayload {
  deleted: number
  failed: string[]
}

export interface AccountPayload {
  email_address: string
  total_messages: number
  threads_total: number
}

function validationMessage(field: string, error: z.ZodError): string {
  const issue = error.issues[0]
  const path = issue && issue.path.length > 0 ? issue.path.join('.') : field
  return new ValidationError({ field: path, reason: issue?.message ?? 'invalid input' }).message
}

export class Engine {
  readonly limiter: RateLimiter
  readonly sync: SyncController
  readonly mutator: BulkMutator
  private client: MailClient
  private store: MessageCache
  private logger: Logger

  constructor({
    client,
    store,
    config,
    logger = silentLogger,
  }: {
    client: MailClient
    store: MessageCache
    config: { sync: SyncOptions; trash: TrashOptions; rateLimit: RateLimiterOptions }
    logger?: Logger
  }) {
    this.client = client
    this.store = store
    this.logger = logger
    // One limiter for every outbound call, so sync and delete share the budget
    this.limiter = new RateLimiter(config.rateLimit)
    // Ids trashed here are never written back by a sync whose fetch was already in flight
    const trashed = new Set<string>()
    this.sync = new SyncController({ client, store, limiter: this.limiter, options: config.sync, trashed, logger })
    this.mutator = new BulkMutator({ client, store, limiter: this.limiter, options: config.trash, trashed, logger })
  }

  // ---------------------------------------------------------------------------
  // Sync
  // ---------------------------------------------------------------------------

  startSync(options: StartOptions = {}): { status: 'started' | 'already_running' } | ErrorPayload {
    const result = this.sync.start(options)
    if (result instanceof SyncAlreadyRunningError) return { status: 'already_running' }
    if (result instanceof Error) return { error: result.message }
    return { status: 'started' }
  }

  stopSync(): { status: 'stopping' | 'not_running' } {
    return { status: this.sync.stop() ? 'stopping' : 'not_running' }
  }

  /** Live state of this process's run; before any run, the summary persisted by the last one. */
  syncStatus(): SyncStatusPayload {
    const state = this.sync.status()
    if (state.status === 'idle') {
      const last = this.store.loadSyncSummary()
      if (last instanceof Error) {
        this.logger.warn(last.message)
      } else if (last && (last.status === 'complete' || last.status === 'error')) {
        return {
          status: last.status,
          scanned_count: last.scannedCount,
          total_to_scan: last.totalToScan,
          is_running: false,
          progress: last.totalToScan > 0 ? Math.min(100, Math.floor((last.scannedCount / last.totalToScan) * 100)) : 0,
          message: last.message,
        }
      }
    }
    return {
      status: state.status,
      scanned_count: state.scannedCount,
      total_to_scan: state.totalToScan,
      is_running: state.status === 'running',
      progress: this.sync.progress(),
      message: state.message,
    }
  }

  // ---------------------------------------------------------------------------
  // Account
  // ---------------------------------------------------------------------------

  async accountInfo(): Promise<AccountPayload | ErrorPayload> {
    const info = await this.limiter.schedule(() => this.client.accountInfo())
    if (info instanceof Error) return { error: info.message }
    return {
      email_address: info.emailAddress,
      total_messages: info.messagesTotal,
      threads_total: info.threadsTotal,
    }
  }

  // ---------------------------------------------------------------------------
  // Stats
  // ---------------------------------------------------------------------------

  getStats(query: StatsQuery = {}): StatsPayload | ErrorPayload {
    const parsed = statsQuerySchema.safeParse(query)
    if (!parsed.success) return { error: validationMessage('query', parsed.error) }

    const { before, category, max_results } = parsed.data
    let beforeDate: Date | undefined
    if (before !== undefined) {
      const day = parseDay(before)
      if (day instanceof Error) return { error: day.message }
      beforeDate = day
    }

    const result = computeStats(this.store, { before: beforeDate, category }, max_results)
    if (result instanceof Error) return { error: result.message }

    return {
      stats: result.ranked.map((a) => ({
        email: a.email,
        name: a.displayName,
        count: a.count,
        last_date: a.lastDate,
        ids: a.ids,
      })),
      meta: { total_scanned: result.meta.totalScanned, oldest_date: result.meta.oldestDate },
    }
  }

  // ---------------------------------------------------------------------------
  // Cache
  // ---------------------------------------------------------------------------

  clearCache(): { success: true } | ErrorPayload {
    if (this.sync.isRunning) return { error: 'Cannot clear the cache while a sync is running' }
    const cleared = this.store.clear()
    if (cleared instanceof Error) return { error: cleared.message }
    this.logger.debug('Cache cleared')
    return { success: true }
  }

  // ---------------------------------------------------------------------------
  // Delete
  // ---------------------------------------------------------------------------

  async deleteMessages(input: DeleteInput): Promise<DeletePayload | ErrorPayload> {
    const parsed = deleteInputSchema.safeParse(input)
    if (!parsed.success) return { error: validationMessage('ids', parsed.error) }

    const result = await this.mutator.delete(parsed.data.ids)
    if (result instanceof Error) return { error: result.message }
    return { deleted: result.deleted, failed: result.failed }
  }

  async deleteSender(email: string): Promise<DeletePayload | ErrorPayload> {
    // Any key stats can produce, including 'unknown' and raw-header fallbacks
    const parsed = z.string().min(1).safeParse(email.trim())
    if (!parsed.success) return { error: validationMessage('email', parsed.error) }

    const result = await this.mutator.deleteSender(parsed.data)
    if (result instanceof Error) return { error: result.message }
    return { deleted: result.deleted, failed: result.failed }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Stop any run, wait for it to wind down, then close the cache. */
  async close(): Promise<void> {
    this.sync.stop()
    await this.sync.waitForIdle()
    this.store.close()
  }
}
