// Bulk trash of messages by id.
// Ids are deduplicated, split into chunks of the remote batch limit and sent
// through the rate limiter with bounded concurrency. Throttled chunks are
// retried with backoff; any other remote failure fails the chunk. The cache
// only loses an id once the remote service confirmed the trash, so a
// failed id stays visible in stats.

import {
  AuthError,
  PartialBatchFailure,
  RateLimitError,
  StorageError,
  chunk,
  mapConcurrent,
  withRetry,
} from './api-utils.js'
import type { TrashOptions } from './config.js'
import type { MailClient } from './mail-client.js'
import type { MessageCache } from './message-cache.js'
import { silentLogger, type Logger } from './output.js'
import type { RateLimiter } from './rate-limiter.js'

export interface DeleteResult {
  /** Ids trashed remotely and dropped from the cache. */
  deleted: number
  /** Ids that were not trashed, in input order. */
  failed: string[]
  /** One message per failed chunk. */
  errors: string[]
}

interface ChunkOutcome {
  succeeded: string[]
  failed: string[]
  error?: string
}

export class BulkMutator {
  private client: MailClient
  private store: MessageCache
  private limiter: RateLimiter
  private options: TrashOptions
  private logger: Logger
  /** Every id trashed remotely; the sync controller reads it before writing headers. */
  readonly trashed: Set<string>

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
    options: TrashOptions
    trashed?: Set<string>
    logger?: Logger
  }) {
    this.client = client
    this.store = store
    this.limiter = limiter
    this.options = options
    this.trashed = trashed
    this.logger = logger
  }

  async delete(ids: string[]): Promise<DeleteResult | StorageError> {
    const unique = [...new Set(ids)]
    if (unique.length === 0) return { deleted: 0, failed: [], errors: [] }

    const chunks = chunk(unique, this.options.batchSize)
    const failed = new Set<string>()
    const errors: string[] = []
    const attempted = new Set<string>()
    let deleted = 0
    let authFailure: AuthError | null = null

    const result = await mapConcurrent(chunks, async (ids) => {
      // Credentials are gone: leave the remaining chunks unattempted
      if (authFailure) return null
      ids.forEach((id) => attempted.add(id))

      const outcome = await this.trashChunk(ids)
      if (outcome instanceof AuthError) {
        authFailure = outcome
        ids.forEach((id) => failed.add(id))
        errors.push(outcome.message)
        return null
      }

      outcome.failed.forEach((id) => failed.add(id))
      if (outcome.error) errors.push(outcome.error)

      // Remote trash succeeded: drop those ids from the cache right away
      outcome.succeeded.forEach((id) => this.trashed.add(id))
      const removed = this.store.remove(outcome.succeeded)
      if (removed instanceof Error) return removed
      deleted += outcome.succeeded.length
      return null
    }, this.options.concurrency)

    if (result instanceof StorageError) {
      this.logger.error(result.message)
      return result
    }

    for (const id of unique) {
      if (!attempted.has(id)) failed.add(id)
    }

    const failedInOrder = unique.filter((id) => failed.has(id))
    if (failedInOrder.length > 0) {
      this.logger.warn(new PartialBatchFailure({
        failed: String(failedInOrder.length),
        total: String(unique.length),
        operation: 'trash',
      }).message)
    }
    this.logger.debug(`Moved ${deleted} message(s) to trash`)
    return { deleted, failed: failedInOrder, errors }
  }

  /** Delete every cached message from one sender. */
  async deleteSender(email: string): Promise<DeleteResult | StorageError> {
    const ids = this.store.idsBySender(email)
    if (ids instanceof Error) return ids
    return this.delete(ids)
  }

  private async trashChunk(ids: string[]): Promise<ChunkOutcome | AuthError> {
    const res = await withRetry(
      () => this.limiter.schedule(() => this.client.trash(ids)),
      this.options.retry,
      {
        shouldRetry: (error) => error instanceof RateLimitError,
        onRetry: ({ attempt, error, waitMs }) => {
          this.limiter.backoff(waitMs)
          this.logger.debug(`Retrying trash of ${ids.length} id(s) in ${waitMs}ms after attempt ${attempt}: ${error.message}`)
        },
      },
    )
    if (res instanceof AuthError) return res
    if (res instanceof Error) return { succeeded: [], failed: ids, error: res.message }

    const succeeded: string[] = []
    const failed: string[] = []
    const reasons: string[] = []
    for (const id of ids) {
      const outcome = res.get(id)
      if (outcome === undefined) {
        failed.push(id)
        reasons.push('no outcome reported')
      } else if (outcome.ok) {
        succeeded.push(id)
      } else {
        failed.push(id)
        reasons.push(outcome.reason)
      }
    }
    if (failed.length === 0) return { succeeded, failed }
    return {
      succeeded,
      failed,
      error: `${new PartialBatchFailure({ failed: String(failed.length), total: String(ids.length), operation: 'trash' }).message}: ${reasons[0]}`,
    }
  }
}
