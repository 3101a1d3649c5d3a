// Per-sender statistics computed from the message cache.
// Nothing here is cached: filters vary per query, so every call walks the
// cache once, groups the surviving records by sender and ranks the groups.
// Ranking is total: count desc, then most recent message, then email, so the
// same cache and filter always give the same order.

import { ValidationError, type StorageError } from './api-utils.js'
import { storageBoundary, type MessageCache } from './message-cache.js'
import type { Category } from './mail-client.js'

export interface StatsFilter {
  /** Keep messages received strictly before this instant. */
  before?: Date
  /** 'all' or undefined means no category filter. */
  category?: Category | 'all'
}

export interface SenderAggregate {
  email: string
  displayName: string
  count: number
  /** Epoch ms of the sender's newest surviving message. */
  lastDate: number
  ids: string[]
}

export interface CacheMetadata {
  totalScanned: number
  /** YYYY-MM-DD (UTC) of the oldest cached message, null when the cache is empty. */
  oldestDate: string | null
}

export interface StatsResult {
  ranked: SenderAggregate[]
  meta: CacheMetadata
}

// ---------------------------------------------------------------------------
// Day strings
// ---------------------------------------------------------------------------

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/** Parse YYYY-MM-DD as midnight UTC. Rejects impossible dates like 2023-02-30. */
export function parseDay(value: string): Date | ValidationError {
  const match = DAY_PATTERN.exec(value)
  if (!match) return new ValidationError({ field: 'before', reason: `expected YYYY-MM-DD, got "${value}"` })

  const [, y, m, d] = match
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)))
  if (date.toISOString().slice(0, 10) !== value) {
    return new ValidationError({ field: 'before', reason: `"${value}" is not a calendar date` })
  }
  return date
}

export function formatDay(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10)
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

export function compareAggregates(a: SenderAggregate, b: SenderAggregate): number {
  if (a.count !== b.count) return b.count - a.count
  if (a.lastDate !== b.lastDate) return b.lastDate - a.lastDate
  return a.email < b.email ? -1 : a.email > b.email ? 1 : 0
}

/** Cache health over every record, ignoring any filter. */
export function cacheMetadata(store: MessageCache): CacheMetadata | StorageError {
  const summary = store.summary()
  if (summary instanceof Error) return summary
  return {
    totalScanned: summary.total,
    oldestDate: summary.oldestReceivedAt === null ? null : formatDay(summary.oldestReceivedAt),
  }
}

export function computeStats(store: MessageCache, filter: StatsFilter, limit: number): StatsResult | StorageError {
  const beforeMs = filter.before?.getTime()
  const category = filter.category === 'all' ? undefined : filter.category

  const groups = storageBoundary('computeStats', () => {
    const bySender = new Map<string, SenderAggregate>()
    for (const record of store.all()) {
      if (beforeMs !== undefined && record.receivedAt >= beforeMs) continue
      if (category !== undefined && record.category !== category) continue

      const group = bySender.get(record.senderEmail)
      if (!group) {
        bySender.set(record.senderEmail, {
          email: record.senderEmail,
          displayName: record.senderName || record.senderEmail,
          count: 1,
          lastDate: record.receivedAt,
          ids: [record.id],
        })
        continue
      }

      group.count++
      group.ids.push(record.id)
      // Records arrive oldest first, so the newest message names the sender
      if (record.receivedAt >= group.lastDate) {
        group.lastDate = record.receivedAt
        group.displayName = record.senderName || record.senderEmail
      }
    }
    return [...bySender.values()]
  })
  if (groups instanceof Error) return groups

  const meta = cacheMetadata(store)
  if (meta instanceof Error) return meta

  const ranked = groups.sort(compareAggregates).slice(0, Math.max(0, limit))
  return { ranked, meta }
}
