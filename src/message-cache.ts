// SQLite-backed cache of message metadata.
// Uses better-sqlite3 for synchronous reads and writes; every mutating call is
// one transaction, so a reader never sees half a batch and a process crash
// after a call returns loses nothing. Two tables: `messages` keyed by Gmail
// message id, and `sync_state` for persistent values (last sync summary,
// resume cursor).
// Failures are returned as StorageError values, never thrown.

import Database from 'better-sqlite3'
import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { StorageError, chunk } from './api-utils.js'
import { toCategory } from './email-utils.js'
import type { MessageRecord } from './mail-client.js'

// SQLite caps bound parameters per statement; stay well below it.
const MAX_PARAMS = 500

// Row shapes for typed .prepare() queries
interface MessageRow {
  id: string
  thread_id: string
  sender_email: string
  sender_name: string
  received_at: number
  category: string
  label_ids: string
  fetched_at: number
}
interface FreshnessRow { id: string; fetched_at: number }
interface SummaryRow { total: number; oldest: number | null }
interface StateRow { value: string }

export interface CacheSummary {
  total: number
  /** Oldest receivedAt across the whole cache, null when empty. */
  oldestReceivedAt: number | null
}

const syncSummarySchema = z.object({
  status: z.string(),
  scannedCount: z.number(),
  totalToScan: z.number(),
  startedAt: z.number().nullable(),
  finishedAt: z.number().nullable(),
  message: z.string(),
})

/** Outcome of the last sync run, kept across restarts. */
export type SyncSummary = z.infer<typeof syncSummarySchema>

/** Boundary helper: run a better-sqlite3 call, converting exceptions to StorageError values. */
export function storageBoundary<T>(operation: string, fn: () => T): T | StorageError {
  try {
    return fn()
  } catch (err) {
    return new StorageError({ operation, reason: String(err), cause: err })
  }
}

function toRecord(row: MessageRow): MessageRecord {
  return {
    id: row.id,
    threadId: row.thread_id,
    senderEmail: row.sender_email,
    senderName: row.sender_name,
    receivedAt: row.received_at,
    category: toCategory(row.category),
    labelIds: row.label_ids ? row.label_ids.split(',') : [],
    fetchedAt: row.fetched_at,
  }
}

export class MessageCache {
  private db: Database.Database

  constructor({ dbPath }: { dbPath: string }) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath)
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 })
      }
    }

    this.db = new Database(dbPath)
    // WAL: concurrent readers + single writer, committed data survives a crash.
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('synchronous = NORMAL')
    this.init()
  }

  /** Open a cache, returning a StorageError instead of throwing when the file is unusable. */
  static open({ dbPath }: { dbPath: string }): MessageCache | StorageError {
    return storageBoundary('open', () => new MessageCache({ dbPath }))
  }

  private init() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id           TEXT PRIMARY KEY,
        thread_id    TEXT NOT NULL,
        sender_email TEXT NOT NULL,
        sender_name  TEXT NOT NULL,
        received_at  INTEGER NOT NULL,
        category     TEXT NOT NULL,
        label_ids    TEXT NOT NULL,
        fetched_at   INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS messages_sender ON messages (sender_email);
      CREATE INDEX IF NOT EXISTS messages_received ON messages (received_at);

      CREATE TABLE IF NOT EXISTS sync_state (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `)
  }

  // ---------------------------------------------------------------------------
  // Messages
  // ---------------------------------------------------------------------------

  /** Insert or replace records by id. Last write wins; repeating a call is a no-op. */
  upsert(records: MessageRecord[]): void | StorageError {
    if (records.length === 0) return
    return storageBoundary('upsert', () => {
      const insert = this.db.prepare(`
        INSERT INTO messages (id, thread_id, sender_email, sender_name, received_at, category, label_ids, fetched_at)
        VALUES (@id, @threadId, @senderEmail, @senderName, @receivedAt, @category, @labelIds, @fetchedAt)
        ON CONFLICT (id) DO UPDATE SET
          thread_id = excluded.thread_id,
          sender_email = excluded.sender_email,
          sender_name = excluded.sender_name,
          received_at = excluded.received_at,
          category = excluded.category,
          label_ids = excluded.label_ids,
          fetched_at = excluded.fetched_at
      `)
      const tx = this.db.transaction((rows: MessageRecord[]) => {
        for (const r of rows) {
          insert.run({
            id: r.id,
            threadId: r.threadId,
            senderEmail: r.senderEmail.toLowerCase(),
            senderName: r.senderName,
            receivedAt: r.receivedAt,
            category: r.category,
            labelIds: r.labelIds.join(','),
            fetchedAt: r.fetchedAt,
          })
        }
      })
      tx(records)
    })
  }

  /**
   * Lazy iteration ordered by receivedAt then id. Each call starts a fresh read.
   * Consume it synchronously: better-sqlite3 rejects writes on this connection
   * while the cursor is open.
   */
  *all(): Generator<MessageRecord> {
    const stmt = this.db.prepare<[], MessageRow>(
      'SELECT * FROM messages ORDER BY received_at, id',
    )
    for (const row of stmt.iterate()) {
      yield toRecord(row)
    }
  }

  get(id: string): MessageRecord | undefined | StorageError {
    return storageBoundary('get', () => {
      const row = this.db
        .prepare<[string], MessageRow>('SELECT * FROM messages WHERE id = ?')
        .get(id)
      return row ? toRecord(row) : undefined
    })
  }

  /** Delete records by id; unknown ids are ignored. Returns how many rows went away. */
  remove(ids: Iterable<string>): number | StorageError {
    const list = [...ids]
    if (list.length === 0) return 0
    return storageBoundary('remove', () => {
      const del = this.db.prepare('DELETE FROM messages WHERE id = ?')
      const tx = this.db.transaction((batch: string[]) => {
        let removed = 0
        for (const id of batch) {
          removed += del.run(id).changes
        }
        return removed
      })
      return tx(list)
    })
  }

  /** Drop every message plus the persisted sync summary and cursor. */
  clear(): void | StorageError {
    return storageBoundary('clear', () => {
      this.db.exec('DELETE FROM messages; DELETE FROM sync_state;')
    })
  }

  count(): number | StorageError {
    return storageBoundary('count', () => {
      const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM messages').get()
      return row?.n ?? 0
    })
  }

  /** Total and oldest date over the whole cache, independent of any filter. */
  summary(): CacheSummary | StorageError {
    return storageBoundary('summary', () => {
      const row = this.db
        .prepare<[], SummaryRow>('SELECT COUNT(*) AS total, MIN(received_at) AS oldest FROM messages')
        .get()
      return { total: row?.total ?? 0, oldestReceivedAt: row?.oldest ?? null }
    })
  }

  /**
   * Ids from `ids` that need a header fetch: not cached at all, or fetched
   * before `staleBefore` (epoch ms). Input order is preserved.
   */
  missingOrStale(ids: string[], staleBefore?: number): string[] | StorageError {
    if (ids.length === 0) return []
    return storageBoundary('missingOrStale', () => {
      const fetchedAt = new Map<string, number>()
      for (const part of chunk(ids, MAX_PARAMS)) {
        const placeholders = part.map(() => '?').join(', ')
        const rows = this.db
          .prepare<string[], FreshnessRow>(`SELECT id, fetched_at FROM messages WHERE id IN (${placeholders})`)
          .all(...part)
        for (const row of rows) fetchedAt.set(row.id, row.fetched_at)
      }
      return ids.filter((id) => {
        const at = fetchedAt.get(id)
        if (at === undefined) return true
        return staleBefore !== undefined && at < staleBefore
      })
    })
  }

  /** Every cached id from one sender, newest first. */
  idsBySender(email: string): string[] | StorageError {
    return storageBoundary('idsBySender', () => {
      return this.db
        .prepare<[string], { id: string }>(
          'SELECT id FROM messages WHERE sender_email = ? ORDER BY received_at DESC, id',
        )
        .all(email.toLowerCase())
        .map((row) => row.id)
    })
  }

  // ---------------------------------------------------------------------------
  // Sync state (persistent key/value)
  // ---------------------------------------------------------------------------

  private getState(key: string): string | undefined {
    const row = this.db
      .prepare<[string], StateRow>('SELECT value FROM sync_state WHERE key = ?')
      .get(key)
    return row?.value
  }

  private setState(key: string, value: string) {
    this.db
      .prepare('INSERT OR REPLACE INTO sync_state (key, value) VALUES (?, ?)')
      .run(key, value)
  }

  saveSyncSummary(summary: SyncSummary): void | StorageError {
    return storageBoundary('saveSyncSummary', () => this.setState('last_sync', JSON.stringify(summary)))
  }

  loadSyncSummary(): SyncSummary | undefined | StorageError {
    return storageBoundary('loadSyncSummary', () => {
      const raw = this.getState('last_sync')
      if (!raw) return undefined
      // Unreadable summaries are treated as absent; the next run rewrites them
      const parsed = syncSummarySchema.safeParse(JSON.parse(raw))
      return parsed.success ? parsed.data : undefined
    })
  }

  saveCursor(cursor: string): void | StorageError {
    return storageBoundary('saveCursor', () => this.setState('resume_cursor', cursor))
  }

  loadCursor(): string | undefined | StorageError {
    return storageBoundary('loadCursor', () => this.getState('resume_cursor'))
  }

  clearCursor(): void | StorageError {
    return storageBoundary('clearCursor', () => {
      this.db.prepare('DELETE FROM sync_state WHERE key = ?').run('resume_cursor')
    })
  }

  // ---------------------------------------------------------------------------
  // Housekeeping
  // ---------------------------------------------------------------------------

  close() {
    this.db.close()
  }
}
