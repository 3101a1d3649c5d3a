// Tests for the SQLite message cache.
// Each test gets a fresh database file in a temporary directory.

import Database from 'better-sqlite3'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { StorageError } from './api-utils.js'
import type { MessageRecord } from './mail-client.js'
import { MessageCache } from './message-cache.js'

let dir: string
let dbPath: string
let cache: MessageCache

function record(id: string, overrides: Partial<MessageRecord> = {}): MessageRecord {
  return {
    id,
    threadId: `t-${id}`,
    senderEmail: 'a@x.com',
    senderName: 'A',
    receivedAt: Date.UTC(2022, 5, 1),
    category: 'primary',
    labelIds: ['INBOX', 'CATEGORY_PERSONAL'],
    fetchedAt: 1_000,
    ...overrides,
  }
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailsweep-cache-'))
  dbPath = path.join(dir, 'nested', 'cache.db')
  cache = new MessageCache({ dbPath })
})

afterEach(() => {
  cache.close()
  fs.rmSync(dir, { recursive: true, force: true })
})

describe('upsert', () => {
  test('is idempotent', () => {
    const r = record('m1')
    cache.upsert([r])
    const once = [...cache.all()]
    cache.upsert([r])
    expect([...cache.all()]).toEqual(once)
    expect(cache.count()).toBe(1)
  })

  test('last write wins', () => {
    cache.upsert([record('m1', { senderName: 'Old' })])
    cache.upsert([record('m1', { senderName: 'New', fetchedAt: 2_000 })])
    expect(cache.get('m1')).toEqual(record('m1', { senderName: 'New', fetchedAt: 2_000 }))
  })

  test('lower-cases sender email', () => {
    cache.upsert([record('m1', { senderEmail: 'Mixed@Case.COM' })])
    expect(cache.get('m1')).toMatchObject({ senderEmail: 'mixed@case.com' })
  })
})

test('all() orders by receivedAt then id and restarts on each call', () => {
  cache.upsert([
    record('b', { receivedAt: 200 }),
    record('c', { receivedAt: 100 }),
    record('a', { receivedAt: 200 }),
  ])
  expect([...cache.all()].map((r) => r.id)).toEqual(['c', 'a', 'b'])
  expect([...cache.all()].map((r) => r.id)).toEqual(['c', 'a', 'b'])
})

test('remove ignores unknown ids', () => {
  cache.upsert([record('m1'), record('m2')])
  expect(cache.remove(['m1', 'missing'])).toBe(1)
  expect([...cache.all()].map((r) => r.id)).toEqual(['m2'])
  expect(cache.remove([])).toBe(0)
})

test('summary reports total and oldest date over the whole cache', () => {
  expect(cache.summary()).toEqual({ total: 0, oldestReceivedAt: null })
  cache.upsert([record('m1', { receivedAt: 500 }), record('m2', { receivedAt: 300 })])
  expect(cache.summary()).toEqual({ total: 2, oldestReceivedAt: 300 })
})

test('missingOrStale keeps input order', () => {
  cache.upsert([record('m1', { fetchedAt: 1_000 }), record('m2', { fetchedAt: 5_000 })])
  expect(cache.missingOrStale(['m3', 'm1', 'm2'])).toEqual(['m3'])
  expect(cache.missingOrStale(['m3', 'm1', 'm2'], 2_000)).toEqual(['m3', 'm1'])
})

test('idsBySender is case-insensitive and newest first', () => {
  cache.upsert([
    record('old', { receivedAt: 100 }),
    record('new', { receivedAt: 300 }),
    record('other', { senderEmail: 'b@y.com' }),
  ])
  expect(cache.idsBySender('A@X.com')).toEqual(['new', 'old'])
})

describe('sync state', () => {
  test('cursor save, load and clear', () => {
    expect(cache.loadCursor()).toBeUndefined()
    cache.saveCursor('page-2')
    expect(cache.loadCursor()).toBe('page-2')
    cache.clearCursor()
    expect(cache.loadCursor()).toBeUndefined()
  })

  test('clear drops messages, summary and cursor', () => {
    cache.upsert([record('m1')])
    cache.saveCursor('page-2')
    cache.saveSyncSummary({ status: 'complete', scannedCount: 1, totalToScan: 1, startedAt: 1, finishedAt: 2, message: 'Complete' })

    expect(cache.clear()).toBeUndefined()
    expect(cache.count()).toBe(0)
    expect(cache.loadCursor()).toBeUndefined()
    expect(cache.loadSyncSummary()).toBeUndefined()
  })
})

test('data survives reopening the database', () => {
  cache.upsert([record('m1')])
  cache.saveSyncSummary({ status: 'complete', scannedCount: 1, totalToScan: 1, startedAt: 1, finishedAt: 2, message: 'Complete' })
  cache.close()

  cache = new MessageCache({ dbPath })
  expect([...cache.all()]).toEqual([record('m1')])
  expect(cache.loadSyncSummary()).toEqual({ status: 'complete', scannedCount: 1, totalToScan: 1, startedAt: 1, finishedAt: 2, message: 'Complete' })
})

test('a stored summary with mistyped fields reads as absent', () => {
  const summary = { status: 'complete', scannedCount: 1, totalToScan: 1, startedAt: 1, finishedAt: 2, message: 'Complete' }
  const raw = new Database(dbPath)
  const write = raw.prepare('INSERT OR REPLACE INTO sync_state (key, value) VALUES (?, ?)')

  write.run('last_sync', JSON.stringify({ ...summary, startedAt: 'yesterday' }))
  expect(cache.loadSyncSummary()).toBeUndefined()

  write.run('last_sync', JSON.stringify({ ...summary, finishedAt: null }))
  expect(cache.loadSyncSummary()).toEqual({ ...summary, finishedAt: null })
  raw.close()
})

test('open returns a StorageError for an unusable path', () => {
  const blocker = path.join(dir, 'file')
  fs.writeFileSync(blocker, 'not a directory')
  const result = MessageCache.open({ dbPath: path.join(blocker, 'cache.db') })
  expect(result).toBeInstanceOf(StorageError)
})
