import { afterEach, describe, expect, test, vi } from 'vitest'
import { AuthError, RateLimitError, StorageError, TransportError } from './api-utils.js'
import { BulkMutator } from './bulk-mutator.js'
import type { TrashOptions } from './config.js'
import { FakeMailClient } from './fake-mail-client.js'
import type { MessageRecord } from './mail-client.js'
import { MessageCache } from './message-cache.js'
import { RateLimiter } from './rate-limiter.js'
import { computeStats } from './stats.js'

const open: MessageCache[] = []

afterEach(() => {
  for (const store of open.splice(0)) store.close()
})

function record(id: string, senderEmail = 'a@x.com'): MessageRecord {
  return {
    id,
    threadId: id,
    senderEmail,
    senderName: senderEmail,
    receivedAt: Date.UTC(2022, 0, 1),
    category: 'primary',
    labelIds: [],
    fetchedAt: 0,
  }
}

function setup(ids: string[], options: Partial<TrashOptions> = {}) {
  const client = new FakeMailClient({
    messages: ids.map((id, i) => ({ id, from: 'a@x.com', receivedAt: 1_000 - i })),
  })
  const store = new MessageCache({ dbPath: ':memory:' })
  open.push(store)
  store.upsert(ids.map((id) => record(id)))
  const limiter = new RateLimiter({ maxConcurrent: 4, maxPerWindow: 1000, windowMs: 1000 })
  const mutator = new BulkMutator({
    client,
    store,
    limiter,
    options: { batchSize: 1000, concurrency: 2, retry: { attempts: 3, delayMs: 0 }, ...options },
  })
  return { client, store, mutator }
}

function remaining(store: MessageCache): string[] {
  return [...store.all()].map((r) => r.id).sort()
}

describe('delete', () => {
  test('a rejected id stays cached while the rest are removed', async () => {
    const { client, store, mutator } = setup(['m1', 'm2'])
    client.trashRejections.set('m2', 'message is locked')

    const result = await mutator.delete(['m1', 'm2'])

    expect(result).toEqual({
      deleted: 1,
      failed: ['m2'],
      errors: ['1 of 2 ids failed during trash: message is locked'],
    })
    expect(store.get('m1')).toBeUndefined()
    expect(store.get('m2')).toMatchObject({ id: 'm2' })
  })

  test('deduplicates and chunks by batch size', async () => {
    const { client, store, mutator } = setup(['a', 'b', 'c', 'd', 'e'], { batchSize: 2, concurrency: 1 })

    const result = await mutator.delete(['a', 'b', 'a', 'c', 'd', 'e', 'e'])

    expect(result).toEqual({ deleted: 5, failed: [], errors: [] })
    expect(client.trashedBatches).toEqual([['a', 'b'], ['c', 'd'], ['e']])
    expect(remaining(store)).toEqual([])
  })

  test('nothing to do for an empty list', async () => {
    const { client, mutator } = setup(['a'])
    expect(await mutator.delete([])).toEqual({ deleted: 0, failed: [], errors: [] })
    expect(client.calls.trash).toBe(0)
  })

  test('a transport failure fails its chunk without a retry', async () => {
    const { client, store, mutator } = setup(['a', 'b', 'c', 'd'], { batchSize: 2, concurrency: 1 })
    const down = new TransportError({ operation: 'messages.batchModify', reason: '500' })
    client.trashErrors = [down]

    const result = await mutator.delete(['a', 'b', 'c', 'd'])

    expect(result).toEqual({ deleted: 2, failed: ['a', 'b'], errors: [down.message] })
    expect(client.calls.trash).toBe(2)
    expect(remaining(store)).toEqual(['a', 'b'])
  })

  test('throttling is retried', async () => {
    const { client, store, mutator } = setup(['a', 'b'])
    client.trashErrors = [new RateLimitError({ operation: 'messages.batchModify', reason: '429' })]

    const result = await mutator.delete(['a', 'b'])

    expect(result).toEqual({ deleted: 2, failed: [], errors: [] })
    expect(client.calls.trash).toBe(2)
    expect(remaining(store)).toEqual([])
  })

  test('an auth failure stops launching new chunks', async () => {
    const ids = ['a', 'b', 'c', 'd', 'e', 'f']
    const { client, store, mutator } = setup(ids, { batchSize: 2, concurrency: 1 })
    const auth = new AuthError({ email: 'me@example.com', reason: 'token revoked' })
    client.trashErrors = [auth]

    const result = await mutator.delete(ids)

    expect(result).toEqual({ deleted: 0, failed: ids, errors: [auth.message] })
    expect(client.calls.trash).toBe(1)
    expect(remaining(store)).toEqual(ids)
  })

  test('a storage failure aborts the call and is returned', async () => {
    const { store, mutator } = setup(['a', 'b'])
    const broken = new StorageError({ operation: 'remove', reason: 'disk I/O error' })
    vi.spyOn(store, 'remove').mockReturnValueOnce(broken)

    expect(await mutator.delete(['a', 'b'])).toBe(broken)
    expect(remaining(store)).toEqual(['a', 'b'])
  })

  test('remotely trashed ids are recorded, rejected ones are not', async () => {
    const { client, mutator } = setup(['a', 'b', 'c'])
    client.trashRejections.set('b', 'message is locked')

    await mutator.delete(['a', 'b', 'c'])
    expect([...mutator.trashed]).toEqual(['a', 'c'])
  })

  test('deleted ids disappear from stats', async () => {
    const { store, mutator } = setup(['m1', 'm2', 'm3'])

    const result = await mutator.delete(['m1', 'm3'])
    expect(result).toEqual({ deleted: 2, failed: [], errors: [] })

    const stats = computeStats(store, {}, 10)
    expect(stats instanceof Error ? stats : stats.ranked.flatMap((a) => a.ids)).toEqual(['m2'])
  })
})

test('deleteSender trashes every cached message from that sender', async () => {
  const { client, store, mutator } = setup(['a1', 'a2'])
  store.upsert([record('b1', 'b@y.com')])
  client.add({ id: 'b1', from: 'b@y.com', receivedAt: 5 })

  const result = await mutator.deleteSender('A@X.COM')

  expect(result).toEqual({ deleted: 2, failed: [], errors: [] })
  expect(remaining(store)).toEqual(['b1'])
  expect(client.has('b1')).toBe(true)
  expect(client.has('a1')).toBe(false)
})
