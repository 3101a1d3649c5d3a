// In-memory MailClient used by the tests.
// Holds an ordered mailbox (newest first, like Gmail's listing), pages it with
// numeric offset cursors, and lets a test queue failures per call or per id.
// Tracks how many calls are in flight at once so tests can check the rate
// limiter's concurrency bound.

import { NotFoundError, sleep } from './api-utils.js'
import { categoryFromLabels, parseFrom } from './email-utils.js'
import {
  unscheduled,
  type AccountInfo,
  type FetchFailure,
  type FetchResult,
  type ListPage,
  type MailClient,
  type MessageRecord,
  type RemoteError,
  type Scheduler,
  type TrashOutcome,
} from './mail-client.js'

export interface FakeMessage {
  id: string
  /** Raw From header. */
  from: string
  /** Epoch ms. */
  receivedAt: number
  labelIds?: string[]
  threadId?: string
}

export class FakeMailClient implements MailClient {
  readonly emailAddress: string
  readonly calls = { list: 0, fetch: 0, trash: 0, account: 0 }
  /** Ids passed to every fetchHeaders call, in call order. */
  readonly fetchedBatches: string[][] = []
  /** Ids passed to every trash call, in call order. */
  readonly trashedBatches: string[][] = []

  /** Returned (one per call) before listMessageIds does any work. */
  listErrors: RemoteError[] = []
  /** Returned (one per call) in place of the fetchHeaders result. */
  fetchErrors: RemoteError[] = []
  /** Returned (one per call) before trash does any work. */
  trashErrors: RemoteError[] = []
  /** Per-id failures for fetchHeaders, consumed one per attempt. */
  readonly fetchFailures = new Map<string, FetchFailure[]>()
  /** Ids trash reports as not trashed, with the reason. */
  readonly trashRejections = new Map<string, string>()

  private mailbox: FakeMessage[] = []
  private latencyMs: number
  private inFlight = 0
  private peak = 0
  /** fetchHeaders calls currently held by hold(). */
  waiting = 0
  /** Per-id header requests made, across all fetchHeaders calls. */
  requests = 0
  private gate: { promise: Promise<void>; open: () => void; after: number } | null = null

  constructor({ messages = [], latencyMs = 0, emailAddress = 'me@example.com' }: {
    messages?: FakeMessage[]
    latencyMs?: number
    emailAddress?: string
  } = {}) {
    this.latencyMs = latencyMs
    this.emailAddress = emailAddress
    this.add(...messages)
  }

  /** Add messages, keeping the mailbox ordered newest first. */
  add(...messages: FakeMessage[]): void {
    this.mailbox.push(...messages)
    this.mailbox.sort((a, b) => b.receivedAt - a.receivedAt || (a.id < b.id ? -1 : 1))
  }

  has(id: string): boolean {
    return this.mailbox.some((m) => m.id === id)
  }

  get size(): number {
    return this.mailbox.length
  }

  /** Most calls that were ever in flight at the same time. */
  get maxInFlight(): number {
    return this.peak
  }

  /** Make fetchHeaders calls after the first `after` wait until release() is called. */
  hold(after = 0): void {
    if (this.gate) return
    let open = () => {}
    const promise = new Promise<void>((resolve) => {
      open = resolve
    })
    this.gate = { promise, open, after }
  }

  release(): void {
    this.gate?.open()
    this.gate = null
  }

  failFetch(id: string, ...failures: FetchFailure[]): void {
    this.fetchFailures.set(id, [...(this.fetchFailures.get(id) ?? []), ...failures])
  }

  // ---------------------------------------------------------------------------
  // MailClient
  // ---------------------------------------------------------------------------

  listMessageIds({ cursor, pageSize }: { cursor: string | null; pageSize: number }): Promise<ListPage | RemoteError> {
    return this.track(async () => {
      this.calls.list++
      const queued = this.listErrors.shift()
      if (queued) return queued

      const offset = cursor === null ? 0 : Number(cursor)
      const end = offset + pageSize
      const ids = this.mailbox.slice(offset, end).map((m) => m.id)
      const nextCursor = end < this.mailbox.length ? String(end) : null
      return { ids, nextCursor, done: nextCursor === null }
    })
  }

  /**
   * Each id is looked up through `schedule`, like one remote request. A held
   * call has its response ready and waits to deliver it, so messages trashed
   * meanwhile still come back.
   */
  fetchHeaders(ids: string[], schedule: Scheduler = unscheduled): Promise<FetchResult | RemoteError> {
    return this.track(async () => {
      this.calls.fetch++
      this.fetchedBatches.push([...ids])

      const records: MessageRecord[] = []
      const failures = new Map<string, FetchFailure>()
      for (const id of ids) {
        const result = await schedule(async () => this.lookup(id))
        if (result instanceof Error) failures.set(id, result)
        else records.push(result)
      }

      if (this.gate && this.calls.fetch > this.gate.after) {
        this.waiting++
        await this.gate.promise
        this.waiting--
      }
      const queued = this.fetchErrors.shift()
      if (queued) return queued
      return { records, failures }
    })
  }

  trash(ids: string[]): Promise<Map<string, TrashOutcome> | RemoteError> {
    return this.track(async () => {
      this.calls.trash++
      this.trashedBatches.push([...ids])
      const queued = this.trashErrors.shift()
      if (queued) return queued

      const outcomes = new Map<string, TrashOutcome>()
      for (const id of ids) {
        const reason = this.trashRejections.get(id)
        if (reason !== undefined) {
          outcomes.set(id, { ok: false, reason })
          continue
        }
        this.mailbox = this.mailbox.filter((m) => m.id !== id)
        outcomes.set(id, { ok: true })
      }
      return outcomes
    })
  }

  accountInfo(): Promise<AccountInfo | RemoteError> {
    return this.track(async () => {
      this.calls.account++
      return {
        emailAddress: this.emailAddress,
        messagesTotal: this.mailbox.length,
        threadsTotal: new Set(this.mailbox.map((m) => m.threadId ?? m.id)).size,
        historyId: '1',
      }
    })
  }

  private lookup(id: string): MessageRecord | FetchFailure {
    this.requests++
    const failure = this.fetchFailures.get(id)?.shift()
    if (failure) return failure
    const message = this.mailbox.find((m) => m.id === id)
    if (!message) return new NotFoundError({ resource: `message ${id}` })
    return toRecord(message)
  }

  private async track<T>(fn: () => Promise<T>): Promise<T> {
    this.inFlight++
    this.peak = Math.max(this.peak, this.inFlight)
    try {
      await sleep(this.latencyMs)
      return await fn()
    } finally {
      this.inFlight--
    }
  }
}

function toRecord(message: FakeMessage): MessageRecord {
  const sender = parseFrom(message.from)
  const labelIds = message.labelIds ?? ['INBOX', 'CATEGORY_PERSONAL']
  return {
    id: message.id,
    threadId: message.threadId ?? message.id,
    senderEmail: sender.email,
    senderName: sender.name,
    receivedAt: message.receivedAt,
    category: categoryFromLabels(labelIds),
    labelIds,
    fetchedAt: Date.now(),
  }
}
