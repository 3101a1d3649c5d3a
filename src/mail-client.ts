// Mail client contract used by the sync and delete paths.
// The engine only talks to the remote mailbox through this interface, so the
// Gmail implementation (gmail-client.ts) and the in-process fake used by tests
// are interchangeable. Implementations are stateless transports: they never
// rate-limit or retry. Callers wrap each call in the RateLimiter, except
// fetchHeaders, which fans out and runs every request through the Scheduler
// it is given.

import type { AuthError, MissingDataError, NotFoundError, RateLimitError, TransportError } from './api-utils.js'

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export const CATEGORIES = ['primary', 'social', 'promotions', 'updates', 'forums', 'unknown'] as const

export type Category = (typeof CATEGORIES)[number]

/** Metadata for one remote message, as stored in the cache. */
export interface MessageRecord {
  id: string
  threadId: string
  senderEmail: string
  senderName: string
  /** Epoch milliseconds (Gmail internalDate). */
  receivedAt: number
  category: Category
  labelIds: string[]
  /** Epoch milliseconds when the headers were fetched. */
  fetchedAt: number
}

// ---------------------------------------------------------------------------
// Call results
// ---------------------------------------------------------------------------

/** Failures any remote call can return. */
export type RemoteError = AuthError | RateLimitError | TransportError

/** Per-message failures from a header fetch. */
export type FetchFailure = RemoteError | NotFoundError | MissingDataError

export interface ListPage {
  ids: string[]
  nextCursor: string | null
  done: boolean
}

export interface FetchResult {
  records: MessageRecord[]
  failures: Map<string, FetchFailure>
}

export type TrashOutcome = { ok: true } | { ok: false; reason: string }

export interface AccountInfo {
  emailAddress: string
  messagesTotal: number
  threadsTotal: number
  historyId: string
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

/** Runs one remote request. The engine passes its rate limiter's schedule. */
export type Scheduler = <T>(request: () => Promise<T>) => Promise<T>

export const unscheduled: Scheduler = (request) => request()

export interface MailClient {
  /** One page of message ids in listing order (newest first for Gmail). */
  listMessageIds(params: { cursor: string | null; pageSize: number }): Promise<ListPage | RemoteError>
  /**
   * Headers for a batch of ids. A failing id lands in `failures`, it does not
   * fail the batch. Every remote request made for the batch goes through `schedule`.
   */
  fetchHeaders(ids: string[], schedule?: Scheduler): Promise<FetchResult | RemoteError>
  /** Move a chunk of ids to trash. An id missing from the returned map counts as failed. */
  trash(ids: string[]): Promise<Map<string, TrashOutcome> | RemoteError>
  accountInfo(): Promise<AccountInfo | RemoteError>
}
