// Gmail implementation of the MailClient contract.
// Wraps the googleapis SDK with the four calls the engine needs: list ids,
// fetch From/label metadata, trash by batchModify, and profile info.
// No caching or retries here. Rate limiting comes from the engine: it wraps
// each call, and hands fetchHeaders a scheduler for its per-id requests.
// Every SDK exception is converted to an error value at the boundary.

import { google, type gmail_v1 } from 'googleapis'
import type { OAuth2Client } from 'google-auth-library'
import * as errore from 'errore'
import { mapConcurrent, toRemoteError, MissingDataError, NotFoundError, TransportError } from './api-utils.js'
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

// Workers per fetchHeaders batch; the scheduler still admits each request
const FETCH_CONCURRENCY = 10

/** Boundary helper: wrap a googleapis SDK call, converting exceptions to error values.
 *  Original error is preserved as `cause` for debugging. */
function gmailBoundary<T>(operation: string, email: string, fn: () => Promise<T>) {
  return errore.tryAsync({
    try: fn,
    catch: (err) => toRemoteError(operation, email, err),
  })
}

/** NotFoundError only makes sense per message; anywhere else it is a transport failure. */
function asRemote(err: RemoteError | NotFoundError, operation: string): RemoteError {
  if (err instanceof NotFoundError) return new TransportError({ operation, reason: err.message, cause: err })
  return err
}

/**
 * One metadata request per id, each admitted by `schedule`, so a rate limiter
 * passed in counts every messages.get. Per-id failures are collected, never
 * returned, so mapConcurrent runs every id.
 */
export async function collectHeaders(
  ids: string[],
  getOne: (id: string) => Promise<gmail_v1.Schema$Message | FetchFailure>,
  schedule: Scheduler,
  concurrency = FETCH_CONCURRENCY,
): Promise<FetchResult> {
  const records: MessageRecord[] = []
  const failures = new Map<string, FetchFailure>()

  await mapConcurrent(ids, async (id) => {
    const res = await schedule(() => getOne(id))
    if (res instanceof Error) {
      failures.set(id, res)
      return null
    }

    const record = GmailClient.parseRawMessage(res, Date.now())
    if (record instanceof Error) {
      failures.set(id, record)
      return null
    }
    records.push(record)
    return null
  }, concurrency)

  // Keep the order the caller asked for
  const position = new Map(ids.map((id, i) => [id, i]))
  records.sort((a, b) => (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0))
  return { records, failures }
}

export class GmailClient implements MailClient {
  private gmail: gmail_v1.Gmail
  private email: string

  constructor({ auth, email }: { auth: OAuth2Client; email?: string }) {
    this.gmail = google.gmail({ version: 'v1', auth })
    this.email = email ?? 'unknown'
  }

  async listMessageIds({ cursor, pageSize }: { cursor: string | null; pageSize: number }): Promise<ListPage | RemoteError> {
    const res = await gmailBoundary('messages.list', this.email, () =>
      this.gmail.users.messages.list({
        userId: 'me',
        maxResults: pageSize,
        pageToken: cursor ?? undefined,
        includeSpamTrash: false,
      }),
    )
    if (res instanceof Error) return asRemote(res, 'messages.list')

    const ids = (res.data.messages ?? []).flatMap((m) => (m.id ? [m.id] : []))
    const nextCursor = res.data.nextPageToken ?? null
    return { ids, nextCursor, done: nextCursor === null }
  }

  fetchHeaders(ids: string[], schedule: Scheduler = unscheduled): Promise<FetchResult | RemoteError> {
    return collectHeaders(ids, (id) => this.getMetadata(id), schedule)
  }

  private async getMetadata(id: string): Promise<gmail_v1.Schema$Message | RemoteError | NotFoundError> {
    const res = await gmailBoundary('messages.get', this.email, () =>
      this.gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'metadata',
        metadataHeaders: ['From'],
      }),
    )
    if (res instanceof Error) return res
    return res.data
  }

  async trash(ids: string[]): Promise<Map<string, TrashOutcome> | RemoteError> {
    if (ids.length === 0) return new Map()

    // batchModify is all-or-nothing for the chunk: one outcome for every id
    const res = await gmailBoundary('messages.batchModify', this.email, () =>
      this.gmail.users.messages.batchModify({
        userId: 'me',
        requestBody: { ids, addLabelIds: ['TRASH'] },
      }),
    )
    if (res instanceof Error) return asRemote(res, 'messages.batchModify')

    return new Map(ids.map((id): [string, TrashOutcome] => [id, { ok: true }]))
  }

  async accountInfo(): Promise<AccountInfo | RemoteError> {
    const res = await gmailBoundary('getProfile', this.email, () =>
      this.gmail.users.getProfile({ userId: 'me' }),
    )
    if (res instanceof Error) return asRemote(res, 'getProfile')

    return {
      emailAddress: res.data.emailAddress ?? '',
      messagesTotal: res.data.messagesTotal ?? 0,
      threadsTotal: res.data.threadsTotal ?? 0,
      historyId: res.data.historyId ?? '',
    }
  }

  // =========================================================================
  // Static: parse raw Google API responses
  // =========================================================================

  /** Parse a raw gmail_v1.Schema$Message (format: metadata) into a cache record. */
  static parseRawMessage(raw: gmail_v1.Schema$Message, fetchedAt: number): MessageRecord | MissingDataError {
    const id = raw.id
    if (!id) return new MissingDataError({ what: 'id', resource: 'message' })

    const receivedAt = Number(raw.internalDate)
    if (!raw.internalDate || !Number.isFinite(receivedAt)) {
      return new MissingDataError({ what: 'internalDate', resource: `message ${id}` })
    }

    const headers = raw.payload?.headers ?? []
    const from = headers.find((h) => h.name?.toLowerCase() === 'from')?.value ?? ''
    const sender = parseFrom(from)
    const labelIds = raw.labelIds ?? []

    return {
      id,
      threadId: raw.threadId ?? id,
      senderEmail: sender.email,
      senderName: sender.name,
      receivedAt,
      category: categoryFromLabels(labelIds),
      labelIds,
      fetchedAt,
    }
  }
}
