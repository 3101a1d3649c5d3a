// Runtime configuration for mailsweep.
// Everything comes from MAILSWEEP_* environment variables, validated with zod.
// Defaults match Gmail's per-call limits: 500 ids per list page, 1000 ids per
// batchModify, and a conservative call budget well under the per-user quota.

import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ValidationError, type RetryOptions } from './api-utils.js'
import type { RateLimiterOptions } from './rate-limiter.js'

const DAY_MS = 24 * 60 * 60 * 1000

const envSchema = z.object({
  MAILSWEEP_DIR: z.string().min(1).optional(),
  MAILSWEEP_DB: z.string().min(1).optional(),
  MAILSWEEP_MAX_MESSAGES: z.coerce.number().int().positive().default(50_000),
  MAILSWEEP_PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(500),
  MAILSWEEP_FETCH_BATCH: z.coerce.number().int().min(1).max(100).default(100),
  MAILSWEEP_TRASH_BATCH: z.coerce.number().int().min(1).max(1000).default(1000),
  MAILSWEEP_TRASH_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  MAILSWEEP_MAX_CONCURRENT: z.coerce.number().int().min(1).default(4),
  MAILSWEEP_RATE_LIMIT: z.coerce.number().int().min(1).default(10),
  MAILSWEEP_RATE_WINDOW_MS: z.coerce.number().int().min(0).default(1000),
  MAILSWEEP_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  MAILSWEEP_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  MAILSWEEP_STALE_AFTER_DAYS: z.coerce.number().positive().optional(),
  MAILSWEEP_CLIENT_ID: z.string().min(1).optional(),
  MAILSWEEP_CLIENT_SECRET: z.string().min(1).optional(),
  MAILSWEEP_DEBUG: z.string().optional(),
})

export interface SyncOptions {
  /** Scan ceiling: the most ids one run will look at. */
  maxMessages: number
  pageSize: number
  fetchBatchSize: number
  /** Cached records fetched longer ago than this are re-fetched. Undefined = never stale. */
  staleAfterMs?: number
  retry: RetryOptions
}

export interface TrashOptions {
  batchSize: number
  concurrency: number
  retry: RetryOptions
}

export interface Config {
  dataDir: string
  dbPath: string
  tokensPath: string
  sync: SyncOptions
  trash: TrashOptions
  rateLimit: RateLimiterOptions
  oauth: { clientId?: string; clientSecret?: string }
  debug: boolean
}

/** Parse configuration from an environment map. Invalid values come back as a ValidationError. */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config | ValidationError {
  // Treat empty strings as unset so `MAILSWEEP_X= mailsweep ...` falls back to defaults
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('MAILSWEEP_') && value !== undefined && value !== ''),
  )

  const parsed = envSchema.safeParse(cleaned)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return new ValidationError({
      field: issue ? issue.path.join('.') : 'environment',
      reason: issue?.message ?? 'invalid configuration',
    })
  }

  const e = parsed.data
  const dataDir = e.MAILSWEEP_DIR ?? path.join(os.homedir(), '.mailsweep')
  const retry: RetryOptions = { attempts: e.MAILSWEEP_RETRY_ATTEMPTS, delayMs: e.MAILSWEEP_RETRY_DELAY_MS }

  return {
    dataDir,
    dbPath: e.MAILSWEEP_DB ?? path.join(dataDir, 'cache.db'),
    tokensPath: path.join(dataDir, 'tokens.json'),
    sync: {
      maxMessages: e.MAILSWEEP_MAX_MESSAGES,
      pageSize: e.MAILSWEEP_PAGE_SIZE,
      fetchBatchSize: e.MAILSWEEP_FETCH_BATCH,
      staleAfterMs: e.MAILSWEEP_STALE_AFTER_DAYS === undefined ? undefined : e.MAILSWEEP_STALE_AFTER_DAYS * DAY_MS,
      retry,
    },
    trash: {
      batchSize: e.MAILSWEEP_TRASH_BATCH,
      concurrency: e.MAILSWEEP_TRASH_CONCURRENCY,
      retry,
    },
    rateLimit: {
      maxConcurrent: e.MAILSWEEP_MAX_CONCURRENT,
      maxPerWindow: e.MAILSWEEP_RATE_LIMIT,
      windowMs: e.MAILSWEEP_RATE_WINDOW_MS,
    },
    oauth: {
      clientId: e.MAILSWEEP_CLIENT_ID,
      clientSecret: e.MAILSWEEP_CLIENT_SECRET,
    },
    debug: e.MAILSWEEP_DEBUG !== undefined && e.MAILSWEEP_DEBUG !== '0',
  }
}
