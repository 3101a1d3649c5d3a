import path from 'node:path'
import { describe, expect, test } from 'vitest'
import { ValidationError } from './api-utils.js'
import { loadConfig } from './config.js'

describe('loadConfig', () => {
  test('defaults', () => {
    const config = loadConfig({ MAILSWEEP_DIR: '/tmp/mailsweep-test' })
    if (config instanceof Error) throw config

    expect(config).toEqual({
      dataDir: '/tmp/mailsweep-test',
      dbPath: path.join('/tmp/mailsweep-test', 'cache.db'),
      tokensPath: path.join('/tmp/mailsweep-test', 'tokens.json'),
      sync: {
        maxMessages: 50_000,
        pageSize: 500,
        fetchBatchSize: 100,
        staleAfterMs: undefined,
        retry: { attempts: 3, delayMs: 1000 },
      },
      trash: { batchSize: 1000, concurrency: 2, retry: { attempts: 3, delayMs: 1000 } },
      rateLimit: { maxConcurrent: 4, maxPerWindow: 10, windowMs: 1000 },
      oauth: { clientId: undefined, clientSecret: undefined },
      debug: false,
    })
  })

  test('reads overrides and ignores empty or foreign variables', () => {
    const config = loadConfig({
      MAILSWEEP_DIR: '/tmp/mailsweep-test',
      MAILSWEEP_DB: '/tmp/other.db',
      MAILSWEEP_MAX_MESSAGES: '200',
      MAILSWEEP_PAGE_SIZE: '',
      MAILSWEEP_STALE_AFTER_DAYS: '2',
      MAILSWEEP_CLIENT_ID: 'test-client-id',
      MAILSWEEP_DEBUG: '1',
      HOME: '/root',
    })
    if (config instanceof Error) throw config

    expect(config.dbPath).toBe('/tmp/other.db')
    expect(config.sync).toMatchObject({ maxMessages: 200, pageSize: 500, staleAfterMs: 2 * 24 * 60 * 60 * 1000 })
    expect(config.oauth.clientId).toBe('test-client-id')
    expect(config.debug).toBe(true)
  })

  test('MAILSWEEP_DEBUG=0 keeps debug off', () => {
    const config = loadConfig({ MAILSWEEP_DEBUG: '0' })
    expect(config instanceof Error ? config : config.debug).toBe(false)
  })

  test('rejects values above the remote limits', () => {
    const config = loadConfig({ MAILSWEEP_PAGE_SIZE: '501' })
    expect(config).toBeInstanceOf(ValidationError)
    expect(config instanceof Error ? config.message : '').toMatch(/^Invalid MAILSWEEP_PAGE_SIZE: /)
  })

  test('rejects non-numeric values', () => {
    expect(loadConfig({ MAILSWEEP_RATE_LIMIT: 'fast' })).toBeInstanceOf(ValidationError)
  })
})
