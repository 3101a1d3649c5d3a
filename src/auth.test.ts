// Tests for token storage and the offline parts of the OAuth flow.
// No browser and no Google endpoints: only the token file and client wiring.

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { AuthError, ValidationError } from './api-utils.js'
import {
  createOAuth2Client,
  extractCodeFromInput,
  getAuthStatus,
  getClient,
  logout,
  readAccount,
  writeAccount,
} from './auth.js'

let dir: string
let tokensPath: string
const oauth = { clientId: 'test-client-id', clientSecret: 'test-secret' }

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailsweep-auth-'))
  tokensPath = path.join(dir, 'data', 'tokens.json')
})

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true })
})

const account = {
  email: 'me@example.com',
  tokens: { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: Date.UTC(2030, 0, 1) },
  updatedAt: 1,
}

describe('token file', () => {
  test('missing file means logged out', () => {
    expect(readAccount(tokensPath)).toBeUndefined()
    expect(getAuthStatus({ tokensPath, oauth })).toBeUndefined()
  })

  test('write then read, with owner-only permissions', () => {
    writeAccount(tokensPath, account)
    expect(readAccount(tokensPath)).toEqual(account)
    expect(fs.statSync(tokensPath).mode & 0o777).toBe(0o600)
  })

  test('corrupt file is a validation error', () => {
    fs.mkdirSync(path.dirname(tokensPath), { recursive: true })
    fs.writeFileSync(tokensPath, '{not json')
    expect(readAccount(tokensPath)).toBeInstanceOf(ValidationError)

    fs.writeFileSync(tokensPath, JSON.stringify({ email: 'me@example.com' }))
    expect(readAccount(tokensPath)).toBeInstanceOf(ValidationError)
  })

  test('status and logout', () => {
    writeAccount(tokensPath, account)
    expect(getAuthStatus({ tokensPath, oauth })).toEqual({
      email: 'me@example.com',
      expiresAt: new Date(Date.UTC(2030, 0, 1)),
      hasRefreshToken: true,
    })
    expect(logout({ tokensPath, oauth })).toBe('me@example.com')
    expect(fs.existsSync(tokensPath)).toBe(false)
    expect(logout({ tokensPath, oauth })).toBeUndefined()
  })
})

describe('clients', () => {
  test('client credentials are required', () => {
    expect(createOAuth2Client({ tokensPath, oauth: {} })).toBeInstanceOf(ValidationError)
    expect(createOAuth2Client({ tokensPath, oauth })).not.toBeInstanceOf(Error)
  })

  test('getClient needs a stored account', () => {
    expect(getClient({ tokensPath, oauth })).toBeInstanceOf(AuthError)
  })

  test('getClient builds a client for the stored account', () => {
    writeAccount(tokensPath, account)
    const result = getClient({ tokensPath, oauth })
    expect(result instanceof Error ? result : result.email).toBe('me@example.com')
  })
})

describe('extractCodeFromInput', () => {
  test('reads the code from a pasted redirect URL', () => {
    expect(extractCodeFromInput('http://localhost:8089/?code=4/abc-def&scope=x')).toBe('4/abc-def')
  })

  test('accepts a bare code', () => {
    expect(extractCodeFromInput('  4/0AbCdEfGhIj  ')).toBe('4/0AbCdEfGhIj')
  })

  test('rejects blank or short input', () => {
    expect(extractCodeFromInput('')).toBeNull()
    expect(extractCodeFromInput('short')).toBeNull()
    expect(extractCodeFromInput('has spaces in it')).toBeNull()
  })
})
