// OAuth2 authentication for mailsweep.
// One account per data directory: tokens live in <dataDir>/tokens.json (mode
// 0600) next to the cache. Supports login (browser OAuth with a localhost
// redirect, or a pasted redirect URL), logout, status, and building an
// authenticated GmailClient. Refreshed tokens are written back through the
// OAuth2Client 'tokens' event, so a long sync never loses a rotated token.

import http from 'node:http'
import readline from 'node:readline'
import fs from 'node:fs'
import path from 'node:path'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import fkill from 'fkill'
import pc from 'picocolors'
import * as errore from 'errore'
import { z } from 'zod'
import { AuthError, ValidationError } from './api-utils.js'
import type { Config } from './config.js'
import { GmailClient } from './gmail-client.js'
import { silentLogger, type Logger } from './output.js'

const REDIRECT_PORT = 8089
const SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify',    // list, read metadata, trash
  'https://www.googleapis.com/auth/userinfo.email',  // email identity
]

// ---------------------------------------------------------------------------
// Token file
// ---------------------------------------------------------------------------

const credentialsSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
})

const storedAccountSchema = z.object({
  email: z.string(),
  tokens: credentialsSchema,
  updatedAt: z.number(),
})

export type StoredAccount = z.infer<typeof storedAccountSchema>

type AuthConfig = Pick<Config, 'tokensPath' | 'oauth'>

/** Load the stored account. Undefined when nobody is logged in. */
export function readAccount(tokensPath: string): StoredAccount | undefined | ValidationError {
  if (!fs.existsSync(tokensPath)) return undefined
  const raw = errore.tryFn((): unknown => JSON.parse(fs.readFileSync(tokensPath, 'utf-8')))
  if (raw instanceof Error) return new ValidationError({ field: tokensPath, reason: raw.message, cause: raw })

  const parsed = storedAccountSchema.safeParse(raw)
  if (!parsed.success) {
    return new ValidationError({ field: tokensPath, reason: parsed.error.issues[0]?.message ?? 'unreadable token file' })
  }
  return parsed.data
}

export function writeAccount(tokensPath: string, account: StoredAccount): void {
  fs.mkdirSync(path.dirname(tokensPath), { recursive: true, mode: 0o700 })
  fs.writeFileSync(tokensPath, JSON.stringify(account, null, 2), { mode: 0o600 })
}

// ---------------------------------------------------------------------------
// OAuth2 client factory
// ---------------------------------------------------------------------------

export function createOAuth2Client({ oauth }: AuthConfig): OAuth2Client | ValidationError {
  if (!oauth.clientId || !oauth.clientSecret) {
    return new ValidationError({
      field: 'MAILSWEEP_CLIENT_ID/MAILSWEEP_CLIENT_SECRET',
      reason: 'set both to the credentials of a Google OAuth desktop client',
    })
  }
  return new OAuth2Client({
    clientId: oauth.clientId,
    clientSecret: oauth.clientSecret,
    redirectUri: `http://localhost:${REDIRECT_PORT}`,
  })
}

/** Persist rotated tokens, merged so a refresh response without refresh_token keeps the old one. */
function persistRefreshedTokens(oauth2Client: OAuth2Client, tokensPath: string, email: string, logger: Logger) {
  oauth2Client.on('tokens', (fresh: Credentials) => {
    const current = readAccount(tokensPath)
    const previous = current && !(current instanceof Error) ? current.tokens : {}
    const merged = credentialsSchema.safeParse({ ...previous, ...fresh })
    if (!merged.success) {
      logger.warn(`Could not store refreshed tokens for ${email}`)
      return
    }
    writeAccount(tokensPath, { email, tokens: merged.data, updatedAt: Date.now() })
    logger.debug(`Stored refreshed tokens for ${email}`)
  })
}

// ---------------------------------------------------------------------------
// Browser OAuth flow
// ---------------------------------------------------------------------------

export function extractCodeFromInput(input: string): string | null {
  const trimmed = input.trim()
  if (!trimmed) return null

  if (URL.canParse(trimmed)) {
    const code = new URL(trimmed).searchParams.get('code')
    if (code) return code
  }

  if (trimmed.length > 10 && !trimmed.includes(' ')) {
    return trimmed
  }

  return null
}

async function getAuthCodeFromBrowser(oauth2Client: OAuth2Client, logger: Logger): Promise<string> {
  const authUrl = oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
    prompt: 'consent',
  })

  // A previous login may still hold the redirect port
  await fkill(`:${REDIRECT_PORT}`, { force: true, silent: true }).catch((err: unknown) => {
    logger.debug(`Nothing to free on port ${REDIRECT_PORT}: ${String(err)}`)
  })

  process.stderr.write('\n' + pc.bold('1.') + ' Open this URL to authorize:\n\n')
  process.stderr.write('   ' + pc.cyan(pc.underline(authUrl)) + '\n\n')
  process.stderr.write(pc.bold('2.') + ' If running locally, the browser will redirect automatically.\n')
  process.stderr.write(pc.dim('   On a remote machine the redirect page will not load.') + '\n')
  process.stderr.write(pc.dim('   Copy the URL from the address bar and paste it below.') + '\n\n')

  return new Promise((resolve, reject) => {
    let resolved = false
    let rl: readline.Interface | null = null

    function finish(code: string) {
      if (resolved) return
      resolved = true
      server.close()
      if (rl) {
        rl.close()
        process.stdin.unref()
      }
      resolve(code)
    }

    function fail(err: Error) {
      if (resolved) return
      resolved = true
      server.close()
      rl?.close()
      reject(err)
    }

    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? '/', `http://localhost:${REDIRECT_PORT}`)
      const code = url.searchParams.get('code')
      const error = url.searchParams.get('error')

      if (error) {
        res.writeHead(400, { 'Content-Type': 'text/html' })
        res.end(`<h1>Error: ${error}</h1>`)
        fail(new Error(error))
        return
      }

      if (code) {
        res.writeHead(200, { 'Content-Type': 'text/html' })
        res.end('<h1>Success! You can close this window.</h1>')
        finish(code)
        return
      }

      res.writeHead(400, { 'Content-Type': 'text/html' })
      res.end('<h1>No authorization code received</h1>')
    })

    server.on('error', fail)
    server.listen(REDIRECT_PORT)

    if (process.stdin.isTTY) {
      rl = readline.createInterface({ input: process.stdin, output: process.stderr })
      rl.question(pc.dim('Paste redirect URL here (or wait for auto-redirect): '), (answer) => {
        const code = extractCodeFromInput(answer)
        if (code) {
          finish(code)
        } else {
          process.stderr.write(pc.yellow('Could not extract authorization code from input.') + '\n')
          process.stderr.write(pc.dim('Waiting for browser redirect...') + '\n')
        }
      })
    }
  })
}

// ---------------------------------------------------------------------------
// Login / logout
// ---------------------------------------------------------------------------

export interface AuthenticatedClient {
  email: string
  client: GmailClient
}

/** Run the browser OAuth flow and store the tokens. */
export async function login(config: AuthConfig, logger: Logger = silentLogger): Promise<AuthenticatedClient | AuthError | ValidationError> {
  const oauth2Client = createOAuth2Client(config)
  if (oauth2Client instanceof Error) return oauth2Client

  const tokens = await errore.tryAsync({
    try: async () => {
      const code = await getAuthCodeFromBrowser(oauth2Client, logger)
      logger.debug('Got authorization code, exchanging for tokens...')
      return (await oauth2Client.getToken(code)).tokens
    },
    catch: (err) => new AuthError({ email: 'new account', reason: String(err), cause: err }),
  })
  if (tokens instanceof Error) return tokens
  oauth2Client.setCredentials(tokens)

  const profile = await new GmailClient({ auth: oauth2Client }).accountInfo()
  if (profile instanceof AuthError) return profile
  if (profile instanceof Error) return new AuthError({ email: 'new account', reason: profile.message, cause: profile })

  const email = profile.emailAddress
  const stored = credentialsSchema.safeParse(tokens)
  if (!stored.success) return new AuthError({ email, reason: 'token response had an unexpected shape' })
  writeAccount(config.tokensPath, { email, tokens: stored.data, updatedAt: Date.now() })
  persistRefreshedTokens(oauth2Client, config.tokensPath, email, logger)

  return { email, client: new GmailClient({ auth: oauth2Client, email }) }
}

/** Forget the stored tokens. Returns the email that was logged in, if any. */
export function logout({ tokensPath }: AuthConfig): string | undefined | ValidationError {
  const account = readAccount(tokensPath)
  if (fs.existsSync(tokensPath)) fs.rmSync(tokensPath)
  if (account instanceof Error) return account
  return account?.email
}

// ---------------------------------------------------------------------------
// Authenticated client and status
// ---------------------------------------------------------------------------

/** GmailClient for the stored account. Token refresh is handled by the OAuth2Client. */
export function getClient(config: AuthConfig, logger: Logger = silentLogger): AuthenticatedClient | AuthError | ValidationError {
  const account = readAccount(config.tokensPath)
  if (account instanceof Error) return account
  if (!account) return new AuthError({ email: 'mailsweep', reason: 'not logged in' })

  const oauth2Client = createOAuth2Client(config)
  if (oauth2Client instanceof Error) return oauth2Client
  oauth2Client.setCredentials(account.tokens)
  persistRefreshedTokens(oauth2Client, config.tokensPath, account.email, logger)

  return { email: account.email, client: new GmailClient({ auth: oauth2Client, email: account.email }) }
}

export interface AuthStatus {
  email: string
  expiresAt?: Date
  hasRefreshToken: boolean
}

export function getAuthStatus({ tokensPath }: AuthConfig): AuthStatus | undefined | ValidationError {
  const account = readAccount(tokensPath)
  if (!account || account instanceof Error) return account
  return {
    email: account.email,
    expiresAt: account.tokens.expiry_date ? new Date(account.tokens.expiry_date) : undefined,
    hasRefreshToken: Boolean(account.tokens.refresh_token),
  }
}
