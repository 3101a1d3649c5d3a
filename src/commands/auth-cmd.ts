// Auth commands: login, logout, whoami.
// One account per data directory; logging in again replaces the stored tokens.

import type { Goke } from 'goke'
import { getAuthStatus, login, logout } from '../auth.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { openConfig } from '../session.js'

export function registerAuthCommands(cli: Goke) {
  cli
    .command('login', 'Authenticate with Google (opens browser). On a headless machine, open the printed URL elsewhere and paste back the localhost redirect URL containing the auth code.')
    .action(async () => {
      const { config, logger } = openConfig()
      const result = await login(config, logger)
      if (result instanceof Error) handleCommandError(result)
      out.success(`Authenticated as ${result.email}`)
      process.exit(0)
    })

  cli
    .command('logout', 'Remove stored credentials')
    .option('--force', 'Skip confirmation')
    .action(async (options) => {
      const { config } = openConfig()
      const status = getAuthStatus(config)
      if (status instanceof Error) handleCommandError(status)

      if (!status) {
        out.hint('Not authenticated')
        return
      }

      if (!options.force) {
        if (!process.stdin.isTTY) {
          out.error('Use --force to logout non-interactively')
          process.exit(1)
        }

        const readline = await import('node:readline')
        const rl = readline.createInterface({ input: process.stdin, output: process.stderr })
        const answer = await new Promise<string>((resolve) => {
          rl.question(`Remove credentials for ${status.email}? [y/N] `, resolve)
        })
        rl.close()

        if (answer.toLowerCase() !== 'y') {
          out.hint('Cancelled')
          return
        }
      }

      const removed = logout(config)
      if (removed instanceof Error) handleCommandError(removed)
      out.success(`Credentials removed for ${status.email}`)
    })

  cli
    .command('whoami', 'Show the authenticated account')
    .action(async () => {
      const { config } = openConfig()
      const status = getAuthStatus(config)
      if (status instanceof Error) handleCommandError(status)

      if (!status) {
        out.hint('Not authenticated. Run: mailsweep login')
        return
      }

      out.printYaml({
        email: status.email,
        status: 'Authenticated',
        expires: status.expiresAt?.toISOString() ?? 'unknown',
        refresh_token: status.hasRefreshToken,
      })
    })
}
