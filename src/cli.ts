#!/usr/bin/env node

// mailsweep: find the noisiest senders in a Gmail mailbox and trash them in bulk.
// Entry point: registers all commands, help, and version.
// Uses goke for command parsing with zod schemas for type-safe options.

import { goke } from 'goke'
import { registerAuthCommands } from './commands/auth-cmd.js'
import { registerAccountCommands } from './commands/account.js'
import { registerSyncCommands } from './commands/sync.js'
import { registerStatsCommands } from './commands/stats.js'
import { registerDeleteCommands } from './commands/delete.js'
import { registerCacheCommands } from './commands/cache.js'

const cli = goke('mailsweep')

// ---------------------------------------------------------------------------
// Register all command modules (auth first so login/logout/whoami appear at top of --help)
// ---------------------------------------------------------------------------

registerAuthCommands(cli)
registerAccountCommands(cli)
registerSyncCommands(cli)
registerStatsCommands(cli)
registerDeleteCommands(cli)
registerCacheCommands(cli)

// ---------------------------------------------------------------------------
// Help & version
// ---------------------------------------------------------------------------

cli.help()
cli.version('0.1.0')

// ---------------------------------------------------------------------------
// Parse & run
// ---------------------------------------------------------------------------

cli.parse()
