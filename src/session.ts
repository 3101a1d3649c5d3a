// Per-command wiring: config, logger, cache, authenticated client and engine.
// Commands call openSession() and get everything they need, or the process
// exits through handleCommandError with a readable message.

import { getClient } from './auth.js'
import { loadConfig, type Config } from './config.js'
import { Engine } from './engine.js'
import { MessageCache } from './message-cache.js'
import { createLogger, handleCommandError, type Logger } from './output.js'

export interface Session {
  config: Config
  logger: Logger
  email: string
  engine: Engine
}

export function openConfig(): { config: Config; logger: Logger } {
  const config = loadConfig()
  if (config instanceof Error) handleCommandError(config)
  return { config, logger: createLogger({ debug: config.debug }) }
}

export function openSession(): Session {
  const { config, logger } = openConfig()

  const account = getClient(config, logger)
  if (account instanceof Error) handleCommandError(account)

  const store = MessageCache.open({ dbPath: config.dbPath })
  if (store instanceof Error) handleCommandError(store)
  logger.debug(`Cache at ${config.dbPath}`)

  const engine = new Engine({ client: account.client, store, config, logger })
  return { config, logger, email: account.email, engine }
}
