// Cache commands. The cache is rebuilt by the next sync.

import type { Goke } from 'goke'
import * as out from '../output.js'
import { openSession } from '../session.js'

export function registerCacheCommands(cli: Goke) {
  cli
    .command('cache clear', 'Delete all cached message metadata and sync progress')
    .action(async () => {
      const { engine } = openSession()
      const result = engine.clearCache()
      await engine.close()

      if ('error' in result) {
        out.error(result.error)
        process.exit(1)
      }
      out.success('Cache cleared')
    })
}
