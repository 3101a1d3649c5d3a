// Stats command: top senders from the local cache.
// Reads only the cache, so it is instant and works offline once synced.

import type { Goke } from 'goke'
import { z } from 'zod'
import * as out from '../output.js'
import { openSession } from '../session.js'

export function registerStatsCommands(cli: Goke) {
  cli
    .command('stats', 'Rank senders by message count')
    .option('--before <before>', z.string().describe('Only messages received before this day (YYYY-MM-DD, UTC)'))
    .option('--category <category>', z.string().describe('primary, social, promotions, updates, forums, unknown or all (default: all)'))
    .option('--max [max]', 'Max senders (default: 2000)')
    .option('--ids', 'Include message ids for each sender')
    .action(async (options) => {
      const { engine } = openSession()
      const result = engine.getStats({
        before: options.before,
        category: options.category,
        max_results: options.max ? Number(options.max) : undefined,
      })
      await engine.close()

      if ('error' in result) {
        out.error(result.error)
        process.exit(1)
      }

      const { stats, meta } = result
      if (meta.total_scanned === 0) {
        out.hint('Cache is empty. Run: mailsweep sync')
      }

      out.printList(
        stats.map((s) => ({
          email: s.email,
          name: s.name,
          count: s.count,
          last_date: new Date(s.last_date).toISOString(),
          ...(options.ids ? { ids: s.ids } : {}),
        })),
        { summary: `${stats.length} sender(s) from ${meta.total_scanned} cached message(s), oldest ${meta.oldest_date ?? 'n/a'}` },
      )
    })
}
