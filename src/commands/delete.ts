// Delete command: move messages to trash by id, or everything from one sender.
// Failed ids are printed so the command can be re-run with just those.

import type { Goke } from 'goke'
import { z } from 'zod'
import * as out from '../output.js'
import { openSession } from '../session.js'

export function registerDeleteCommands(cli: Goke) {
  cli
    .command('delete [...ids]', 'Move messages to trash')
    .option('--sender <sender>', z.string().describe('Trash every cached message from this address'))
    .option('--force', 'Skip confirmation')
    .action(async (ids, options) => {
      if (ids.length === 0 && !options.sender) {
        out.error('Pass message ids or --sender <email>')
        process.exit(1)
      }
      if (ids.length > 0 && options.sender) {
        out.error('Pass either message ids or --sender, not both')
        process.exit(1)
      }

      const target = options.sender ? `every cached message from ${options.sender}` : `${ids.length} message(s)`

      if (!options.force) {
        if (!process.stdin.isTTY) {
          out.error('Use --force to delete non-interactively')
          process.exit(1)
        }

        const readline = await import('node:readline')
        const rl = readline.createInterface({ input: process.stdin, output: process.stderr })
        const answer = await new Promise<string>((resolve) => {
          rl.question(`Move ${target} to trash? [y/N] `, resolve)
        })
        rl.close()

        if (answer.toLowerCase() !== 'y') {
          out.hint('Cancelled')
          return
        }
      }

      const { engine } = openSession()
      const result = options.sender
        ? await engine.deleteSender(options.sender)
        : await engine.deleteMessages({ ids })
      await engine.close()

      if ('error' in result) {
        out.error(result.error)
        process.exit(1)
      }

      out.printYaml(result)
      if (result.failed.length > 0) {
        out.warn(`${result.failed.length} message(s) were not trashed`)
        process.exit(1)
      }
      out.success(`Moved ${result.deleted} message(s) to trash`)
    })
}
