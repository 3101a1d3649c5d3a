// Account command: mailbox size and identity as YAML.

import type { Goke } from 'goke'
import * as out from '../output.js'
import { openSession } from '../session.js'

export function registerAccountCommands(cli: Goke) {
  cli
    .command('account', 'Show Gmail account info')
    .action(async () => {
      const { engine } = openSession()
      const info = await engine.accountInfo()
      await engine.close()

      if ('error' in info) {
        out.error(info.error)
        process.exit(1)
      }
      out.printYaml(info)
    })
}
