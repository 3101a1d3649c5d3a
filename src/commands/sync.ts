// Sync commands: run a scan in the foreground, show the last run.
// The scan runs in the engine's background loop; this command only polls its
// status and redraws one progress line. Ctrl+C asks the loop to stop after
// the batch in flight, a second Ctrl+C exits immediately.

import type { Goke } from 'goke'
import { sleep } from '../api-utils.js'
import * as out from '../output.js'
import { openSession } from '../session.js'

const POLL_INTERVAL_MS = 500

export function registerSyncCommands(cli: Goke) {
  cli
    .command('sync', 'Scan the mailbox and cache sender metadata')
    .option('--full', 'Re-fetch every message, ignoring the cache')
    .option('--resume', 'Continue from where the last stopped run left off')
    .action(async (options) => {
      const { engine } = openSession()

      const started = engine.startSync({ full: Boolean(options.full), resume: Boolean(options.resume) })
      if ('error' in started) {
        out.error(started.error)
        process.exit(1)
      }

      let interrupts = 0
      const onSigint = () => {
        interrupts++
        if (interrupts > 1) process.exit(130)
        engine.stopSync()
        out.endProgress()
        out.hint('Stopping after the current batch (Ctrl+C again to quit now)')
      }
      process.on('SIGINT', onSigint)

      while (engine.sync.isRunning) {
        out.progress(out.formatProgress(engine.sync.status(), engine.sync.progress()))
        await Promise.race([engine.sync.waitForIdle(), sleep(POLL_INTERVAL_MS)])
      }
      out.progress(out.formatProgress(engine.sync.status(), engine.sync.progress()))
      out.endProgress()
      process.off('SIGINT', onSigint)

      const status = engine.syncStatus()
      await engine.close()
      out.printYaml(status)
      if (status.status === 'error') process.exit(1)
      if (status.message.startsWith('Stopped')) out.hint('Run: mailsweep sync --resume')
    })

  cli
    .command('sync status', 'Show the last sync run')
    .action(async () => {
      const { engine } = openSession()
      const status = engine.syncStatus()
      await engine.close()
      out.printYaml(status)
    })
}
