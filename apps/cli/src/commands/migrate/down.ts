import { Command } from 'commander'
import { migrateDown } from '@storelens/store'
import { logger, toStoreLogger } from '../../utils/logger.js'
import { withDatabase } from '../../utils/with-database.js'
import type { GlobalOptions } from '../../types.js'

export function downCommand(): Command {
  return new Command('down')
    .description('Revert the most recent migration')
    .action(async (_options: object, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>()

      await withDatabase({ config: opts.config }, async ({ db }) => {
        const results = await migrateDown(db, { logger: toStoreLogger(logger) })
        const reverted = results[0]

        if (opts.json) {
          logger.log(JSON.stringify(results.map(r => ({ name: r.migrationName, status: r.status }))))
        } else if (!reverted) {
          logger.info('No migrations to revert')
        } else {
          logger.success(`Reverted ${reverted.migrationName}`)
        }
      })
    })
}
