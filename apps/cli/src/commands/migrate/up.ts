import { Command } from 'commander'
import { migrateToLatest } from '@storelens/store'
import { logger, toStoreLogger } from '../../utils/logger.js'
import { withDatabase } from '../../utils/with-database.js'
import type { GlobalOptions } from '../../types.js'

export function upCommand(): Command {
  return new Command('up')
    .description('Apply pending migrations')
    .action(async (_options: object, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>()

      await withDatabase({ config: opts.config }, async ({ db }) => {
        const startTime = Date.now()
        const results = await migrateToLatest(db, { logger: toStoreLogger(logger) })

        if (opts.json) {
          logger.log(JSON.stringify(results.map(r => ({ name: r.migrationName, status: r.status }))))
        } else if (results.length === 0) {
          logger.info('No pending migrations to run')
        } else {
          logger.success(
            `${results.length} migration${results.length > 1 ? 's' : ''} applied (${Date.now() - startTime}ms)`
          )
        }
      })
    })
}
