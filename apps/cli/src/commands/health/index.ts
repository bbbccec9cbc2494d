import { Command } from 'commander'
import chalk from 'chalk'
import { createQueryExecutor } from '@storelens/analytics'
import { CLIError } from '../../utils/errors.js'
import { logger } from '../../utils/logger.js'
import { createVerticalTable } from '../../utils/table.js'
import { withDatabase } from '../../utils/with-database.js'
import type { GlobalOptions } from '../../types.js'

const STATUS_COLORS = {
  healthy: chalk.green,
  degraded: chalk.yellow,
  unhealthy: chalk.red
} as const

export function healthCommand(): Command {
  return new Command('health')
    .description('Check database connectivity and latency')
    .action(async (_options: object, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>()

      await withDatabase({ config: opts.config }, async ({ db, dialect, pool }) => {
        const health = await createQueryExecutor(db, { dialect, pool }).ping()

        if (opts.json) {
          logger.log(JSON.stringify(health, null, 2))
        } else {
          logger.log(
            createVerticalTable({
              status: STATUS_COLORS[health.status](health.status),
              dialect,
              connected: health.checks.database.connected ? 'yes' : 'no',
              latency: `${health.checks.database.latency}ms`,
              ...(health.checks.database.error ? { error: health.checks.database.error } : {}),
              ...(health.checks.pool ? { pool: health.checks.pool } : {})
            })
          )
        }

        if (health.status === 'unhealthy') {
          throw new CLIError('Database is unhealthy', 'DB_UNHEALTHY', [
            'Check the database url in your configuration or DATABASE_URL'
          ])
        }
      })
    })
}
