import { Command } from 'commander'
import { createQueryExecutor } from '@storelens/analytics'
import { logger, toStoreLogger } from '../../utils/logger.js'
import { printResult } from '../../utils/output.js'
import { withDatabase } from '../../utils/with-database.js'
import type { GlobalOptions } from '../../types.js'

export interface QueryOptions {
  year?: string
  category?: string
  limit?: string
}

/**
 * Only the parameters given on the command line; the catalog rejects
 * parameters a query does not take.
 */
export function buildParams(options: QueryOptions): Record<string, string> {
  const params: Record<string, string> = {}
  for (const key of ['year', 'category', 'limit'] as const) {
    const value = options[key]
    if (value !== undefined) {
      params[key] = value
    }
  }
  return params
}

export function queryCommand(): Command {
  return new Command('query')
    .description('Run a catalog query')
    .argument('<name>', "Query name (see 'storelens queries')")
    .option('--year <year>', 'Join year for customers-by-join-year')
    .option('--category <category>', 'Category for products-by-category')
    .option('--limit <n>', 'Number of products for top-products-by-revenue')
    .action(async (name: string, options: QueryOptions, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>()

      await withDatabase({ config: opts.config }, async ({ db, dialect }, config) => {
        const executor = createQueryExecutor(db, {
          dialect,
          logger: toStoreLogger(logger),
          timeoutMs: config.queryTimeoutMs
        })
        const result = await executor.runByName(name, buildParams(options))
        printResult(result, opts.json)
      })
    })
}
