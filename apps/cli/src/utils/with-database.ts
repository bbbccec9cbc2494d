import { createStoreDatabase, type StoreConnection } from '@storelens/store'
import { loadConfig } from '../config/loader.js'
import type { StoreLensConfig } from '../config/schema.js'
import { logger, toStoreLogger } from './logger.js'

export interface WithDatabaseOptions {
  /** Path to configuration file */
  config?: string
}

/**
 * Load configuration, open a connection, run the handler and close the
 * connection whatever the outcome.
 *
 * @example
 * ```typescript
 * await withDatabase({ config: options.config }, async ({ db }) => {
 *   await migrateToLatest(db)
 * })
 * ```
 */
export async function withDatabase<T>(
  options: WithDatabaseOptions,
  handler: (connection: StoreConnection, config: StoreLensConfig) => Promise<T>
): Promise<T> {
  const config = await loadConfig({ configPath: options.config })
  const { dialect, url, pool } = config.database

  logger.debug(`Connecting to ${dialect} database`)
  const connection = createStoreDatabase({ dialect, url, pool, logger: toStoreLogger(logger) })

  try {
    return await handler(connection, config)
  } finally {
    await connection.close()
  }
}
