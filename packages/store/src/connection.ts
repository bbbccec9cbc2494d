import { Kysely, PostgresDialect, SqliteDialect, type LogEvent } from 'kysely'
import SQLite from 'better-sqlite3'
import pg from 'pg'
import { silentLogger, type PoolCounters, type StoreLogger } from '@storelens/core'
import type { StoreDatabase } from './schema.js'

export type StoreDialect = 'sqlite' | 'postgres'

export interface PoolOptions {
  max?: number
  connectionTimeoutMillis?: number
}

export interface ConnectionOptions {
  dialect: StoreDialect
  /** Postgres connection string, or a SQLite file path (`:memory:` for a throwaway database) */
  url: string
  pool?: PoolOptions
  logger?: StoreLogger
}

export interface StoreConnection {
  db: Kysely<StoreDatabase>
  dialect: StoreDialect
  /** Present for postgres; feeds pool stats into health checks */
  pool?: PoolCounters
  close(): Promise<void>
}

function sqliteFilename(url: string): string {
  return url.startsWith('sqlite:') ? url.slice('sqlite:'.length).replace(/^\/\//, '') : url
}

function createLogHandler(logger: StoreLogger) {
  return (event: LogEvent): void => {
    if (event.level === 'error') {
      logger.error(`Query failed (${event.queryDurationMillis}ms): ${event.query.sql}`, event.error)
    } else {
      logger.debug(`Query (${event.queryDurationMillis}ms): ${event.query.sql}`)
    }
  }
}

/**
 * Open a connection to the store database.
 *
 * SQLite connections enforce foreign keys. Postgres `date` values arrive as
 * `Date`s and are formatted by the row mappers.
 *
 * @example
 * ```typescript
 * const { db, close } = createStoreDatabase({ dialect: 'sqlite', url: ':memory:' })
 * await migrateToLatest(db)
 * await close()
 * ```
 */
export function createStoreDatabase(options: ConnectionOptions): StoreConnection {
  const logger = options.logger ?? silentLogger
  const log = createLogHandler(logger)

  if (options.dialect === 'postgres') {
    const pool = new pg.Pool({
      connectionString: options.url,
      max: options.pool?.max ?? 10,
      connectionTimeoutMillis: options.pool?.connectionTimeoutMillis ?? 5000
    })
    const db = new Kysely<StoreDatabase>({
      dialect: new PostgresDialect({ pool }),
      log
    })

    return {
      db,
      dialect: 'postgres',
      pool,
      close: () => db.destroy()
    }
  }

  const database = new SQLite(sqliteFilename(options.url))
  database.pragma('foreign_keys = ON')
  const db = new Kysely<StoreDatabase>({
    dialect: new SqliteDialect({ database }),
    log
  })

  return {
    db,
    dialect: 'sqlite',
    close: () => db.destroy()
  }
}
