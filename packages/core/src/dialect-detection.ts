import { sql } from 'kysely'
import type { Dialect, Executor } from './types.js'

/**
 * Detects the database dialect of a Kysely instance or transaction.
 *
 * A probe statement is compiled (never executed) and its parameter
 * placeholder read: `$1` means postgres, `?` means sqlite.
 *
 * @example
 * ```typescript
 * const db = new Kysely<StoreDatabase>({ dialect: new SqliteDialect({ database }) })
 * detectDialect(db) // 'sqlite'
 * ```
 */
export function detectDialect<DB>(executor: Executor<DB>): Dialect {
  const compiled = sql`select ${1} as ${sql.ref('probe')}`.compile(executor)

  if (compiled.sql.includes('$1')) {
    return 'postgres'
  }
  return 'sqlite'
}
