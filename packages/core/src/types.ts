import type { Kysely, Transaction } from 'kysely'

/**
 * Either a Kysely database instance or a transaction.
 *
 * Functions that accept an `Executor` work unchanged inside and outside of
 * `withTransaction`, which is how the write paths compose an order with its
 * items atomically.
 *
 * @example
 * ```typescript
 * async function countOrders(executor: Executor<StoreDatabase>) {
 *   return executor
 *     .selectFrom('orders')
 *     .select(eb => eb.fn.countAll().as('count'))
 *     .executeTakeFirstOrThrow()
 * }
 * ```
 */
export type Executor<DB> = Kysely<DB> | Transaction<DB>

/**
 * SQL dialects the store runs on.
 */
export type Dialect = 'postgres' | 'sqlite'

/**
 * Timing of a single executed query.
 */
export interface QueryMetrics {
  /** Catalog name or SQL text */
  name: string
  /** Execution duration in milliseconds */
  duration: number
  /** Rows returned */
  rowCount: number
  /** Epoch milliseconds when the query started */
  timestamp: number
}
