/**
 * Database context and transaction utilities.
 *
 * @module @storelens/dal
 */

import { sql } from 'kysely'
import { detectDialect, silentLogger, type Executor } from '@storelens/core'
import type { ContextOptions, DbContext, TransactionOptions } from './types.js'
import { DB_CONTEXT_SYMBOL, isDbContext } from './types.js'

// Savepoint sequence per open transaction
const savepointCounters = new WeakMap<object, number>()

function nextSavepointName(trx: object): string {
  const next = (savepointCounters.get(trx) ?? 0) + 1
  savepointCounters.set(trx, next)
  return `storelens_sp_${next}`
}

/**
 * Create a database context from a Kysely instance or transaction.
 *
 * The dialect is detected from the instance unless given.
 *
 * @example
 * ```typescript
 * const ctx = createContext(db, { logger: consoleLogger })
 * const rows = await productsByCategory(ctx, 'Electronics')
 * ```
 */
export function createContext<DB>(db: Executor<DB>, options: ContextOptions = {}): DbContext<DB> {
  return {
    [DB_CONTEXT_SYMBOL]: true,
    db,
    isTransaction: db.isTransaction,
    dialect: options.dialect ?? detectDialect(db),
    logger: options.logger ?? silentLogger
  }
}

/**
 * Normalize a context-or-database argument into a context.
 * @internal
 */
export function toContext<DB>(
  ctxOrDb: DbContext<DB> | Executor<DB>,
  options?: ContextOptions
): DbContext<DB> {
  return isDbContext<DB>(ctxOrDb) ? ctxOrDb : createContext(ctxOrDb, options)
}

/**
 * Execute a function within a transaction.
 *
 * When called with a context (or transaction) that is already inside a
 * transaction, the work runs in a savepoint instead: a failure rolls back
 * to the savepoint and rethrows, leaving the outer transaction usable.
 *
 * @example
 * ```typescript
 * const order = await withTransaction(db, async ctx => {
 *   const order = await insertOrder(ctx, header)
 *   await insertItems(ctx, order.id, items)
 *   return order
 * })
 * ```
 */
export async function withTransaction<DB, T>(
  dbOrCtx: Executor<DB> | DbContext<DB>,
  fn: (ctx: DbContext<DB>) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const parent = isDbContext<DB>(dbOrCtx) ? dbOrCtx : undefined
  const db = isDbContext<DB>(dbOrCtx) ? dbOrCtx.db : dbOrCtx
  const logger = options.logger ?? parent?.logger ?? silentLogger
  const dialect = options.dialect ?? parent?.dialect ?? detectDialect(db)

  const contextFor = (executor: Executor<DB>): DbContext<DB> => ({
    [DB_CONTEXT_SYMBOL]: true,
    db: executor,
    isTransaction: true,
    dialect,
    logger
  })

  if (db.isTransaction) {
    const savepoint = nextSavepointName(db)
    await sql`savepoint ${sql.id(savepoint)}`.execute(db)

    try {
      const result = await fn(contextFor(db))
      await sql`release savepoint ${sql.id(savepoint)}`.execute(db)
      return result
    } catch (error) {
      try {
        await sql`rollback to savepoint ${sql.id(savepoint)}`.execute(db)
      } catch (rollbackError) {
        // The original error is the one worth surfacing
        logger.error(`Savepoint rollback failed for ${savepoint}:`, rollbackError)
      }
      throw error
    }
  }

  let builder = db.transaction()
  if (options.isolationLevel) {
    builder = builder.setIsolationLevel(options.isolationLevel)
  }

  return await builder.execute(trx => fn(contextFor(trx)))
}

/**
 * Check whether a context is inside a transaction.
 */
export function isInTransaction<DB>(ctx: DbContext<DB>): boolean {
  return ctx.isTransaction
}
