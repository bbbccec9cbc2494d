/**
 * Query function creation utilities.
 *
 * @module @storelens/dal
 */

import type { Executor } from '@storelens/core'
import type { DbContext, QueryFunction } from './types.js'
import { isInTransaction, toContext } from './context.js'
import { TransactionRequiredError } from './errors.js'

/**
 * Create a typed query function.
 *
 * The result type is inferred from the implementation. The returned
 * function accepts either a context or a bare Kysely instance.
 *
 * @example
 * ```typescript
 * const productsByCategory = createQuery((ctx: DbContext<StoreDatabase>, category: string) =>
 *   ctx.db.selectFrom('products').selectAll().where('category', '=', category).execute()
 * )
 *
 * const phones = await productsByCategory(db, 'Phones')
 * ```
 */
export function createQuery<DB, TArgs extends readonly unknown[], TResult>(
  queryFn: (ctx: DbContext<DB>, ...args: TArgs) => Promise<TResult>
): QueryFunction<DB, TArgs, TResult> {
  return (ctxOrDb: DbContext<DB> | Executor<DB>, ...args: TArgs): Promise<TResult> =>
    queryFn(toContext(ctxOrDb), ...args)
}

/**
 * Create a query function that refuses to run outside a transaction.
 *
 * @throws TransactionRequiredError when called without an enclosing transaction
 */
export function createTransactionalQuery<DB, TArgs extends readonly unknown[], TResult>(
  queryFn: (ctx: DbContext<DB>, ...args: TArgs) => Promise<TResult>
): QueryFunction<DB, TArgs, TResult> {
  return createQuery(async (ctx: DbContext<DB>, ...args: TArgs) => {
    if (!isInTransaction(ctx)) {
      throw new TransactionRequiredError()
    }
    return await queryFn(ctx, ...args)
  })
}
