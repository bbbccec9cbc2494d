/**
 * Query composition utilities.
 *
 * @module @storelens/dal
 */

import type { Executor } from '@storelens/core'
import type { DbContext, QueryFunction } from './types.js'
import { toContext } from './context.js'

/**
 * Map every element of an array-returning query.
 *
 * @example
 * ```typescript
 * const customerNames = mapResult(customersWithoutOrders, customer => customer.name)
 * ```
 */
export function mapResult<DB, TArgs extends readonly unknown[], TItem, TResult>(
  query: QueryFunction<DB, TArgs, TItem[]>,
  mapper: (item: TItem, index: number) => TResult
): QueryFunction<DB, TArgs, TResult[]> {
  return async (ctxOrDb: DbContext<DB> | Executor<DB>, ...args: TArgs): Promise<TResult[]> => {
    const items = await query(toContext(ctxOrDb), ...args)
    return items.map(mapper)
  }
}
