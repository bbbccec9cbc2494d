/**
 * Core types for the data access layer.
 *
 * @module @storelens/dal
 */

import type { Dialect, Executor, StoreLogger } from '@storelens/core'

/**
 * Symbol marking DbContext objects. `Symbol.for` keeps it identical across
 * duplicated module instances.
 */
export const DB_CONTEXT_SYMBOL: unique symbol = Symbol.for('storelens.DbContext')

/**
 * Database context handed to every query function.
 *
 * @typeParam DB - Database schema type
 */
export interface DbContext<DB> {
  /** Marker symbol for reliable type detection */
  readonly [DB_CONTEXT_SYMBOL]: true
  /** Database or transaction instance */
  readonly db: Executor<DB>
  /** Whether the context is within a transaction */
  readonly isTransaction: boolean
  /** Dialect of `db`, used for savepoints and error parsing */
  readonly dialect: Dialect
  /** Logger for context operations; silent unless provided */
  readonly logger: StoreLogger
}

export interface ContextOptions {
  logger?: StoreLogger
  dialect?: Dialect
}

/**
 * Options for transaction execution.
 */
export interface TransactionOptions extends ContextOptions {
  /**
   * Isolation level for the transaction. Ignored for nested calls,
   * which run inside a savepoint of the enclosing transaction.
   */
  isolationLevel?: 'read uncommitted' | 'read committed' | 'repeatable read' | 'serializable'
}

/**
 * Query function signature.
 *
 * Accepts either an explicit {@link DbContext} (inside `withTransaction`) or
 * a bare Kysely instance / transaction, followed by the query arguments.
 *
 * @typeParam DB - Database schema type
 * @typeParam TArgs - Tuple of argument types
 * @typeParam TResult - Return type
 */
export type QueryFunction<DB, TArgs extends readonly unknown[], TResult> = (
  ctxOrDb: DbContext<DB> | Executor<DB>,
  ...args: TArgs
) => Promise<TResult>

/**
 * Infer result type from a query function.
 */
export type InferResult<T> = T extends (...args: never[]) => Promise<infer R> ? R : never

/**
 * Infer arguments type from a query function.
 */
export type InferArgs<T> = T extends (ctxOrDb: never, ...args: infer A) => Promise<unknown>
  ? A
  : never

/**
 * Type guard to check if a value is a DbContext.
 */
export function isDbContext<DB>(obj: unknown): obj is DbContext<DB> {
  return typeof obj === 'object' && obj !== null && DB_CONTEXT_SYMBOL in obj
}
