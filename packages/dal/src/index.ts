/**
 * @storelens/dal - functional data access layer
 *
 * Query functions receive a {@link DbContext} (or a bare Kysely instance)
 * plus arguments and return a promise; transactions pass the same context
 * type down so reads and writes compose without a repository layer.
 *
 * @module @storelens/dal
 */

// Types
export type {
  DbContext,
  ContextOptions,
  TransactionOptions,
  QueryFunction,
  InferResult,
  InferArgs
} from './types.js'
export { DB_CONTEXT_SYMBOL, isDbContext } from './types.js'

// Context
export { createContext, toContext, withTransaction, isInTransaction } from './context.js'

// Query creation
export { createQuery, createTransactionalQuery } from './query.js'

// Composition
export { mapResult } from './compose.js'

// Errors
export { TransactionRequiredError } from './errors.js'
