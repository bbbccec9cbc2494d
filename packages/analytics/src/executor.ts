import type { Kysely } from 'kysely'
import { ZodError } from 'zod'
import {
  checkDatabaseHealth,
  ConnectionError,
  isConnectionError,
  QueryTimeoutError,
  silentLogger,
  type Dialect,
  type HealthCheckResult,
  type PoolCounters,
  type QueryMetrics,
  type StoreLogger
} from '@storelens/core'
import { createContext, type DbContext, type QueryFunction } from '@storelens/dal'
import type { StoreDatabase } from '@storelens/store'
import {
  entries,
  isQueryName,
  queryNames,
  type BoundQuery,
  type QueryName,
  type QueryResult
} from './catalog.js'
import { InvalidQueryParamsError, UnknownQueryError } from './errors.js'

export interface QueryExecutorOptions {
  logger?: StoreLogger
  /** Skip dialect detection */
  dialect?: Dialect
  /** Fail a query with `QueryTimeoutError` after this many milliseconds */
  timeoutMs?: number
  /** Pool counters reported by `ping()` */
  pool?: PoolCounters
  /** Called after every successful query */
  onQuery?: (metrics: QueryMetrics) => void
}

export type QueryOverview = Partial<{ [N in QueryName]: QueryResult<N> }>

function rowCount(result: unknown): number {
  return Array.isArray(result) ? result.length : 1
}

/**
 * Bind the query catalog to a database.
 *
 * Connectivity failures surface as `ConnectionError` with the driver error
 * as `cause`; a query running past `timeoutMs` rejects with
 * `QueryTimeoutError`. Other errors propagate unchanged. Nothing is retried.
 *
 * @example
 * ```typescript
 * const executor = createQueryExecutor(db, { timeoutMs: 5000 })
 * const top = await executor.run('top-products-by-revenue', { limit: 5 })
 * ```
 */
export function createQueryExecutor(db: Kysely<StoreDatabase>, options: QueryExecutorOptions = {}) {
  const logger = options.logger ?? silentLogger
  const { timeoutMs, pool, onQuery } = options
  const ctx = createContext(db, { logger, dialect: options.dialect })

  async function withTimeout<T>(name: string, work: Promise<T>): Promise<T> {
    if (timeoutMs === undefined) {
      return work
    }
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new QueryTimeoutError(name, timeoutMs)), timeoutMs)
    })
    try {
      return await Promise.race([work, timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  async function guard<T>(name: string, work: (ctx: DbContext<StoreDatabase>) => Promise<T>): Promise<T> {
    const start = Date.now()
    try {
      const result = await withTimeout(name, work(ctx))
      const duration = Date.now() - start
      logger.debug(`${name} completed in ${duration}ms`)
      onQuery?.({ name, duration, rowCount: rowCount(result), timestamp: start })
      return result
    } catch (error) {
      logger.error(`${name} failed after ${Date.now() - start}ms`, error)
      if (!(error instanceof QueryTimeoutError) && isConnectionError(error)) {
        throw new ConnectionError(`Database unreachable while running "${name}"`, { cause: error })
      }
      throw error
    }
  }

  function prepare<N extends QueryName>(name: N, params: unknown): BoundQuery<QueryResult<N>> {
    try {
      return entries[name].prepare(params)
    } catch (error) {
      if (error instanceof ZodError) {
        throw new InvalidQueryParamsError(name, error)
      }
      throw error
    }
  }

  // Parameters are checked before the query runs; a ZodError from mapping
  // result rows propagates as is.
  async function run<N extends QueryName>(name: N, params?: unknown): Promise<QueryResult<N>> {
    return guard(name, async queryCtx => prepare(name, params)(queryCtx))
  }

  return {
    /**
     * Run any query function against the bound database. `name` labels its
     * log lines and metrics.
     */
    execute<TArgs extends readonly unknown[], TResult>(
      name: string,
      query: QueryFunction<StoreDatabase, TArgs, TResult>,
      ...args: TArgs
    ): Promise<TResult> {
      return guard(name, queryCtx => query(queryCtx, ...args))
    },

    run,

    /**
     * Run a catalog entry looked up by an untrusted name.
     *
     * @throws UnknownQueryError when no entry has that name
     */
    runByName(name: string, params?: unknown): Promise<unknown> {
      if (!isQueryName(name)) {
        return Promise.reject(new UnknownQueryError(name, queryNames))
      }
      return run(name, params)
    },

    /**
     * Run every entry that needs no parameters, concurrently.
     */
    async runAll(): Promise<QueryOverview> {
      const overview: QueryOverview = {}
      const collect = async <N extends QueryName>(name: N): Promise<void> => {
        overview[name] = await run(name)
      }
      await Promise.all(queryNames.filter(name => entries[name].parameterless).map(collect))
      return overview
    },

    ping(): Promise<HealthCheckResult> {
      return checkDatabaseHealth(db, { pool })
    }
  }
}

export type QueryExecutor = ReturnType<typeof createQueryExecutor>
