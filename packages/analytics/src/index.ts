/**
 * @storelens/analytics - the query catalog and its executor
 *
 * @module @storelens/analytics
 */

export * from './queries.js'
export {
  catalog,
  entries,
  isQueryName,
  queryNames,
  DEFAULT_TOP_PRODUCTS_LIMIT,
  type BoundQuery,
  type CatalogEntry,
  type CatalogEntries,
  type QueryCatalog,
  type QueryName,
  type QueryResult
} from './catalog.js'
export { createQueryExecutor, type QueryExecutor, type QueryExecutorOptions, type QueryOverview } from './executor.js'
export { InvalidQueryParamsError, UnknownQueryError } from './errors.js'
