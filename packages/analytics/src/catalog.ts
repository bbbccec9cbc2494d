import { z } from 'zod'
import type { DbContext } from '@storelens/dal'
import type { StoreDatabase } from '@storelens/store'
import {
  averageSalaryByDepartment,
  customersByJoinYear,
  customersWithoutOrders,
  maxPriceProducts,
  orderCount,
  productsByCategory,
  topProductsByRevenue,
  totalRevenue
} from './queries.js'

export const DEFAULT_TOP_PRODUCTS_LIMIT = 3

export type BoundQuery<TResult> = (ctx: DbContext<StoreDatabase>) => Promise<TResult>

/**
 * A named catalog query.
 */
export interface CatalogEntry<TResult> {
  description: string
  /** Parameter names, in the order the CLI documents them */
  parameters: string[]
  /** True when the query runs without any caller-supplied parameter */
  parameterless: boolean
  /**
   * Validate raw parameters and bind them to the query.
   *
   * @throws ZodError when the parameters are invalid
   */
  prepare(params: unknown): BoundQuery<TResult>
}

function defineQuery<TSchema extends z.AnyZodObject, TResult>(definition: {
  description: string
  params: TSchema
  query: (ctx: DbContext<StoreDatabase>, params: z.output<TSchema>) => Promise<TResult>
}): CatalogEntry<TResult> {
  const { description, params, query } = definition
  return {
    description,
    parameters: Object.keys(params.shape),
    parameterless: params.safeParse({}).success,
    prepare: raw => {
      const parsed = params.parse(raw ?? {})
      return ctx => query(ctx, parsed)
    }
  }
}

const noParams = z.object({}).strict()

export const catalog = {
  'customers-by-join-year': defineQuery({
    description: 'Customers who joined in a given year',
    params: z.object({ year: z.coerce.number().int().min(1900).max(9999) }),
    query: (ctx, { year }) => customersByJoinYear(ctx, year)
  }),
  'products-by-category': defineQuery({
    description: 'Products in a category (exact match)',
    params: z.object({ category: z.string().min(1) }),
    query: (ctx, { category }) => productsByCategory(ctx, category)
  }),
  'order-count': defineQuery({
    description: 'Number of orders',
    params: noParams,
    query: ctx => orderCount(ctx)
  }),
  'max-price-products': defineQuery({
    description: 'Products at the highest price',
    params: noParams,
    query: ctx => maxPriceProducts(ctx)
  }),
  'total-revenue': defineQuery({
    description: 'Revenue across all order items',
    params: noParams,
    query: ctx => totalRevenue(ctx)
  }),
  'top-products-by-revenue': defineQuery({
    description: 'Best-selling products by revenue',
    params: z.object({
      limit: z.coerce
        .number()
        .int()
        .positive()
        .max(Number.MAX_SAFE_INTEGER)
        .default(DEFAULT_TOP_PRODUCTS_LIMIT)
    }),
    query: (ctx, { limit }) => topProductsByRevenue(ctx, limit)
  }),
  'customers-without-orders': defineQuery({
    description: 'Customers who never placed an order',
    params: noParams,
    query: ctx => customersWithoutOrders(ctx)
  }),
  'average-salary-by-department': defineQuery({
    description: 'Average employee salary per department',
    params: noParams,
    query: ctx => averageSalaryByDepartment(ctx)
  })
}

export type QueryCatalog = typeof catalog
export type QueryName = keyof QueryCatalog
export type QueryResult<N extends QueryName> =
  QueryCatalog[N] extends CatalogEntry<infer R> ? R : never

/**
 * The catalog seen through a mapped type, so `entries[name]` keeps the
 * result type of a generic `name`.
 */
export type CatalogEntries = { [N in QueryName]: CatalogEntry<QueryResult<N>> }

export const entries: CatalogEntries = catalog

export const queryNames = Object.keys(catalog).filter(isQueryName)

export function isQueryName(name: string): name is QueryName {
  return Object.prototype.hasOwnProperty.call(catalog, name)
}
