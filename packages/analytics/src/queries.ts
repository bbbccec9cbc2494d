import { sql } from 'kysely'
import { z } from 'zod'
import { createQuery, mapResult, type DbContext } from '@storelens/dal'
import {
  countValue,
  mapCustomerRow,
  mapProductRow,
  moneyValue,
  type StoreDatabase
} from '@storelens/store'

/**
 * Read-only queries over the store. Each accepts a context or a bare
 * Kysely instance as its first argument.
 */

export const ProductRevenueSchema = z.object({
  product_id: z.coerce.number().int().positive(),
  name: z.string(),
  revenue: moneyValue
})

export const DepartmentSalarySchema = z.object({
  department: z.string(),
  average_salary: moneyValue
})

export type ProductRevenue = z.infer<typeof ProductRevenueSchema>
export type DepartmentSalary = z.infer<typeof DepartmentSalarySchema>

function yearStart(year: number): string {
  return `${String(year).padStart(4, '0')}-01-01`
}

function yearEnd(year: number): string {
  return `${String(year).padStart(4, '0')}-12-31`
}

/**
 * Customers who joined during `year`, by id.
 */
export const customersByJoinYear = mapResult(
  createQuery((ctx: DbContext<StoreDatabase>, year: number) =>
    ctx.db
      .selectFrom('customers')
      .selectAll()
      .where('join_date', '>=', yearStart(year))
      .where('join_date', '<=', yearEnd(year))
      .orderBy('id')
      .execute()
  ),
  mapCustomerRow
)

export const productsByCategory = mapResult(
  createQuery((ctx: DbContext<StoreDatabase>, category: string) =>
    ctx.db
      .selectFrom('products')
      .selectAll()
      .where('category', '=', category)
      .orderBy('id')
      .execute()
  ),
  mapProductRow
)

export const orderCount = createQuery(async (ctx: DbContext<StoreDatabase>) => {
  const row = await ctx.db
    .selectFrom('orders')
    .select(eb => eb.fn.countAll().as('count'))
    .executeTakeFirstOrThrow()
  return countValue.parse(row.count)
})

/**
 * Every product priced at the catalog maximum; ties return all of them.
 */
export const maxPriceProducts = mapResult(
  createQuery((ctx: DbContext<StoreDatabase>) =>
    ctx.db
      .selectFrom('products')
      .selectAll()
      .where(eb =>
        eb('price', '=', eb.selectFrom('products').select(eb.fn.max('price').as('max_price')))
      )
      .orderBy('id')
      .execute()
  ),
  mapProductRow
)

/**
 * Sum of `quantity * item_price` over all order items; `0` when there are none.
 */
export const totalRevenue = createQuery(async (ctx: DbContext<StoreDatabase>) => {
  const row = await ctx.db
    .selectFrom('order_items')
    .select(sql<number | string>`coalesce(sum(quantity * item_price), 0)`.as('revenue'))
    .executeTakeFirstOrThrow()
  return moneyValue.parse(row.revenue)
})

/**
 * Products ranked by revenue from their order items, highest first.
 * Equal revenue ranks by ascending product id. Products never ordered are
 * not ranked.
 */
export const topProductsByRevenue = mapResult(
  createQuery((ctx: DbContext<StoreDatabase>, limit: number) =>
    ctx.db
      .selectFrom('order_items')
      .innerJoin('products', 'products.id', 'order_items.product_id')
      .select([
        'products.id as product_id',
        'products.name',
        sql<number | string>`sum(order_items.quantity * order_items.item_price)`.as('revenue')
      ])
      .groupBy(['products.id', 'products.name'])
      .orderBy('revenue', 'desc')
      .orderBy('products.id', 'asc')
      .limit(limit)
      .execute()
  ),
  row => ProductRevenueSchema.parse(row)
)

export const customersWithoutOrders = mapResult(
  createQuery((ctx: DbContext<StoreDatabase>) =>
    ctx.db
      .selectFrom('customers')
      .selectAll()
      .where(eb =>
        eb.not(
          eb.exists(
            eb
              .selectFrom('orders')
              .select('orders.id')
              .whereRef('orders.customer_id', '=', 'customers.id')
          )
        )
      )
      .orderBy('id')
      .execute()
  ),
  mapCustomerRow
)

export const averageSalaryByDepartment = mapResult(
  createQuery((ctx: DbContext<StoreDatabase>) =>
    ctx.db
      .selectFrom('employees')
      .select(eb => ['department', eb.fn.avg('salary').as('average_salary')])
      .groupBy('department')
      .orderBy('department')
      .execute()
  ),
  row => DepartmentSalarySchema.parse(row)
)
