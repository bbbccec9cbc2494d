import { sql } from 'kysely'
import { detectDialect, ForeignKeyError, type Executor } from '@storelens/core'
import { createTransactionalQuery, withTransaction, type DbContext } from '@storelens/dal'
import type { StoreDatabase } from '../schema.js'
import {
  mapOrderItemRow,
  mapOrderRow,
  moneyValue,
  roundMoney,
  type Order,
  type OrderItem,
  type OrderWithItems
} from '../models.js'
import { PlaceOrderSchema, type ValidatedOrder } from '../validation.js'
import { translateErrors } from '../errors.js'
import { createProductRepository } from './product.repository.js'

export interface TotalMismatch {
  order: Order
  itemsTotal: number
}

/**
 * Insert a validated order with its items and take out stock. Must run
 * inside a transaction so a failing line rolls back the whole order.
 */
const insertOrder = createTransactionalQuery(
  async (ctx: DbContext<StoreDatabase>, validated: ValidatedOrder): Promise<OrderWithItems> => {
    const trx = ctx.db
    const products = createProductRepository(trx)

    const customer = await trx
      .selectFrom('customers')
      .select('id')
      .where('id', '=', validated.customer_id)
      .executeTakeFirst()
    if (!customer) {
      throw new ForeignKeyError(
        'orders_customer_id_fkey',
        'orders',
        'customers',
        JSON.stringify({ customer_id: validated.customer_id })
      )
    }

    const productIds = [...new Set(validated.items.map(line => line.product_id))]
    const known = new Map(
      (await products.findByIds(productIds)).map(product => [product.id, product])
    )

    const lines = validated.items.map(line => {
      const product = known.get(line.product_id)
      if (!product) {
        throw new ForeignKeyError(
          'order_items_product_id_fkey',
          'order_items',
          'products',
          JSON.stringify({ product_id: line.product_id })
        )
      }
      return {
        product_id: line.product_id,
        quantity: line.quantity,
        item_price: line.item_price ?? product.price
      }
    })

    const total = roundMoney(
      lines.reduce((sum, line) => sum + line.quantity * line.item_price, 0)
    )

    const orderRow = await translateErrors(ctx.dialect, () =>
      trx
        .insertInto('orders')
        .values({
          customer_id: validated.customer_id,
          order_date: validated.order_date,
          total_amount: total
        })
        .returningAll()
        .executeTakeFirstOrThrow()
    )
    const order = mapOrderRow(orderRow)

    const itemRows = await translateErrors(ctx.dialect, () =>
      trx
        .insertInto('order_items')
        .values(lines.map(line => ({ ...line, order_id: order.id })))
        .returningAll()
        .execute()
    )

    for (const line of lines) {
      await products.decreaseStock(line.product_id, line.quantity)
    }

    const items = itemRows.map(mapOrderItemRow).sort((a, b) => a.id - b.id)
    return { ...order, items }
  }
)

export function createOrderRepository(executor: Executor<StoreDatabase>) {
  const dialect = detectDialect(executor)

  async function findItems(db: Executor<StoreDatabase>, orderId: number): Promise<OrderItem[]> {
    const rows = await db
      .selectFrom('order_items')
      .selectAll()
      .where('order_id', '=', orderId)
      .orderBy('id')
      .execute()
    return rows.map(mapOrderItemRow)
  }

  return {
    async findById(id: number): Promise<OrderWithItems | null> {
      const row = await executor
        .selectFrom('orders')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst()

      if (!row) {
        return null
      }
      return { ...mapOrderRow(row), items: await findItems(executor, id) }
    },

    async findItems(orderId: number): Promise<OrderItem[]> {
      return findItems(executor, orderId)
    },

    /**
     * Place an order atomically.
     *
     * The total is the sum of `quantity * item_price` over the lines, where
     * a line without `item_price` takes the product's current price. Stock
     * is taken out for every line; any failure rolls the whole order back.
     *
     * @throws ForeignKeyError when the customer or a product does not exist
     * @throws InsufficientStockError when a product cannot cover its lines
     */
    async placeOrder(input: unknown): Promise<OrderWithItems> {
      const validated = PlaceOrderSchema.parse(input)

      return withTransaction(executor, ctx => insertOrder(ctx, validated), { dialect })
    },

    /**
     * Orders whose stored total differs from the sum of their items.
     * Orders without items compare against zero.
     */
    async findTotalMismatches(): Promise<TotalMismatch[]> {
      const rows = await executor
        .selectFrom('orders')
        .leftJoin('order_items', 'order_items.order_id', 'orders.id')
        .select([
          'orders.id',
          'orders.order_date',
          'orders.customer_id',
          'orders.total_amount',
          sql<number | string>`coalesce(sum(order_items.quantity * order_items.item_price), 0)`.as(
            'items_total'
          )
        ])
        .groupBy(['orders.id', 'orders.order_date', 'orders.customer_id', 'orders.total_amount'])
        .orderBy('orders.id')
        .execute()

      return rows.flatMap(row => {
        const order = mapOrderRow(row)
        const itemsTotal = moneyValue.parse(row.items_total)
        return order.total_amount === itemsTotal ? [] : [{ order, itemsTotal }]
      })
    }
  }
}

export type OrderRepository = ReturnType<typeof createOrderRepository>
