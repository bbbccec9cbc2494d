import { sql } from 'kysely'
import { detectDialect, NotFoundError, type Executor } from '@storelens/core'
import type { StoreDatabase } from '../schema.js'
import { mapProductRow, type Product } from '../models.js'
import { CreateProductSchema, PriceSchema, StockChangeSchema } from '../validation.js'
import { InsufficientStockError, translateErrors } from '../errors.js'

export function createProductRepository(executor: Executor<StoreDatabase>) {
  const dialect = detectDialect(executor)

  async function requireProduct(id: number): Promise<Product> {
    const row = await executor
      .selectFrom('products')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst()

    if (!row) {
      throw new NotFoundError('Product', { id })
    }
    return mapProductRow(row)
  }

  return {
    async findById(id: number): Promise<Product | null> {
      const row = await executor
        .selectFrom('products')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst()

      return row ? mapProductRow(row) : null
    },

    async findByIds(ids: readonly number[]): Promise<Product[]> {
      if (ids.length === 0) {
        return []
      }
      const rows = await executor
        .selectFrom('products')
        .selectAll()
        .where('id', 'in', ids)
        .orderBy('id')
        .execute()
      return rows.map(mapProductRow)
    },

    async create(input: unknown): Promise<Product> {
      const validated = CreateProductSchema.parse(input)

      const row = await translateErrors(dialect, () =>
        executor.insertInto('products').values(validated).returningAll().executeTakeFirstOrThrow()
      )
      return mapProductRow(row)
    },

    async restock(id: number, quantity: number): Promise<Product> {
      const amount = StockChangeSchema.parse(quantity)

      const row = await translateErrors(dialect, () =>
        executor
          .updateTable('products')
          .set({ stock_quantity: sql<number>`stock_quantity + ${amount}` })
          .where('id', '=', id)
          .returningAll()
          .executeTakeFirst()
      )
      if (!row) {
        throw new NotFoundError('Product', { id })
      }
      return mapProductRow(row)
    },

    /**
     * Take stock out in a single conditional update so concurrent orders
     * cannot drive it below zero.
     */
    async decreaseStock(id: number, quantity: number): Promise<Product> {
      const amount = StockChangeSchema.parse(quantity)

      const row = await translateErrors(dialect, () =>
        executor
          .updateTable('products')
          .set({ stock_quantity: sql<number>`stock_quantity - ${amount}` })
          .where('id', '=', id)
          .where('stock_quantity', '>=', amount)
          .returningAll()
          .executeTakeFirst()
      )
      if (!row) {
        // Distinguish a missing product from a short one
        await requireProduct(id)
        throw new InsufficientStockError(id, amount)
      }
      return mapProductRow(row)
    },

    async updatePrice(id: number, price: number): Promise<Product> {
      const validated = PriceSchema.parse(price)

      const row = await translateErrors(dialect, () =>
        executor
          .updateTable('products')
          .set({ price: validated })
          .where('id', '=', id)
          .returningAll()
          .executeTakeFirst()
      )
      if (!row) {
        throw new NotFoundError('Product', { id })
      }
      return mapProductRow(row)
    }
  }
}

export type ProductRepository = ReturnType<typeof createProductRepository>
