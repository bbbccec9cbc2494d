/**
 * Tests for the catalog queries on empty and seeded stores.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  createOrderRepository,
  createProductRepository,
  type StoreConnection
} from '@storelens/store'
import {
  averageSalaryByDepartment,
  customersByJoinYear,
  customersWithoutOrders,
  maxPriceProducts,
  orderCount,
  productsByCategory,
  topProductsByRevenue,
  totalRevenue
} from '../src/queries.js'
import { createTestStore, seedStore } from './helpers.js'

describe('catalog queries', () => {
  let connection: StoreConnection

  beforeEach(async () => {
    connection = await createTestStore()
  })

  afterEach(async () => {
    await connection.close()
  })

  describe('on empty tables', () => {
    it('returns zero for counts and sums', async () => {
      expect(await orderCount(connection.db)).toBe(0)
      expect(await totalRevenue(connection.db)).toBe(0)
    })

    it('returns empty lists for filters and groups', async () => {
      expect(await customersByJoinYear(connection.db, 2023)).toEqual([])
      expect(await productsByCategory(connection.db, 'Tools')).toEqual([])
      expect(await maxPriceProducts(connection.db)).toEqual([])
      expect(await topProductsByRevenue(connection.db, 3)).toEqual([])
      expect(await customersWithoutOrders(connection.db)).toEqual([])
      expect(await averageSalaryByDepartment(connection.db)).toEqual([])
    })
  })

  describe('on seeded data', () => {
    beforeEach(async () => {
      await seedStore(connection)
    })

    it('finds customers by join year, inclusive of both year ends', async () => {
      const customers = await customersByJoinYear(connection.db, 2023)

      expect(customers).toEqual([
        { id: 2, name: 'Ben', contact: null, join_date: '2023-01-01' },
        { id: 3, name: 'Cy', contact: null, join_date: '2023-12-31' }
      ])
    })

    it('filters products by exact category', async () => {
      const products = await productsByCategory(connection.db, 'Garden')

      expect(products.map(p => p.name)).toEqual(['C', 'D'])
      expect(await productsByCategory(connection.db, 'garden')).toEqual([])
    })

    it('counts orders', async () => {
      expect(await orderCount(connection.db)).toBe(2)
    })

    it('sums revenue over all items', async () => {
      expect(await totalRevenue(connection.db)).toBe(270)
    })

    it('ranks the top products, breaking ties by id', async () => {
      const top = await topProductsByRevenue(connection.db, 3)

      expect(top).toEqual([
        { product_id: 1, name: 'A', revenue: 100 },
        { product_id: 2, name: 'B', revenue: 80 },
        { product_id: 3, name: 'C', revenue: 80 }
      ])
    })

    it('honours the limit', async () => {
      const top = await topProductsByRevenue(connection.db, 1)

      expect(top.map(p => p.name)).toEqual(['A'])
    })

    it('lists customers without orders', async () => {
      const customers = await customersWithoutOrders(connection.db)

      expect(customers.map(c => c.name)).toEqual(['Cy'])
    })

    it('lists nobody once every customer has ordered', async () => {
      await createOrderRepository(connection.db).placeOrder({
        customer_id: 3,
        order_date: '2024-03-01',
        items: [{ product_id: 4, quantity: 1 }]
      })

      expect(await customersWithoutOrders(connection.db)).toEqual([])
    })

    it('averages salary per department', async () => {
      expect(await averageSalaryByDepartment(connection.db)).toEqual([
        { department: 'IT', average_salary: 70000 },
        { department: 'Sales', average_salary: 55000 }
      ])
    })

    it('returns the single most expensive product', async () => {
      const products = await maxPriceProducts(connection.db)

      expect(products.map(p => p.name)).toEqual(['C'])
    })
  })

  it('returns every product tied at the maximum price', async () => {
    const products = createProductRepository(connection.db)
    await products.create({ name: 'Laptop', category: 'Electronics', price: 799.99 })
    await products.create({ name: 'Phone', category: 'Electronics', price: 499 })
    await products.create({ name: 'Tablet', category: 'Electronics', price: 799.99 })

    const expensive = await maxPriceProducts(connection.db)

    expect(expensive).toEqual([
      { id: 1, name: 'Laptop', category: 'Electronics', price: 799.99, stock_quantity: 0 },
      { id: 3, name: 'Tablet', category: 'Electronics', price: 799.99, stock_quantity: 0 }
    ])
  })

  it('returns every customer while nobody has ordered', async () => {
    await seedCustomersOnly(connection)

    const customers = await customersWithoutOrders(connection.db)

    expect(customers.map(c => c.name)).toEqual(['Kim', 'Lee'])
  })
})

async function seedCustomersOnly(connection: StoreConnection): Promise<void> {
  await connection.db
    .insertInto('customers')
    .values([
      { name: 'Kim', contact: null, join_date: '2021-05-05' },
      { name: 'Lee', contact: 'lee@example.com', join_date: '2021-06-06' }
    ])
    .execute()
}
