import type { ColumnType, Generated } from 'kysely'

/**
 * Database schema for the store.
 *
 * Dates are written as `YYYY-MM-DD` strings; `pg` reads `date` back as a
 * local-midnight `Date`. Money columns are `decimal`, which `pg` hands back
 * as strings and SQLite as numbers. The row mappers in `models.ts` coerce
 * both.
 */

export type Money = ColumnType<number | string, number, number>

export type DateColumn = ColumnType<string | Date, string, string>

export interface CustomersTable {
  id: Generated<number>
  name: string
  contact: string | null
  join_date: DateColumn
}

export interface ProductsTable {
  id: Generated<number>
  name: string
  category: string
  price: Money
  stock_quantity: Generated<number>
}

export interface OrdersTable {
  id: Generated<number>
  order_date: DateColumn
  customer_id: number
  total_amount: Money
}

// Items are written once with their order and never updated
export interface OrderItemsTable {
  id: Generated<number>
  order_id: ColumnType<number, number, never>
  product_id: ColumnType<number, number, never>
  quantity: ColumnType<number, number, never>
  item_price: ColumnType<number | string, number, never>
}

export interface EmployeesTable {
  id: Generated<number>
  name: string
  contact: string | null
  hire_date: DateColumn
  department: string
  salary: Money
}

export interface StoreDatabase {
  customers: CustomersTable
  products: ProductsTable
  orders: OrdersTable
  order_items: OrderItemsTable
  employees: EmployeesTable
}

export type TableName = keyof StoreDatabase
