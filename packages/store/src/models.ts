import { z } from 'zod'

/**
 * Domain row types and the schemas that map driver rows onto them.
 *
 * Drivers disagree on representation: `pg` returns `numeric` and `bigint`
 * aggregates as strings and may return `date` as a `Date`, SQLite returns
 * plain numbers and text. Every row leaving the store goes through one of
 * these schemas.
 */

/**
 * Round a monetary amount to cents.
 */
export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Format a `Date` as `YYYY-MM-DD` using its local calendar fields, which is
 * how `pg` builds dates when no type parser is installed.
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

export const moneyValue = z.coerce.number().finite().transform(roundMoney)

export const countValue = z.coerce.number().int().nonnegative()

export const dateValue = z
  .union([z.string(), z.date()])
  .transform(value => (typeof value === 'string' ? value.slice(0, 10) : formatDate(value)))

const idValue = z.coerce.number().int().positive()

export const CustomerSchema = z.object({
  id: idValue,
  name: z.string(),
  contact: z.string().nullable(),
  join_date: dateValue
})

export const ProductSchema = z.object({
  id: idValue,
  name: z.string(),
  category: z.string(),
  price: moneyValue,
  stock_quantity: countValue
})

export const OrderSchema = z.object({
  id: idValue,
  order_date: dateValue,
  customer_id: idValue,
  total_amount: moneyValue
})

export const OrderItemSchema = z.object({
  id: idValue,
  order_id: idValue,
  product_id: idValue,
  quantity: z.coerce.number().int().positive(),
  item_price: moneyValue
})

export const EmployeeSchema = z.object({
  id: idValue,
  name: z.string(),
  contact: z.string().nullable(),
  hire_date: dateValue,
  department: z.string(),
  salary: moneyValue
})

export type Customer = z.infer<typeof CustomerSchema>
export type Product = z.infer<typeof ProductSchema>
export type Order = z.infer<typeof OrderSchema>
export type OrderItem = z.infer<typeof OrderItemSchema>
export type Employee = z.infer<typeof EmployeeSchema>

export interface OrderWithItems extends Order {
  items: OrderItem[]
}

export const mapCustomerRow = (row: unknown): Customer => CustomerSchema.parse(row)
export const mapProductRow = (row: unknown): Product => ProductSchema.parse(row)
export const mapOrderRow = (row: unknown): Order => OrderSchema.parse(row)
export const mapOrderItemRow = (row: unknown): OrderItem => OrderItemSchema.parse(row)
export const mapEmployeeRow = (row: unknown): Employee => EmployeeSchema.parse(row)
