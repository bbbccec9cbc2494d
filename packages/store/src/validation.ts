import { z } from 'zod'
import { roundMoney } from './models.js'

/**
 * Input validation for every write path.
 */

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Today's date in UTC as `YYYY-MM-DD`.
 */
export function today(): string {
  return new Date().toISOString().slice(0, 10)
}

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_REGEX.exec(value)
  if (!match) {
    return false
  }
  const [, year, month, day] = match.map(Number)
  if (year === undefined || month === undefined || day === undefined) {
    return false
  }
  const date = new Date(Date.UTC(year, month - 1, day))
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  )
}

export const isoDate = z
  .string()
  .regex(ISO_DATE_REGEX, 'Expected a YYYY-MM-DD date')
  .refine(isCalendarDate, 'Not a calendar date')

const pastOrToday = isoDate.refine(value => value <= today(), 'Date cannot be in the future')

const name = z.string().trim().min(1).max(200)
const contact = z.string().trim().max(255).nullable().default(null)
const label = z.string().trim().min(1).max(100)
const money = z.number().finite().nonnegative().transform(roundMoney)
const id = z.number().int().positive()

export const CreateCustomerSchema = z.object({
  id: id.optional(),
  name,
  contact,
  join_date: pastOrToday.default(today)
})

export const CreateProductSchema = z.object({
  id: id.optional(),
  name,
  category: label,
  price: money,
  stock_quantity: z.number().int().nonnegative().default(0)
})

export const CreateEmployeeSchema = z.object({
  id: id.optional(),
  name,
  contact,
  hire_date: isoDate.default(today),
  department: label,
  salary: money
})

export const OrderLineSchema = z.object({
  product_id: id,
  quantity: z.number().int().positive(),
  /** Defaults to the product's current price */
  item_price: money.optional()
})

export const PlaceOrderSchema = z.object({
  customer_id: id,
  order_date: isoDate.default(today),
  items: z.array(OrderLineSchema).min(1, 'An order needs at least one item')
})

export const StockChangeSchema = z.number().int().positive()
export const PriceSchema = money
export const SalarySchema = money
export const DepartmentSchema = label

export type CreateCustomerInput = z.input<typeof CreateCustomerSchema>
export type CreateProductInput = z.input<typeof CreateProductSchema>
export type CreateEmployeeInput = z.input<typeof CreateEmployeeSchema>
export type OrderLineInput = z.input<typeof OrderLineSchema>
export type PlaceOrderInput = z.input<typeof PlaceOrderSchema>
export type ValidatedOrder = z.output<typeof PlaceOrderSchema>
