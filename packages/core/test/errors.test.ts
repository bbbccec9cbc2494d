/**
 * Tests for the database error hierarchy and driver error parsing.
 */

import { describe, it, expect } from 'vitest'
import {
  parseDatabaseError,
  isConnectionError,
  DatabaseError,
  UniqueConstraintError,
  ForeignKeyError,
  NotNullError,
  CheckConstraintError,
  ConnectionError,
  QueryTimeoutError,
  NotFoundError
} from '../src/errors.js'
import { ErrorCodes } from '../src/error-codes.js'

describe('parseDatabaseError', () => {
  describe('sqlite', () => {
    it('should map UNIQUE violations with table and column', () => {
      const parsed = parseDatabaseError(
        new Error('UNIQUE constraint failed: customers.id'),
        'sqlite'
      )

      expect(parsed).toBeInstanceOf(UniqueConstraintError)
      expect(parsed.code).toBe(ErrorCodes.VALIDATION_UNIQUE_VIOLATION)
      expect(parsed.toJSON()).toMatchObject({ table: 'customers', columns: ['id'] })
    })

    it('should map FOREIGN KEY violations', () => {
      const parsed = parseDatabaseError({ message: 'FOREIGN KEY constraint failed' }, 'sqlite')

      expect(parsed).toBeInstanceOf(ForeignKeyError)
      expect(parsed.code).toBe(ErrorCodes.VALIDATION_FOREIGN_KEY_VIOLATION)
    })

    it('should map NOT NULL violations', () => {
      const parsed = parseDatabaseError(
        new Error('NOT NULL constraint failed: products.name'),
        'sqlite'
      )

      expect(parsed).toBeInstanceOf(NotNullError)
      expect(parsed.message).toBe('NOT NULL constraint violation on column name on table products')
    })

    it('should map CHECK violations to the constraint name', () => {
      const parsed = parseDatabaseError(
        new Error('CHECK constraint failed: products_price_check'),
        'sqlite'
      )

      expect(parsed).toBeInstanceOf(CheckConstraintError)
      expect(parsed.message).toBe('CHECK constraint violation: products_price_check')
    })

    it('should fall back to DB_UNKNOWN for other messages', () => {
      const parsed = parseDatabaseError(new Error('no such table: nope'), 'sqlite')

      expect(parsed.constructor).toBe(DatabaseError)
      expect(parsed.code).toBe(ErrorCodes.DB_UNKNOWN)
      expect(parsed.message).toBe('no such table: nope')
    })
  })

  describe('postgres', () => {
    it('should extract columns from the unique violation detail', () => {
      const parsed = parseDatabaseError({
        code: '23505',
        constraint: 'customers_pkey',
        table: 'customers',
        detail: 'Key (id)=(1) already exists.'
      })

      expect(parsed).toBeInstanceOf(UniqueConstraintError)
      expect(parsed.toJSON()).toMatchObject({
        constraint: 'customers_pkey',
        table: 'customers',
        columns: ['id']
      })
    })

    it('should extract the referenced table from the foreign key detail', () => {
      const parsed = parseDatabaseError({
        code: '23503',
        constraint: 'orders_customer_id_fkey',
        table: 'orders',
        detail: 'Key (customer_id)=(99) is not present in table "customers".'
      })

      expect(parsed).toBeInstanceOf(ForeignKeyError)
      expect(parsed.toJSON()).toMatchObject({
        table: 'orders',
        referencedTable: 'customers',
        detail: 'Key (customer_id)=(99) is not present in table "customers".'
      })
    })

    it('should map check violations', () => {
      const parsed = parseDatabaseError({
        code: '23514',
        constraint: 'order_items_quantity_check',
        table: 'order_items'
      })

      expect(parsed).toBeInstanceOf(CheckConstraintError)
      expect(parsed.message).toBe(
        'CHECK constraint violation: order_items_quantity_check on table order_items'
      )
    })

    it('should keep unknown codes', () => {
      const parsed = parseDatabaseError({ code: '42P01', message: 'relation does not exist' })

      expect(parsed.code).toBe('42P01')
      expect(parsed.message).toBe('relation does not exist')
    })
  })

  it('should return DatabaseError instances unchanged', () => {
    const original = new NotFoundError('Customer', { id: 7 })

    expect(parseDatabaseError(original, 'sqlite')).toBe(original)
  })

  it('should handle non-object input', () => {
    for (const input of [null, undefined, 'boom', 42, ['a']]) {
      const parsed = parseDatabaseError(input)
      expect(parsed.code).toBe(ErrorCodes.DB_UNKNOWN)
      expect(parsed.message).toBe('Unknown database error')
    }
  })
})

describe('isConnectionError', () => {
  it('should recognise network error codes', () => {
    expect(isConnectionError({ code: 'ECONNREFUSED' })).toBe(true)
    expect(isConnectionError({ code: 'ETIMEDOUT' })).toBe(true)
  })

  it('should recognise postgres connection exception codes', () => {
    expect(isConnectionError({ code: '08006' })).toBe(true)
    expect(isConnectionError({ code: '57P01' })).toBe(true)
  })

  it('should recognise driver messages without a code', () => {
    expect(isConnectionError(new Error('Connection terminated unexpectedly'))).toBe(true)
    expect(isConnectionError(new TypeError('The database connection is not open'))).toBe(true)
  })

  it('should recognise ConnectionError itself', () => {
    expect(isConnectionError(new ConnectionError('down'))).toBe(true)
  })

  it('should reject constraint and unrelated errors', () => {
    expect(isConnectionError({ code: '23505' })).toBe(false)
    expect(isConnectionError(new Error('syntax error'))).toBe(false)
    expect(isConnectionError(null)).toBe(false)
  })
})

describe('error classes', () => {
  it('should keep the driver error as cause on ConnectionError', () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' })
    const error = new ConnectionError('Data source unreachable', { cause })

    expect(error.cause).toBe(cause)
    expect(error.code).toBe(ErrorCodes.DB_CONNECTION_FAILED)
    expect(error.name).toBe('ConnectionError')
  })

  it('should describe the query and budget on QueryTimeoutError', () => {
    const error = new QueryTimeoutError('total-revenue', 250)

    expect(error.message).toBe('Query "total-revenue" timed out after 250ms')
    expect(error.toJSON()).toEqual({
      name: 'QueryTimeoutError',
      message: 'Query "total-revenue" timed out after 250ms',
      code: ErrorCodes.DB_TIMEOUT,
      detail: undefined,
      queryName: 'total-revenue',
      timeoutMs: 250
    })
  })

  it('should serialise NotFoundError filters into detail', () => {
    const error = new NotFoundError('Order', { id: 12 })

    expect(error.message).toBe('Order not found')
    expect(error.detail).toBe('{"id":12}')
  })
})
