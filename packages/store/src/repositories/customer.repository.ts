import { detectDialect, NotFoundError, type Executor } from '@storelens/core'
import type { StoreDatabase } from '../schema.js'
import { mapCustomerRow, type Customer } from '../models.js'
import { CreateCustomerSchema } from '../validation.js'
import { translateErrors } from '../errors.js'

export function createCustomerRepository(executor: Executor<StoreDatabase>) {
  const dialect = detectDialect(executor)

  return {
    async findById(id: number): Promise<Customer | null> {
      const row = await executor
        .selectFrom('customers')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst()

      return row ? mapCustomerRow(row) : null
    },

    async findAll(): Promise<Customer[]> {
      const rows = await executor.selectFrom('customers').selectAll().orderBy('id').execute()
      return rows.map(mapCustomerRow)
    },

    async create(input: unknown): Promise<Customer> {
      const validated = CreateCustomerSchema.parse(input)

      const row = await translateErrors(dialect, () =>
        executor.insertInto('customers').values(validated).returningAll().executeTakeFirstOrThrow()
      )
      return mapCustomerRow(row)
    },

    /**
     * Delete a customer. Fails with a `ForeignKeyError` while orders still
     * reference them.
     */
    async delete(id: number): Promise<void> {
      const result = await translateErrors(dialect, () =>
        executor.deleteFrom('customers').where('id', '=', id).executeTakeFirst()
      )
      if (result.numDeletedRows === 0n) {
        throw new NotFoundError('Customer', { id })
      }
    }
  }
}

export type CustomerRepository = ReturnType<typeof createCustomerRepository>
