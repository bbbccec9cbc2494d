import { detectDialect, NotFoundError, type Executor } from '@storelens/core'
import type { StoreDatabase } from '../schema.js'
import { mapEmployeeRow, type Employee } from '../models.js'
import { CreateEmployeeSchema, DepartmentSchema, SalarySchema } from '../validation.js'
import { translateErrors } from '../errors.js'

export function createEmployeeRepository(executor: Executor<StoreDatabase>) {
  const dialect = detectDialect(executor)

  return {
    async findById(id: number): Promise<Employee | null> {
      const row = await executor
        .selectFrom('employees')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst()

      return row ? mapEmployeeRow(row) : null
    },

    async findByDepartment(department: string): Promise<Employee[]> {
      const rows = await executor
        .selectFrom('employees')
        .selectAll()
        .where('department', '=', department)
        .orderBy('id')
        .execute()
      return rows.map(mapEmployeeRow)
    },

    async create(input: unknown): Promise<Employee> {
      const validated = CreateEmployeeSchema.parse(input)

      const row = await translateErrors(dialect, () =>
        executor.insertInto('employees').values(validated).returningAll().executeTakeFirstOrThrow()
      )
      return mapEmployeeRow(row)
    },

    /**
     * Set a new salary. Lowering it is allowed; negative amounts are not.
     */
    async giveRaise(id: number, salary: number): Promise<Employee> {
      const validated = SalarySchema.parse(salary)

      const row = await translateErrors(dialect, () =>
        executor
          .updateTable('employees')
          .set({ salary: validated })
          .where('id', '=', id)
          .returningAll()
          .executeTakeFirst()
      )
      if (!row) {
        throw new NotFoundError('Employee', { id })
      }
      return mapEmployeeRow(row)
    },

    async changeDepartment(id: number, department: string): Promise<Employee> {
      const validated = DepartmentSchema.parse(department)

      const row = await translateErrors(dialect, () =>
        executor
          .updateTable('employees')
          .set({ department: validated })
          .where('id', '=', id)
          .returningAll()
          .executeTakeFirst()
      )
      if (!row) {
        throw new NotFoundError('Employee', { id })
      }
      return mapEmployeeRow(row)
    }
  }
}

export type EmployeeRepository = ReturnType<typeof createEmployeeRepository>
