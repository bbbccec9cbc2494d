/**
 * @storelens/store - schema, migrations, connection and repositories
 *
 * @module @storelens/store
 */

// Schema and row types
export type {
  Money,
  DateColumn,
  CustomersTable,
  ProductsTable,
  OrdersTable,
  OrderItemsTable,
  EmployeesTable,
  StoreDatabase,
  TableName
} from './schema.js'
export * from './models.js'
export * from './validation.js'

// Migrations
export * from './migrations.js'

// Connection
export * from './connection.js'

// Errors
export { InsufficientStockError } from './errors.js'

// Repositories
export * from './repositories/customer.repository.js'
export * from './repositories/product.repository.js'
export * from './repositories/employee.repository.js'
export * from './repositories/order.repository.js'
