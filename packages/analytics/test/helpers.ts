import {
  createCustomerRepository,
  createEmployeeRepository,
  createOrderRepository,
  createProductRepository,
  createStoreDatabase,
  migrateToLatest,
  type StoreConnection
} from '@storelens/store'

export async function createTestStore(): Promise<StoreConnection> {
  const connection = createStoreDatabase({ dialect: 'sqlite', url: ':memory:' })
  await migrateToLatest(connection.db)
  return connection
}

/**
 * Four products whose order revenue is A:100, B:80, C:80, D:10, bought by
 * two of three customers, plus three employees in two departments.
 */
export async function seedStore(connection: StoreConnection): Promise<void> {
  const customers = createCustomerRepository(connection.db)
  const products = createProductRepository(connection.db)
  const orders = createOrderRepository(connection.db)
  const employees = createEmployeeRepository(connection.db)

  await customers.create({ name: 'Ada', join_date: '2022-12-31' })
  await customers.create({ name: 'Ben', join_date: '2023-01-01' })
  await customers.create({ name: 'Cy', join_date: '2023-12-31' })

  await products.create({ name: 'A', category: 'Tools', price: 50, stock_quantity: 10 })
  await products.create({ name: 'B', category: 'Tools', price: 40, stock_quantity: 10 })
  await products.create({ name: 'C', category: 'Garden', price: 80, stock_quantity: 10 })
  await products.create({ name: 'D', category: 'Garden', price: 10, stock_quantity: 10 })

  await orders.placeOrder({
    customer_id: 1,
    order_date: '2024-02-01',
    items: [
      { product_id: 1, quantity: 2 },
      { product_id: 4, quantity: 1 }
    ]
  })
  await orders.placeOrder({
    customer_id: 2,
    order_date: '2024-02-02',
    items: [
      { product_id: 3, quantity: 1 },
      { product_id: 2, quantity: 2 }
    ]
  })

  await employees.create({
    name: 'Sam',
    hire_date: '2020-01-01',
    department: 'Sales',
    salary: 50000
  })
  await employees.create({
    name: 'Sid',
    hire_date: '2021-01-01',
    department: 'Sales',
    salary: 60000
  })
  await employees.create({
    name: 'Ivy',
    hire_date: '2019-01-01',
    department: 'IT',
    salary: 70000
  })
}
