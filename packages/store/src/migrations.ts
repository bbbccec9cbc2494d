import {
  Migrator,
  sql,
  type ColumnDefinitionBuilder,
  type Kysely,
  type Migration,
  type MigrationResult
} from 'kysely'
import { detectDialect, silentLogger, type StoreLogger } from '@storelens/core'

export const MIGRATION_TABLE = 'storelens_migration'
export const MIGRATION_LOCK_TABLE = 'storelens_migration_lock'

export interface NamedMigration extends Migration {
  name: string
}

/**
 * Auto-incrementing integer primary key in the running dialect.
 */
function primaryId(db: Kysely<unknown>) {
  const postgres = detectDialect(db) === 'postgres'
  return [
    postgres ? 'serial' : 'integer',
    (col: ColumnDefinitionBuilder) => (postgres ? col.primaryKey() : col.primaryKey().autoIncrement())
  ] as const
}

export const migrations: NamedMigration[] = [
  {
    name: '001_create_customers',
    async up(db: Kysely<unknown>) {
      await db.schema
        .createTable('customers')
        .addColumn('id', ...primaryId(db))
        .addColumn('name', 'varchar(200)', col => col.notNull())
        .addColumn('contact', 'varchar(255)')
        .addColumn('join_date', 'date', col => col.notNull())
        .execute()

      await db.schema.createIndex('customers_join_date_idx').on('customers').column('join_date').execute()
    },
    async down(db: Kysely<unknown>) {
      await db.schema.dropTable('customers').execute()
    }
  },
  {
    name: '002_create_products',
    async up(db: Kysely<unknown>) {
      await db.schema
        .createTable('products')
        .addColumn('id', ...primaryId(db))
        .addColumn('name', 'varchar(200)', col => col.notNull())
        .addColumn('category', 'varchar(100)', col => col.notNull())
        .addColumn('price', 'decimal(10, 2)', col => col.notNull())
        .addColumn('stock_quantity', 'integer', col => col.notNull().defaultTo(0))
        .addCheckConstraint('products_price_check', sql`price >= 0`)
        .addCheckConstraint('products_stock_quantity_check', sql`stock_quantity >= 0`)
        .execute()

      await db.schema.createIndex('products_category_idx').on('products').column('category').execute()
    },
    async down(db: Kysely<unknown>) {
      await db.schema.dropTable('products').execute()
    }
  },
  {
    name: '003_create_orders',
    async up(db: Kysely<unknown>) {
      await db.schema
        .createTable('orders')
        .addColumn('id', ...primaryId(db))
        .addColumn('order_date', 'date', col => col.notNull())
        .addColumn('customer_id', 'integer', col =>
          col.notNull().references('customers.id').onDelete('restrict')
        )
        .addColumn('total_amount', 'decimal(10, 2)', col => col.notNull())
        .addCheckConstraint('orders_total_amount_check', sql`total_amount >= 0`)
        .execute()

      await db.schema.createIndex('orders_customer_id_idx').on('orders').column('customer_id').execute()
    },
    async down(db: Kysely<unknown>) {
      await db.schema.dropTable('orders').execute()
    }
  },
  {
    name: '004_create_order_items',
    async up(db: Kysely<unknown>) {
      await db.schema
        .createTable('order_items')
        .addColumn('id', ...primaryId(db))
        .addColumn('order_id', 'integer', col =>
          col.notNull().references('orders.id').onDelete('cascade')
        )
        .addColumn('product_id', 'integer', col =>
          col.notNull().references('products.id').onDelete('restrict')
        )
        .addColumn('quantity', 'integer', col => col.notNull())
        .addColumn('item_price', 'decimal(10, 2)', col => col.notNull())
        .addCheckConstraint('order_items_quantity_check', sql`quantity > 0`)
        .addCheckConstraint('order_items_item_price_check', sql`item_price >= 0`)
        .execute()

      await db.schema
        .createIndex('order_items_order_id_idx')
        .on('order_items')
        .column('order_id')
        .execute()
      await db.schema
        .createIndex('order_items_product_id_idx')
        .on('order_items')
        .column('product_id')
        .execute()
    },
    async down(db: Kysely<unknown>) {
      await db.schema.dropTable('order_items').execute()
    }
  },
  {
    name: '005_create_employees',
    async up(db: Kysely<unknown>) {
      await db.schema
        .createTable('employees')
        .addColumn('id', ...primaryId(db))
        .addColumn('name', 'varchar(200)', col => col.notNull())
        .addColumn('contact', 'varchar(255)')
        .addColumn('hire_date', 'date', col => col.notNull())
        .addColumn('department', 'varchar(100)', col => col.notNull())
        .addColumn('salary', 'decimal(12, 2)', col => col.notNull())
        .addCheckConstraint('employees_salary_check', sql`salary >= 0`)
        .execute()

      await db.schema
        .createIndex('employees_department_idx')
        .on('employees')
        .column('department')
        .execute()
    },
    async down(db: Kysely<unknown>) {
      await db.schema.dropTable('employees').execute()
    }
  }
]

export interface MigrateOptions {
  logger?: StoreLogger
}

function createMigrator<DB>(db: Kysely<DB>): Migrator {
  return new Migrator({
    db,
    provider: {
      getMigrations: () =>
        Promise.resolve(Object.fromEntries(migrations.map(migration => [migration.name, migration])))
    },
    migrationTableName: MIGRATION_TABLE,
    migrationLockTableName: MIGRATION_LOCK_TABLE
  })
}

function report(results: MigrationResult[] | undefined, logger: StoreLogger): MigrationResult[] {
  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.info(`${result.direction === 'Up' ? '↑' : '↓'} ${result.migrationName}`)
    } else if (result.status === 'Error') {
      logger.error(`✗ ${result.migrationName} failed`)
    }
  }
  return results ?? []
}

/**
 * Apply every pending migration.
 *
 * @returns One result per migration that was attempted
 * @throws The first migration error; earlier migrations stay applied
 */
export async function migrateToLatest<DB>(
  db: Kysely<DB>,
  options: MigrateOptions = {}
): Promise<MigrationResult[]> {
  const logger = options.logger ?? silentLogger
  const { error, results } = await createMigrator(db).migrateToLatest()
  const applied = report(results, logger)
  if (error) {
    throw error
  }
  return applied
}

/**
 * Revert the most recently applied migration.
 */
export async function migrateDown<DB>(
  db: Kysely<DB>,
  options: MigrateOptions = {}
): Promise<MigrationResult[]> {
  const logger = options.logger ?? silentLogger
  const { error, results } = await createMigrator(db).migrateDown()
  const reverted = report(results, logger)
  if (error) {
    throw error
  }
  return reverted
}
