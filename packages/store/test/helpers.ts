import { createStoreDatabase, type StoreConnection } from '../src/connection.js'
import { migrateToLatest } from '../src/migrations.js'

/**
 * Fresh in-memory store with every migration applied.
 */
export async function createTestStore(): Promise<StoreConnection> {
  const connection = createStoreDatabase({ dialect: 'sqlite', url: ':memory:' })
  await migrateToLatest(connection.db)
  return connection
}
