/**
 * Tests for dialect detection from compiled SQL.
 */

import { describe, it, expect } from 'vitest'
import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  SqliteDialect
} from 'kysely'
import Database from 'better-sqlite3'
import { detectDialect } from '../src/dialect-detection.js'

// Compile-only instances; DummyDriver never opens a connection
function postgresDb(): Kysely<Record<string, never>> {
  return new Kysely({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: db => new PostgresIntrospector(db),
      createQueryCompiler: () => new PostgresQueryCompiler()
    }
  })
}

describe('detectDialect', () => {
  it('should detect postgres from $n placeholders', () => {
    expect(detectDialect(postgresDb())).toBe('postgres')
  })

  it('should detect sqlite on a real better-sqlite3 connection', async () => {
    const db = new Kysely<Record<string, never>>({
      dialect: new SqliteDialect({ database: new Database(':memory:') })
    })

    expect(detectDialect(db)).toBe('sqlite')
    await db.destroy()
  })

  it('should detect the dialect inside a transaction', async () => {
    const db = new Kysely<Record<string, never>>({
      dialect: new SqliteDialect({ database: new Database(':memory:') })
    })

    const detected = await db.transaction().execute(async trx => detectDialect(trx))

    expect(detected).toBe('sqlite')
    await db.destroy()
  })
})
