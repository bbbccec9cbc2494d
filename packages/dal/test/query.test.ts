/**
 * Tests for query function creation and composition.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Kysely, SqliteDialect, type Generated } from 'kysely'
import Database from 'better-sqlite3'
import { createQuery, createTransactionalQuery } from '../src/query.js'
import { mapResult } from '../src/compose.js'
import { createContext, withTransaction } from '../src/context.js'
import { TransactionRequiredError } from '../src/errors.js'
import type { DbContext } from '../src/types.js'

interface TestDB {
  items: {
    id: Generated<number>
    label: string
    amount: number
  }
}

const itemsByMinAmount = createQuery((ctx: DbContext<TestDB>, min: number) =>
  ctx.db.selectFrom('items').selectAll().where('amount', '>=', min).orderBy('id').execute()
)

describe('query functions', () => {
  let db: Kysely<TestDB>

  beforeEach(async () => {
    db = new Kysely<TestDB>({ dialect: new SqliteDialect({ database: new Database(':memory:') }) })
    await db.schema
      .createTable('items')
      .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
      .addColumn('label', 'text', col => col.notNull())
      .addColumn('amount', 'integer', col => col.notNull())
      .execute()
    await db
      .insertInto('items')
      .values([
        { label: 'a', amount: 5 },
        { label: 'b', amount: 15 },
        { label: 'c', amount: 25 }
      ])
      .execute()
  })

  afterEach(async () => {
    await db.destroy()
  })

  describe('createQuery', () => {
    it('should accept a bare Kysely instance', async () => {
      const rows = await itemsByMinAmount(db, 10)

      expect(rows.map(row => row.label)).toEqual(['b', 'c'])
    })

    it('should pass an existing context through unchanged', async () => {
      const queryFn = vi.fn((ctx: DbContext<TestDB>, _min: number) => Promise.resolve(ctx))
      const query = createQuery(queryFn)
      const ctx = createContext(db)

      const received = await query(ctx, 1)

      expect(received).toBe(ctx)
      expect(queryFn).toHaveBeenCalledWith(ctx, 1)
    })
  })

  describe('createTransactionalQuery', () => {
    const renameAll = createTransactionalQuery(async (ctx: DbContext<TestDB>, label: string) => {
      const result = await ctx.db.updateTable('items').set({ label }).executeTakeFirst()
      return Number(result.numUpdatedRows)
    })

    it('should refuse to run outside a transaction', async () => {
      await expect(renameAll(db, 'x')).rejects.toBeInstanceOf(TransactionRequiredError)
    })

    it('should run inside withTransaction', async () => {
      const updated = await withTransaction(db, ctx => renameAll(ctx, 'x'))

      expect(updated).toBe(3)
    })
  })

  describe('mapResult', () => {
    it('should map each row', async () => {
      const amounts = mapResult(itemsByMinAmount, (row, index) => `${index}:${row.amount}`)

      expect(await amounts(db, 0)).toEqual(['0:5', '1:15', '2:25'])
    })
  })
})
