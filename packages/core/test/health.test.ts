/**
 * Tests for the database health check.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Kysely, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'
import { checkDatabaseHealth } from '../src/health.js'

describe('checkDatabaseHealth', () => {
  let db: Kysely<Record<string, never>>

  beforeEach(() => {
    db = new Kysely({ dialect: new SqliteDialect({ database: new Database(':memory:') }) })
  })

  afterEach(async () => {
    await db.destroy()
  })

  it('should report a working database as connected', async () => {
    const health = await checkDatabaseHealth(db)

    expect(health.checks.database.connected).toBe(true)
    expect(health.checks.database.latency).toBeGreaterThanOrEqual(0)
    expect(health.checks.database.error).toBeUndefined()
    expect(health.timestamp).toBeInstanceOf(Date)
  })

  it('should classify by latency thresholds', async () => {
    const health = await checkDatabaseHealth(db, { degradedMs: 0, unhealthyMs: 60_000 })

    expect(health.status).toBe('degraded')
  })

  it('should report unhealthy instead of throwing when the database is closed', async () => {
    const closed = new Kysely<Record<string, never>>({
      dialect: new SqliteDialect({ database: new Database(':memory:') })
    })
    await closed.destroy()

    const health = await checkDatabaseHealth(closed)

    expect(health.status).toBe('unhealthy')
    expect(health.checks.database.connected).toBe(false)
    expect(health.checks.database.latency).toBe(-1)
    expect(health.checks.database.error).toBeTypeOf('string')
  })

  it('should include pool counters when a pool is given', async () => {
    const pool = { totalCount: 10, idleCount: 7, waitingCount: 1 }

    const health = await checkDatabaseHealth(db, { pool })

    expect(health.checks.pool).toEqual({ size: 10, active: 3, idle: 7, waiting: 1 })
  })
})
