import type { Executor } from './types.js'

export interface HealthCheckResult {
  status: 'healthy' | 'degraded' | 'unhealthy'
  checks: {
    database: {
      connected: boolean
      latency: number
      error?: string
    }
    pool?: {
      size: number
      active: number
      idle: number
      waiting: number
    }
  }
  timestamp: Date
}

/**
 * Counters exposed by a connection pool. `pg.Pool` satisfies this as-is.
 */
export interface PoolCounters {
  readonly totalCount: number
  readonly idleCount: number
  readonly waitingCount: number
}

export interface HealthCheckOptions {
  pool?: PoolCounters
  /** Latency at or above which the database counts as degraded (ms) */
  degradedMs?: number
  /** Latency at or above which the database counts as unhealthy (ms) */
  unhealthyMs?: number
}

function poolStats(pool: PoolCounters): NonNullable<HealthCheckResult['checks']['pool']> {
  return {
    size: pool.totalCount,
    active: pool.totalCount - pool.idleCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount
  }
}

/**
 * Check database health with a `select 1` round trip.
 *
 * Never throws: an unreachable database yields `status: 'unhealthy'` with
 * the driver message in `checks.database.error`.
 */
export async function checkDatabaseHealth<DB>(
  db: Executor<DB>,
  options: HealthCheckOptions = {}
): Promise<HealthCheckResult> {
  const { pool, degradedMs = 100, unhealthyMs = 500 } = options
  const start = Date.now()

  let result: HealthCheckResult
  try {
    await db.selectNoFrom(eb => eb.val(1).as('ping')).execute()

    const latency = Date.now() - start
    result = {
      status: latency < degradedMs ? 'healthy' : latency < unhealthyMs ? 'degraded' : 'unhealthy',
      checks: { database: { connected: true, latency } },
      timestamp: new Date()
    }
  } catch (error) {
    result = {
      status: 'unhealthy',
      checks: {
        database: {
          connected: false,
          latency: -1,
          error: error instanceof Error ? error.message : String(error)
        }
      },
      timestamp: new Date()
    }
  }

  if (pool) {
    result.checks.pool = poolStats(pool)
  }
  return result
}
