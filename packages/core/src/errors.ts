/**
 * Database error hierarchy with multi-database support
 *
 * Every error carries a stable code from {@link ErrorCodes} so callers can
 * branch on the failure class without inspecting driver messages.
 */

import { ErrorCodes } from './error-codes.js'
import type { Dialect } from './types.js'

// Pre-compiled regex patterns for database error parsing
const PG_KEY_REGEX = /Key \(([^)]+)\)=/
const PG_TABLE_REGEX = /table "(.+?)"/
const SQLITE_UNIQUE_REGEX = /UNIQUE constraint failed: (\w+)\.(\w+)/
const SQLITE_NOT_NULL_REGEX = /NOT NULL constraint failed: (\w+)\.(\w+)/
const SQLITE_CHECK_REGEX = /CHECK constraint failed: (\w+)/

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly detail?: string,
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'DatabaseError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      detail: this.detail
    }
  }
}

export class UniqueConstraintError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table: string,
    public readonly columns: string[]
  ) {
    super(`UNIQUE constraint violation on ${table}`, ErrorCodes.VALIDATION_UNIQUE_VIOLATION)
    this.name = 'UniqueConstraintError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table,
      columns: this.columns
    }
  }
}

/**
 * A row references a parent that does not exist, or a referenced parent
 * is being deleted while children still point at it.
 */
export class ForeignKeyError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table: string,
    public readonly referencedTable: string,
    detail?: string
  ) {
    super(`FOREIGN KEY constraint violation`, ErrorCodes.VALIDATION_FOREIGN_KEY_VIOLATION, detail)
    this.name = 'ForeignKeyError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table,
      referencedTable: this.referencedTable
    }
  }
}

export class NotFoundError extends DatabaseError {
  constructor(entity: string, filters?: Record<string, unknown>) {
    const message = `${entity} not found`
    const detail = filters ? JSON.stringify(filters) : undefined
    super(message, ErrorCodes.RESOURCE_NOT_FOUND, detail)
    this.name = 'NotFoundError'
  }
}

export class NotNullError extends DatabaseError {
  constructor(
    public readonly column: string,
    public readonly table?: string
  ) {
    const tableInfo = table ? ` on table ${table}` : ''
    super(
      `NOT NULL constraint violation on column ${column}${tableInfo}`,
      ErrorCodes.VALIDATION_NOT_NULL_VIOLATION,
      column
    )
    this.name = 'NotNullError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      column: this.column,
      table: this.table
    }
  }
}

export class CheckConstraintError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table?: string
  ) {
    const tableInfo = table ? ` on table ${table}` : ''
    super(
      `CHECK constraint violation: ${constraint}${tableInfo}`,
      ErrorCodes.VALIDATION_CHECK_VIOLATION
    )
    this.name = 'CheckConstraintError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table
    }
  }
}

/**
 * The data source could not be reached. The driver error is kept as `cause`.
 */
export class ConnectionError extends DatabaseError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.DB_CONNECTION_FAILED, undefined, options)
    this.name = 'ConnectionError'
  }
}

export class QueryTimeoutError extends DatabaseError {
  constructor(
    public readonly queryName: string,
    public readonly timeoutMs: number
  ) {
    super(`Query "${queryName}" timed out after ${timeoutMs}ms`, ErrorCodes.DB_TIMEOUT)
    this.name = 'QueryTimeoutError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      queryName: this.queryName,
      timeoutMs: this.timeoutMs
    }
  }
}

/**
 * Driver error codes that mean the server is unreachable or the
 * connection was lost mid-flight.
 */
const CONNECTION_ERROR_CODES = new Set([
  // Network
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EPIPE',

  // PostgreSQL class 08 + shutdown
  '08000',
  '08001',
  '08003',
  '08004',
  '08006',
  '57P01',
  '57P02',
  '57P03',

  // SQLite
  'SQLITE_CANTOPEN',
  'SQLITE_BUSY'
])

const CONNECTION_MESSAGE_PATTERNS = [
  'connection terminated',
  'timeout exceeded when trying to connect',
  'the database connection is not open',
  'cannot use a pool after calling end'
]

/**
 * Database error with code property (internal type for parsing).
 * @internal
 */
interface RawDatabaseError {
  code?: string
  message?: string
  detail?: string
  constraint?: string
  table?: string
  column?: string
  columns?: string[]
}

function isRawDatabaseError(error: unknown): error is RawDatabaseError {
  return typeof error === 'object' && error !== null && !Array.isArray(error)
}

/**
 * Check whether an error means the data source is unreachable.
 *
 * Matches driver codes first, then a short list of messages emitted by
 * `pg` and `better-sqlite3` that carry no code.
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof ConnectionError) {
    return true
  }
  if (!isRawDatabaseError(error)) {
    return false
  }
  if (typeof error.code === 'string' && CONNECTION_ERROR_CODES.has(error.code)) {
    return true
  }
  const message = typeof error.message === 'string' ? error.message.toLowerCase() : ''
  return CONNECTION_MESSAGE_PATTERNS.some(pattern => message.includes(pattern))
}

/**
 * Parse PostgreSQL-specific database errors.
 * @internal
 */
function parsePostgresError(dbError: RawDatabaseError): DatabaseError {
  switch (dbError.code) {
    case '23505': {
      const detailMatch = dbError.detail ? PG_KEY_REGEX.exec(dbError.detail) : null
      const matchedColumn = detailMatch?.[1]
      const columns = matchedColumn
        ? matchedColumn.split(',').map(col => col.trim())
        : (dbError.columns ?? [])
      return new UniqueConstraintError(
        dbError.constraint ?? 'unique',
        dbError.table ?? 'unknown',
        columns
      )
    }
    case '23503': {
      const tableMatch = dbError.detail ? PG_TABLE_REGEX.exec(dbError.detail) : null
      return new ForeignKeyError(
        dbError.constraint ?? 'foreign_key',
        dbError.table ?? 'unknown',
        tableMatch?.[1] ?? 'unknown',
        dbError.detail
      )
    }
    case '23502':
      return new NotNullError(dbError.column ?? 'unknown', dbError.table)
    case '23514':
      return new CheckConstraintError(dbError.constraint ?? 'unknown', dbError.table)
    default:
      return new DatabaseError(
        dbError.message ?? 'Database error',
        dbError.code ?? ErrorCodes.DB_UNKNOWN
      )
  }
}

/**
 * Parse SQLite-specific database errors.
 * @internal
 */
function parseSQLiteError(message: string): DatabaseError {
  if (message.includes('UNIQUE constraint failed')) {
    const match = SQLITE_UNIQUE_REGEX.exec(message)
    return new UniqueConstraintError(
      'unique',
      match?.[1] ?? 'unknown',
      match?.[2] ? [match[2]] : []
    )
  }
  if (message.includes('FOREIGN KEY constraint failed')) {
    return new ForeignKeyError('foreign_key', 'unknown', 'unknown')
  }
  if (message.includes('NOT NULL constraint failed')) {
    const match = SQLITE_NOT_NULL_REGEX.exec(message)
    return new NotNullError(match?.[2] ?? 'unknown', match?.[1])
  }
  if (message.includes('CHECK constraint failed')) {
    const match = SQLITE_CHECK_REGEX.exec(message)
    return new CheckConstraintError(match?.[1] ?? 'unknown')
  }
  return new DatabaseError(message, ErrorCodes.DB_UNKNOWN)
}

/**
 * Driver error parser for PostgreSQL and SQLite.
 *
 * Errors that are already a {@link DatabaseError} are returned as-is.
 */
export function parseDatabaseError(error: unknown, dialect: Dialect = 'postgres'): DatabaseError {
  if (error instanceof DatabaseError) {
    return error
  }
  if (!isRawDatabaseError(error)) {
    return new DatabaseError('Unknown database error', ErrorCodes.DB_UNKNOWN)
  }

  if (dialect === 'postgres' && error.code) {
    return parsePostgresError(error)
  }

  if (dialect === 'sqlite') {
    return parseSQLiteError(typeof error.message === 'string' ? error.message : '')
  }

  return new DatabaseError('Unknown database error', ErrorCodes.DB_UNKNOWN)
}
