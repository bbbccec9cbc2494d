/**
 * Stable error codes shared by every storelens package.
 *
 * Codes follow the `CATEGORY_DETAIL` pattern so they can be matched
 * by prefix (`DB_`, `VALIDATION_`, `RESOURCE_`, `QUERY_`).
 */
export const ErrorCodes = {
  // Database / connectivity
  DB_UNKNOWN: 'DB_UNKNOWN',
  DB_CONNECTION_FAILED: 'DB_CONNECTION_FAILED',
  DB_TIMEOUT: 'DB_TIMEOUT',

  // Constraint violations
  VALIDATION_UNIQUE_VIOLATION: 'VALIDATION_UNIQUE_VIOLATION',
  VALIDATION_FOREIGN_KEY_VIOLATION: 'VALIDATION_FOREIGN_KEY_VIOLATION',
  VALIDATION_NOT_NULL_VIOLATION: 'VALIDATION_NOT_NULL_VIOLATION',
  VALIDATION_CHECK_VIOLATION: 'VALIDATION_CHECK_VIOLATION',

  // Resources
  RESOURCE_NOT_FOUND: 'RESOURCE_NOT_FOUND',
  RESOURCE_INSUFFICIENT_STOCK: 'RESOURCE_INSUFFICIENT_STOCK',

  // Query catalog
  QUERY_UNKNOWN: 'QUERY_UNKNOWN',
  QUERY_INVALID_PARAMS: 'QUERY_INVALID_PARAMS'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]
