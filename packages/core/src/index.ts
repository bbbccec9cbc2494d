/**
 * @storelens/core - shared utilities
 *
 * - Error handling (DatabaseError hierarchy, error codes, driver error parsing)
 * - Logger interface
 * - Dialect detection
 * - Health check
 * - Types (Executor, Dialect)
 *
 * @module @storelens/core
 */

// Error handling
export * from './errors.js'
export * from './error-codes.js'

// Dialect detection
export * from './dialect-detection.js'

// Health
export * from './health.js'

// Types
export * from './types.js'

// Logger
export * from './logger.js'
