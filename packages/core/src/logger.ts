/**
 * Logging interface shared by the storelens packages.
 *
 * Levels from least to most severe: `trace`, `debug`, `info`, `warn`,
 * `error`, `fatal`. Any logging library can sit behind it.
 *
 * @example
 * ```typescript
 * import type { StoreLogger } from '@storelens/core'
 * import pino from 'pino'
 *
 * const base = pino()
 * const logger: StoreLogger = {
 *   trace: (msg, ...args) => base.trace({ args }, msg),
 *   debug: (msg, ...args) => base.debug({ args }, msg),
 *   info: (msg, ...args) => base.info({ args }, msg),
 *   warn: (msg, ...args) => base.warn({ args }, msg),
 *   error: (msg, ...args) => base.error({ args }, msg),
 *   fatal: (msg, ...args) => base.fatal({ args }, msg)
 * }
 *
 * const executor = createQueryExecutor(db, { logger })
 * ```
 */
export interface StoreLogger {
  trace(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  fatal(message: string, ...args: unknown[]): void
}

/**
 * Console-backed logger. Messages are prefixed with `[storelens:level]`.
 */
export const consoleLogger: StoreLogger = {
  trace: (msg, ...args) => console.debug(`[storelens:trace] ${msg}`, ...args),
  debug: (msg, ...args) => console.debug(`[storelens:debug] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[storelens:info] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[storelens:warn] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[storelens:error] ${msg}`, ...args),
  fatal: (msg, ...args) => console.error(`[storelens:fatal] FATAL: ${msg}`, ...args)
}

const noop = (): void => {
  /* intentionally empty */
}

/**
 * Logger that discards everything. Default wherever a logger is optional.
 */
export const silentLogger: StoreLogger = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop
}
