import chalk from 'chalk'
import stripAnsi from 'strip-ansi'
import { format } from 'node:util'
import { silentLogger, type StoreLogger } from '@storelens/core'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value)
}

export interface LoggerOptions {
  level?: LogLevel
  colors?: boolean
  timestamps?: boolean
  json?: boolean
}

export class Logger {
  public level: LogLevel = 'info'
  public colors = true
  public timestamps = false
  public json = false

  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
  }

  constructor(options: LoggerOptions = {}) {
    this.configure(options)
  }

  /**
   * Reset the logger from options; unset fields fall back to defaults.
   */
  configure(options: LoggerOptions): void {
    this.level = options.level ?? 'info'
    this.colors = options.colors !== false
    this.timestamps = options.timestamps ?? false
    this.json = options.json ?? false

    // Disable colors if not in TTY or if NO_COLOR is set
    if (!process.stdout.isTTY || process.env['NO_COLOR']) {
      this.colors = false
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.level]
  }

  private formatMessage(level: LogLevel | 'success', message: string, args: unknown[]): string {
    const formatted = format(message, ...args)

    if (this.json) {
      return JSON.stringify({
        level,
        message: stripAnsi(formatted),
        timestamp: new Date().toISOString()
      })
    }

    const prefix = this.timestamps ? this.paint(chalk.gray, `[${new Date().toISOString()}] `) : ''
    const text = this.colors ? formatted : stripAnsi(formatted)
    return `${prefix}${this.levelTag(level)} ${text}`
  }

  // JSON mode keeps stdout for command results
  private write(line: string): void {
    if (this.json) {
      console.error(line)
    } else {
      console.log(line)
    }
  }

  private paint(style: (text: string) => string, text: string): string {
    return this.colors ? style(text) : text
  }

  private levelTag(level: LogLevel | 'success'): string {
    if (!this.colors) {
      return level === 'success' ? '✔' : `[${level.toUpperCase()}]`
    }

    switch (level) {
      case 'debug':
        return chalk.gray('[DEBUG]')
      case 'info':
        return chalk.blue('[INFO]')
      case 'warn':
        return chalk.yellow('[WARN]')
      case 'error':
        return chalk.red('[ERROR]')
      case 'success':
        return chalk.green('✔')
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      this.write(this.formatMessage('debug', message, args))
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      this.write(this.formatMessage('info', message, args))
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, args))
    }
  }

  error(message: string | Error, ...args: unknown[]): void {
    if (!this.shouldLog('error')) {
      return
    }
    if (message instanceof Error) {
      console.error(this.formatMessage('error', message.message, args))
      if (this.level === 'debug' && message.stack) {
        console.error(this.paint(chalk.gray, message.stack))
      }
    } else {
      console.error(this.formatMessage('error', message, args))
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      this.write(this.formatMessage('success', message, args))
    }
  }

  /**
   * Raw output without a level prefix. Command results go here, so it
   * ignores the level.
   */
  log(message: string, ...args: unknown[]): void {
    const formatted = format(message, ...args)
    console.log(this.colors ? formatted : stripAnsi(formatted))
  }
}

function envLevel(): LogLevel {
  const value = process.env['LOG_LEVEL']
  return isLogLevel(value) ? value : 'info'
}

export function defaultLoggerOptions(): LoggerOptions {
  return {
    level: envLevel(),
    colors: process.env['FORCE_COLOR'] !== '0',
    timestamps: process.env['LOG_TIMESTAMPS'] === 'true',
    json: process.env['LOG_FORMAT'] === 'json'
  }
}

export const logger = new Logger(defaultLoggerOptions())

/**
 * Route library logging (migrations, queries) through the CLI logger.
 * In JSON mode the libraries stay silent: the command prints its result
 * or error payload itself.
 */
export function toStoreLogger(base: Logger): StoreLogger {
  if (base.json) {
    return silentLogger
  }
  return {
    trace: (msg, ...args) => base.debug(msg, ...args),
    debug: (msg, ...args) => base.debug(msg, ...args),
    info: (msg, ...args) => base.info(msg, ...args),
    warn: (msg, ...args) => base.warn(msg, ...args),
    error: (msg, ...args) => base.error(msg, ...args),
    fatal: (msg, ...args) => base.error(`FATAL: ${msg}`, ...args)
  }
}
