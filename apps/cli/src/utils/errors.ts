import chalk from 'chalk'
import { CommanderError } from 'commander'
import { ZodError } from 'zod'
import { DatabaseError, ErrorCodes } from '@storelens/core'
import { InvalidQueryParamsError, UnknownQueryError } from '@storelens/analytics'
import { logger } from './logger.js'

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'CLI_ERROR',
    public readonly suggestions: string[] = [],
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'CLIError'
  }
}

export class ConfigurationError extends CLIError {
  constructor(
    message: string,
    public readonly errors: string[] = [],
    suggestions: string[] = []
  ) {
    super(message, 'CONFIG_ERROR', suggestions)
    this.name = 'ConfigurationError'
  }
}

const SUGGESTIONS: Record<string, string[]> = {
  [ErrorCodes.DB_CONNECTION_FAILED]: [
    'Check the database url in your configuration or DATABASE_URL',
    'Verify the database server is running'
  ],
  [ErrorCodes.DB_TIMEOUT]: ['Increase queryTimeoutMs in your configuration'],
  [ErrorCodes.QUERY_UNKNOWN]: ["Run 'storelens queries' to list available queries"],
  [ErrorCodes.QUERY_INVALID_PARAMS]: ["Run 'storelens queries' to see each query's parameters"],
  [ErrorCodes.VALIDATION_FOREIGN_KEY_VIOLATION]: ['Check that referenced rows exist'],
  [ErrorCodes.VALIDATION_CHECK_VIOLATION]: ['Prices, stock and salaries cannot be negative']
}

/**
 * Turn any thrown value into a CLIError carrying suggestions.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error
  }
  if (error instanceof UnknownQueryError) {
    return new CLIError(error.message, error.code, [
      `Available queries: ${error.available.join(', ')}`
    ], { cause: error })
  }
  if (error instanceof InvalidQueryParamsError) {
    return new CLIError(error.message, error.code, SUGGESTIONS[error.code] ?? [], { cause: error })
  }
  if (error instanceof DatabaseError) {
    const message = error.detail ? `${error.message} (${error.detail})` : error.message
    return new CLIError(message, error.code, SUGGESTIONS[error.code] ?? [], { cause: error })
  }
  if (error instanceof ZodError) {
    const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    return new CLIError(`Invalid input: ${issues.join('; ')}`, 'VALIDATION_ERROR', [], {
      cause: error
    })
  }
  if (error instanceof Error) {
    return new CLIError(error.message, 'UNEXPECTED_ERROR', [], { cause: error })
  }
  return new CLIError(String(error), 'UNEXPECTED_ERROR')
}

/**
 * Report an error and return the process exit code.
 */
export function handleError(error: unknown): number {
  // Commander has already printed its own message
  if (error instanceof CommanderError) {
    return error.exitCode
  }

  const cliError = toCLIError(error)

  if (logger.json) {
    console.error(
      JSON.stringify({
        error: { code: cliError.code, message: cliError.message, suggestions: cliError.suggestions }
      })
    )
    return 1
  }

  logger.error(chalk.red(`✗ ${cliError.message}`))

  if (cliError instanceof ConfigurationError && cliError.errors.length > 0) {
    logger.error('Validation errors:')
    for (const err of cliError.errors) {
      logger.error(`  • ${err}`)
    }
  }

  if (cliError.suggestions.length > 0) {
    logger.error('Suggestions:')
    for (const suggestion of cliError.suggestions) {
      logger.error(chalk.yellow(`  → ${suggestion}`))
    }
  }

  logger.error(chalk.gray(`Error code: ${cliError.code}`))

  const origin = cliError.cause instanceof Error ? cliError.cause : cliError
  if (logger.level === 'debug' && origin.stack) {
    logger.error(chalk.gray(origin.stack))
  }

  return 1
}
