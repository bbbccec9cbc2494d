import type { ZodError } from 'zod'
import { DatabaseError, ErrorCodes } from '@storelens/core'

export class UnknownQueryError extends DatabaseError {
  constructor(
    public readonly queryName: string,
    public readonly available: readonly string[]
  ) {
    super(`Unknown query "${queryName}"`, ErrorCodes.QUERY_UNKNOWN, available.join(', '))
    this.name = 'UnknownQueryError'
  }
}

/**
 * Catalog parameters failed validation. The zod error is kept as `cause`.
 */
export class InvalidQueryParamsError extends DatabaseError {
  public readonly issues: string[]

  constructor(
    public readonly queryName: string,
    error: ZodError
  ) {
    const issues = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    super(
      `Invalid parameters for "${queryName}": ${issues.join('; ')}`,
      ErrorCodes.QUERY_INVALID_PARAMS,
      undefined,
      { cause: error }
    )
    this.name = 'InvalidQueryParamsError'
    this.issues = issues
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), queryName: this.queryName, issues: this.issues }
  }
}
