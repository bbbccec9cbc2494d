import { ZodError } from 'zod'
import { DatabaseError, ErrorCodes, parseDatabaseError, type Dialect } from '@storelens/core'

/**
 * A product cannot cover the requested quantity.
 */
export class InsufficientStockError extends DatabaseError {
  constructor(
    public readonly productId: number,
    public readonly requested: number
  ) {
    super(
      `Insufficient stock for product ${productId}`,
      ErrorCodes.RESOURCE_INSUFFICIENT_STOCK,
      JSON.stringify({ productId, requested })
    )
    this.name = 'InsufficientStockError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      productId: this.productId,
      requested: this.requested
    }
  }
}

/**
 * Run a write and rethrow driver failures as {@link DatabaseError}s.
 * Validation errors and errors already in the hierarchy pass through.
 * @internal
 */
export async function translateErrors<T>(dialect: Dialect, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    if (error instanceof ZodError) {
      throw error
    }
    throw parseDatabaseError(error, dialect)
  }
}
