/**
 * Error thrown when a query that requires a transaction is called outside
 * of one.
 *
 * @example
 * ```typescript
 * const placeOrder = createTransactionalQuery(async (ctx, input: PlaceOrderInput) => {
 *   // ...
 * })
 *
 * await placeOrder(db, input) // throws TransactionRequiredError
 * await withTransaction(db, ctx => placeOrder(ctx, input)) // ok
 * ```
 */
export class TransactionRequiredError extends Error {
  constructor(
    message = 'Query requires a transaction. Use withTransaction() to execute this query.'
  ) {
    super(message)
    this.name = 'TransactionRequiredError'
  }
}
