/**
 * Options every command inherits from the program.
 */
export interface GlobalOptions {
  config?: string
  verbose?: boolean
  quiet?: boolean
  json?: boolean
}
