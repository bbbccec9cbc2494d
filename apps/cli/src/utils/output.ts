import { logger } from './logger.js'
import { formatTable, formatValue, type TableRow } from './table.js'

function isRowList(value: unknown[]): value is TableRow[] {
  return value.every(item => typeof item === 'object' && item !== null && !Array.isArray(item))
}

/**
 * Print a command result as JSON or as a table.
 */
export function printResult(result: unknown, json: boolean | undefined): void {
  if (json) {
    logger.log(JSON.stringify(result, null, 2))
    return
  }
  if (Array.isArray(result)) {
    logger.log(isRowList(result) ? formatTable(result) : result.map(formatValue).join('\n'))
    return
  }
  logger.log(formatValue(result))
}
