import Table from 'cli-table3'
import chalk from 'chalk'

export interface TableOptions {
  head?: string[]
  colWidths?: number[]
  colAligns?: Array<'left' | 'center' | 'right'>
}

export type TableRow = Record<string, unknown>

function headerLabel(column: string): string {
  return column.replace(/_/g, ' ').replace(/\b\w/g, l => l.toUpperCase())
}

export function createTable(options: TableOptions = {}): Table.Table {
  const tableOptions: Table.TableConstructorOptions = {
    head: options.head?.map(h => chalk.bold(h)) ?? [],
    style: { head: ['cyan'], border: ['gray'] },
    wordWrap: true,
    wrapOnWordBoundary: true
  }

  if (options.colWidths) {
    tableOptions.colWidths = options.colWidths
  }
  if (options.colAligns) {
    tableOptions.colAligns = options.colAligns
  }

  return new Table(tableOptions)
}

/**
 * Format a single value for table display.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('—')
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2)
  }
  if (Array.isArray(value)) {
    return value.map(formatValue).join(', ')
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

/**
 * Format rows as a table; columns default to the first row's keys.
 */
export function formatTable(data: TableRow[], columns?: string[], options: TableOptions = {}): string {
  const first = data[0]
  if (!first) {
    return 'No rows'
  }

  const cols = columns ?? Object.keys(first)
  const table = createTable({ ...options, head: options.head ?? cols.map(headerLabel) })

  for (const row of data) {
    table.push(cols.map(col => formatValue(row[col])))
  }

  return table.toString()
}

/**
 * Key-value table.
 */
export function createVerticalTable(data: Record<string, unknown>, options: TableOptions = {}): string {
  const table = createTable({ ...options, colAligns: options.colAligns ?? ['right', 'left'] })

  for (const [key, value] of Object.entries(data)) {
    table.push([chalk.bold(headerLabel(key)), formatValue(value)])
  }

  return table.toString()
}
