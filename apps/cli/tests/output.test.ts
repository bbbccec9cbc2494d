/**
 * Tests for table and result formatting.
 */

import { describe, it, expect } from 'vitest'
import stripAnsi from 'strip-ansi'
import { formatTable, formatValue } from '../src/utils/table.js'
import { buildParams } from '../src/commands/query/index.js'

describe('formatValue', () => {
  it('prints money with two decimals and integers as-is', () => {
    expect(formatValue(799.9)).toBe('799.90')
    expect(formatValue(3)).toBe('3')
  })

  it('prints a dash for missing values', () => {
    expect(stripAnsi(formatValue(null))).toBe('—')
  })
})

describe('formatTable', () => {
  it('says so when there are no rows', () => {
    expect(formatTable([])).toBe('No rows')
  })

  it('titles columns from snake_case keys', () => {
    const table = stripAnsi(formatTable([{ average_salary: 55000, department: 'Sales' }]))

    expect(table).toContain('Average Salary')
    expect(table).toContain('55000')
    expect(table).toContain('Sales')
  })
})

describe('buildParams', () => {
  it('keeps only the options given', () => {
    expect(buildParams({ limit: '5' })).toEqual({ limit: '5' })
    expect(buildParams({})).toEqual({})
  })
})
