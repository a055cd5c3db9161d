import type { RawRow, Transaction, ValidationResult } from './types.js'
import {
  SchemaError,
  EmptyFileError,
  MixedCurrencyError,
  ValueTypeError,
  DateError,
} from './errors.js'
import { cellToText, findCurrencySymbols, parseCalendarDate, parseMoney } from './field-parsers.js'

/** date, description, category, value */
export const EXPECTED_COLUMN_COUNT = 4

const DATE_COLUMN = 0
const DESCRIPTION_COLUMN = 1
const CATEGORY_COLUMN = 2
const VALUE_COLUMN = 3

/**
 * Validates raw spreadsheet rows and converts them into transactions.
 *
 * The first row is a header and is skipped without being read; column order is
 * authoritative. Checks run in this order and the first failure rejects the
 * whole file:
 *   1. every row has exactly 4 columns
 *   2. there is at least one data row
 *   3. the value column uses at most one currency symbol ($, € or £)
 *   4. every value parses as a decimal once that symbol is stripped
 *   5. every date parses as a calendar date
 *
 * Row numbers in value and date errors are 1-based data rows (header excluded).
 * Transactions come back in input order, with the detected currency symbol
 * (null when values carry none).
 *
 * @example
 * const result = validateRows([
 *   ['date', 'description', 'category', 'value'],
 *   ['2026-01-15', 'Grocery', 'Groceries', -120.5],
 * ])
 * if (result.success) {
 *   result.transactions[0].value // => -120.5
 * }
 */
export const validateRows = (rows: readonly RawRow[]): ValidationResult => {
  const widthIndex = rows.findIndex((row) => row.length !== EXPECTED_COLUMN_COUNT)
  if (widthIndex !== -1) {
    return {
      success: false,
      error: new SchemaError(widthIndex + 1, rows[widthIndex].length),
    }
  }

  const dataRows = rows.slice(1)
  if (dataRows.length === 0) {
    return { success: false, error: new EmptyFileError() }
  }

  const symbols = findCurrencySymbols(dataRows.map((row) => row[VALUE_COLUMN]))
  if (symbols.length > 1) {
    return { success: false, error: new MixedCurrencyError(symbols) }
  }

  const values: number[] = []
  for (const [index, row] of dataRows.entries()) {
    const value = parseMoney(row[VALUE_COLUMN])
    if (value === null) {
      return {
        success: false,
        error: new ValueTypeError(index + 1, cellToText(row[VALUE_COLUMN])),
      }
    }
    values.push(value)
  }

  const dates: string[] = []
  for (const [index, row] of dataRows.entries()) {
    const date = parseCalendarDate(row[DATE_COLUMN])
    if (date === null) {
      return {
        success: false,
        error: new DateError(index + 1, cellToText(row[DATE_COLUMN])),
      }
    }
    dates.push(date)
  }

  const transactions: Transaction[] = dataRows.map((row, index) =>
    Object.freeze({
      date: dates[index],
      description: cellToText(row[DESCRIPTION_COLUMN]),
      category: cellToText(row[CATEGORY_COLUMN]),
      value: values[index],
    })
  )

  return { success: true, transactions, currencySymbol: symbols[0] ?? null }
}
