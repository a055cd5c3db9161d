import type { CurrencySymbol, RawCell } from './types.js'

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

// Year-first: 2026-01-15, 2026/1/15, optionally followed by a time part
const YEAR_FIRST_PATTERN = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ].*)?$/

// Month-first or day-first with a four digit year: 01/15/2026, 15/01/2026
const YEAR_LAST_PATTERN = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate()

const isCalendarDate = (year: number, month: number, day: number): boolean =>
  year >= 1 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month)

const toIsoDate = (year: number, month: number, day: number): string =>
  `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`

/**
 * Converts any cell to display text. Strings pass through untouched.
 */
export const cellToText = (cell: RawCell): string => {
  if (cell === null || cell === undefined) return ''
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? 'Invalid Date' : cell.toISOString()
  }
  return String(cell)
}

/**
 * Parses a value field as a decimal number.
 * Numbers must be finite; strings must be a plain decimal after trimming
 * (no currency symbols or thousands separators; see `parseMoney`).
 * Returns null otherwise.
 *
 * @example
 * parseDecimal('-120.50') // => -120.5
 * parseDecimal('$5')      // => null
 */
export const parseDecimal = (cell: RawCell): number | null => {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null
  }
  if (typeof cell !== 'string') return null

  const trimmed = cell.trim()
  if (!DECIMAL_PATTERN.test(trimmed)) return null

  const value = Number(trimmed)
  return Number.isFinite(value) ? value : null
}

export const CURRENCY_SYMBOLS: readonly CurrencySymbol[] = ['$', '€', '£']

const CURRENCY_SYMBOL_PATTERN = /[$€£]/g

const isCurrencySymbol = (value: string): value is CurrencySymbol =>
  CURRENCY_SYMBOLS.some((symbol) => symbol === value)

/**
 * Currency symbols used in a column, in order of first appearance.
 * Only text cells can carry a symbol.
 *
 * @example
 * findCurrencySymbols(['-$12.50', 30, '$4']) // => ['$']
 * findCurrencySymbols(['$1', '€2'])          // => ['$', '€']
 */
export const findCurrencySymbols = (cells: readonly RawCell[]): CurrencySymbol[] => {
  const found = new Set<CurrencySymbol>()
  for (const cell of cells) {
    if (typeof cell !== 'string') continue
    for (const match of cell.matchAll(CURRENCY_SYMBOL_PATTERN)) {
      if (isCurrencySymbol(match[0])) found.add(match[0])
    }
  }
  return [...found]
}

/**
 * Removes currency symbols and the spaces that follow them.
 *
 * @example
 * stripCurrencySymbols('-$ 12.50') // => '-12.50'
 */
export const stripCurrencySymbols = (text: string): string => text.replace(/[$€£]\s*/g, '')

/**
 * `parseDecimal` after stripping currency symbols from text cells.
 *
 * @example
 * parseMoney('-$12.50') // => -12.5
 * parseMoney('$abc')    // => null
 */
export const parseMoney = (cell: RawCell): number | null =>
  parseDecimal(typeof cell === 'string' ? stripCurrencySymbols(cell) : cell)

/**
 * Parses a date field into an ISO `YYYY-MM-DD` string, or null.
 *
 * Formats are tried in a fixed priority order and the first one that yields a
 * real calendar date wins:
 *   1. YYYY-MM-DD (also YYYY/MM/DD, time suffix ignored)
 *   2. MM/DD/YYYY
 *   3. DD/MM/YYYY
 *
 * So `03/04/2026` is March 4th, while `25/04/2026` falls through to April 25th.
 * Date cells from workbooks are read by their local calendar fields.
 */
export const parseCalendarDate = (cell: RawCell): string | null => {
  if (cell instanceof Date) {
    if (Number.isNaN(cell.getTime())) return null
    return toIsoDate(cell.getFullYear(), cell.getMonth() + 1, cell.getDate())
  }
  if (typeof cell !== 'string') return null

  const trimmed = cell.trim()

  const yearFirst = YEAR_FIRST_PATTERN.exec(trimmed)
  if (yearFirst) {
    const [year, month, day] = [yearFirst[1], yearFirst[2], yearFirst[3]].map(Number)
    return isCalendarDate(year, month, day) ? toIsoDate(year, month, day) : null
  }

  const yearLast = YEAR_LAST_PATTERN.exec(trimmed)
  if (yearLast) {
    const [first, second, year] = [yearLast[1], yearLast[2], yearLast[3]].map(Number)
    if (isCalendarDate(year, first, second)) return toIsoDate(year, first, second)
    if (isCalendarDate(year, second, first)) return toIsoDate(year, second, first)
  }

  return null
}
