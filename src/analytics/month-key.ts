import type { MonthKey } from './types.js'

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const

/**
 * Extracts the month key from an ISO `YYYY-MM-DD` date.
 * Reads the string directly to avoid timezone issues with Date parsing.
 */
export const monthKeyOf = (isoDate: string): MonthKey => {
  const [year, month] = isoDate.split('-').map(Number)
  return { year, month }
}

/**
 * @example
 * formatMonthKey({ year: 2026, month: 1 }) // => '2026-01'
 */
export const formatMonthKey = ({ year, month }: MonthKey): string =>
  `${year}-${String(month).padStart(2, '0')}`

/**
 * Parses a `YYYY-MM` string. Returns null for anything else.
 */
export const parseMonthKey = (value: string): MonthKey | null => {
  const match = /^(\d{4})-(0[1-9]|1[0-2])$/.exec(value)
  if (!match) return null
  return { year: Number(match[1]), month: Number(match[2]) }
}

/**
 * Long display label.
 *
 * @example
 * formatMonthLabel({ year: 2026, month: 1 }) // => 'January 2026'
 */
export const formatMonthLabel = ({ year, month }: MonthKey): string =>
  `${MONTH_NAMES[month - 1]} ${year}`

/**
 * Chronological comparator for sorting.
 */
export const compareMonthKeys = (a: MonthKey, b: MonthKey): number =>
  a.year !== b.year ? a.year - b.year : a.month - b.month

export const isSameMonth = (a: MonthKey, b: MonthKey): boolean =>
  a.year === b.year && a.month === b.month

export const nextMonthKey = ({ year, month }: MonthKey): MonthKey =>
  month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 }

/**
 * Every calendar month from `from` to `to`, inclusive.
 * Empty when `to` is before `from`.
 *
 * @example
 * monthRange({ year: 2025, month: 11 }, { year: 2026, month: 2 })
 * // => Nov 2025, Dec 2025, Jan 2026, Feb 2026
 */
export const monthRange = (from: MonthKey, to: MonthKey): MonthKey[] => {
  const months: MonthKey[] = []
  let current = from
  while (compareMonthKeys(current, to) <= 0) {
    months.push(current)
    current = nextMonthKey(current)
  }
  return months
}
