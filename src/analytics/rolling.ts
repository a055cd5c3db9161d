import type { MonthKey, RollingOptions, RollingPoint, Transaction } from './types.js'
import { ConfigurationError } from './errors.js'
import { groupByMonth } from './aggregator.js'
import { compareMonthKeys, formatMonthKey, monthRange } from './month-key.js'

export const DEFAULT_ROLLING_WINDOW = 3

interface MonthlyExpense {
  month: MonthKey
  expense: number
}

/**
 * Throws a ConfigurationError unless `window` is a positive integer.
 */
export const assertValidWindow = (window: number): void => {
  if (!Number.isInteger(window) || window <= 0) {
    throw new ConfigurationError(`Rolling window must be a positive integer (got ${window})`)
  }
}

/**
 * Chronological per-month expense totals (positive amounts).
 * Only months with at least one expense transaction appear.
 */
export const buildMonthlyExpenseSeries = (
  transactions: readonly Transaction[]
): MonthlyExpense[] =>
  [...groupByMonth(transactions.filter((tx) => tx.value < 0)).values()]
    .map(({ month, items }) => ({
      month,
      expense: items.reduce((sum, tx) => sum + Math.abs(tx.value), 0),
    }))
    .sort((a, b) => compareMonthKeys(a.month, b.month))

/**
 * Zero-fills every calendar month between the first and last entry.
 */
const fillExpenseGaps = (series: MonthlyExpense[]): MonthlyExpense[] => {
  if (series.length === 0) return series

  const byKey = new Map(series.map((point) => [formatMonthKey(point.month), point.expense]))
  return monthRange(series[0].month, series[series.length - 1].month).map((month) => ({
    month,
    expense: byKey.get(formatMonthKey(month)) ?? 0,
  }))
}

/**
 * Trailing average of monthly expenses over `window` months, inclusive of the
 * current month.
 *
 * Income is ignored. The first point is emitted once `window` months of
 * expense history exist; with fewer months the result is empty, which callers
 * should present as "insufficient history" rather than as an error.
 *
 * Months without expenses are NOT synthesized unless `fillGaps` is set, so by
 * default a window may span non-consecutive calendar months. Zero-filling is
 * the caller's choice.
 *
 * @example
 * rollingExpenseAverage(transactions)              // 3-month window
 * rollingExpenseAverage(transactions, 6, { fillGaps: true })
 */
export const rollingExpenseAverage = (
  transactions: readonly Transaction[],
  window: number = DEFAULT_ROLLING_WINDOW,
  options: RollingOptions = {}
): RollingPoint[] => {
  assertValidWindow(window)

  const monthly = buildMonthlyExpenseSeries(transactions)
  const series = options.fillGaps ? fillExpenseGaps(monthly) : monthly

  const points: RollingPoint[] = []
  for (let i = window - 1; i < series.length; i++) {
    const slice = series.slice(i - window + 1, i + 1)
    const total = slice.reduce((sum, point) => sum + point.expense, 0)
    points.push({ month: series[i].month, averageExpense: total / window })
  }

  return points
}
