import type { MonthKey, MonthlySummary } from './types.js'
import { formatMonthKey, monthRange } from './month-key.js'

export interface ChartOptions {
  /** Insert zero-valued months between the first and last summary */
  fillGaps?: boolean
}

export interface IncomeExpensePoint {
  month: MonthKey
  income: number
  expenses: number
  net: number
}

export interface CategorySeries {
  category: string
  /** Spend over the whole timeline */
  total: number
  /** One value per timeline month, 0 where the category had no spend */
  values: number[]
}

export interface CategoryChart {
  months: MonthKey[]
  series: CategorySeries[]
}

/**
 * Timeline used by charts. Without gap filling it is exactly the months that
 * have summaries.
 */
const buildTimeline = (
  summaries: readonly MonthlySummary[],
  fillGaps: boolean
): MonthKey[] => {
  if (!fillGaps || summaries.length === 0) {
    return summaries.map((s) => s.month)
  }
  return monthRange(summaries[0].month, summaries[summaries.length - 1].month)
}

const indexByMonth = (summaries: readonly MonthlySummary[]): Map<string, MonthlySummary> =>
  new Map(summaries.map((s) => [formatMonthKey(s.month), s]))

/**
 * Points for the monthly income vs expenses line chart.
 * Expects chronologically ordered summaries (as produced by `summarizeByMonth`).
 */
export const buildIncomeExpenseSeries = (
  summaries: readonly MonthlySummary[],
  options: ChartOptions = {}
): IncomeExpensePoint[] => {
  const lookup = indexByMonth(summaries)

  return buildTimeline(summaries, options.fillGaps ?? false).map((month) => {
    const summary = lookup.get(formatMonthKey(month))
    return {
      month,
      income: summary?.totalIncome ?? 0,
      expenses: summary?.totalExpenses ?? 0,
      net: summary?.netIncome ?? 0,
    }
  })
}

/**
 * Flattens per-month category breakdowns into one series per category, for a
 * stacked bar chart. Series are ordered by total spend (largest first), then
 * by name.
 */
export const buildCategorySeries = (
  summaries: readonly MonthlySummary[],
  options: ChartOptions = {}
): CategoryChart => {
  const months = buildTimeline(summaries, options.fillGaps ?? false)
  const lookup = indexByMonth(summaries)

  const categories = new Set<string>()
  for (const summary of summaries) {
    for (const category of Object.keys(summary.categoryBreakdown)) {
      categories.add(category)
    }
  }

  const series = [...categories]
    .map((category) => {
      const values = months.map((month) => {
        const breakdown = lookup.get(formatMonthKey(month))?.categoryBreakdown
        // Category names are user data and may shadow Object.prototype members
        return breakdown && Object.hasOwn(breakdown, category) ? breakdown[category] : 0
      })
      return {
        category,
        total: values.reduce((sum, v) => sum + v, 0),
        values,
      }
    })
    .sort((a, b) => b.total - a.total || a.category.localeCompare(b.category))

  return { months, series }
}
