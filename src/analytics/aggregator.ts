import type { MonthKey, MonthlySummary, Transaction } from './types.js'
import { compareMonthKeys, formatMonthKey, monthKeyOf } from './month-key.js'

/**
 * Helper type for building monthly summaries.
 * Used internally by the aggregator.
 */
interface MonthAccumulator {
  month: MonthKey
  income: number
  expenses: number
  categories: Map<string, number>
}

/**
 * Groups transactions by calendar month, keyed by `YYYY-MM`.
 * Map iteration keeps first-seen order; callers sort.
 */
export const groupByMonth = <T extends { date: string }>(
  transactions: readonly T[]
): Map<string, { month: MonthKey; items: T[] }> => {
  const groups = new Map<string, { month: MonthKey; items: T[] }>()

  for (const tx of transactions) {
    const month = monthKeyOf(tx.date)
    const key = formatMonthKey(month)

    const group = groups.get(key)
    if (group) {
      group.items.push(tx)
    } else {
      groups.set(key, { month, items: [tx] })
    }
  }

  return groups
}

const accumulateMonth = (month: MonthKey, transactions: readonly Transaction[]): MonthAccumulator => {
  const acc: MonthAccumulator = { month, income: 0, expenses: 0, categories: new Map() }

  for (const tx of transactions) {
    if (tx.value > 0) {
      acc.income += tx.value
    } else if (tx.value < 0) {
      const spend = Math.abs(tx.value)
      acc.expenses += spend
      acc.categories.set(tx.category, (acc.categories.get(tx.category) ?? 0) + spend)
    }
    // Zero values are neither income nor expense
  }

  return acc
}

/**
 * Builds one summary per month that has at least one transaction, in
 * chronological order. Months without transactions are not synthesized;
 * see `buildIncomeExpenseSeries` for a gap-filled chart timeline.
 *
 * Category breakdowns only contain categories with expense activity in that
 * month. Category names are used as-is (case-sensitive, untrimmed).
 * Pure function with no side effects.
 *
 * @example
 * summarizeByMonth([
 *   { date: '2026-01-15', description: 'Grocery', category: 'Groceries', value: -120.5 },
 *   { date: '2026-01-30', description: 'Salary', category: 'Salary', value: 3000 },
 * ])
 * // => [{ month: { year: 2026, month: 1 }, totalIncome: 3000, totalExpenses: 120.5,
 * //       netIncome: 2879.5, categoryBreakdown: { Groceries: 120.5 } }]
 */
export const summarizeByMonth = (transactions: readonly Transaction[]): MonthlySummary[] =>
  [...groupByMonth(transactions).values()]
    .map(({ month, items }) => accumulateMonth(month, items))
    .sort((a, b) => compareMonthKeys(a.month, b.month))
    .map((acc) => ({
      month: acc.month,
      totalIncome: acc.income,
      totalExpenses: acc.expenses,
      netIncome: acc.income - acc.expenses,
      categoryBreakdown: Object.fromEntries(acc.categories),
    }))
