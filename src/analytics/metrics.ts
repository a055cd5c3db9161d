import type {
  MetricsOutcome,
  MonthResult,
  MonthlySummary,
  Transaction,
} from './types.js'
import { compareMonthKeys } from './month-key.js'

/**
 * Sum of all transaction values.
 */
export const calculateBalance = (transactions: readonly Transaction[]): number =>
  transactions.reduce((sum, tx) => sum + tx.value, 0)

/**
 * Picks the extreme month by net income. Walks months in chronological order
 * and only replaces on a strict improvement, so ties keep the earliest month.
 */
const findExtremeMonth = (
  chronological: readonly MonthlySummary[],
  isBetter: (candidate: number, current: number) => boolean
): MonthResult => {
  let pick = chronological[0]
  for (const summary of chronological.slice(1)) {
    if (isBetter(summary.netIncome, pick.netIncome)) {
      pick = summary
    }
  }
  return { month: pick.month, netIncome: pick.netIncome }
}

/**
 * Calculates headline metrics from the transactions and their monthly summaries.
 *
 * The balance is summed from raw transactions rather than from the summaries.
 * With zero months there is nothing to average, so an `insufficient-data`
 * outcome is returned instead of metrics.
 *
 * @example
 * const outcome = computeMetrics(transactions, summarizeByMonth(transactions))
 * if (outcome.status === 'ok') {
 *   console.log(outcome.metrics.bestMonth)
 * }
 */
export const computeMetrics = (
  transactions: readonly Transaction[],
  summaries: readonly MonthlySummary[]
): MetricsOutcome => {
  if (summaries.length === 0) {
    return {
      status: 'insufficient-data',
      reason: 'No months with transactions to analyze',
    }
  }

  const chronological = [...summaries].sort((a, b) => compareMonthKeys(a.month, b.month))
  const totalNet = chronological.reduce((sum, s) => sum + s.netIncome, 0)

  return {
    status: 'ok',
    metrics: {
      currentBalance: calculateBalance(transactions),
      averageMonthlySavings: totalNet / chronological.length,
      bestMonth: findExtremeMonth(chronological, (candidate, current) => candidate > current),
      worstMonth: findExtremeMonth(chronological, (candidate, current) => candidate < current),
    },
  }
}
