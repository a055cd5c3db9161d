import type {
  AnalysisOptions,
  AnalysisReport,
  AnalyzeRowsResult,
  RawRow,
  Transaction,
} from './types.js'
import { validateRows } from './validator.js'
import { summarizeByMonth } from './aggregator.js'
import { computeMetrics } from './metrics.js'
import { DEFAULT_ROLLING_WINDOW, rollingExpenseAverage } from './rolling.js'

/**
 * Derives every aggregate from an already validated transaction list.
 * Pure function with no side effects; throws ConfigurationError for an
 * invalid window.
 *
 * @example
 * const report = analyzeTransactions(transactions, { window: 3 })
 * report.months.length   // months with transactions
 * report.rolling.points  // may be empty
 */
export const analyzeTransactions = (
  transactions: readonly Transaction[],
  options: AnalysisOptions = {}
): AnalysisReport => {
  const window = options.window ?? DEFAULT_ROLLING_WINDOW
  const fillGaps = options.fillGaps ?? false

  // Validate the window before doing any work
  const points = rollingExpenseAverage(transactions, window, { fillGaps })
  const months = summarizeByMonth(transactions)

  return {
    transactionCount: transactions.length,
    months,
    metrics: computeMetrics(transactions, months),
    rolling: { window, gapsFilled: fillGaps, points },
  }
}

/**
 * Validates raw rows and analyzes them in one step.
 * Validation failures are returned, not thrown.
 */
export const analyzeRows = (
  rows: readonly RawRow[],
  options: AnalysisOptions = {}
): AnalyzeRowsResult => {
  const validation = validateRows(rows)
  if (!validation.success) {
    return validation
  }
  return {
    success: true,
    report: analyzeTransactions(validation.transactions, options),
    currencySymbol: validation.currencySymbol,
  }
}
