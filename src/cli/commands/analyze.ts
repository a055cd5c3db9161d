import type { AnalyzeOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import type { AnalysisReport, CurrencySymbol } from '../../analytics/types.js'
import { createFormatter } from '../output.js'
import { formatTextReport } from '../text-report.js'
import { analyzeTransactions } from '../../analytics/pipeline.js'
import {
  buildCategorySeries,
  buildIncomeExpenseSeries,
  type CategoryChart,
  type IncomeExpensePoint,
} from '../../analytics/chart-series.js'
import {
  allSubcategoryBreakdowns,
  type CategorySubcategories,
} from '../../subcategories/classifier.js'
import { withFileCurrency } from '../../shared/format.js'
import { loadTransactions } from './dataset.js'

interface AnalyzeResult {
  success: true
  file: string
  currencySymbol: CurrencySymbol | null
  report: AnalysisReport
  charts: {
    incomeExpense: IncomeExpensePoint[]
    categories: CategoryChart
  }
  subcategories?: CategorySubcategories[]
  /** Pre-formatted text output (only for text format) */
  formatted?: string
}

/**
 * Analyze CLI command implementation.
 *
 * @example
 * expense-insights analyze transactions.xlsx --window 3 --format text
 */
export const analyzeCommand = async (
  options: AnalyzeOptions,
  config: AppConfig
): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const { transactions, currencySymbol } = await loadTransactions(options.file, formatter)

  const { rollingWindow, fillGaps } = config.analysis
  formatter.progress(
    `Analyzing ${transactions.length} transactions (${rollingWindow}-month rolling window)...`
  )

  const report = analyzeTransactions(transactions, { window: rollingWindow, fillGaps })
  const charts = {
    incomeExpense: buildIncomeExpenseSeries(report.months, { fillGaps }),
    categories: buildCategorySeries(report.months, { fillGaps }),
  }

  if (report.rolling.points.length === 0) {
    formatter.warn(
      `Not enough expense history for a ${rollingWindow}-month rolling average; the series is empty`
    )
  }

  const result: AnalyzeResult = {
    success: true,
    file: options.file,
    currencySymbol,
    report,
    charts,
  }

  if (options.subcategories) {
    result.subcategories = allSubcategoryBreakdowns(transactions)
  }

  if (options.format === 'text') {
    result.formatted = formatTextReport({
      file: options.file,
      report,
      categoryChart: charts.categories,
      display: withFileCurrency(config.display, currencySymbol),
      subcategories: result.subcategories,
    })
  }

  formatter.success(result)
}
