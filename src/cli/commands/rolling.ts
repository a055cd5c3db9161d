import type { RollingOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import type { RollingSeries } from '../../analytics/types.js'
import { createFormatter } from '../output.js'
import { formatRollingLines, rollingTitle } from '../text-report.js'
import { buildMonthlyExpenseSeries, rollingExpenseAverage } from '../../analytics/rolling.js'
import { withFileCurrency } from '../../shared/format.js'
import { loadTransactions } from './dataset.js'

interface RollingResult {
  success: true
  file: string
  expenseMonths: number
  rolling: RollingSeries
  formatted?: string
}

/**
 * Rolling CLI command implementation.
 *
 * @example
 * expense-insights rolling transactions.xlsx --window 6 --fill-gaps
 */
export const rollingCommand = async (
  options: RollingOptions,
  config: AppConfig
): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const { transactions, currencySymbol } = await loadTransactions(options.file, formatter)

  const { rollingWindow: window, fillGaps } = config.analysis
  const rolling: RollingSeries = {
    window,
    gapsFilled: fillGaps,
    points: rollingExpenseAverage(transactions, window, { fillGaps }),
  }

  const result: RollingResult = {
    success: true,
    file: options.file,
    expenseMonths: buildMonthlyExpenseSeries(transactions).length,
    rolling,
  }

  if (options.format === 'text') {
    const display = withFileCurrency(config.display, currencySymbol)
    result.formatted = ['', `  ${rollingTitle(rolling)}`, '', ...formatRollingLines(rolling, display), ''].join('\n')
  }

  formatter.success(result)
}
