import type { ValidateOptions } from '../args.js'
import { createFormatter } from '../output.js'
import { summarizeByMonth } from '../../analytics/aggregator.js'
import { formatMonthKey } from '../../analytics/month-key.js'
import type { CurrencySymbol } from '../../analytics/types.js'
import { loadTransactions } from './dataset.js'

interface ValidateResult {
  success: true
  file: string
  transactionCount: number
  monthCount: number
  firstMonth: string
  lastMonth: string
  currencySymbol: CurrencySymbol | null
  formatted?: string
}

/**
 * Validate CLI command implementation.
 * Rejections are reported by `loadTransactions` and exit with code 1.
 *
 * @example
 * expense-insights validate transactions.xlsx --format text
 */
export const validateCommand = async (options: ValidateOptions): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const { transactions, currencySymbol } = await loadTransactions(options.file, formatter)

  // A valid file always has at least one month
  const months = summarizeByMonth(transactions)
  const firstMonth = formatMonthKey(months[0].month)
  const lastMonth = formatMonthKey(months[months.length - 1].month)

  const result: ValidateResult = {
    success: true,
    file: options.file,
    transactionCount: transactions.length,
    monthCount: months.length,
    firstMonth,
    lastMonth,
    currencySymbol,
  }

  if (options.format === 'text') {
    const currencyNote = currencySymbol ? `, values in ${currencySymbol}` : ''
    result.formatted = `${options.file}: ${result.transactionCount} transactions across ${result.monthCount} month(s) (${firstMonth} to ${lastMonth})${currencyNote}`
  }

  formatter.success(result)
}
