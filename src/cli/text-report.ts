import type { DisplayConfig } from '../config/config-types.js'
import type { AnalysisReport, MonthlySummary, RollingSeries } from '../analytics/types.js'
import type { CategoryChart } from '../analytics/chart-series.js'
import type { CategorySubcategories } from '../subcategories/classifier.js'
import { formatMonthKey, formatMonthLabel } from '../analytics/month-key.js'
import { formatTable } from './output.js'
import { formatMoney, formatPercent } from '../shared/format.js'

export const DIVIDER = '─'.repeat(60)

export interface TextReportInput {
  file: string
  report: AnalysisReport
  categoryChart: CategoryChart
  display: DisplayConfig
  subcategories?: CategorySubcategories[]
}

/**
 * Category with the highest spend in a month, or null without expenses.
 */
export const topCategory = (summary: MonthlySummary): { name: string; spent: number } | null => {
  let top: { name: string; spent: number } | null = null
  for (const [name, spent] of Object.entries(summary.categoryBreakdown)) {
    if (top === null || spent > top.spent) {
      top = { name, spent }
    }
  }
  return top
}

const section = (lines: string[], title: string) => {
  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push(`  ${title}`)
  lines.push('')
}

/**
 * Message shown when the rolling series is empty.
 */
export const insufficientHistoryMessage = (window: number): string =>
  `Insufficient history: at least ${window} month(s) of expenses are needed for a ${window}-month average.`

/**
 * Renders the rolling section body (table or insufficient-history note).
 */
export const formatRollingLines = (rolling: RollingSeries, display: DisplayConfig): string[] => {
  if (rolling.points.length === 0) {
    return [`  ${insufficientHistoryMessage(rolling.window)}`]
  }

  const rows = rolling.points.map((point) => [
    formatMonthKey(point.month),
    formatMoney(point.averageExpense, display),
  ])
  return [formatTable(['Month', 'Avg Expense'], rows)]
}

export const rollingTitle = (rolling: RollingSeries): string =>
  `ROLLING EXPENSE AVERAGE (${rolling.window} months${rolling.gapsFilled ? ', gaps zero-filled' : ''})`

/**
 * Generates a formatted text report for terminal display.
 */
export const formatTextReport = ({
  file,
  report,
  categoryChart,
  display,
  subcategories,
}: TextReportInput): string => {
  const lines: string[] = []
  const money = (amount: number) => formatMoney(amount, display)

  // Header
  lines.push('')
  lines.push(`  Expense Report: ${file}`)
  lines.push(`  Transactions: ${report.transactionCount}, Months: ${report.months.length}`)

  // Metrics
  section(lines, 'KEY METRICS')
  if (report.metrics.status === 'ok') {
    const { currentBalance, averageMonthlySavings, bestMonth, worstMonth } = report.metrics.metrics
    lines.push(`  Current Balance:     ${money(currentBalance)}`)
    lines.push(`  Avg Monthly Savings: ${money(averageMonthlySavings)}`)
    lines.push(`  Best Month:          ${formatMonthLabel(bestMonth.month)} (${money(bestMonth.netIncome)})`)
    lines.push(`  Worst Month:         ${formatMonthLabel(worstMonth.month)} (${money(worstMonth.netIncome)})`)
  } else {
    lines.push(`  Insufficient data: ${report.metrics.reason}`)
  }

  if (report.months.length === 1) {
    lines.push('')
    lines.push('  Only one month of data available. Add more transactions to see trends over time.')
  }

  // Monthly summary
  section(lines, 'MONTHLY SUMMARY')
  if (report.months.length === 0) {
    lines.push('  No transactions found.')
  } else {
    const rows = report.months.map((summary) => {
      const top = topCategory(summary)
      return [
        formatMonthKey(summary.month),
        money(summary.totalIncome),
        money(summary.totalExpenses),
        money(summary.netIncome),
        top ? top.name.slice(0, 20) : '-',
      ]
    })
    lines.push(formatTable(['Month', 'Income', 'Expenses', 'Net', 'Top Category'], rows))
  }

  // Category totals
  section(lines, 'SPENDING BY CATEGORY')
  if (categoryChart.series.length === 0) {
    lines.push('  No expenses found.')
  } else {
    const grandTotal = categoryChart.series.reduce((sum, s) => sum + s.total, 0)
    const shown = categoryChart.series.slice(0, display.maxCategories)
    const rows = shown.map((s) => [
      s.category.slice(0, 20),
      money(s.total),
      formatPercent(grandTotal > 0 ? (s.total / grandTotal) * 100 : 0),
    ])
    lines.push(formatTable(['Category', 'Spent', 'Share'], rows))

    const hidden = categoryChart.series.length - shown.length
    if (hidden > 0) {
      lines.push('')
      lines.push(`  ... and ${hidden} more categories`)
    }
  }

  // Rolling average
  section(lines, rollingTitle(report.rolling))
  lines.push(...formatRollingLines(report.rolling, display))

  // Subcategories
  if (subcategories) {
    section(lines, 'SUBCATEGORIES')
    lines.push(...formatSubcategoryLines(subcategories, display))
  }

  lines.push('')
  lines.push(DIVIDER)
  lines.push('')

  return lines.join('\n')
}

/**
 * Renders one block per category with its subcategory split.
 */
export const formatSubcategoryLines = (
  breakdowns: CategorySubcategories[],
  display: DisplayConfig
): string[] => {
  if (breakdowns.length === 0) {
    return ['  No expenses found.']
  }

  const lines: string[] = []
  for (const [index, { category, breakdown }] of breakdowns.entries()) {
    if (index > 0) lines.push('')
    lines.push(`  ${category}`)
    const rows = breakdown.map((item) => [
      item.subcategory,
      formatMoney(item.amount, display),
      formatPercent(item.percentage),
    ])
    lines.push(formatTable(['Subcategory', 'Spent', 'Share'], rows))
  }
  return lines
}
