import React from 'react'
import { Box, Text } from 'ink'
import type { MonthlySummary } from '../analytics/types.js'
import type { DisplayConfig } from '../config/config-types.js'
import { formatMonthKey } from '../analytics/month-key.js'
import { formatMoney } from '../shared/format.js'

interface MonthsViewProps {
  months: MonthlySummary[]
  cursor: number
  display: DisplayConfig
}

const Cell = ({ width, children, color }: { width: number; children: string; color?: string }) => (
  <Box width={width}>
    <Text color={color}>{children}</Text>
  </Box>
)

export const MonthsView = ({ months, cursor, display }: MonthsViewProps) => {
  const money = (amount: number) => formatMoney(amount, display)

  return (
    <Box flexDirection="column">
      <Box>
        <Text dimColor>{'  '}</Text>
        <Cell width={10}>Month</Cell>
        <Cell width={16}>Income</Cell>
        <Cell width={16}>Expenses</Cell>
        <Cell width={16}>Net</Cell>
        <Cell width={12}>Categories</Cell>
      </Box>
      {months.map((summary, index) => {
        const selected = index === cursor
        const key = formatMonthKey(summary.month)
        return (
          <Box key={key}>
            <Text color="cyan">{selected ? '> ' : '  '}</Text>
            <Cell width={10} color={selected ? 'cyan' : undefined}>
              {key}
            </Cell>
            <Cell width={16} color="green">
              {money(summary.totalIncome)}
            </Cell>
            <Cell width={16} color="red">
              {money(summary.totalExpenses)}
            </Cell>
            <Cell width={16} color={summary.netIncome >= 0 ? 'green' : 'red'}>
              {money(summary.netIncome)}
            </Cell>
            <Cell width={12}>{String(Object.keys(summary.categoryBreakdown).length)}</Cell>
          </Box>
        )
      })}
    </Box>
  )
}
