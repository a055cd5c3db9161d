import React from 'react'
import { Box, Text } from 'ink'
import type { IncomeExpensePoint } from '../analytics/chart-series.js'
import type { DisplayConfig } from '../config/config-types.js'
import { formatMonthKey } from '../analytics/month-key.js'
import { formatCompact } from '../shared/format.js'
import { bar } from './bars.js'

interface IncomeExpenseChartProps {
  points: IncomeExpensePoint[]
  display: DisplayConfig
}

/**
 * Monthly income vs expenses as paired horizontal bars.
 */
export const IncomeExpenseChart = ({ points, display }: IncomeExpenseChartProps) => {
  const max = Math.max(0, ...points.flatMap((p) => [p.income, p.expenses]))

  return (
    <Box flexDirection="column">
      <Text bold>Monthly Income vs Expenses</Text>
      {points.length === 1 && (
        <Text dimColor>Only one month of data available. Add more transactions to see trends over time.</Text>
      )}
      {points.map((point) => {
        const key = formatMonthKey(point.month)
        return (
          <Box key={key} flexDirection="column" marginTop={1}>
            <Text dimColor>{key}</Text>
            <Box gap={1}>
              <Box width={10}>
                <Text color="green">{formatCompact(point.income, display)}</Text>
              </Box>
              <Text color="green">{bar(point.income, max, 30)}</Text>
            </Box>
            <Box gap={1}>
              <Box width={10}>
                <Text color="red">{formatCompact(point.expenses, display)}</Text>
              </Box>
              <Text color="red">{bar(point.expenses, max, 30)}</Text>
            </Box>
          </Box>
        )
      })}
    </Box>
  )
}
