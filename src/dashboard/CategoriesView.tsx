import React from 'react'
import { Box, Text } from 'ink'
import type { MonthlySummary } from '../analytics/types.js'
import type { CategoryChart } from '../analytics/chart-series.js'
import type { DisplayConfig } from '../config/config-types.js'
import { formatMonthLabel } from '../analytics/month-key.js'
import { formatMoney } from '../shared/format.js'
import { bar } from './bars.js'

interface CategoriesViewProps {
  selected: MonthlySummary | null
  chart: CategoryChart
  display: DisplayConfig
}

interface CategoryBarsProps {
  entries: { category: string; amount: number }[]
  display: DisplayConfig
}

const CategoryBars = ({ entries, display }: CategoryBarsProps) => {
  if (entries.length === 0) {
    return <Text dimColor>No expenses.</Text>
  }

  const max = Math.max(...entries.map((e) => e.amount))
  return (
    <Box flexDirection="column">
      {entries.map(({ category, amount }) => (
        <Box key={category} gap={1}>
          <Box width={20}>
            <Text>{category.slice(0, 18) || '(blank)'}</Text>
          </Box>
          <Box width={14}>
            <Text>{formatMoney(amount, display)}</Text>
          </Box>
          <Text color="magenta">{bar(amount, max, 24)}</Text>
        </Box>
      ))}
    </Box>
  )
}

/**
 * Category spend for the selected month, next to totals across all months.
 */
export const CategoriesView = ({ selected, chart, display }: CategoriesViewProps) => {
  const monthEntries = selected
    ? Object.entries(selected.categoryBreakdown)
        .map(([category, amount]) => ({ category, amount }))
        .sort((a, b) => b.amount - a.amount)
    : []

  const totals = chart.series
    .slice(0, display.maxCategories)
    .map((s) => ({ category: s.category, amount: s.total }))

  return (
    <Box flexDirection="column" gap={1}>
      <Box flexDirection="column">
        <Text bold>{selected ? formatMonthLabel(selected.month) : 'No month selected'}</Text>
        <CategoryBars entries={monthEntries} display={display} />
      </Box>
      <Box flexDirection="column">
        <Text bold>All months</Text>
        <CategoryBars entries={totals} display={display} />
      </Box>
    </Box>
  )
}
