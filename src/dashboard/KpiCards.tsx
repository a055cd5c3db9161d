import React from 'react'
import { Box, Text } from 'ink'
import type { MetricsOutcome } from '../analytics/types.js'
import type { DisplayConfig } from '../config/config-types.js'
import { formatMonthLabel } from '../analytics/month-key.js'
import { formatMoney } from '../shared/format.js'

interface KpiCardProps {
  title: string
  value: string
  color?: string
  hint?: string
}

const KpiCard = ({ title, value, color, hint }: KpiCardProps) => (
  <Box flexDirection="column" borderStyle="round" borderColor="gray" paddingX={1} minWidth={22}>
    <Text dimColor>{title}</Text>
    <Text bold color={color}>
      {value}
    </Text>
    {hint ? <Text dimColor>{hint}</Text> : null}
  </Box>
)

interface KpiCardsProps {
  outcome: MetricsOutcome
  display: DisplayConfig
}

export const KpiCards = ({ outcome, display }: KpiCardsProps) => {
  if (outcome.status === 'insufficient-data') {
    return (
      <Box borderStyle="round" borderColor="yellow" paddingX={1}>
        <Text color="yellow">Insufficient data: {outcome.reason}</Text>
      </Box>
    )
  }

  const { currentBalance, averageMonthlySavings, bestMonth, worstMonth } = outcome.metrics
  const money = (amount: number) => formatMoney(amount, display)
  const tone = (amount: number) => (amount >= 0 ? 'green' : 'red')

  return (
    <Box gap={1} flexWrap="wrap">
      <KpiCard title="Current Balance" value={money(currentBalance)} color={tone(currentBalance)} />
      <KpiCard
        title="Avg Monthly Savings"
        value={money(averageMonthlySavings)}
        color={tone(averageMonthlySavings)}
      />
      <KpiCard
        title="Best Month"
        value={money(bestMonth.netIncome)}
        color={tone(bestMonth.netIncome)}
        hint={formatMonthLabel(bestMonth.month)}
      />
      <KpiCard
        title="Worst Month"
        value={money(worstMonth.netIncome)}
        color={tone(worstMonth.netIncome)}
        hint={formatMonthLabel(worstMonth.month)}
      />
    </Box>
  )
}
