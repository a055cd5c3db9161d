import React from 'react'
import { Box, Text } from 'ink'
import type { RollingSeries } from '../analytics/types.js'
import type { DisplayConfig } from '../config/config-types.js'
import { formatMonthKey } from '../analytics/month-key.js'
import { formatMoney } from '../shared/format.js'
import { insufficientHistoryMessage } from '../cli/text-report.js'
import { bar } from './bars.js'

interface RollingViewProps {
  rolling: RollingSeries
  display: DisplayConfig
}

export const RollingView = ({ rolling, display }: RollingViewProps) => {
  const max = Math.max(0, ...rolling.points.map((p) => p.averageExpense))

  return (
    <Box flexDirection="column">
      <Text bold>
        {rolling.window}-month rolling expense average
        {rolling.gapsFilled ? ' (gaps zero-filled)' : ''}
      </Text>
      {rolling.points.length === 0 ? (
        <Text color="yellow">{insufficientHistoryMessage(rolling.window)}</Text>
      ) : (
        rolling.points.map((point) => {
          const key = formatMonthKey(point.month)
          return (
            <Box key={key} gap={1}>
              <Box width={8}>
                <Text dimColor>{key}</Text>
              </Box>
              <Box width={14}>
                <Text>{formatMoney(point.averageExpense, display)}</Text>
              </Box>
              <Text color="yellow">{bar(point.averageExpense, max, 30)}</Text>
            </Box>
          )
        })
      )}
    </Box>
  )
}
