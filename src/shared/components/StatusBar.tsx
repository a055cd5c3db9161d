import React from 'react'
import { Box, Text } from 'ink'
import { SCREEN_ORDER, SCREEN_TITLES, type Screen } from '../../navigation/navigation-atoms.js'

interface StatusBarProps {
  file: string
  screen: Screen
  transactionCount: number
  monthCount: number
  fillGaps: boolean
}

export const StatusBar = ({
  file,
  screen,
  transactionCount,
  monthCount,
  fillGaps,
}: StatusBarProps) => (
  <Box
    borderStyle="single"
    borderColor="gray"
    paddingX={1}
    justifyContent="space-between"
  >
    <Box gap={2}>
      <Text bold color="green">
        {file}
      </Text>
      {SCREEN_ORDER.map((name, index) => (
        <Text key={name} color={name === screen ? 'cyan' : undefined} dimColor={name !== screen}>
          {index + 1} {SCREEN_TITLES[name]}
        </Text>
      ))}
    </Box>
    <Box gap={2}>
      {fillGaps && <Text color="yellow">gaps filled</Text>}
      <Text dimColor>
        {transactionCount} transactions · {monthCount} months
      </Text>
    </Box>
  </Box>
)
