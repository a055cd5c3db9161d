import React from 'react'
import { Box, Text, useInput } from 'ink'

interface HelpScreenProps {
  onClose: () => void
}

export const HelpScreen = ({ onClose }: HelpScreenProps) => {
  useInput((input, key) => {
    if (key.escape || input === '?') {
      onClose()
    }
  })

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Expense Insights - Keyboard Shortcuts</Text>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Screens</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>1-4</Text>         Overview, months, categories, rolling average</Text>
          <Text><Text color="cyan" bold>Tab</Text>         Next screen</Text>
          <Text><Text color="cyan" bold>Shift+Tab</Text>   Previous screen</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Months and Categories</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>j/k</Text> or <Text color="cyan" bold>↑/↓</Text>   Select month</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Analysis</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>g</Text>           Toggle zero-filling of months without expenses</Text>
          <Text dimColor>Run with --window to change the rolling window</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Global</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>?</Text>           Show this help</Text>
          <Text><Text color="cyan" bold>q</Text>           Quit</Text>
        </Box>
      </Box>

      <Box marginTop={2}>
        <Text dimColor>Press Esc or ? to close</Text>
      </Box>
    </Box>
  )
}
