import React from 'react'
import { Box, Text } from 'ink'
import type { Screen } from '../../navigation/navigation-atoms.js'

interface KeyHint {
  key: string
  label: string
}

const GLOBAL_HINTS: KeyHint[] = [
  { key: '1-4', label: 'screens' },
  { key: 'g', label: 'fill gaps' },
  { key: '?', label: 'help' },
  { key: 'q', label: 'quit' },
]

/** Screens with a month cursor */
const CURSOR_SCREENS: ReadonlySet<Screen> = new Set(['months', 'categories'])

export const hintsFor = (screen: Screen): KeyHint[] =>
  CURSOR_SCREENS.has(screen)
    ? [GLOBAL_HINTS[0], { key: 'j/k', label: 'month' }, ...GLOBAL_HINTS.slice(1)]
    : GLOBAL_HINTS

interface KeyHintsProps {
  screen: Screen
}

export const KeyHints = ({ screen }: KeyHintsProps) => (
  <Box marginTop={1} gap={2} flexWrap="wrap">
    {hintsFor(screen).map(({ key, label }) => (
      <Box key={key} gap={1}>
        <Text color="cyan" bold>
          {key}
        </Text>
        <Text dimColor>{label}</Text>
      </Box>
    ))}
  </Box>
)
