import React, { useEffect, useMemo } from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import { createStore, useAtomValue, useSetAtom } from 'jotai'
import { Provider } from 'jotai/react'

import {
  currentScreenAtom,
  navigateAtom,
  nextScreenAtom,
  goBackAtom,
  SCREEN_ORDER,
} from './navigation/navigation-atoms.js'
import {
  loadStateAtom,
  reportAtom,
  incomeExpenseSeriesAtom,
  categoryChartAtom,
  selectedMonthAtom,
  monthCursorAtom,
  fillGapsAtom,
  rollingWindowAtom,
  currencySymbolAtom,
  datasetLoadedAtom,
  datasetRejectedAtom,
  moveMonthCursorAtom,
  toggleFillGapsAtom,
} from './dashboard/dashboard-atoms.js'
import { KpiCards } from './dashboard/KpiCards.js'
import { IncomeExpenseChart } from './dashboard/IncomeExpenseChart.js'
import { MonthsView } from './dashboard/MonthsView.js'
import { CategoriesView } from './dashboard/CategoriesView.js'
import { RollingView } from './dashboard/RollingView.js'
import { HelpScreen } from './shared/components/HelpScreen.js'
import { StatusBar } from './shared/components/StatusBar.js'
import { KeyHints } from './shared/components/KeyHints.js'
import { readWorkbookFile } from './ingest/workbook-reader.js'
import { validateRows } from './analytics/validator.js'
import { AnalysisError, WorkbookReadError, describeErrorLocation } from './analytics/errors.js'
import type { AppConfig } from './config/config-types.js'
import { withFileCurrency } from './shared/format.js'

interface AppContentProps {
  file: string
  config: AppConfig
}

const AppContent = ({ file, config }: AppContentProps) => {
  const { exit } = useApp()
  const screen = useAtomValue(currentScreenAtom)
  const loadState = useAtomValue(loadStateAtom)
  const report = useAtomValue(reportAtom)
  const incomeExpense = useAtomValue(incomeExpenseSeriesAtom)
  const categoryChart = useAtomValue(categoryChartAtom)
  const selectedMonth = useAtomValue(selectedMonthAtom)
  const cursor = useAtomValue(monthCursorAtom)
  const fillGaps = useAtomValue(fillGapsAtom)
  const currencySymbol = useAtomValue(currencySymbolAtom)
  const display = withFileCurrency(config.display, currencySymbol)

  const navigate = useSetAtom(navigateAtom)
  const nextScreen = useSetAtom(nextScreenAtom)
  const goBack = useSetAtom(goBackAtom)
  const datasetLoaded = useSetAtom(datasetLoadedAtom)
  const datasetRejected = useSetAtom(datasetRejectedAtom)
  const moveCursor = useSetAtom(moveMonthCursorAtom)
  const toggleFillGaps = useSetAtom(toggleFillGapsAtom)

  // Initial load
  useEffect(() => {
    readWorkbookFile(file)
      .then((rows) => {
        const validation = validateRows(rows)
        if (validation.success) {
          datasetLoaded(validation)
        } else {
          datasetRejected(validation.error)
        }
      })
      .catch((err: unknown) => {
        datasetRejected(
          err instanceof AnalysisError
            ? err
            : new WorkbookReadError(err instanceof Error ? err.message : String(err), err)
        )
      })
  }, [file])

  useInput(
    (input, key) => {
      if (input === 'q') {
        exit()
        return
      }
      if (loadState.status !== 'ready') return

      const index = Number(input)
      if (Number.isInteger(index) && index >= 1 && index <= SCREEN_ORDER.length) {
        navigate(SCREEN_ORDER[index - 1])
      } else if (key.tab) {
        nextScreen(key.shift ? -1 : 1)
      } else if (input === 'j' || key.downArrow) {
        moveCursor(1)
      } else if (input === 'k' || key.upArrow) {
        moveCursor(-1)
      } else if (input === 'g') {
        toggleFillGaps()
      } else if (input === '?') {
        navigate('help')
      }
    },
    { isActive: screen !== 'help' }
  )

  if (loadState.status === 'loading') {
    return <Text color="cyan">Loading {file}...</Text>
  }

  if (loadState.status === 'rejected') {
    const { error } = loadState
    const { rowNumber, column } = describeErrorLocation(error)
    return (
      <Box flexDirection="column" borderStyle="round" borderColor="red" paddingX={1}>
        <Text bold color="red">
          Could not load {file}
        </Text>
        <Text>{error.message}</Text>
        <Text dimColor>
          {error.code}
          {rowNumber !== undefined ? ` · row ${rowNumber}` : ''}
          {column !== undefined ? ` · column ${column}` : ''}
        </Text>
        <Text dimColor>Press q to quit</Text>
      </Box>
    )
  }

  if (screen === 'help') {
    return <HelpScreen onClose={() => goBack()} />
  }

  const renderScreen = () => {
    switch (screen) {
      case 'overview':
        return (
          <Box flexDirection="column" gap={1}>
            <KpiCards outcome={report.metrics} display={display} />
            <IncomeExpenseChart points={incomeExpense} display={display} />
          </Box>
        )
      case 'months':
        return <MonthsView months={report.months} cursor={cursor} display={display} />
      case 'categories':
        return (
          <CategoriesView selected={selectedMonth} chart={categoryChart} display={display} />
        )
      case 'rolling':
        return <RollingView rolling={report.rolling} display={display} />
    }
  }

  return (
    <Box flexDirection="column">
      <StatusBar
        file={file}
        screen={screen}
        transactionCount={report.transactionCount}
        monthCount={report.months.length}
        fillGaps={fillGaps}
      />
      <Box paddingX={1}>{renderScreen()}</Box>
      <KeyHints screen={screen} />
    </Box>
  )
}

interface AppProps {
  file: string
  config: AppConfig
}

export const App = ({ file, config }: AppProps) => {
  const store = useMemo(() => {
    const next = createStore()
    next.set(rollingWindowAtom, config.analysis.rollingWindow)
    next.set(fillGapsAtom, config.analysis.fillGaps)
    return next
  }, [config])

  return (
    <Provider store={store}>
      <Box flexDirection="column">
        <AppContent file={file} config={config} />
      </Box>
    </Provider>
  )
}
