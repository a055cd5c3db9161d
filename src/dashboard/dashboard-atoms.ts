import { atom } from 'jotai'
import type { Transaction, AnalysisReport, CurrencySymbol } from '../analytics/types.js'
import type { AnalysisError } from '../analytics/errors.js'
import { analyzeTransactions } from '../analytics/pipeline.js'
import { DEFAULT_ROLLING_WINDOW } from '../analytics/rolling.js'
import {
  buildCategorySeries,
  buildIncomeExpenseSeries,
  type CategoryChart,
  type IncomeExpensePoint,
} from '../analytics/chart-series.js'

export type LoadState =
  | { status: 'loading' }
  | { status: 'ready' }
  | { status: 'rejected'; error: AnalysisError }

export const loadStateAtom = atom<LoadState>({ status: 'loading' })
export const transactionsAtom = atom<Transaction[]>([])
/** Currency symbol found in the loaded file's values */
export const currencySymbolAtom = atom<CurrencySymbol | null>(null)

export const rollingWindowAtom = atom<number>(DEFAULT_ROLLING_WINDOW)
export const fillGapsAtom = atom<boolean>(false)

/** Index into the month list for the months/categories screens */
export const monthCursorAtom = atom(0)

// Derived analysis, recomputed whenever the inputs change
export const reportAtom = atom<AnalysisReport>((get) =>
  analyzeTransactions(get(transactionsAtom), {
    window: get(rollingWindowAtom),
    fillGaps: get(fillGapsAtom),
  })
)

export const incomeExpenseSeriesAtom = atom<IncomeExpensePoint[]>((get) =>
  buildIncomeExpenseSeries(get(reportAtom).months, { fillGaps: get(fillGapsAtom) })
)

export const categoryChartAtom = atom<CategoryChart>((get) =>
  buildCategorySeries(get(reportAtom).months, { fillGaps: get(fillGapsAtom) })
)

export const selectedMonthAtom = atom((get) => {
  const { months } = get(reportAtom)
  if (months.length === 0) return null
  return months[Math.min(get(monthCursorAtom), months.length - 1)]
})

// Actions
interface LoadedDataset {
  transactions: Transaction[]
  currencySymbol: CurrencySymbol | null
}

export const datasetLoadedAtom = atom(null, (_get, set, dataset: LoadedDataset) => {
  set(transactionsAtom, dataset.transactions)
  set(currencySymbolAtom, dataset.currencySymbol)
  set(monthCursorAtom, 0)
  set(loadStateAtom, { status: 'ready' })
})

export const datasetRejectedAtom = atom(null, (_get, set, error: AnalysisError) => {
  set(transactionsAtom, [])
  set(currencySymbolAtom, null)
  set(loadStateAtom, { status: 'rejected', error })
})

export const moveMonthCursorAtom = atom(null, (get, set, delta: number) => {
  const count = get(reportAtom).months.length
  if (count === 0) return
  const next = Math.max(0, Math.min(count - 1, get(monthCursorAtom) + delta))
  set(monthCursorAtom, next)
})

export const toggleFillGapsAtom = atom(null, (get, set) => {
  set(fillGapsAtom, !get(fillGapsAtom))
})
