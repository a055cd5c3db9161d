import type { RawCell, RawRow, Transaction } from '../analytics/types.js'

export const HEADER_ROW: RawRow = ['date', 'description', 'category', 'value']

/**
 * Creates a mock Transaction with sensible defaults
 */
export const createMockTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  date: '2026-01-15',
  description: 'Test Purchase',
  category: 'Groceries',
  value: -10,
  ...overrides,
})

/**
 * Builds a sheet (header row first) from data rows.
 */
export const sheet = (...dataRows: RawCell[][]): RawRow[] => [HEADER_ROW, ...dataRows]

/**
 * Transactions for the same month pattern used across analytics tests:
 * groceries and salary in January, a coffee in February.
 */
export const createSampleTransactions = (): Transaction[] => [
  createMockTransaction({ date: '2026-01-15', description: 'Grocery', category: 'Groceries', value: -120.5 }),
  createMockTransaction({ date: '2026-01-30', description: 'Salary', category: 'Salary', value: 3000 }),
  createMockTransaction({ date: '2026-02-05', description: 'Coffee', category: 'Dining', value: -4.5 }),
]
