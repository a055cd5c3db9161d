import { describe, it, expect } from 'vitest'
import { groupByMonth, summarizeByMonth } from '../aggregator.js'
import { formatMonthKey } from '../month-key.js'
import { createMockTransaction, createSampleTransactions } from '../../test-utils/fixtures.js'

describe('groupByMonth', () => {
  it('groups by calendar month regardless of day', () => {
    const groups = groupByMonth([
      createMockTransaction({ date: '2026-01-01' }),
      createMockTransaction({ date: '2026-02-01' }),
      createMockTransaction({ date: '2026-01-31' }),
    ])

    expect([...groups.keys()]).toEqual(['2026-01', '2026-02'])
    expect(groups.get('2026-01')?.items).toHaveLength(2)
  })

  it('handles year rollover (December to January)', () => {
    const groups = groupByMonth([
      createMockTransaction({ date: '2025-12-31' }),
      createMockTransaction({ date: '2026-01-01' }),
    ])

    expect([...groups.keys()]).toEqual(['2025-12', '2026-01'])
  })
})

describe('summarizeByMonth', () => {
  it('summarizes income, expenses and categories per month', () => {
    const summaries = summarizeByMonth(createSampleTransactions())

    expect(summaries).toEqual([
      {
        month: { year: 2026, month: 1 },
        totalIncome: 3000,
        totalExpenses: 120.5,
        netIncome: 2879.5,
        categoryBreakdown: { Groceries: 120.5 },
      },
      {
        month: { year: 2026, month: 2 },
        totalIncome: 0,
        totalExpenses: 4.5,
        netIncome: -4.5,
        categoryBreakdown: { Dining: 4.5 },
      },
    ])
  })

  it('sorts months chronologically whatever the input order', () => {
    const summaries = summarizeByMonth([
      createMockTransaction({ date: '2026-03-01' }),
      createMockTransaction({ date: '2025-11-20' }),
      createMockTransaction({ date: '2026-01-10' }),
    ])

    expect(summaries.map((s) => formatMonthKey(s.month))).toEqual(['2025-11', '2026-01', '2026-03'])
  })

  it('does not synthesize months without transactions', () => {
    const summaries = summarizeByMonth([
      createMockTransaction({ date: '2026-01-10' }),
      createMockTransaction({ date: '2026-04-10' }),
    ])

    expect(summaries).toHaveLength(2)
  })

  it('ignores zero values for income, expenses and categories', () => {
    const [summary] = summarizeByMonth([
      createMockTransaction({ category: 'Adjustments', value: 0 }),
    ])

    expect(summary.totalIncome).toBe(0)
    expect(summary.totalExpenses).toBe(0)
    expect(summary.categoryBreakdown).toEqual({})
  })

  it('leaves the breakdown empty for income-only months', () => {
    const [summary] = summarizeByMonth([
      createMockTransaction({ category: 'Salary', value: 3000 }),
    ])

    expect(summary.categoryBreakdown).toEqual({})
  })

  it('treats category names case-sensitively', () => {
    const [summary] = summarizeByMonth([
      createMockTransaction({ category: 'Dining', value: -5 }),
      createMockTransaction({ category: 'dining', value: -7 }),
      createMockTransaction({ category: 'Dining', value: -3 }),
    ])

    expect(summary.categoryBreakdown).toEqual({ Dining: 8, dining: 7 })
  })

  it('returns nothing for no transactions', () => {
    expect(summarizeByMonth([])).toEqual([])
  })

  describe('invariants', () => {
    const transactions = [
      createMockTransaction({ date: '2026-01-03', category: 'Rent', value: -950.25 }),
      createMockTransaction({ date: '2026-01-09', category: 'Dining', value: -12.4 }),
      createMockTransaction({ date: '2026-01-28', category: 'Salary', value: 2100.1 }),
      createMockTransaction({ date: '2026-03-02', category: 'Dining', value: -33.3 }),
      createMockTransaction({ date: '2026-03-15', category: 'Refund', value: 19.99 }),
      createMockTransaction({ date: '2026-03-20', category: 'Transport', value: -2.75 }),
    ]

    it('keeps totals non-negative and net = income - expenses', () => {
      for (const summary of summarizeByMonth(transactions)) {
        expect(summary.totalIncome).toBeGreaterThanOrEqual(0)
        expect(summary.totalExpenses).toBeGreaterThanOrEqual(0)
        expect(summary.netIncome).toBe(summary.totalIncome - summary.totalExpenses)
      }
    })

    it('conserves expenses across categories', () => {
      for (const summary of summarizeByMonth(transactions)) {
        const categorySum = Object.values(summary.categoryBreakdown).reduce((a, b) => a + b, 0)
        expect(categorySum).toBeCloseTo(summary.totalExpenses, 9)
      }
    })

    it('produces strictly increasing months', () => {
      const keys = summarizeByMonth(transactions).map((s) => formatMonthKey(s.month))
      expect(keys).toEqual([...keys].sort())
      expect(new Set(keys).size).toBe(keys.length)
    })
  })
})
