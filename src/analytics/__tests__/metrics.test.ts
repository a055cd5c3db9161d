import { describe, it, expect } from 'vitest'
import { calculateBalance, computeMetrics } from '../metrics.js'
import { summarizeByMonth } from '../aggregator.js'
import { createMockTransaction, createSampleTransactions } from '../../test-utils/fixtures.js'

describe('calculateBalance', () => {
  it('sums every transaction value', () => {
    expect(calculateBalance(createSampleTransactions())).toBe(2875)
  })

  it('is zero for no transactions', () => {
    expect(calculateBalance([])).toBe(0)
  })
})

describe('computeMetrics', () => {
  it('computes balance, savings and extreme months', () => {
    const transactions = createSampleTransactions()
    const outcome = computeMetrics(transactions, summarizeByMonth(transactions))

    expect(outcome).toEqual({
      status: 'ok',
      metrics: {
        currentBalance: 2875,
        averageMonthlySavings: 1437.5,
        bestMonth: { month: { year: 2026, month: 1 }, netIncome: 2879.5 },
        worstMonth: { month: { year: 2026, month: 2 }, netIncome: -4.5 },
      },
    })
  })

  it('picks the smaller positive month as worst when everything is income', () => {
    const transactions = [
      createMockTransaction({ date: '2026-01-10', category: 'Salary', value: 3000 }),
      createMockTransaction({ date: '2026-02-10', category: 'Salary', value: 2500 }),
    ]
    const summaries = summarizeByMonth(transactions)
    const outcome = computeMetrics(transactions, summaries)

    expect(outcome.status).toBe('ok')
    if (outcome.status === 'ok') {
      expect(outcome.metrics.worstMonth).toEqual({ month: { year: 2026, month: 2 }, netIncome: 2500 })
      expect(outcome.metrics.bestMonth).toEqual({ month: { year: 2026, month: 1 }, netIncome: 3000 })
    }
    expect(summaries.map((s) => s.categoryBreakdown)).toEqual([{}, {}])
  })

  it('breaks ties in favour of the earliest month', () => {
    const transactions = [
      createMockTransaction({ date: '2026-03-10', value: -50 }),
      createMockTransaction({ date: '2026-01-10', value: -50 }),
      createMockTransaction({ date: '2026-02-10', value: -50 }),
    ]
    const outcome = computeMetrics(transactions, summarizeByMonth(transactions))

    expect(outcome.status).toBe('ok')
    if (outcome.status === 'ok') {
      expect(outcome.metrics.bestMonth.month).toEqual({ year: 2026, month: 1 })
      expect(outcome.metrics.worstMonth.month).toEqual({ year: 2026, month: 1 })
    }
  })

  it('uses one month as both best and worst', () => {
    const transactions = [createMockTransaction({ value: -20 })]
    const outcome = computeMetrics(transactions, summarizeByMonth(transactions))

    expect(outcome.status).toBe('ok')
    if (outcome.status === 'ok') {
      expect(outcome.metrics.bestMonth).toEqual(outcome.metrics.worstMonth)
      expect(outcome.metrics.averageMonthlySavings).toBe(-20)
    }
  })

  it('reports insufficient data for zero months', () => {
    expect(computeMetrics([], [])).toEqual({
      status: 'insufficient-data',
      reason: 'No months with transactions to analyze',
    })
  })

  it('matches the sum of monthly net income', () => {
    const transactions = [
      createMockTransaction({ date: '2025-12-03', value: -950.25 }),
      createMockTransaction({ date: '2026-01-09', value: 2100.1 }),
      createMockTransaction({ date: '2026-01-19', value: -12.4 }),
      createMockTransaction({ date: '2026-03-02', value: 19.99 }),
    ]
    const summaries = summarizeByMonth(transactions)
    const outcome = computeMetrics(transactions, summaries)

    expect(outcome.status).toBe('ok')
    if (outcome.status === 'ok') {
      const netSum = summaries.reduce((sum, s) => sum + s.netIncome, 0)
      expect(outcome.metrics.currentBalance).toBeCloseTo(netSum, 9)
    }
  })
})
