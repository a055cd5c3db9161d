import { describe, it, expect } from 'vitest'
import { buildCategorySeries, buildIncomeExpenseSeries } from '../chart-series.js'
import { summarizeByMonth } from '../aggregator.js'
import { formatMonthKey } from '../month-key.js'
import { createMockTransaction } from '../../test-utils/fixtures.js'

const summaries = summarizeByMonth([
  createMockTransaction({ date: '2026-01-05', category: 'Rent', value: -800 }),
  createMockTransaction({ date: '2026-01-20', category: 'Salary', value: 2000 }),
  createMockTransaction({ date: '2026-01-22', category: 'Dining', value: -40 }),
  createMockTransaction({ date: '2026-03-02', category: 'Dining', value: -60 }),
  createMockTransaction({ date: '2026-03-09', category: 'Books', value: -60 }),
])

describe('buildIncomeExpenseSeries', () => {
  it('emits one point per summarized month', () => {
    expect(buildIncomeExpenseSeries(summaries)).toEqual([
      { month: { year: 2026, month: 1 }, income: 2000, expenses: 840, net: 1160 },
      { month: { year: 2026, month: 3 }, income: 0, expenses: 120, net: -120 },
    ])
  })

  it('inserts zero months when filling gaps', () => {
    const points = buildIncomeExpenseSeries(summaries, { fillGaps: true })

    expect(points.map((p) => formatMonthKey(p.month))).toEqual(['2026-01', '2026-02', '2026-03'])
    expect(points[1]).toEqual({ month: { year: 2026, month: 2 }, income: 0, expenses: 0, net: 0 })
  })

  it('is empty without summaries', () => {
    expect(buildIncomeExpenseSeries([], { fillGaps: true })).toEqual([])
  })
})

describe('buildCategorySeries', () => {
  it('orders series by total, then name', () => {
    const chart = buildCategorySeries(summaries)

    expect(chart.series).toEqual([
      { category: 'Rent', total: 800, values: [800, 0] },
      { category: 'Dining', total: 100, values: [40, 60] },
      { category: 'Books', total: 60, values: [0, 60] },
    ])
  })

  it('aligns values with a gap-filled timeline', () => {
    const chart = buildCategorySeries(summaries, { fillGaps: true })

    expect(chart.months).toHaveLength(3)
    expect(chart.series.find((s) => s.category === 'Dining')?.values).toEqual([40, 0, 60])
  })

  it('treats category names as data, not object members', () => {
    const chart = buildCategorySeries(
      summarizeByMonth([
        createMockTransaction({ date: '2026-01-05', category: 'constructor', value: -30 }),
        createMockTransaction({ date: '2026-01-06', category: '__proto__', value: -5 }),
        createMockTransaction({ date: '2026-02-07', category: 'Dining', value: -20 }),
      ])
    )

    expect(chart.series).toEqual([
      { category: 'constructor', total: 30, values: [30, 0] },
      { category: 'Dining', total: 20, values: [0, 20] },
      { category: '__proto__', total: 5, values: [5, 0] },
    ])
  })
})
