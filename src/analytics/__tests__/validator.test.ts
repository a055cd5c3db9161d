import { describe, it, expect } from 'vitest'
import { validateRows } from '../validator.js'
import { DateError, EmptyFileError, MixedCurrencyError, SchemaError, ValueTypeError } from '../errors.js'
import { HEADER_ROW, sheet } from '../../test-utils/fixtures.js'

describe('validateRows', () => {
  it('converts rows into transactions in input order', () => {
    const result = validateRows(
      sheet(
        ['2026-02-05', 'Coffee', 'Dining', '-4.50'],
        ['2026-01-15', 'Grocery', 'Groceries', -120.5]
      )
    )

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.transactions).toEqual([
        { date: '2026-02-05', description: 'Coffee', category: 'Dining', value: -4.5 },
        { date: '2026-01-15', description: 'Grocery', category: 'Groceries', value: -120.5 },
      ])
    }
  })

  it('ignores header names and uses column positions', () => {
    const result = validateRows([
      ['When', 'What', 'Kind', 'Amount'],
      ['2026-01-15', 'Grocery', 'Groceries', -120.5],
    ])

    expect(result.success).toBe(true)
  })

  it('keeps category names as-is', () => {
    const result = validateRows(sheet(['2026-01-15', 'Lunch', ' dining ', -8]))

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.transactions[0].category).toBe(' dining ')
    }
  })

  it('freezes the returned transactions', () => {
    const result = validateRows(sheet(['2026-01-15', 'Grocery', 'Groceries', -1]))

    expect(result.success).toBe(true)
    if (result.success) {
      expect(Object.isFrozen(result.transactions[0])).toBe(true)
    }
  })

  it('rejects a row with five columns', () => {
    const result = validateRows(
      sheet(
        ['2026-01-15', 'Grocery', 'Groceries', -120.5],
        ['2026-01-16', 'Grocery', 'Groceries', -10, 'extra']
      )
    )

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(SchemaError)
      expect(result.error.code).toBe('SCHEMA_ERROR')
      expect(result.error.message).toBe(
        'wrong column count: expected 4 columns (date, description, category, value), found 5 in row 3'
      )
    }
  })

  it('checks the header width too', () => {
    const result = validateRows([['date', 'description', 'value']])

    expect(result.success).toBe(false)
    if (!result.success && result.error instanceof SchemaError) {
      expect(result.error.rowNumber).toBe(1)
      expect(result.error.columnCount).toBe(3)
    } else {
      expect.unreachable('expected a SchemaError')
    }
  })

  it('rejects a header-only file', () => {
    const result = validateRows([HEADER_ROW])

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(EmptyFileError)
      expect(result.error.message).toBe('File is empty or contains only a header row')
    }
  })

  it('rejects a completely empty file', () => {
    const result = validateRows([])

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(EmptyFileError)
    }
  })

  it('reports the data row of a non-numeric value', () => {
    const result = validateRows(
      sheet(
        ['2026-01-15', 'Grocery', 'Groceries', -120.5],
        ['2026-01-30', 'Salary', 'Salary', 3000],
        ['2026-02-05', 'Coffee', 'Dining', 'four fifty']
      )
    )

    expect(result.success).toBe(false)
    if (!result.success && result.error instanceof ValueTypeError) {
      expect(result.error.rowNumber).toBe(3)
      expect(result.error.column).toBe('value')
      expect(result.error.message).toBe('non-numeric value in row 3: "four fifty"')
    } else {
      expect.unreachable('expected a ValueTypeError')
    }
  })

  it('reports the data row of an invalid date', () => {
    const result = validateRows(
      sheet(['2026-01-15', 'Grocery', 'Groceries', -120.5], ['2026-02-30', 'Coffee', 'Dining', -4.5])
    )

    expect(result.success).toBe(false)
    if (!result.success && result.error instanceof DateError) {
      expect(result.error.rowNumber).toBe(2)
      expect(result.error.column).toBe('date')
      expect(result.error.code).toBe('DATE_ERROR')
    } else {
      expect.unreachable('expected a DateError')
    }
  })

  it('checks every value before any date', () => {
    const result = validateRows(
      sheet(['not-a-date', 'Grocery', 'Groceries', -120.5], ['2026-01-16', 'Coffee', 'Dining', 'x'])
    )

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValueTypeError)
    }
  })

  it('checks the shape before anything else', () => {
    const result = validateRows(sheet(['2026-01-15', 'Grocery', 'Groceries', 'x'], ['2026-01-15', 'Grocery']))

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(SchemaError)
    }
  })

  describe('currency symbols', () => {
    it('strips a single symbol and reports it', () => {
      const result = validateRows(
        sheet(
          ['2026-01-15', 'Salary', 'Salary', '$3000'],
          ['2026-01-20', 'Grocery', 'Groceries', '-$120.50'],
          ['2026-01-21', 'Coffee', 'Dining', -4.5]
        )
      )

      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.currencySymbol).toBe('$')
        expect(result.transactions.map((tx) => tx.value)).toEqual([3000, -120.5, -4.5])
      }
    })

    it('reports no symbol for plain values', () => {
      const result = validateRows(sheet(['2026-01-15', 'Grocery', 'Groceries', '-120.50']))

      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.currencySymbol).toBeNull()
      }
    })

    it('rejects mixed symbols', () => {
      const result = validateRows(
        sheet(
          ['2026-01-15', 'Grocery', 'Groceries', '$100.50'],
          ['2026-01-16', 'Coffee', 'Dining', '€75.00'],
          ['2026-01-17', 'Tea', 'Dining', '£50.25']
        )
      )

      expect(result.success).toBe(false)
      if (!result.success && result.error instanceof MixedCurrencyError) {
        expect(result.error.code).toBe('MIXED_CURRENCY')
        expect(result.error.symbols).toEqual(['$', '€', '£'])
        expect(result.error.message).toBe(
          'Multiple currencies detected. Please ensure all values use the same currency.'
        )
      } else {
        expect.unreachable('expected a MixedCurrencyError')
      }
    })

    it('rejects text that is not a number once the symbol is gone', () => {
      const result = validateRows(
        sheet(['2026-01-15', 'Test', 'Cat1', '$100.00'], ['2026-01-30', 'Test2', 'Cat2', '$invalid'])
      )

      expect(result.success).toBe(false)
      if (!result.success && result.error instanceof ValueTypeError) {
        expect(result.error.rowNumber).toBe(2)
        expect(result.error.message).toBe('non-numeric value in row 2: "$invalid"')
      } else {
        expect.unreachable('expected a ValueTypeError')
      }
    })
  })
})
