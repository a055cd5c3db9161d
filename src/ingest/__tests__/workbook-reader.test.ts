import { describe, it, expect } from 'vitest'
import * as XLSX from 'xlsx'
import { readWorkbookFile, readWorkbookRows } from '../workbook-reader.js'
import { validateRows } from '../../analytics/validator.js'
import { WorkbookReadError } from '../../analytics/errors.js'

const toXlsxBuffer = (rows: unknown[][]): Buffer => {
  const workbook = XLSX.utils.book_new()
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Transactions')
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
}

describe('readWorkbookRows', () => {
  it('reads the first sheet as positional rows', () => {
    const rows = readWorkbookRows(
      toXlsxBuffer([
        ['date', 'description', 'category', 'value'],
        ['2026-01-15', 'Grocery', 'Groceries', -120.5],
      ])
    )

    expect(rows).toEqual([
      ['date', 'description', 'category', 'value'],
      ['2026-01-15', 'Grocery', 'Groceries', -120.5],
    ])
  })

  it('returns blank cells inside the used range as empty strings', () => {
    const rows = readWorkbookRows(
      toXlsxBuffer([
        ['date', 'description', 'category', 'value'],
        ['2026-01-15', null, 'Groceries', -3],
      ])
    )

    expect(rows[1]).toEqual(['2026-01-15', '', 'Groceries', -3])
  })

  it('keeps CSV cells as text when asked', () => {
    const csv = Buffer.from('date,description,category,value\n03/04/2026,Coffee,Dining,-4.50\n')
    const rows = readWorkbookRows(csv, { textCells: true })

    expect(rows).toEqual([
      ['date', 'description', 'category', 'value'],
      ['03/04/2026', 'Coffee', 'Dining', '-4.50'],
    ])
  })

  it('reads date-formatted serials as calendar dates', () => {
    const worksheet = XLSX.utils.aoa_to_sheet([
      ['date', 'description', 'category', 'value'],
      ['', 'Coffee', 'Dining', -4.5],
    ])
    worksheet['A2'] = { t: 'n', v: 46023, z: 'yyyy-mm-dd' }
    const workbook = XLSX.utils.book_new()
    XLSX.utils.book_append_sheet(workbook, worksheet, 'Transactions')

    const rows = readWorkbookRows(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }))
    expect(rows[1]).toEqual(['2026-01-01', 'Coffee', 'Dining', -4.5])

    const result = validateRows(rows)
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.transactions[0].date).toBe('2026-01-01')
    }
  })

  it('decodes CSV text as UTF-8', () => {
    const csv = Buffer.from('\uFEFFdate,description,category,value\n2026-01-15,Café Crème,Éducation,-4.50\n', 'utf8')
    const rows = readWorkbookRows(csv, { textCells: true })

    expect(rows).toEqual([
      ['date', 'description', 'category', 'value'],
      ['2026-01-15', 'Café Crème', 'Éducation', '-4.50'],
    ])
  })

  it('feeds rows with extra columns through to schema validation', () => {
    const csv = Buffer.from('date,description,category,value\n2026-01-15,Coffee,Dining,-4.50,extra\n')
    const result = validateRows(readWorkbookRows(csv, { textCells: true }))

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('SCHEMA_ERROR')
    }
  })
})

describe('readWorkbookFile', () => {
  it('wraps missing files in a WorkbookReadError', async () => {
    await expect(readWorkbookFile('/nonexistent/transactions.xlsx')).rejects.toBeInstanceOf(
      WorkbookReadError
    )
  })
})
