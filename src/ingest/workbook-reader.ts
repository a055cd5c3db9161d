import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import * as XLSX from 'xlsx'
import type { RawCell, RawRow } from '../analytics/types.js'
import { WorkbookReadError } from '../analytics/errors.js'

const TEXT_EXTENSIONS = new Set(['.csv', '.txt'])

export interface ReadOptions {
  /**
   * Treat the data as UTF-8 text (CSV) and keep every cell as a string
   * instead of letting the parser guess numbers and dates.
   */
  textCells?: boolean
}

interface DateFormattedCell {
  t: 'n'
  v: number
  z: string
}

const toRawCell = (value: unknown): RawCell => {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    value === null ||
    value === undefined
  ) {
    return value
  }
  return String(value)
}

const isDateFormattedCell = (cell: unknown): cell is DateFormattedCell =>
  typeof cell === 'object' &&
  cell !== null &&
  't' in cell &&
  cell.t === 'n' &&
  'v' in cell &&
  typeof cell.v === 'number' &&
  'z' in cell &&
  typeof cell.z === 'string' &&
  XLSX.SSF.is_date(cell.z) === true

const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * Date serial to YYYY-MM-DD from the serial's own calendar fields, so the
 * day does not depend on the local timezone.
 */
const serialToIsoDate = (serial: number, date1904: boolean): string => {
  const parsed: unknown = XLSX.SSF.parse_date_code(serial, { date1904 })
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'y' in parsed &&
    typeof parsed.y === 'number' &&
    'm' in parsed &&
    typeof parsed.m === 'number' &&
    'd' in parsed &&
    typeof parsed.d === 'number'
  ) {
    return `${parsed.y}-${pad(parsed.m)}-${pad(parsed.d)}`
  }
  return String(serial)
}

/** Rewrites date-formatted numeric cells as ISO date strings in place. */
const convertDateCells = (sheet: XLSX.WorkSheet, date1904: boolean): void => {
  const ref = sheet['!ref']
  if (!ref) return

  const range = XLSX.utils.decode_range(ref)
  for (let r = range.s.r; r <= range.e.r; r++) {
    for (let c = range.s.c; c <= range.e.c; c++) {
      const address = XLSX.utils.encode_cell({ r, c })
      const cell: unknown = sheet[address]
      if (isDateFormattedCell(cell)) {
        sheet[address] = { t: 's', v: serialToIsoDate(cell.v, date1904) }
      }
    }
  }
}

const parseWorkbook = (data: Buffer | Uint8Array, textCells: boolean): XLSX.WorkBook => {
  if (textCells) {
    const text = Buffer.from(data).toString('utf8').replace(/^\uFEFF/, '')
    return XLSX.read(text, { type: 'string', raw: true })
  }
  return XLSX.read(data, { type: 'buffer', cellDates: false, cellNF: true })
}

/**
 * Parses a workbook and returns the first sheet as positional rows, header
 * row included. Blank cells inside the used range come back as ''.
 * Date-formatted cells come back as YYYY-MM-DD strings.
 */
export const readWorkbookRows = (data: Buffer | Uint8Array, options: ReadOptions = {}): RawRow[] => {
  let workbook: XLSX.WorkBook
  try {
    workbook = parseWorkbook(data, options.textCells ?? false)
  } catch (error) {
    throw new WorkbookReadError(error instanceof Error ? error.message : String(error), error)
  }

  if (workbook.SheetNames.length === 0) return []
  const sheet = workbook.Sheets[workbook.SheetNames[0]]
  convertDateCells(sheet, workbook.Workbook?.WBProps?.date1904 ?? false)

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    blankrows: false,
    raw: true,
  })

  return rows.map((row) => Array.from(row, toRawCell))
}

/**
 * Reads an .xlsx/.xls/.csv file from disk.
 *
 * @example
 * const rows = await readWorkbookFile('transactions.xlsx')
 * const result = validateRows(rows)
 */
export const readWorkbookFile = async (path: string): Promise<RawRow[]> => {
  let data: Buffer
  try {
    data = await readFile(path)
  } catch (error) {
    throw new WorkbookReadError(error instanceof Error ? error.message : String(error), error)
  }

  return readWorkbookRows(data, {
    textCells: TEXT_EXTENSIONS.has(extname(path).toLowerCase()),
  })
}
