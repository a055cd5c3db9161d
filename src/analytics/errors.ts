export type AnalysisErrorCode =
  | 'SCHEMA_ERROR'
  | 'EMPTY_FILE'
  | 'TYPE_ERROR'
  | 'DATE_ERROR'
  | 'MIXED_CURRENCY'
  | 'CONFIGURATION_ERROR'
  | 'WORKBOOK_READ_ERROR'

/**
 * Base class for every error raised or reported by the analysis pipeline.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode

  constructor(code: AnalysisErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** The file does not have the fixed four-column shape. */
export class SchemaError extends AnalysisError {
  /** 1-based row number in the file, header included */
  readonly rowNumber: number
  readonly columnCount: number

  constructor(rowNumber: number, columnCount: number) {
    super(
      'SCHEMA_ERROR',
      `wrong column count: expected 4 columns (date, description, category, value), found ${columnCount} in row ${rowNumber}`
    )
    this.rowNumber = rowNumber
    this.columnCount = columnCount
  }
}

export class EmptyFileError extends AnalysisError {
  constructor() {
    super('EMPTY_FILE', 'File is empty or contains only a header row')
  }
}

/** A value field is not a decimal number. */
export class ValueTypeError extends AnalysisError {
  /** 1-based data row number (header excluded) */
  readonly rowNumber: number
  readonly column = 'value' as const

  constructor(rowNumber: number, received: string) {
    super('TYPE_ERROR', `non-numeric value in row ${rowNumber}: "${received}"`)
    this.rowNumber = rowNumber
  }
}

/** A date field is not a recognizable calendar date. */
export class DateError extends AnalysisError {
  /** 1-based data row number (header excluded) */
  readonly rowNumber: number
  readonly column = 'date' as const

  constructor(rowNumber: number, received: string) {
    super(
      'DATE_ERROR',
      `invalid date in row ${rowNumber}: "${received}" (expected YYYY-MM-DD, MM/DD/YYYY or DD/MM/YYYY)`
    )
    this.rowNumber = rowNumber
  }
}

/** The value column uses more than one currency symbol. */
export class MixedCurrencyError extends AnalysisError {
  readonly column = 'value' as const
  /** Symbols in order of first appearance */
  readonly symbols: readonly string[]

  constructor(symbols: readonly string[]) {
    super(
      'MIXED_CURRENCY',
      'Multiple currencies detected. Please ensure all values use the same currency.'
    )
    this.symbols = symbols
  }
}

export type ValidationError =
  | SchemaError
  | EmptyFileError
  | MixedCurrencyError
  | ValueTypeError
  | DateError

export class ConfigurationError extends AnalysisError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message)
  }
}

export class WorkbookReadError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super('WORKBOOK_READ_ERROR', `Failed to read workbook: ${message}`, { cause })
  }
}

/**
 * Row and column details for display, where the error carries them.
 */
export const describeErrorLocation = (
  error: AnalysisError
): { rowNumber?: number; column?: string } => {
  if (error instanceof ValueTypeError || error instanceof DateError) {
    return { rowNumber: error.rowNumber, column: error.column }
  }
  if (error instanceof SchemaError) {
    return { rowNumber: error.rowNumber }
  }
  if (error instanceof MixedCurrencyError) {
    return { column: error.column }
  }
  return {}
}
