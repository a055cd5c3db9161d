import type { OutputFormatter } from '../output.js'
import { errorDetails } from '../output.js'
import type { CurrencySymbol, Transaction } from '../../analytics/types.js'
import { validateRows } from '../../analytics/validator.js'
import { readWorkbookFile } from '../../ingest/workbook-reader.js'

export interface LoadedDataset {
  transactions: Transaction[]
  /** Symbol found in the value column, if any */
  currencySymbol: CurrencySymbol | null
}

/**
 * Reads and validates a transaction file. A rejected file is reported through
 * the formatter (exit code 1) with the error code and offending row.
 */
export const loadTransactions = async (
  file: string,
  formatter: OutputFormatter
): Promise<LoadedDataset> => {
  formatter.progress(`Reading ${file}...`)
  const rows = await readWorkbookFile(file)

  const validation = validateRows(rows)
  if (!validation.success) {
    return formatter.error(validation.error.message, errorDetails(validation.error))
  }

  formatter.progress(`Validated ${validation.transactions.length} transactions`)
  return { transactions: validation.transactions, currencySymbol: validation.currencySymbol }
}
