import type { SubcategoriesOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { createFormatter } from '../output.js'
import { formatSubcategoryLines } from '../text-report.js'
import {
  allSubcategoryBreakdowns,
  subcategoryBreakdown,
  type CategorySubcategories,
} from '../../subcategories/classifier.js'
import { withFileCurrency } from '../../shared/format.js'
import { loadTransactions } from './dataset.js'

interface SubcategoriesResult {
  success: true
  file: string
  categories: CategorySubcategories[]
  formatted?: string
}

/**
 * Subcategories CLI command implementation.
 *
 * @example
 * expense-insights subcategories transactions.xlsx --category food
 */
export const subcategoriesCommand = async (
  options: SubcategoriesOptions,
  config: AppConfig
): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const { transactions, currencySymbol } = await loadTransactions(options.file, formatter)

  let categories: CategorySubcategories[]
  if (options.category) {
    const breakdown = subcategoryBreakdown(transactions, options.category)
    categories = breakdown.length > 0 ? [{ category: options.category, breakdown }] : []
    if (categories.length === 0) {
      formatter.warn(`No expenses found in categories matching "${options.category}"`)
    }
  } else {
    categories = allSubcategoryBreakdowns(transactions)
  }

  const result: SubcategoriesResult = { success: true, file: options.file, categories }

  if (options.format === 'text') {
    const display = withFileCurrency(config.display, currencySymbol)
    result.formatted = ['', ...formatSubcategoryLines(categories, display), ''].join('\n')
  }

  formatter.success(result)
}
