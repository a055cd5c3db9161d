import type { DisplayConfig } from '../config/config-types.js'
import type { CurrencySymbol } from '../analytics/types.js'

export type MoneyFormat = Pick<DisplayConfig, 'currency' | 'locale'>

/** Currency assumed for a symbol found in the file */
const SYMBOL_CURRENCIES: Record<CurrencySymbol, string> = {
  $: 'USD',
  '€': 'EUR',
  '£': 'GBP',
}

const narrowSymbol = (currency: string): string | undefined =>
  new Intl.NumberFormat('en', { style: 'currency', currency, currencyDisplay: 'narrowSymbol' })
    .formatToParts(0)
    .find((part) => part.type === 'currency')?.value

/**
 * Display settings for a file whose values carried `symbol`. The configured
 * currency is kept when it already renders with that symbol (CAD for `$`),
 * otherwise the symbol's usual currency is used.
 *
 * @example
 * withFileCurrency({ currency: 'USD', locale: 'en-US', maxCategories: 15 }, '€')
 * // => { currency: 'EUR', locale: 'en-US', maxCategories: 15 }
 */
export const withFileCurrency = <T extends MoneyFormat>(
  display: T,
  symbol: CurrencySymbol | null
): T => {
  if (symbol === null || narrowSymbol(display.currency) === symbol) return display
  return { ...display, currency: SYMBOL_CURRENCIES[symbol] }
}

/**
 * Format an amount as currency using the configured locale.
 *
 * @example
 * formatMoney(-4.5, { currency: 'USD', locale: 'en-US' }) // => '-$4.50'
 */
export const formatMoney = (amount: number, display: MoneyFormat): string =>
  new Intl.NumberFormat(display.locale, { style: 'currency', currency: display.currency }).format(
    amount
  )

/**
 * Short form for narrow terminal cells: thousands and up use compact notation.
 *
 * @example
 * formatCompact(2879.5, { currency: 'USD', locale: 'en-US' }) // => '$2.9K'
 * formatCompact(-4.5, { currency: 'USD', locale: 'en-US' })   // => '-$4.50'
 */
export const formatCompact = (amount: number, display: MoneyFormat): string => {
  if (Math.abs(amount) < 1000) return formatMoney(amount, display)
  return new Intl.NumberFormat(display.locale, {
    style: 'currency',
    currency: display.currency,
    notation: 'compact',
    minimumFractionDigits: 0,
    maximumFractionDigits: 1,
  }).format(amount)
}

/**
 * Format a percentage with one decimal place
 */
export const formatPercent = (value: number): string => `${value.toFixed(1)}%`
