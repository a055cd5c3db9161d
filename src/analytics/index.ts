/**
 * Transaction analytics engine.
 *
 * Turns a validated list of transactions into monthly summaries, headline
 * metrics and a rolling expense average. Presentation (CLI, dashboard) and
 * file reading live elsewhere and only exchange the plain values below.
 */

// Pipeline
export { analyzeRows, analyzeTransactions } from './pipeline.js'

// Stages
export { validateRows, EXPECTED_COLUMN_COUNT } from './validator.js'
export { summarizeByMonth, groupByMonth } from './aggregator.js'
export { computeMetrics, calculateBalance } from './metrics.js'
export {
  rollingExpenseAverage,
  buildMonthlyExpenseSeries,
  assertValidWindow,
  DEFAULT_ROLLING_WINDOW,
} from './rolling.js'

// Chart shaping
export { buildIncomeExpenseSeries, buildCategorySeries } from './chart-series.js'
export type {
  ChartOptions,
  IncomeExpensePoint,
  CategorySeries,
  CategoryChart,
} from './chart-series.js'

// Helpers
export {
  monthKeyOf,
  formatMonthKey,
  parseMonthKey,
  formatMonthLabel,
  compareMonthKeys,
  isSameMonth,
  nextMonthKey,
  monthRange,
} from './month-key.js'
export {
  parseDecimal,
  parseMoney,
  parseCalendarDate,
  cellToText,
  findCurrencySymbols,
  stripCurrencySymbols,
  CURRENCY_SYMBOLS,
} from './field-parsers.js'

// Errors
export {
  AnalysisError,
  SchemaError,
  EmptyFileError,
  ValueTypeError,
  DateError,
  MixedCurrencyError,
  ConfigurationError,
  WorkbookReadError,
  describeErrorLocation,
} from './errors.js'
export type { AnalysisErrorCode, ValidationError } from './errors.js'

// Types
export type {
  RawCell,
  RawRow,
  CurrencySymbol,
  Transaction,
  MonthKey,
  MonthlySummary,
  MonthResult,
  FinancialMetrics,
  MetricsOutcome,
  RollingPoint,
  RollingOptions,
  RollingSeries,
  AnalysisOptions,
  AnalysisReport,
  ValidationResult,
  AnalyzeRowsResult,
} from './types.js'
