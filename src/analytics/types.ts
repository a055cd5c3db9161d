/**
 * Types for the transaction analytics engine.
 *
 * Everything here is a plain value owned by a single analysis run.
 * Monetary values are decimal numbers in the file's currency (positive = income,
 * negative = expense). Dates are ISO `YYYY-MM-DD` strings.
 */

import type { ValidationError } from './errors.js'

/**
 * A single spreadsheet cell as handed over by the ingestion layer.
 * Workbook readers produce strings, numbers, booleans and Dates; blank cells
 * may arrive as null, undefined or ''.
 */
export type RawCell = string | number | boolean | Date | null | undefined

/** One positional row: date, description, category, value */
export type RawRow = readonly RawCell[]

/**
 * A validated transaction.
 *
 * @example
 * const coffee: Transaction = {
 *   date: '2026-02-05',
 *   description: 'Coffee',
 *   category: 'Dining',
 *   value: -4.5,
 * }
 */
export interface Transaction {
  readonly date: string
  readonly description: string
  readonly category: string
  readonly value: number
}

/**
 * Grouping unit for all time-bucketed aggregates. Day-of-month is ignored.
 */
export interface MonthKey {
  readonly year: number
  /** 1-12 */
  readonly month: number
}

/**
 * Income and expense totals for one calendar month.
 *
 * @example
 * const january: MonthlySummary = {
 *   month: { year: 2026, month: 1 },
 *   totalIncome: 3000,
 *   totalExpenses: 120.5,
 *   netIncome: 2879.5,
 *   categoryBreakdown: { Groceries: 120.5 },
 * }
 */
export interface MonthlySummary {
  month: MonthKey
  /** Sum of positive values */
  totalIncome: number
  /** Sum of absolute values of negative values */
  totalExpenses: number
  /** totalIncome - totalExpenses */
  netIncome: number
  /** Expense spend per category (positive amounts, expense transactions only) */
  categoryBreakdown: Record<string, number>
}

export interface MonthResult {
  month: MonthKey
  netIncome: number
}

export interface FinancialMetrics {
  /** Sum of every transaction value */
  currentBalance: number
  /** Mean of monthly net income */
  averageMonthlySavings: number
  /** Month with the highest net income (earliest on ties) */
  bestMonth: MonthResult
  /** Month with the lowest net income (earliest on ties) */
  worstMonth: MonthResult
}

/**
 * Outcome of the metrics calculator.
 * `insufficient-data` is a valid state for an empty dataset, not a failure, and
 * must not be rendered as a $0 balance.
 */
export type MetricsOutcome =
  | { status: 'ok'; metrics: FinancialMetrics }
  | { status: 'insufficient-data'; reason: string }

export interface RollingPoint {
  month: MonthKey
  averageExpense: number
}

export interface RollingOptions {
  /**
   * Zero-fill calendar months without expenses between the first and last
   * expense month before windowing. Off by default: missing months are not
   * synthesized and the window spans the months that exist.
   */
  fillGaps?: boolean
}

export interface AnalysisOptions extends RollingOptions {
  /** Rolling window size in months (default: 3) */
  window?: number
}

export interface RollingSeries {
  window: number
  gapsFilled: boolean
  points: RollingPoint[]
}

/**
 * Everything derived from one validated transaction set.
 */
export interface AnalysisReport {
  transactionCount: number
  /** Chronological, one entry per month that has transactions */
  months: MonthlySummary[]
  metrics: MetricsOutcome
  rolling: RollingSeries
}

/** Currency symbols recognised (and stripped) in the value column */
export type CurrencySymbol = '$' | '€' | '£'

/**
 * Validator output. Bad input is reported here rather than thrown.
 */
export type ValidationResult =
  | { success: true; transactions: Transaction[]; currencySymbol: CurrencySymbol | null }
  | { success: false; error: ValidationError }

export type AnalyzeRowsResult =
  | { success: true; report: AnalysisReport; currencySymbol: CurrencySymbol | null }
  | { success: false; error: ValidationError }
