import { z } from 'zod'
import type { Transaction } from '../analytics/types.js'
import keywords from './keywords.json' with { type: 'json' }

const ruleSchema = z.object({
  /** Substrings of the category name that select this rule */
  patterns: z.array(z.string().min(1)).min(1),
  /** Subcategory used when no keyword matches */
  fallback: z.string().min(1),
  /** Subcategory name -> description keywords, checked in order */
  subcategories: z.record(z.string(), z.array(z.string().min(1))),
})

const keywordTableSchema = z.object({
  food: ruleSchema,
  transportation: ruleSchema,
  hobbies: ruleSchema,
})

export type SubcategoryRule = z.infer<typeof ruleSchema>

const table = keywordTableSchema.parse(keywords)

/** Rules in priority order: the first whose pattern matches the category wins */
export const SUBCATEGORY_RULES: readonly SubcategoryRule[] = [
  table.food,
  table.transportation,
  table.hobbies,
]

export interface SubcategoryAmount {
  subcategory: string
  /** Absolute spend */
  amount: number
  /** Share of the category total, 0-100 */
  percentage: number
}

export interface CategorySubcategories {
  category: string
  breakdown: SubcategoryAmount[]
}

/**
 * Lowercases and replaces punctuation with spaces so keywords match across
 * "Metro-Transit" and "metro transit".
 */
const normalizeDescription = (description: string): string =>
  description.toLowerCase().replace(/[^\p{L}\p{N}_\s]/gu, ' ')

const findRule = (category: string): SubcategoryRule | undefined => {
  const lower = category.toLowerCase()
  return SUBCATEGORY_RULES.find((rule) => rule.patterns.some((p) => lower.includes(p)))
}

/**
 * Classifies a description under a rule, by keyword substring match.
 */
export const classifyWithRule = (rule: SubcategoryRule, description: string): string => {
  const normalized = normalizeDescription(description)

  for (const [subcategory, words] of Object.entries(rule.subcategories)) {
    if (words.some((word) => normalized.includes(word))) {
      return subcategory
    }
  }

  return rule.fallback
}

/**
 * Assigns a subcategory based on the category and description.
 * Categories without a rule use the category name itself.
 *
 * @example
 * classifySubcategory('Food', 'Grocery Store')     // => 'Groceries'
 * classifySubcategory('Transport', 'Bus Fare')     // => 'Public Transportation'
 * classifySubcategory('Hobbies', 'Gym Membership') // => 'Fitness'
 * classifySubcategory('Rent', 'April rent')        // => 'Rent'
 */
export const classifySubcategory = (category: string, description: string): string => {
  const rule = findRule(category)
  return rule ? classifyWithRule(rule, description) : category
}

const buildBreakdown = (expenses: readonly Transaction[]): SubcategoryAmount[] => {
  const totals = new Map<string, number>()
  for (const tx of expenses) {
    const subcategory = classifySubcategory(tx.category, tx.description)
    totals.set(subcategory, (totals.get(subcategory) ?? 0) + Math.abs(tx.value))
  }

  const categoryTotal = [...totals.values()].reduce((sum, amount) => sum + amount, 0)

  return [...totals.entries()]
    .map(([subcategory, amount]) => ({
      subcategory,
      amount,
      percentage: categoryTotal > 0 ? (amount / categoryTotal) * 100 : 0,
    }))
    .sort((a, b) => b.amount - a.amount || a.subcategory.localeCompare(b.subcategory))
}

/**
 * Spend per subcategory for expense transactions whose category contains
 * `category` (case-insensitive). Empty when nothing matches.
 */
export const subcategoryBreakdown = (
  transactions: readonly Transaction[],
  category: string
): SubcategoryAmount[] => {
  const needle = category.toLowerCase()
  return buildBreakdown(
    transactions.filter((tx) => tx.value < 0 && tx.category.toLowerCase().includes(needle))
  )
}

/**
 * One breakdown per distinct expense category, in order of first appearance.
 */
export const allSubcategoryBreakdowns = (
  transactions: readonly Transaction[]
): CategorySubcategories[] => {
  const byCategory = new Map<string, Transaction[]>()
  for (const tx of transactions) {
    if (tx.value >= 0) continue
    const group = byCategory.get(tx.category)
    if (group) {
      group.push(tx)
    } else {
      byCategory.set(tx.category, [tx])
    }
  }

  return [...byCategory.entries()].map(([category, expenses]) => ({
    category,
    breakdown: buildBreakdown(expenses),
  }))
}
