import { z } from 'zod'

export const analysisConfigSchema = z.object({
  rollingWindow: z.number().int().min(1).max(24).default(3),
  fillGaps: z.boolean().default(false),
})

const isFormattingLocale = (locale: string): boolean => {
  try {
    new Intl.NumberFormat(Intl.getCanonicalLocales(locale))
    return true
  } catch {
    return false
  }
}

export const displayConfigSchema = z.object({
  currency: z
    .string()
    .regex(/^[A-Z]{3}$/, 'Currency must be a three-letter ISO 4217 code such as USD')
    .default('USD'),
  locale: z
    .string()
    .min(2)
    .refine(isFormattingLocale, 'Locale must be a BCP 47 tag such as en-US')
    .default('en-US'),
  maxCategories: z.number().int().min(1).max(50).default(15),
})

export const appConfigSchema = z.object({
  analysis: analysisConfigSchema.default({}),
  display: displayConfigSchema.default({}),
})

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>
export type DisplayConfig = z.infer<typeof displayConfigSchema>
export type AppConfig = z.infer<typeof appConfigSchema>

export const DEFAULT_CONFIG: AppConfig = appConfigSchema.parse({})

export const CURRENCIES = [
  { value: 'USD', label: 'US Dollar', locale: 'en-US' },
  { value: 'EUR', label: 'Euro', locale: 'de-DE' },
  { value: 'GBP', label: 'British Pound', locale: 'en-GB' },
  { value: 'BRL', label: 'Brazilian Real', locale: 'pt-BR' },
  { value: 'JPY', label: 'Japanese Yen', locale: 'ja-JP' },
] as const
