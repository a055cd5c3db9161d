import { loadConfig as loadConfigFile } from './config-service.js'
import { appConfigSchema, DEFAULT_CONFIG, type AppConfig } from './config-types.js'
import { ConfigurationError } from '../analytics/errors.js'

/**
 * Environment variable names for CLI automation
 */
export const ENV_VARS = {
  WINDOW: 'EXPENSE_INSIGHTS_WINDOW',
  FILL_GAPS: 'EXPENSE_INSIGHTS_FILL_GAPS',
  CURRENCY: 'EXPENSE_INSIGHTS_CURRENCY',
  LOCALE: 'EXPENSE_INSIGHTS_LOCALE',
} as const

/**
 * Values given on the command line. They win over env vars and the file.
 */
export interface ConfigOverrides {
  window?: number
  fillGaps?: boolean
}

interface LoadConfigResult {
  config: AppConfig
  source: 'defaults' | 'env' | 'file' | 'mixed'
}

const parseBooleanEnv = (value: string | undefined): boolean | undefined => {
  if (value === undefined) return undefined
  const lower = value.trim().toLowerCase()
  if (lower === '1' || lower === 'true' || lower === 'yes') return true
  if (lower === '0' || lower === 'false' || lower === 'no') return false
  return undefined
}

const parseNumberEnv = (value: string | undefined): number | undefined =>
  value === undefined || value.trim() === '' ? undefined : Number(value)

/**
 * Load config from environment variables, with fallback to config file and
 * then defaults. Priority: CLI overrides > env vars > file > defaults.
 * Throws ConfigurationError when the merged values are invalid.
 */
export const loadConfigWithEnv = async (
  overrides: ConfigOverrides = {}
): Promise<LoadConfigResult> => {
  const fileConfig = await loadConfigFile()
  const base = fileConfig ?? DEFAULT_CONFIG

  const envWindow = parseNumberEnv(process.env[ENV_VARS.WINDOW])
  const envFillGaps = parseBooleanEnv(process.env[ENV_VARS.FILL_GAPS])
  const envCurrency = process.env[ENV_VARS.CURRENCY] || undefined
  const envLocale = process.env[ENV_VARS.LOCALE] || undefined

  const merged = {
    analysis: {
      rollingWindow: overrides.window ?? envWindow ?? base.analysis.rollingWindow,
      fillGaps: overrides.fillGaps ?? envFillGaps ?? base.analysis.fillGaps,
    },
    display: {
      currency: envCurrency ?? base.display.currency,
      locale: envLocale ?? base.display.locale,
      maxCategories: base.display.maxCategories,
    },
  }

  const validated = appConfigSchema.safeParse(merged)
  if (!validated.success) {
    const problems = validated.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration: ${problems}`)
  }

  const fromEnv =
    envWindow !== undefined ||
    envFillGaps !== undefined ||
    envCurrency !== undefined ||
    envLocale !== undefined

  let source: LoadConfigResult['source']
  if (fileConfig) {
    source = fromEnv ? 'mixed' : 'file'
  } else {
    source = fromEnv ? 'env' : 'defaults'
  }

  return { config: validated.data, source }
}
