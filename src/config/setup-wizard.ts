import * as p from '@clack/prompts'
import { CURRENCIES, type AppConfig } from './config-types.js'
import { saveConfig, getConfigPath } from './config-service.js'

function cancelSetup(): never {
  p.cancel('Setup cancelled')
  process.exit(0)
}

/**
 * Interactive setup wizard for first-time configuration.
 * Asks for the rolling window, gap policy and display currency.
 */
export const runSetupWizard = async (): Promise<AppConfig> => {
  p.intro('Welcome to Expense Insights')

  const rollingWindow = await p.text({
    message: 'How many months should the rolling expense average cover?',
    placeholder: '3',
    initialValue: '3',
    validate: (value) => {
      const n = Number(value)
      if (!Number.isInteger(n) || n < 1 || n > 24) return 'Enter a whole number between 1 and 24'
    },
  })
  if (p.isCancel(rollingWindow)) cancelSetup()

  const fillGaps = await p.confirm({
    message: 'Treat months without expenses as $0 months in the rolling average?',
    initialValue: false,
  })
  if (p.isCancel(fillGaps)) cancelSetup()

  const currency = await p.select({
    message: 'Select the currency used in your files',
    options: CURRENCIES.map((c) => ({
      value: c.value,
      label: `${c.label} (${c.value})`,
    })),
  })
  if (p.isCancel(currency)) cancelSetup()

  const selected = CURRENCIES.find((c) => c.value === currency) ?? CURRENCIES[0]

  const config: AppConfig = {
    analysis: {
      rollingWindow: Number(rollingWindow),
      fillGaps: fillGaps === true,
    },
    display: {
      currency: selected.value,
      locale: selected.locale,
      maxCategories: 15,
    },
  }

  await saveConfig(config)
  p.outro(`Configuration saved to ${getConfigPath()}`)

  return config
}
