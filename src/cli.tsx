#!/usr/bin/env node
import React from 'react'
import { render } from 'ink'
import { App } from './app.js'
import { runSetupWizard } from './config/setup-wizard.js'
import { parseArgs, type AnalysisFlags, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv } from './config/config-loader.js'
import {
  analyzeCommand,
  validateCommand,
  rollingCommand,
  subcategoriesCommand,
} from './cli/commands/index.js'

const runTuiMode = async (file: string | undefined, forceSetup: boolean, flags: AnalysisFlags) => {
  if (forceSetup) {
    await runSetupWizard()
  }

  if (!file) {
    if (forceSetup) return
    console.error('Error: a transaction file is required, e.g. expense-insights transactions.xlsx')
    process.exit(1)
  }

  const { config } = await loadConfigWithEnv(flags)
  const instance = render(<App file={file} config={config} />)
  await instance.waitUntilExit()
}

const runCliCommand = async (action: CommandAction) => {
  if (action.command === 'tui') {
    await runTuiMode(action.file, action.forceSetup, action.flags)
    return
  }

  switch (action.command) {
    case 'analyze': {
      const { window, fillGaps } = action.options
      const { config } = await loadConfigWithEnv({ window, fillGaps })
      await analyzeCommand(action.options, config)
      break
    }
    case 'validate':
      await validateCommand(action.options)
      break
    case 'rolling': {
      const { window, fillGaps } = action.options
      const { config } = await loadConfigWithEnv({ window, fillGaps })
      await rollingCommand(action.options, config)
      break
    }
    case 'subcategories': {
      const { config } = await loadConfigWithEnv()
      await subcategoriesCommand(action.options, config)
      break
    }
  }
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCliCommand(action)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

await main()
