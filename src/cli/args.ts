import { Command, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'

const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url))
    const pkgPath = join(__dirname, '..', '..', 'package.json')
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'))
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
    return '0.0.0'
  } catch {
    return '0.0.0'
  }
}

export type OutputFormat = 'json' | 'text'

export interface GlobalOptions {
  format: OutputFormat
  quiet: boolean
}

/**
 * Analysis settings given on the command line. Unset values fall back to
 * env vars, then the config file.
 */
export interface AnalysisFlags {
  window?: number
  fillGaps?: boolean
}

export interface AnalyzeOptions extends GlobalOptions, AnalysisFlags {
  file: string
  subcategories: boolean
}

export interface ValidateOptions extends GlobalOptions {
  file: string
}

export interface RollingOptions extends GlobalOptions, AnalysisFlags {
  file: string
}

export interface SubcategoriesOptions extends GlobalOptions {
  file: string
  category?: string
}

export type CommandAction =
  | { command: 'analyze'; options: AnalyzeOptions }
  | { command: 'validate'; options: ValidateOptions }
  | { command: 'rolling'; options: RollingOptions }
  | { command: 'subcategories'; options: SubcategoriesOptions }
  | { command: 'tui'; file?: string; forceSetup: boolean; flags: AnalysisFlags }

interface RawGlobalOptions {
  format?: unknown
  quiet?: unknown
}

interface RawAnalysisOptions {
  window?: unknown
  fillGaps?: unknown
}

const toGlobalOptions = (raw: RawGlobalOptions): GlobalOptions => ({
  format: raw.format === 'text' ? 'text' : 'json',
  quiet: raw.quiet === true,
})

const toAnalysisFlags = (raw: RawAnalysisOptions): AnalysisFlags => ({
  window: typeof raw.window === 'string' ? Number(raw.window) : undefined,
  fillGaps: raw.fillGaps === true ? true : undefined,
})

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  const program = new Command()
    .name('expense-insights')
    .description('Monthly income, expense and category analytics for transaction spreadsheets')
    .version(getVersion())
    .enablePositionalOptions()
    // Throw instead of calling process.exit; subcommands inherit this setting
    .exitOverride()
    .argument('[file]', 'Transaction file (.xlsx, .xls or .csv) to open in the dashboard')
    .option('--setup', 'Run the configuration wizard first', false)
    .option('-w, --window <months>', 'Rolling average window in months')
    .option('--fill-gaps', 'Zero-fill months without expenses before windowing')
    .action((file: string | undefined, options: RawAnalysisOptions & { setup?: unknown }) => {
      // Default action when no subcommand is provided - open the dashboard
      result = {
        command: 'tui',
        file,
        forceSetup: options.setup === true,
        flags: toAnalysisFlags(options),
      }
    })

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command) => {
    return cmd
      .addOption(
        new Option('-f, --format <format>', 'Output format').choices(['json', 'text']).default('json')
      )
      .option('-q, --quiet', 'Suppress progress messages', false)
  }

  const addAnalysisOptions = (cmd: Command) => {
    return cmd
      .option('-w, --window <months>', 'Rolling average window in months (default: 3)')
      .option('--fill-gaps', 'Zero-fill months without expenses before windowing')
  }

  // Analyze command
  addAnalysisOptions(
    addGlobalOptions(
      program
        .command('analyze')
        .description('Full report: metrics, monthly summaries, categories and rolling average')
        .argument('<file>', 'Transaction file')
        .option('-s, --subcategories', 'Include subcategory breakdowns', false)
    )
  ).action((file: string, options: RawGlobalOptions & RawAnalysisOptions & { subcategories?: unknown }) => {
    result = {
      command: 'analyze',
      options: {
        ...toGlobalOptions(options),
        ...toAnalysisFlags(options),
        file,
        subcategories: options.subcategories === true,
      },
    }
  })

  // Validate command
  addGlobalOptions(
    program
      .command('validate')
      .description('Check a transaction file against the date/description/category/value layout')
      .argument('<file>', 'Transaction file')
  ).action((file: string, options: RawGlobalOptions) => {
    result = { command: 'validate', options: { ...toGlobalOptions(options), file } }
  })

  // Rolling command
  addAnalysisOptions(
    addGlobalOptions(
      program
        .command('rolling')
        .description('Trailing average of monthly expenses')
        .argument('<file>', 'Transaction file')
    )
  ).action((file: string, options: RawGlobalOptions & RawAnalysisOptions) => {
    result = {
      command: 'rolling',
      options: { ...toGlobalOptions(options), ...toAnalysisFlags(options), file },
    }
  })

  // Subcategories command
  addGlobalOptions(
    program
      .command('subcategories')
      .description('Split expense categories into subcategories by description keywords')
      .argument('<file>', 'Transaction file')
      .option('-c, --category <name>', 'Only this category (case-insensitive, partial match)')
  ).action((file: string, options: RawGlobalOptions & { category?: unknown }) => {
    result = {
      command: 'subcategories',
      options: {
        ...toGlobalOptions(options),
        file,
        category: typeof options.category === 'string' ? options.category : undefined,
      },
    }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const { code } = err
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        return null
      }
    }
    throw err
  }

  return result
}
