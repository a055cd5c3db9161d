import { homedir } from 'node:os'
import { join } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { appConfigSchema, type AppConfig } from './config-types.js'

const CONFIG_DIR = join(homedir(), '.config', 'expense-insights')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

/**
 * Loads the saved config. A missing, unreadable or invalid file counts as
 * "not configured" and yields null.
 */
export const loadConfig = async (): Promise<AppConfig | null> => {
  if (!existsSync(CONFIG_FILE)) return null
  try {
    const content = await readFile(CONFIG_FILE, 'utf-8')
    return appConfigSchema.parse(JSON.parse(content))
  } catch (err) {
    process.stderr.write(
      `Warning: ignoring invalid config at ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}\n`
    )
    return null
  }
}

export const saveConfig = async (config: AppConfig): Promise<void> => {
  await mkdir(CONFIG_DIR, { recursive: true })
  await writeFile(CONFIG_FILE, JSON.stringify(config, null, 2))
}

export const isConfigured = async (): Promise<boolean> => {
  const config = await loadConfig()
  return config !== null
}
