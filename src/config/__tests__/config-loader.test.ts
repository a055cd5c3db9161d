import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { loadConfigWithEnv, ENV_VARS } from '../config-loader.js'
import { loadConfig } from '../config-service.js'
import { ConfigurationError } from '../../analytics/errors.js'
import type { AppConfig } from '../config-types.js'

vi.mock('../config-service.js', () => ({
  loadConfig: vi.fn(),
}))

const mockedLoadConfig = vi.mocked(loadConfig)

const fileConfig: AppConfig = {
  analysis: { rollingWindow: 6, fillGaps: false },
  display: { currency: 'EUR', locale: 'de-DE', maxCategories: 10 },
}

describe('loadConfigWithEnv', () => {
  beforeEach(() => {
    mockedLoadConfig.mockReset()
    for (const name of Object.values(ENV_VARS)) {
      vi.stubEnv(name, '')
    }
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('uses defaults without a file or env vars', async () => {
    mockedLoadConfig.mockResolvedValue(null)

    const { config, source } = await loadConfigWithEnv()

    expect(source).toBe('defaults')
    expect(config).toEqual({
      analysis: { rollingWindow: 3, fillGaps: false },
      display: { currency: 'USD', locale: 'en-US', maxCategories: 15 },
    })
  })

  it('reads the config file', async () => {
    mockedLoadConfig.mockResolvedValue(fileConfig)

    const { config, source } = await loadConfigWithEnv()

    expect(source).toBe('file')
    expect(config).toEqual(fileConfig)
  })

  it('lets env vars override the file', async () => {
    mockedLoadConfig.mockResolvedValue(fileConfig)
    vi.stubEnv(ENV_VARS.WINDOW, '4')
    vi.stubEnv(ENV_VARS.FILL_GAPS, 'yes')
    vi.stubEnv(ENV_VARS.CURRENCY, 'GBP')

    const { config, source } = await loadConfigWithEnv()

    expect(source).toBe('mixed')
    expect(config.analysis).toEqual({ rollingWindow: 4, fillGaps: true })
    expect(config.display.currency).toBe('GBP')
    expect(config.display.locale).toBe('de-DE')
  })

  it('reports env as the source without a file', async () => {
    mockedLoadConfig.mockResolvedValue(null)
    vi.stubEnv(ENV_VARS.LOCALE, 'en-GB')

    const { config, source } = await loadConfigWithEnv()

    expect(source).toBe('env')
    expect(config.display.locale).toBe('en-GB')
  })

  it('lets command line values win over env vars', async () => {
    mockedLoadConfig.mockResolvedValue(null)
    vi.stubEnv(ENV_VARS.WINDOW, '4')
    vi.stubEnv(ENV_VARS.FILL_GAPS, '0')

    const { config } = await loadConfigWithEnv({ window: 2, fillGaps: true })

    expect(config.analysis).toEqual({ rollingWindow: 2, fillGaps: true })
  })

  it('throws a ConfigurationError for an invalid window', async () => {
    mockedLoadConfig.mockResolvedValue(null)

    await expect(loadConfigWithEnv({ window: 0 })).rejects.toBeInstanceOf(ConfigurationError)
    await expect(loadConfigWithEnv({ window: Number('abc') })).rejects.toThrow(
      /^Invalid configuration: analysis\.rollingWindow: /
    )
  })
})
