import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../ingestion/text/errors.js'
import { loadSettings } from '../settings.js'

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      inputRoot: 'data/input',
      outputDir: 'data',
      lookupTimeoutMs: 30000,
      lookupMinDelayMs: 500,
      logLevel: undefined,
      logFormat: undefined,
    })
  })

  it('reads overrides and treats blank values as unset', () => {
    const settings = loadSettings({
      HARVESTER_INPUT_ROOT: '/srv/hanja/input',
      HARVESTER_OUTPUT_DIR: '  ',
      LOOKUP_TIMEOUT_MS: '5000',
      LOG_LEVEL: 'WARN',
      LOG_FORMAT: 'json',
    })

    expect(settings).toMatchObject({
      inputRoot: '/srv/hanja/input',
      outputDir: 'data',
      lookupTimeoutMs: 5000,
      logLevel: 'warn',
      logFormat: 'json',
    })
  })

  it('rejects invalid values with the variable name', () => {
    expect(() => loadSettings({ LOOKUP_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError)
    expect(() => loadSettings({ LOG_LEVEL: 'loud' })).toThrow(
      'environment: LOG_LEVEL: must be one of debug, info, warn, error, fatal'
    )
  })
})
