import { describe, it, expect } from 'vitest'
import { DEFAULT_CONFIG, configFromEnv, loadConfig } from '../settings.js'
import { ConfigError } from '../../scraper/errors.js'

describe('loadConfig', () => {
  it('uses the defaults when nothing is set', () => {
    expect(loadConfig({}, {})).toEqual(DEFAULT_CONFIG)
  })

  it('layers environment over defaults and overrides over environment', () => {
    const env = {
      CATALOG_BASE_URL: 'http://localhost:8080/catalog/',
      HISTORY_JSON_PATH: 'env/prices.json',
      IMAGES_DIR: 'env/images',
    }

    const config = loadConfig({ historyJsonPath: 'flag/prices.json' }, env)

    expect(config.baseUrl).toBe('http://localhost:8080/catalog/')
    expect(config.historyJsonPath).toBe('flag/prices.json')
    expect(config.imagesDir).toBe('env/images')
    expect(config.csvPath).toBe(DEFAULT_CONFIG.csvPath)
  })

  it('treats empty overrides as unset', () => {
    expect(loadConfig({ baseUrl: '', reportHtmlPath: '' }, {})).toEqual(DEFAULT_CONFIG)
  })

  it('rejects a base URL that is not http(s)', () => {
    expect(() => loadConfig({ baseUrl: 'ftp://catalog.example.com/' }, {})).toThrow(ConfigError)
    expect(() => loadConfig({ baseUrl: 'ftp://catalog.example.com/' }, {})).toThrow(
      'Invalid configuration: baseUrl: must be an http(s) URL'
    )
  })

  it('rejects a base URL that does not parse', () => {
    expect(() => loadConfig({}, { CATALOG_BASE_URL: 'not a url' })).toThrow('Invalid configuration: baseUrl: Invalid url')
  })
})

describe('configFromEnv', () => {
  it('maps only the variables that are set', () => {
    expect(configFromEnv({ HISTORY_CSV_PATH: 'out.csv', REPORT_HTML_PATH: '' })).toEqual({ csvPath: 'out.csv' })
  })
})
