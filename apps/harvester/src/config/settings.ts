/**
 * Pipeline configuration
 *
 * Precedence: built-in defaults < environment < explicit overrides (CLI flags,
 * tests). The result is validated once and passed down explicitly; nothing
 * below the entry points reads process.env.
 */

import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigError } from '../scraper/errors.js'

/** Report templates shipped beside the renderer */
export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../report/templates/', import.meta.url))

const pathSchema = z.string().trim().min(1)

export const pipelineConfigSchema = z.object({
  baseUrl: z
    .string()
    .trim()
    .url()
    .refine(value => /^https?:\/\//i.test(value), 'must be an http(s) URL'),
  historyJsonPath: pathSchema,
  csvPath: pathSchema,
  imagesDir: pathSchema,
  reportHtmlPath: pathSchema,
  templatesDir: pathSchema,
})

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>

export const DEFAULT_CONFIG: PipelineConfig = {
  baseUrl: 'https://catalog.example.com/iphone-catalog/',
  historyJsonPath: 'data/prices.json',
  csvPath: 'data/prices.csv',
  imagesDir: 'data/images',
  reportHtmlPath: 'reports/index.html',
  templatesDir: DEFAULT_TEMPLATES_DIR,
}

const ENV_KEYS: Record<Exclude<keyof PipelineConfig, 'templatesDir'>, string> = {
  baseUrl: 'CATALOG_BASE_URL',
  historyJsonPath: 'HISTORY_JSON_PATH',
  csvPath: 'HISTORY_CSV_PATH',
  imagesDir: 'IMAGES_DIR',
  reportHtmlPath: 'REPORT_HTML_PATH',
}

function compact(input: Partial<PipelineConfig>): Partial<PipelineConfig> {
  const out: Partial<PipelineConfig> = {}
  for (const [key, value] of Object.entries(input)) {
    if (typeof value === 'string' && value !== '') {
      Object.assign(out, { [key]: value })
    }
  }
  return out
}

export function configFromEnv(env: NodeJS.ProcessEnv): Partial<PipelineConfig> {
  return compact({
    baseUrl: env[ENV_KEYS.baseUrl],
    historyJsonPath: env[ENV_KEYS.historyJsonPath],
    csvPath: env[ENV_KEYS.csvPath],
    imagesDir: env[ENV_KEYS.imagesDir],
    reportHtmlPath: env[ENV_KEYS.reportHtmlPath],
  })
}

/**
 * @throws ConfigError naming the first invalid field
 */
export function loadConfig(
  overrides: Partial<PipelineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const merged = { ...DEFAULT_CONFIG, ...configFromEnv(env), ...compact(overrides) }
  const result = pipelineConfigSchema.safeParse(merged)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ConfigError(issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error')
  }
  return result.data
}
