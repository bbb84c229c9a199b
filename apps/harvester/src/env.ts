/**
 * Environment loader - import before anything that reads process.env
 *
 * Loads apps/harvester/.env.local outside production. Scheduled runs
 * (cron, CI) pass CATALOG_BASE_URL and the output paths directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
