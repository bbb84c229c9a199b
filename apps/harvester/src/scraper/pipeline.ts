/**
 * Fetch → validate → cache images → merge → persist, for one cycle.
 *
 * Nothing is written until the cycle's snapshots are all fetched, their
 * images cached and the existing history read and merged. A fault anywhere
 * before the writes leaves the files on disk as they were.
 */

import type { PipelineConfig } from '../config/settings.js'
import { loggers } from '../config/logger.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { ImageCache } from './media/image-cache.js'
import { mergeHistory } from './process/dedupe.js'
import { StaticCatalogSource } from './sources/catalog/index.js'
import { writeCsv } from './storage/csv-store.js'
import { readHistory, writeHistory } from './storage/json-store.js'
import { assertValidSnapshot } from './storage/snapshot-record.js'
import type { Fetcher, Snapshot, Source } from './types.js'

const log = loggers.pipeline

export interface PipelineDeps {
  fetcher?: Fetcher
  /** Defaults to the static catalog over config.baseUrl */
  source?: Source
  imageCache?: ImageCache
}

export interface PipelineResult {
  rows: Snapshot[]
  fetched: number
  existing: number
  total: number
  /** Entries the cycle added to history */
  added: number
}

export function createDefaultSource(config: PipelineConfig, fetcher: Fetcher): Source {
  return new StaticCatalogSource({ baseUrl: config.baseUrl, fetcher })
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
  const fetcher = deps.fetcher ?? new HttpFetcher()
  const source = deps.source ?? createDefaultSource(config, fetcher)
  const imageCache = deps.imageCache ?? new ImageCache(fetcher)

  const fresh = await source.fetch()
  fresh.forEach((snapshot, index) => assertValidSnapshot(snapshot, index))

  const enriched: Snapshot[] = []
  for (const snapshot of fresh) {
    const imagePath = await imageCache.ensureCached(snapshot.imageUrl, snapshot.model, config.imagesDir)
    enriched.push({ ...snapshot, imagePath })
  }

  const existing = await readHistory(config.historyJsonPath)
  const rows = mergeHistory(existing, enriched)

  await writeHistory(config.historyJsonPath, rows)
  await writeCsv(config.csvPath, rows)

  const result: PipelineResult = {
    rows,
    fetched: fresh.length,
    existing: existing.length,
    total: rows.length,
    added: rows.length - existing.length,
  }

  log.info('Pipeline cycle complete', {
    source: source.id,
    fetched: result.fetched,
    existing: result.existing,
    total: result.total,
    added: result.added,
    historyJsonPath: config.historyJsonPath,
    csvPath: config.csvPath,
  })

  return result
}
