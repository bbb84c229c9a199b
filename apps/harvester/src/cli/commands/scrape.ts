import type { PipelineConfig } from '../../config/settings.js'
import { HttpFetcher } from '../../scraper/fetch/http-fetcher.js'
import { createDefaultSource, type PipelineDeps } from '../../scraper/pipeline.js'
import { toSnapshotRecord } from '../../scraper/storage/snapshot-record.js'
import type { CommandIO } from './io.js'

/**
 * Fetch one cycle and print it as a JSON array of records. Writes nothing.
 */
export async function runScrapeCommand(
  config: PipelineConfig,
  io: CommandIO,
  deps: Pick<PipelineDeps, 'fetcher' | 'source'> = {}
): Promise<number> {
  const source = deps.source ?? createDefaultSource(config, deps.fetcher ?? new HttpFetcher())
  const snapshots = await source.fetch()
  io.out(JSON.stringify(snapshots.map(toSnapshotRecord), null, 2))
  return 0
}
