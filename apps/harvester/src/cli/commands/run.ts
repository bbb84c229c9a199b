import type { PipelineConfig } from '../../config/settings.js'
import { renderReport } from '../../report/render.js'
import { runPipeline, type PipelineDeps } from '../../scraper/pipeline.js'
import type { CommandIO } from './io.js'

export async function runRunCommand(
  config: PipelineConfig,
  io: CommandIO,
  deps: PipelineDeps = {}
): Promise<number> {
  const result = await runPipeline(config, deps)
  await renderReport(config.historyJsonPath, config.reportHtmlPath, config.templatesDir)

  io.out(`[ok] fetched=${result.fetched} existing=${result.existing} total=${result.total} added=${result.added}`)
  io.out(`  json:   ${config.historyJsonPath}`)
  io.out(`  csv:    ${config.csvPath}`)
  io.out(`  images: ${config.imagesDir}`)
  io.out(`  report: ${config.reportHtmlPath}`)
  return 0
}
