import type { PipelineConfig } from '../../config/settings.js'
import { renderReport } from '../../report/render.js'
import type { CommandIO } from './io.js'

export async function runReportCommand(config: PipelineConfig, io: CommandIO): Promise<number> {
  await renderReport(config.historyJsonPath, config.reportHtmlPath, config.templatesDir)
  io.out(`[ok] report: ${config.reportHtmlPath}`)
  return 0
}
