import { loggers } from '../config/logger.js'
import { loadConfig, type PipelineConfig } from '../config/settings.js'
import type { PipelineDeps } from '../scraper/pipeline.js'
import { runHealthcheckCommand } from './commands/healthcheck.js'
import { consoleIO, type CommandIO } from './commands/io.js'
import { runReportCommand } from './commands/report.js'
import { runRunCommand } from './commands/run.js'
import { runScrapeCommand } from './commands/scrape.js'
import { asString, parseFlags, type Flags } from './parse-flags.js'

const log = loggers.cli

export interface CliOptions {
  io?: CommandIO
  env?: NodeJS.ProcessEnv
  /** Injected into scrape and run; defaults build the live fetcher and catalog source */
  deps?: PipelineDeps
}

export function printHelp(io: CommandIO): void {
  io.out('Price Monitor CLI')
  io.out('')
  io.out('Commands:')
  io.out('  healthcheck')
  io.out('  scrape [--base-url <url>]')
  io.out('  run [--base-url <url>] [--out-json <path>] [--out-csv <path>] [--images-dir <dir>] [--report <path>]')
  io.out('  report [--out-json <path>] [--report <path>]')
}

function configFromFlags(flags: Flags, env: NodeJS.ProcessEnv): PipelineConfig {
  return loadConfig(
    {
      baseUrl: asString(flags['base-url']),
      historyJsonPath: asString(flags['out-json']),
      csvPath: asString(flags['out-csv']),
      imagesDir: asString(flags['images-dir']),
      reportHtmlPath: asString(flags.report),
    },
    env
  )
}

async function dispatch(command: string, flags: Flags, options: Required<CliOptions>): Promise<number> {
  const { io, env, deps } = options

  switch (command) {
    case 'healthcheck':
      return runHealthcheckCommand(io)
    case 'scrape':
      return runScrapeCommand(configFromFlags(flags, env), io, deps)
    case 'run':
      return runRunCommand(configFromFlags(flags, env), io, deps)
    case 'report':
      return runReportCommand(configFromFlags(flags, env), io)
    default:
      io.err(`Unknown command: ${command}`)
      printHelp(io)
      return 2
  }
}

/**
 * Run one CLI invocation and return its exit code.
 * 0 on success, 1 on any fault, 2 on usage errors.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const resolved: Required<CliOptions> = {
    io: options.io ?? consoleIO,
    env: options.env ?? process.env,
    deps: options.deps ?? {},
  }
  const [command, ...rest] = argv

  if (!command || command === '--help' || command === '-h') {
    printHelp(resolved.io)
    return 0
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp(resolved.io)
    return 0
  }

  try {
    return await dispatch(command, flags, resolved)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    log.error('Command failed', { command }, error)
    resolved.io.err(`[error] ${message}`)
    return 1
  }
}
