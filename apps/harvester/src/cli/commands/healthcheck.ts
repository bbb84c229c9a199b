import type { CommandIO } from './io.js'

export function healthcheckMessage(now: Date): string {
  return `[ok] price-monitor CLI is working | utc=${now.toISOString()}`
}

export function runHealthcheckCommand(io: CommandIO, now: () => Date = () => new Date()): number {
  io.out(healthcheckMessage(now()))
  return 0
}
