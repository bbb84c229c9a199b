/** Where commands write their human-facing output. Logs go through the logger. */
export interface CommandIO {
  out(line: string): void
  err(line: string): void
}

export const consoleIO: CommandIO = {
  out: line => console.log(line),
  err: line => console.error(line),
}
