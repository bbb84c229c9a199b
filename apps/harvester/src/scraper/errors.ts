/**
 * Error taxonomy for the scrape pipeline.
 *
 * Every fault that aborts a cycle derives from MonitorError and carries a
 * stable `code`. Transient network faults are never surfaced directly: the
 * fetcher either recovers from them or wraps the last one in
 * FetchRetryExhaustedError.
 */

export type MonitorErrorCode =
  | 'HTTP_STATUS'
  | 'FETCH_RETRY_EXHAUSTED'
  | 'EXTRACTION_FAILED'
  | 'PRICE_PARSE_FAILED'
  | 'HISTORY_FORMAT'
  | 'SNAPSHOT_INVALID'
  | 'CONFIG_INVALID'

export class MonitorError extends Error {
  readonly code: MonitorErrorCode

  constructor(code: MonitorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'MonitorError'
    this.code = code
  }
}

/** Non-2xx response. Never retried. */
export class HttpStatusError extends MonitorError {
  readonly url: string
  readonly statusCode: number

  constructor(url: string, statusCode: number, statusText: string) {
    super('HTTP_STATUS', `HTTP ${statusCode}${statusText ? ` ${statusText}` : ''}: ${url}`)
    this.name = 'HttpStatusError'
    this.url = url
    this.statusCode = statusCode
  }
}

export class FetchRetryExhaustedError extends MonitorError {
  readonly url: string
  readonly retries: number

  constructor(url: string, retries: number, cause: unknown) {
    super('FETCH_RETRY_EXHAUSTED', `Failed to fetch after ${retries} retries: ${url}`, { cause })
    this.name = 'FetchRetryExhaustedError'
    this.url = url
    this.retries = retries
  }
}

export class ExtractionError extends MonitorError {
  readonly url: string
  readonly selector: string
  readonly attribute?: string

  constructor(message: string, details: { url: string; selector: string; attribute?: string }) {
    super('EXTRACTION_FAILED', `${message} (${details.url})`)
    this.name = 'ExtractionError'
    this.url = details.url
    this.selector = details.selector
    this.attribute = details.attribute
  }
}

export class PriceParseError extends MonitorError {
  readonly input: string

  constructor(input: string) {
    super('PRICE_PARSE_FAILED', `Could not parse price from: ${JSON.stringify(input)}`)
    this.name = 'PriceParseError'
    this.input = input
  }
}

export class HistoryFormatError extends MonitorError {
  readonly path: string
  readonly index?: number

  constructor(path: string, reason: string, options: { index?: number; cause?: unknown } = {}) {
    const where = options.index === undefined ? path : `${path} [record ${options.index}]`
    super('HISTORY_FORMAT', `Invalid history file ${where}: ${reason}`, { cause: options.cause })
    this.name = 'HistoryFormatError'
    this.path = path
    this.index = options.index
  }
}

/** A Source produced a snapshot the history store would reject on the next read. */
export class InvalidSnapshotError extends MonitorError {
  readonly index: number

  constructor(index: number, reason: string) {
    super('SNAPSHOT_INVALID', `Invalid snapshot [${index}]: ${reason}`)
    this.name = 'InvalidSnapshotError'
    this.index = index
  }
}

export class ConfigError extends MonitorError {
  constructor(reason: string) {
    super('CONFIG_INVALID', `Invalid configuration: ${reason}`)
    this.name = 'ConfigError'
  }
}
