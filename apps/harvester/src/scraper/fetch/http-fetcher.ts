/**
 * HTTP Fetcher Implementation
 *
 * Uses Node's built-in fetch (undici), which speaks HTTP/1.1 only, so there
 * is no protocol negotiation to go wrong. Redirects are followed.
 *
 * Retries transient faults (connect/read failures, mid-stream resets,
 * timeouts) with exponential backoff plus jitter. HTTP error statuses are
 * fatal on the first response.
 */

import type { ILogger } from '@pricewatch/logger'
import { loggers } from '../../config/logger.js'
import { FetchRetryExhaustedError, HttpStatusError, MonitorError } from '../errors.js'
import type { Fetcher, FetchOptions, RetryPolicy } from '../types.js'
import {
  BYTES_TIMEOUT_MS,
  DEFAULT_FETCH_HEADERS,
  DEFAULT_IMAGE_HEADERS,
  DEFAULT_RETRY_POLICY,
  TEXT_TIMEOUT_MS,
} from '../types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  logger?: ILogger
}

/** Socket and DNS error codes reported by Node and undici for retryable faults. */
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
])

const TRANSIENT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError'])

function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code
  }
  return undefined
}

/**
 * True for network-level faults worth another attempt.
 * Our own errors (HTTP status and friends) are never transient.
 */
export function isTransientFetchError(error: unknown): boolean {
  if (error instanceof MonitorError || !(error instanceof Error)) {
    return false
  }

  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true
  }

  const code = errorCode(error) ?? errorCode(error.cause)
  if (code !== undefined) {
    return TRANSIENT_ERROR_CODES.has(code)
  }

  // undici wraps socket failures without a code as TypeError('fetch failed')
  // and aborts mid-body as TypeError('terminated').
  return error instanceof TypeError && (error.message === 'fetch failed' || error.message === 'terminated')
}

/**
 * Delay before the retry that follows the zero-based `attempt`.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  return Math.pow(2, attempt) * policy.baseDelayMs + random() * policy.jitterMaxMs
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.log = options.logger ?? loggers.fetch
  }

  async fetchText(url: string, options: FetchOptions = {}): Promise<string> {
    return this.request(
      url,
      { ...DEFAULT_FETCH_HEADERS, ...options.headers },
      options.timeoutMs ?? TEXT_TIMEOUT_MS,
      response => response.text()
    )
  }

  async fetchBytes(url: string, options: FetchOptions = {}): Promise<Buffer> {
    return this.request(
      url,
      { ...DEFAULT_IMAGE_HEADERS, ...options.headers },
      options.timeoutMs ?? BYTES_TIMEOUT_MS,
      async response => Buffer.from(await response.arrayBuffer())
    )
  }

  private async request<T>(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const { retries } = this.retryPolicy
    let lastError: unknown

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return await this.fetchOnce(url, headers, timeoutMs, read)
      } catch (error) {
        if (!isTransientFetchError(error)) {
          throw error
        }

        lastError = error
        if (attempt >= retries) {
          break
        }

        const delayMs = computeBackoffDelay(attempt, this.retryPolicy)
        this.log.warn('Transient fetch failure, retrying', {
          url,
          attempt: attempt + 1,
          retries,
          delayMs: Math.round(delayMs),
          reason: describeFault(error, timeoutMs),
        })
        await this.sleep(delayMs)
      }
    }

    throw new FetchRetryExhaustedError(url, retries, lastError)
  }

  /**
   * Single attempt. The timeout covers headers and body.
   */
  private async fetchOnce<T>(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        // release the connection; the error body is never read
        await response.body?.cancel()
        throw new HttpStatusError(url, response.status, response.statusText)
      }

      return await read(response)
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}

function describeFault(error: unknown, timeoutMs: number): string {
  if (!(error instanceof Error)) {
    return String(error)
  }
  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return `timed out after ${timeoutMs}ms`
  }
  const code = errorCode(error) ?? errorCode(error.cause)
  return code ? `${error.message} (${code})` : error.message
}
