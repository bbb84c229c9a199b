/**
 * Scraper Core Types
 *
 * Snapshot is the one entity the pipeline produces and persists.
 * Source and Fetcher are the seams tests and future collectors plug into.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Catalog vocabulary
// ═══════════════════════════════════════════════════════════════════════════════

/** Model identifiers the catalog exposes. Anything else fails extraction. */
export const PRODUCT_MODELS = ['iphone_15', 'iphone_16', 'iphone_17'] as const

export type ProductModel = (typeof PRODUCT_MODELS)[number]

export function isProductModel(value: string): value is ProductModel {
  return (PRODUCT_MODELS as readonly string[]).includes(value)
}

/** Single currency for v1. */
export type CurrencyCode = 'EUR'

export const CATALOG_CURRENCY: CurrencyCode = 'EUR'

// ═══════════════════════════════════════════════════════════════════════════════
// Snapshot - Output Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One observed price for one model at one instant.
 *
 * Built once per fetch cycle and never mutated; attaching `imagePath`
 * produces a copy.
 */
export interface Snapshot {
  /** Shared by every snapshot of the same fetch cycle */
  timestamp: Date

  /** Origin tag of the collector that produced it */
  source: string

  model: ProductModel

  title: string

  /** null when the page shows none */
  sku: string | null

  currency: CurrencyCode

  /** Decimal price, never negative */
  price: number

  /** Absolute URL */
  productUrl: string

  /** Absolute URL */
  imageUrl: string

  /** Local cached copy of the image, set after caching */
  imagePath?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Source
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A collector of snapshots. One call is one fetch cycle: it either yields
 * every snapshot of the cycle or throws.
 */
export interface Source {
  readonly id: string
  fetch(): Promise<Snapshot[]>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = retries + 1 */
  retries: number

  /** Backoff unit: delay = 2^attempt * baseDelayMs + jitter */
  baseDelayMs: number

  /** Upper bound of the uniform random jitter */
  jitterMaxMs: number
}

export interface FetchOptions {
  timeoutMs?: number
  headers?: Record<string, string>
}

export interface Fetcher {
  fetchText(url: string, options?: FetchOptions): Promise<string>
  fetchBytes(url: string, options?: FetchOptions): Promise<Buffer>
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 4,
  baseDelayMs: 600,
  jitterMaxMs: 400,
}

export const DEFAULT_USER_AGENT = 'price-monitor/1.0'

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent': DEFAULT_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml',
}

export const DEFAULT_IMAGE_HEADERS: Record<string, string> = {
  'User-Agent': DEFAULT_USER_AGENT,
  Accept: 'image/*',
}

export const TEXT_TIMEOUT_MS = 20_000

export const BYTES_TIMEOUT_MS = 30_000
