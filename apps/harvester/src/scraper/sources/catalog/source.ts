/**
 * Static Catalog Source
 *
 * Walks the fixed page list under a base URL, one page at a time, and turns
 * each page into a Snapshot.
 *
 * A cycle is all-or-nothing: the first missing field, unknown model or
 * unparseable price aborts the whole fetch() call and no snapshot from the
 * cycle is returned.
 */

import type { ILogger } from '@pricewatch/logger'
import { loggers } from '../../../config/logger.js'
import { ExtractionError } from '../../errors.js'
import { loadHtml, optionalText, requireAttr, requireText } from '../../kit/html.js'
import { parsePrice } from '../../kit/price.js'
import { CATALOG_CURRENCY, isProductModel } from '../../types.js'
import type { Fetcher, Snapshot, Source } from '../../types.js'
import { CATALOG_PAGES, IMAGE_ATTR, SELECTORS } from './selectors.js'

export const CATALOG_SOURCE_ID = 'static_catalog'

export interface PageContext {
  baseUrl: string
  productUrl: string
  observedAt: Date
}

/**
 * Extract one snapshot from a product page.
 *
 * @throws ExtractionError for a missing element/attribute or an unknown model
 * @throws PriceParseError for an unparseable price
 */
export function extractSnapshot(html: string, ctx: PageContext): Snapshot {
  const $ = loadHtml(html)
  const url = ctx.productUrl

  const title = requireText($, SELECTORS.title, url)
  const model = requireText($, SELECTORS.model, url)
  const priceText = requireText($, SELECTORS.price, url)
  const sku = optionalText($, SELECTORS.sku)
  const imageSrc = requireAttr($, SELECTORS.image, IMAGE_ATTR, url)

  if (!isProductModel(model)) {
    throw new ExtractionError(`Unknown product model "${model}" in ${SELECTORS.model}`, {
      url,
      selector: SELECTORS.model,
    })
  }

  return {
    timestamp: ctx.observedAt,
    source: CATALOG_SOURCE_ID,
    model,
    title,
    sku,
    currency: CATALOG_CURRENCY,
    price: parsePrice(priceText),
    productUrl: url,
    imageUrl: new URL(imageSrc, ctx.baseUrl).toString(),
  }
}

export interface StaticCatalogSourceOptions {
  /** e.g. https://catalog.example.com/iphone-catalog/ */
  baseUrl: string
  fetcher: Fetcher
  pages?: readonly string[]
  /** Clock for the cycle timestamp */
  now?: () => Date
  logger?: ILogger
}

export class StaticCatalogSource implements Source {
  readonly id = CATALOG_SOURCE_ID

  private readonly baseUrl: string
  private readonly fetcher: Fetcher
  private readonly pages: readonly string[]
  private readonly now: () => Date
  private readonly log: ILogger

  constructor(options: StaticCatalogSourceOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`
    this.fetcher = options.fetcher
    this.pages = options.pages ?? CATALOG_PAGES
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? loggers.catalog
  }

  async fetch(): Promise<Snapshot[]> {
    const observedAt = this.now()
    const snapshots: Snapshot[] = []

    for (const path of this.pages) {
      const productUrl = new URL(path, this.baseUrl).toString()
      const html = await this.fetcher.fetchText(productUrl)
      const snapshot = extractSnapshot(html, { baseUrl: this.baseUrl, productUrl, observedAt })
      this.log.debug('Extracted snapshot', { url: productUrl, model: snapshot.model, price: snapshot.price })
      snapshots.push(snapshot)
    }

    this.log.info('Catalog fetched', {
      baseUrl: this.baseUrl,
      pages: this.pages.length,
      observedAt: observedAt.toISOString(),
    })
    return snapshots
  }
}
