import { describe, it, expect, vi } from 'vitest'
import { readFileSync } from 'node:fs'
import { StaticCatalogSource, extractSnapshot } from '../source.js'
import { ExtractionError, HttpStatusError, PriceParseError } from '../../../errors.js'
import type { Fetcher } from '../../../types.js'

const BASE_URL = 'https://catalog.example.com/iphone-catalog/'
const NOW = new Date('2026-02-05T10:00:00.000Z')

function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8')
}

/** Serves fixtures by page name; anything else is a 404. */
function fixtureFetcher(overrides: Record<string, string> = {}) {
  const fetchText = vi.fn(async (url: string) => {
    const page = url.slice(BASE_URL.length)
    if (page in overrides) {
      return overrides[page] ?? ''
    }
    if (['iphone-15.html', 'iphone-16.html', 'iphone-17.html'].includes(page)) {
      return fixture(page)
    }
    throw new HttpStatusError(url, 404, 'Not Found')
  })
  const fetchBytes = vi.fn(async () => Buffer.alloc(0))
  const fetcher: Fetcher = { fetchText, fetchBytes }
  return { fetcher, fetchText, fetchBytes }
}

describe('StaticCatalogSource', () => {
  it('extracts one snapshot per catalog page', async () => {
    const { fetcher, fetchText } = fixtureFetcher()
    const source = new StaticCatalogSource({ baseUrl: BASE_URL, fetcher, now: () => NOW })

    const snapshots = await source.fetch()

    expect(fetchText.mock.calls.map(call => call[0])).toEqual([
      `${BASE_URL}iphone-15.html`,
      `${BASE_URL}iphone-16.html`,
      `${BASE_URL}iphone-17.html`,
    ])
    expect(snapshots).toEqual([
      {
        timestamp: NOW,
        source: 'static_catalog',
        model: 'iphone_15',
        title: 'iPhone 15 128 GB',
        sku: 'A3090',
        currency: 'EUR',
        price: 799,
        productUrl: `${BASE_URL}iphone-15.html`,
        imageUrl: `${BASE_URL}images/iphone-15.png`,
      },
      {
        timestamp: NOW,
        source: 'static_catalog',
        model: 'iphone_16',
        title: 'iPhone 16 128 GB',
        sku: 'A3287',
        currency: 'EUR',
        price: 1099.99,
        productUrl: `${BASE_URL}iphone-16.html`,
        imageUrl: `${BASE_URL}images/iphone-16.png`,
      },
      {
        timestamp: NOW,
        source: 'static_catalog',
        model: 'iphone_17',
        title: 'iPhone 17 256 GB',
        sku: null,
        currency: 'EUR',
        price: 999,
        productUrl: `${BASE_URL}iphone-17.html`,
        imageUrl: `${BASE_URL}images/iphone-17.png`,
      },
    ])
  })

  it('stamps every snapshot of a cycle with one instant', async () => {
    const { fetcher } = fixtureFetcher()
    const now = vi
      .fn<() => Date>()
      .mockReturnValueOnce(new Date('2026-02-05T10:00:00.000Z'))
      .mockReturnValueOnce(new Date('2026-02-05T10:00:05.000Z'))
    const source = new StaticCatalogSource({ baseUrl: BASE_URL, fetcher, now })

    const snapshots = await source.fetch()

    expect(now).toHaveBeenCalledTimes(1)
    expect(new Set(snapshots.map(s => s.timestamp.toISOString()))).toEqual(
      new Set(['2026-02-05T10:00:00.000Z'])
    )
  })

  it('appends a trailing slash to the base URL', async () => {
    const { fetcher, fetchText } = fixtureFetcher()
    const source = new StaticCatalogSource({
      baseUrl: 'https://catalog.example.com/iphone-catalog',
      fetcher,
      pages: ['iphone-15.html'],
      now: () => NOW,
    })

    await source.fetch()

    expect(fetchText).toHaveBeenCalledWith(`${BASE_URL}iphone-15.html`)
  })

  it('aborts the whole cycle when a page lacks a required field', async () => {
    const broken = fixture('iphone-16.html').replace('data-testid="product-title"', 'data-testid="headline"')
    const { fetcher, fetchText } = fixtureFetcher({ 'iphone-16.html': broken })
    const source = new StaticCatalogSource({ baseUrl: BASE_URL, fetcher, now: () => NOW })

    const error = await source.fetch().catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ExtractionError)
    if (!(error instanceof ExtractionError)) return
    expect(error.selector).toBe('[data-testid="product-title"]')
    expect(error.url).toBe(`${BASE_URL}iphone-16.html`)
    // iphone-17 is never requested once iphone-16 fails
    expect(fetchText).toHaveBeenCalledTimes(2)
  })

  it('propagates fetch failures', async () => {
    const { fetcher } = fixtureFetcher()
    const source = new StaticCatalogSource({
      baseUrl: BASE_URL,
      fetcher,
      pages: ['iphone-15.html', 'iphone-18.html'],
      now: () => NOW,
    })

    await expect(source.fetch()).rejects.toBeInstanceOf(HttpStatusError)
  })
})

describe('extractSnapshot', () => {
  const ctx = { baseUrl: BASE_URL, productUrl: `${BASE_URL}iphone-15.html`, observedAt: NOW }

  it('requires a non-empty image src', () => {
    const html = fixture('iphone-15.html').replace('src="images/iphone-15.png"', 'src=""')

    expect(() => extractSnapshot(html, ctx)).toThrow(
      `Missing attribute "src" in [data-testid="product-image"] (${BASE_URL}iphone-15.html)`
    )
  })

  it('rejects models outside the configured set', () => {
    const html = fixture('iphone-15.html').replace('>iphone_15<', '>iphone_99<')

    expect(() => extractSnapshot(html, ctx)).toThrow(ExtractionError)
    expect(() => extractSnapshot(html, ctx)).toThrow('Unknown product model "iphone_99"')
  })

  it('surfaces price parse faults', () => {
    const html = fixture('iphone-15.html').replace('799,00 €', 'auf Anfrage')

    expect(() => extractSnapshot(html, ctx)).toThrow(PriceParseError)
  })

  it('resolves absolute image URLs unchanged', () => {
    const html = fixture('iphone-15.html').replace(
      'src="images/iphone-15.png"',
      'src="https://cdn.example.com/iphone-15.png"'
    )

    expect(extractSnapshot(html, ctx).imageUrl).toBe('https://cdn.example.com/iphone-15.png')
  })
})
