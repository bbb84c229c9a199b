/**
 * Static Catalog Selectors
 *
 * Every product page marks its fields with data-testid attributes.
 */

export const SELECTORS = {
  title: '[data-testid="product-title"]',
  model: '[data-testid="product-model"]',
  price: '[data-testid="product-price"]',
  // optional
  sku: '[data-testid="product-sku"]',
  image: '[data-testid="product-image"]',
} as const

export const IMAGE_ATTR = 'src'

/** Fixed page set, relative to the catalog base URL. */
export const CATALOG_PAGES = ['iphone-15.html', 'iphone-16.html', 'iphone-17.html'] as const
