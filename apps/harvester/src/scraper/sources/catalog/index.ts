export { StaticCatalogSource, CATALOG_SOURCE_ID, extractSnapshot } from './source.js'
export type { StaticCatalogSourceOptions, PageContext } from './source.js'
export { SELECTORS, CATALOG_PAGES } from './selectors.js'
