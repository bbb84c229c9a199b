import { createLogger } from '@pricewatch/logger'

export const logger = createLogger('harvester')

/** Component loggers, one per pipeline stage. */
export const loggers = {
  fetch: logger.child('fetch'),
  catalog: logger.child('catalog'),
  images: logger.child('images'),
  storage: logger.child('storage'),
  pipeline: logger.child('pipeline'),
  report: logger.child('report'),
  cli: logger.child('cli'),
}
