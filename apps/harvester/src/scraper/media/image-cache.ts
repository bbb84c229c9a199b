/**
 * Product Image Cache
 *
 * One file per model under the cache directory. A non-empty file is a hit
 * and is never re-downloaded.
 *
 * Files are written through a temp file and a rename, so an interrupted
 * write never leaves a partial image that later counts as a hit. Two
 * processes missing the same model at once both download it.
 */

import { stat } from 'node:fs/promises'
import { join } from 'node:path'
import type { ILogger } from '@pricewatch/logger'
import { loggers } from '../../config/logger.js'
import type { Fetcher } from '../types.js'
import { BYTES_TIMEOUT_MS } from '../types.js'
import { writeFileAtomic } from '../storage/atomic-write.js'

export const IMAGE_EXTENSION = '.png'

/**
 * "iPhone 15 Pro" -> "iphone-15-pro.png", "iphone_15" -> "iphone_15.png"
 */
export function imageFileName(model: string): string {
  const slug = model.trim().toLowerCase().replace(/[^a-z0-9_-]+/g, '-')
  return `${slug}${IMAGE_EXTENSION}`
}

async function nonEmptyFileExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path)
    return info.isFile() && info.size > 0
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return false
    }
    throw error
  }
}

export class ImageCache {
  private readonly fetcher: Pick<Fetcher, 'fetchBytes'>
  private readonly log: ILogger

  constructor(fetcher: Pick<Fetcher, 'fetchBytes'>, logger: ILogger = loggers.images) {
    this.fetcher = fetcher
    this.log = logger
  }

  /**
   * Local path of the model's image, downloading it first on a miss.
   */
  async ensureCached(imageUrl: string, model: string, cacheDir: string): Promise<string> {
    const target = join(cacheDir, imageFileName(model))

    if (await nonEmptyFileExists(target)) {
      this.log.debug('Image cache hit', { model, path: target })
      return target
    }

    const bytes = await this.fetcher.fetchBytes(imageUrl, { timeoutMs: BYTES_TIMEOUT_MS })
    await writeFileAtomic(target, bytes)

    this.log.info('Image cached', { model, url: imageUrl, path: target, bytes: bytes.length })
    return target
  }
}
