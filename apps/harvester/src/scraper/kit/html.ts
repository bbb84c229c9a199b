import * as cheerio from 'cheerio'
import { ExtractionError } from '../errors.js'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Trimmed text of the first match.
 * @throws ExtractionError when nothing matches
 */
export function requireText($: cheerio.CheerioAPI, selector: string, url: string): string {
  const node = $(selector).first()
  if (node.length === 0) {
    throw new ExtractionError(`Missing required element: ${selector}`, { url, selector })
  }
  return node.text().trim()
}

export function optionalText($: cheerio.CheerioAPI, selector: string): string | null {
  const node = $(selector).first()
  if (node.length === 0) {
    return null
  }
  return node.text().trim() || null
}

/**
 * Trimmed attribute of the first match.
 * @throws ExtractionError when nothing matches or the attribute is absent or empty
 */
export function requireAttr($: cheerio.CheerioAPI, selector: string, attr: string, url: string): string {
  const node = $(selector).first()
  if (node.length === 0) {
    throw new ExtractionError(`Missing required element: ${selector}`, { url, selector })
  }
  const value = node.attr(attr)?.trim()
  if (!value) {
    throw new ExtractionError(`Missing attribute "${attr}" in ${selector}`, { url, selector, attribute: attr })
  }
  return value
}
