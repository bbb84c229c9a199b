import { PriceParseError } from '../errors.js'

/**
 * Parse a European-formatted price into a number.
 *
 * "799,00 €" -> 799, "1.099,99 €" -> 1099.99, "999 €" -> 999.
 * `.` is always a thousands separator and `,` the decimal mark.
 *
 * @throws PriceParseError when no digit survives or the remainder is not a number
 */
export function parsePrice(text: string): number {
  const cleaned = text
    .replace(/€/g, '')
    // \s covers U+00A0 as well
    .replace(/\s+/g, '')
    .replace(/\./g, '')
    .replace(/,/g, '.')
    .replace(/[^0-9.]/g, '')

  if (!/\d/.test(cleaned)) {
    throw new PriceParseError(text)
  }

  const value = Number(cleaned)
  if (!Number.isFinite(value)) {
    throw new PriceParseError(text)
  }

  return value
}
