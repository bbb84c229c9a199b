/**
 * On-disk shape of a Snapshot.
 *
 * JSON history and CSV export both use snake_case field names and ISO-8601
 * timestamps; the domain type uses camelCase and Date.
 */

import { z } from 'zod'
import { InvalidSnapshotError } from '../errors.js'
import { PRODUCT_MODELS, type Snapshot } from '../types.js'

export const snapshotRecordSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  source: z.string().min(1),
  model: z.enum(PRODUCT_MODELS),
  title: z.string(),
  sku: z.string().nullable().optional(),
  currency: z.literal('EUR'),
  price: z.number().finite().nonnegative(),
  product_url: z.string().url(),
  image_url: z.string().url(),
  image_path: z.string().nullable().optional(),
})

export type SnapshotRecord = z.infer<typeof snapshotRecordSchema>

export function toSnapshotRecord(snapshot: Snapshot): SnapshotRecord {
  const record: SnapshotRecord = {
    timestamp: snapshot.timestamp.toISOString(),
    source: snapshot.source,
    model: snapshot.model,
    title: snapshot.title,
    sku: snapshot.sku,
    currency: snapshot.currency,
    price: snapshot.price,
    product_url: snapshot.productUrl,
    image_url: snapshot.imageUrl,
  }
  if (snapshot.imagePath !== undefined) {
    record.image_path = snapshot.imagePath
  }
  return record
}

export function fromSnapshotRecord(record: SnapshotRecord): Snapshot {
  const snapshot: Snapshot = {
    timestamp: new Date(record.timestamp),
    source: record.source,
    model: record.model,
    title: record.title,
    sku: record.sku ?? null,
    currency: record.currency,
    price: record.price,
    productUrl: record.product_url,
    imageUrl: record.image_url,
  }
  if (record.image_path) {
    snapshot.imagePath = record.image_path
  }
  return snapshot
}

/**
 * Check a freshly produced snapshot against the on-disk schema, so nothing
 * readHistory would refuse ever reaches the history file.
 *
 * @throws InvalidSnapshotError naming the first offending field
 */
export function assertValidSnapshot(snapshot: Snapshot, index: number): void {
  if (Number.isNaN(snapshot.timestamp.getTime())) {
    throw new InvalidSnapshotError(index, 'timestamp: Invalid date')
  }
  const result = snapshotRecordSchema.safeParse(toSnapshotRecord(snapshot))
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new InvalidSnapshotError(index, issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid record')
  }
}
