/**
 * Tabular export of the history, derived from the JSON store on every run.
 */

import { stringify } from 'csv-stringify/sync'
import { loggers } from '../../config/logger.js'
import type { Snapshot } from '../types.js'
import { writeFileAtomic } from './atomic-write.js'
import { toSnapshotRecord } from './snapshot-record.js'

const log = loggers.storage

export const CSV_COLUMNS = [
  'timestamp',
  'source',
  'model',
  'title',
  'sku',
  'currency',
  'price',
  'product_url',
  'image_url',
  'image_path',
] as const

export function formatCsv(rows: Snapshot[]): string {
  return stringify(rows.map(toSnapshotRecord), {
    header: true,
    columns: [...CSV_COLUMNS],
  })
}

export async function writeCsv(path: string, rows: Snapshot[]): Promise<void> {
  await writeFileAtomic(path, formatCsv(rows))
  log.debug('Wrote CSV export', { path, rows: rows.length })
}
