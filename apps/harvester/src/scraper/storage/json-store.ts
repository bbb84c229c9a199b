/**
 * Canonical JSON history: a pretty-printed array of snapshot records.
 */

import { readFile } from 'node:fs/promises'
import { loggers } from '../../config/logger.js'
import { HistoryFormatError } from '../errors.js'
import type { Snapshot } from '../types.js'
import { writeFileAtomic } from './atomic-write.js'
import { fromSnapshotRecord, snapshotRecordSchema, toSnapshotRecord } from './snapshot-record.js'

const log = loggers.storage

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}

/**
 * Read and validate the history file. A missing file is an empty history.
 *
 * @throws HistoryFormatError when the file is not an array of valid records
 */
export async function readHistory(path: string): Promise<Snapshot[]> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      log.debug('No history file yet', { path })
      return []
    }
    throw error
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new HistoryFormatError(path, 'not valid JSON', { cause: error })
  }

  if (!Array.isArray(parsed)) {
    throw new HistoryFormatError(path, 'expected a JSON array')
  }

  return parsed.map((entry: unknown, index) => {
    const result = snapshotRecordSchema.safeParse(entry)
    if (!result.success) {
      const issue = result.error.issues[0]
      const reason = issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record'
      throw new HistoryFormatError(path, reason, { index })
    }
    return fromSnapshotRecord(result.data)
  })
}

export async function writeHistory(path: string, rows: Snapshot[]): Promise<void> {
  const payload = rows.map(toSnapshotRecord)
  await writeFileAtomic(path, `${JSON.stringify(payload, null, 2)}\n`)
  log.debug('Wrote history', { path, rows: rows.length })
}
