/**
 * History Deduplication
 *
 * Identity of a history entry is (timestamp, source, model, price). Two
 * observations of the same model at the same instant with different prices
 * are both kept; whether that is a correction or a new fact is left open.
 */

import type { Snapshot } from '../types.js'

export function snapshotKey(snapshot: Snapshot): string {
  return [snapshot.timestamp.toISOString(), snapshot.source, snapshot.model, String(snapshot.price)].join('|')
}

function compareSnapshots(a: Snapshot, b: Snapshot): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime()
  if (byTime !== 0) return byTime
  if (a.model < b.model) return -1
  if (a.model > b.model) return 1
  return 0
}

/**
 * Keep the first occurrence of each key, then stable-sort by (timestamp, model).
 */
export function dedupeSnapshots(rows: readonly Snapshot[]): Snapshot[] {
  const seen = new Set<string>()
  const out: Snapshot[] = []

  for (const row of rows) {
    const key = snapshotKey(row)
    if (seen.has(key)) continue
    seen.add(key)
    out.push(row)
  }

  // Array.prototype.sort is stable
  return out.sort(compareSnapshots)
}

/**
 * Existing entries precede incoming ones: on a key collision the persisted
 * entry is the one kept.
 */
export function mergeHistory(existing: readonly Snapshot[], incoming: readonly Snapshot[]): Snapshot[] {
  return dedupeSnapshots([...existing, ...incoming])
}
