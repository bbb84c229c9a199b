/**
 * Price-trend report
 *
 * Renders the JSON history into a static HTML page: latest price per model
 * with the change against the previous observation, then the full history
 * per model. styles.css is copied next to the page so the output directory
 * is self-contained.
 */

import { copyFile, mkdir, stat, writeFile } from 'node:fs/promises'
import { dirname, join, relative, sep } from 'node:path'
import { loggers } from '../config/logger.js'
import { readHistory } from '../scraper/storage/json-store.js'
import type { Snapshot } from '../scraper/types.js'

const log = loggers.report

export const STYLESHEET = 'styles.css'

export interface LatestEntry {
  snapshot: Snapshot
  /** Price change against the previous observation, rounded to cents; null for a first observation */
  delta: number | null
}

export interface ReportContext {
  byModel: Record<string, Snapshot[]>
  latest: Record<string, LatestEntry>
  /** Max ISO timestamp across all rows, '' when there are none */
  lastUpdated: string
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100
}

export function prepareReportContext(rows: readonly Snapshot[]): ReportContext {
  const byModel: Record<string, Snapshot[]> = {}
  for (const row of rows) {
    const group = byModel[row.model] ?? []
    group.push(row)
    byModel[row.model] = group
  }

  const latest: Record<string, LatestEntry> = {}
  for (const [model, items] of Object.entries(byModel)) {
    items.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())

    const current = items[items.length - 1]
    if (!current) continue
    const previous = items.length > 1 ? items[items.length - 2] : undefined

    latest[model] = {
      snapshot: current,
      delta: previous ? roundCents(current.price - previous.price) : null,
    }
  }

  let lastUpdated = ''
  for (const row of rows) {
    const iso = row.timestamp.toISOString()
    if (iso > lastUpdated) lastUpdated = iso
  }

  return { byModel, latest, lastUpdated }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

export function formatPrice(value: number): string {
  return `${value.toFixed(2)} €`
}

export function formatDelta(delta: number | null): { text: string; className: string } {
  if (delta === null) return { text: '—', className: 'delta delta-none' }
  if (delta > 0) return { text: `+${delta.toFixed(2)}`, className: 'delta delta-up' }
  if (delta < 0) return { text: delta.toFixed(2), className: 'delta delta-down' }
  return { text: '0.00', className: 'delta delta-flat' }
}

/** Image reference as seen from the report's directory. */
function imageSrc(snapshot: Snapshot, reportDir: string): string {
  if (!snapshot.imagePath) return snapshot.imageUrl
  return relative(reportDir, snapshot.imagePath).split(sep).join('/')
}

function renderLatestRow(entry: LatestEntry, reportDir: string): string {
  const { snapshot, delta } = entry
  const change = formatDelta(delta)
  return `
        <tr>
          <td><img class="thumb" src="${escapeHtml(imageSrc(snapshot, reportDir))}" alt="${escapeHtml(snapshot.title)}"></td>
          <td><a href="${escapeHtml(snapshot.productUrl)}">${escapeHtml(snapshot.title)}</a></td>
          <td>${escapeHtml(snapshot.sku ?? '')}</td>
          <td class="price">${formatPrice(snapshot.price)}</td>
          <td class="${change.className}">${change.text}</td>
        </tr>`
}

function renderHistorySection(model: string, items: readonly Snapshot[]): string {
  const rows = items
    .map(
      item => `
          <tr><td>${item.timestamp.toISOString()}</td><td class="price">${formatPrice(item.price)}</td></tr>`
    )
    .join('')
  return `
    <section class="history" id="history-${escapeHtml(model)}">
      <h2>${escapeHtml(model)}</h2>
      <table>
        <thead><tr><th>Observed</th><th>Price</th></tr></thead>
        <tbody>${rows}
        </tbody>
      </table>
    </section>`
}

export function renderReportHtml(ctx: ReportContext, reportDir: string): string {
  const models = Object.keys(ctx.latest).sort()
  const latestRows = models
    .map(model => {
      const entry = ctx.latest[model]
      return entry ? renderLatestRow(entry, reportDir) : ''
    })
    .join('')
  const history = models.map(model => renderHistorySection(model, ctx.byModel[model] ?? [])).join('')
  const lastUpdated = ctx.lastUpdated || 'never'

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>Price Monitor</title>
    <link rel="stylesheet" href="${STYLESHEET}">
  </head>
  <body>
    <header>
      <h1>Price Monitor</h1>
      <p class="updated">Last update: <time>${escapeHtml(lastUpdated)}</time></p>
    </header>
    <section class="latest">
      <table>
        <thead><tr><th></th><th>Product</th><th>SKU</th><th>Price</th><th>Change</th></tr></thead>
        <tbody>${latestRows}
        </tbody>
      </table>
    </section>${history}
  </body>
</html>
`
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

export async function renderReport(historyJsonPath: string, outHtmlPath: string, templatesDir: string): Promise<void> {
  const rows = await readHistory(historyJsonPath)
  const outDir = dirname(outHtmlPath)
  const html = renderReportHtml(prepareReportContext(rows), outDir)

  await mkdir(outDir, { recursive: true })
  await writeFile(outHtmlPath, html, 'utf8')

  const stylesheet = join(templatesDir, STYLESHEET)
  if (await fileExists(stylesheet)) {
    await copyFile(stylesheet, join(outDir, STYLESHEET))
  } else {
    log.warn('Stylesheet not found, report rendered unstyled', { path: stylesheet })
  }

  log.info('Report rendered', { path: outHtmlPath, rows: rows.length })
}
