/**
 * Item HTML reports: <outdir>/reports/<source>_<itemId>_report.html
 *
 * A standalone page with the summary and the annotated series as tables.
 */

import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ILogger } from '@stream-metrics/logger'
import {
  formatTimestamp,
  groupSeries,
  seriesKey,
  type CounterSpec,
  type MetricRecord,
  type SummaryRecord,
} from '@stream-metrics/series'
import { loggers } from '../config/logger.js'
import { ensureDir, FileNameAllocator } from './paths.js'
import { summaryColumns, summaryRow } from './summary-csv.js'

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

function text(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return ''
  return escapeHtml(String(value))
}

function renderSummaryTable(summary: SummaryRecord, counters: readonly CounterSpec[]): string {
  const row = summaryRow(summary, counters)
  const rows = summaryColumns(counters)
    .map((column) => `<tr><th>${text(column)}</th><td>${text(row[column])}</td></tr>`)
    .join('\n')
  return `<table class="summary">\n${rows}\n</table>`
}

function renderSeriesTable(series: readonly MetricRecord[], counters: readonly CounterSpec[]): string {
  const header = [
    'timestamp',
    ...counters.map(({ field }) => field),
    ...counters.map(({ key }) => `delta_${key}`),
    'delta_minutes',
    ...counters.map(({ key }) => `rate_${key}_per_min`),
    'is_anomaly_negative_diff',
  ]

  const body = series.map((record) => {
    const cells = [
      formatTimestamp(record.timestamp),
      ...counters.map(({ field }) => record.counters[field]),
      ...counters.map(({ field }) => record.deltas[field]),
      record.deltaMinutes,
      ...counters.map(({ field }) => record.rates[field]),
      record.isAnomalyNegativeDiff ? 'true' : 'false',
    ]
    const rowClass = record.isAnomalyNegativeDiff ? ' class="anomaly"' : ''
    return `<tr${rowClass}>${cells.map((value) => `<td>${text(value)}</td>`).join('')}</tr>`
  })

  return [
    '<table class="series">',
    `<thead><tr>${header.map((column) => `<th>${text(column)}</th>`).join('')}</tr></thead>`,
    '<tbody>',
    ...body,
    '</tbody>',
    '</table>',
  ].join('\n')
}

export function renderItemReport(
  summary: SummaryRecord,
  series: readonly MetricRecord[],
  counters: readonly CounterSpec[]
): string {
  const title = `${summary.source} ${summary.itemId}${summary.itemName ? ` - ${summary.itemName}` : ''}`

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${text(title)}</title>`,
    '<style>',
    'body { font-family: sans-serif; margin: 2rem; }',
    'table { border-collapse: collapse; margin-bottom: 2rem; }',
    'th, td { border: 1px solid #ccc; padding: 4px 8px; text-align: right; }',
    'th { background: #f3f4f6; text-align: left; }',
    'tr.anomaly td { background: #fee2e2; }',
    '</style>',
    '</head>',
    '<body>',
    `<h1>${text(title)}</h1>`,
    '<h2>Summary</h2>',
    renderSummaryTable(summary, counters),
    '<h2>Series</h2>',
    renderSeriesTable(series, counters),
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

/**
 * Write one report per summary. Series without a summary are skipped.
 */
export async function writeItemReports(
  records: readonly MetricRecord[],
  summaries: readonly SummaryRecord[],
  outDir: string,
  counters: readonly CounterSpec[],
  log: ILogger = loggers.output
): Promise<string[]> {
  const summaryByKey = new Map(summaries.map((summary) => [seriesKey(summary.source, summary.itemId), summary]))
  const names = new FileNameAllocator()
  const written: string[] = []

  for (const series of groupSeries(records)) {
    const { source, itemId } = series[0]
    const summary = summaryByKey.get(seriesKey(source, itemId))
    if (!summary) continue

    await ensureDir(outDir)
    const outPath = join(outDir, names.allocate([source, itemId], '_report.html'))
    await writeFile(outPath, renderItemReport(summary, series, counters), 'utf-8')
    written.push(outPath)
  }

  log.info('Item reports written', { reportCount: written.length })
  return written
}
