/**
 * Per-source summary CSV files: <outdir>/csv/<source>_summary.csv
 */

import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@stream-metrics/logger'
import type { CounterSpec, SummaryRecord } from '@stream-metrics/series'
import { loggers } from '../config/logger.js'
import { cell, timestampCell, type Cell } from './format.js'
import { ensureDir, FileNameAllocator } from './paths.js'

/** Files are UTF-8 with a BOM */
const UTF8_BOM = '\uFEFF'

export function summaryColumns(counters: readonly CounterSpec[]): string[] {
  return [
    'source',
    'item_id',
    'item_name',
    'artist_name',
    'first_timestamp',
    'last_timestamp',
    ...counters.flatMap(({ field, key }) => [`first_${field}`, `last_${field}`, `net_${key}`]),
    ...counters.map(({ key }) => `avg_rate_${key}_per_min`),
    'num_points',
    'num_anomalies_negative_diff',
  ]
}

export function summaryRow(summary: SummaryRecord, counters: readonly CounterSpec[]): Record<string, Cell> {
  const row: Record<string, Cell> = {
    source: summary.source,
    item_id: summary.itemId,
    item_name: summary.itemName,
    artist_name: summary.artistName,
    first_timestamp: timestampCell(summary.firstTimestamp),
    last_timestamp: timestampCell(summary.lastTimestamp),
  }

  for (const { field, key } of counters) {
    const counter = summary.counters[field]
    row[`first_${field}`] = cell(counter?.first)
    row[`last_${field}`] = cell(counter?.last)
    row[`net_${key}`] = cell(counter?.net)
  }
  for (const { field, key } of counters) {
    row[`avg_rate_${key}_per_min`] = cell(summary.counters[field]?.avgRatePerMin)
  }

  row.num_points = summary.numPoints
  row.num_anomalies_negative_diff = summary.numAnomaliesNegativeDiff
  return row
}

export function renderSummaryCsv(
  summaries: readonly SummaryRecord[],
  counters: readonly CounterSpec[]
): string {
  return (
    UTF8_BOM +
    stringify(
      summaries.map((summary) => summaryRow(summary, counters)),
      { header: true, columns: summaryColumns(counters) }
    )
  )
}

/**
 * Write one summary CSV per source.
 *
 * @returns Paths of the files written
 */
export async function writeSummaryCsv(
  summaries: readonly SummaryRecord[],
  outDir: string,
  counters: readonly CounterSpec[],
  log: ILogger = loggers.output
): Promise<string[]> {
  if (summaries.length === 0) {
    log.warn('Summary is empty, no CSV written')
    return []
  }

  const bySource = new Map<string, SummaryRecord[]>()
  for (const summary of summaries) {
    const bucket = bySource.get(summary.source) ?? []
    bucket.push(summary)
    bySource.set(summary.source, bucket)
  }

  await ensureDir(outDir)
  const names = new FileNameAllocator()
  const written: string[] = []
  for (const [source, rows] of bySource) {
    const outPath = join(outDir, names.allocate([source], '_summary.csv'))
    await writeFile(outPath, renderSummaryCsv(rows, counters), 'utf-8')
    log.info('Summary CSV written', { source, path: outPath, rowCount: rows.length })
    written.push(outPath)
  }
  return written
}
