import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@stream-metrics/logger'
import type { RankedItem, SourceRanking } from '@stream-metrics/series'
import { loggers } from '../config/logger.js'
import { ensureDir, FileNameAllocator } from './paths.js'

function renderRanking(items: readonly RankedItem[], valueColumn: string): string {
  return stringify(
    items.map((item) => ({
      rank: item.rank,
      item_id: item.itemId,
      item_name: item.itemName,
      [valueColumn]: item.value,
    })),
    { header: true, columns: ['rank', 'item_id', 'item_name', valueColumn] }
  )
}

export function renderTotalsCsv(ranking: SourceRanking): string {
  return renderRanking(ranking.topTotals, `last_${ranking.counter.field}`)
}

export function renderRecentDeltaCsv(ranking: SourceRanking): string {
  return renderRanking(ranking.topRecentDelta, `avg_delta_${ranking.counter.key}`)
}

/**
 * Write `<source>_top<N>_totals.csv` and `<source>_top<N>_delta.csv` per source.
 */
export async function writeRankingsCsv(
  rankings: readonly SourceRanking[],
  outDir: string,
  topN: number,
  log: ILogger = loggers.output
): Promise<string[]> {
  if (rankings.length === 0) return []

  await ensureDir(outDir)
  const names = new FileNameAllocator()
  const written: string[] = []
  for (const ranking of rankings) {
    const totalsPath = join(outDir, names.allocate([ranking.source], `_top${topN}_totals.csv`))
    const deltaPath = join(outDir, names.allocate([ranking.source], `_top${topN}_delta.csv`))
    await writeFile(totalsPath, renderTotalsCsv(ranking), 'utf-8')
    await writeFile(deltaPath, renderRecentDeltaCsv(ranking), 'utf-8')
    log.info('Ranking CSVs written', {
      source: ranking.source,
      totals: ranking.topTotals.length,
      recentDelta: ranking.topRecentDelta.length,
    })
    written.push(totalsPath, deltaPath)
  }
  return written
}
