/**
 * Top-N item rankings per source, on the primary (first configured) counter.
 */

import { DEFAULT_COUNTERS } from './counters.js'
import { compareText } from './normalize.js'
import { groupSeries } from './metrics.js'
import type { CounterSpec, MetricRecord, SummaryRecord } from './types.js'

export const DEFAULT_TOP_N = 10
export const DEFAULT_RECENT_POINTS = 3

export interface RankedItem {
  rank: number
  itemId: string
  itemName: string
  value: number
}

export interface SourceRanking {
  source: string
  counter: CounterSpec
  /** Items by last observed value, descending */
  topTotals: RankedItem[]
  /** Items by mean delta over their most recent points, descending */
  topRecentDelta: RankedItem[]
}

export interface RankOptions {
  counters?: readonly CounterSpec[]
  topN?: number
  recentPoints?: number
}

type Candidate = Omit<RankedItem, 'rank'>

function takeTop(candidates: Candidate[], topN: number): RankedItem[] {
  return [...candidates]
    .sort((a, b) => b.value - a.value || compareText(a.itemId, b.itemId))
    .slice(0, topN)
    .map((candidate, index) => ({ rank: index + 1, ...candidate }))
}

function recentDeltaMean(series: readonly MetricRecord[], field: string, recentPoints: number): number | null {
  const deltas: number[] = []
  for (const record of series.slice(-recentPoints)) {
    const delta = record.deltas[field]
    if (delta !== null && delta !== undefined) deltas.push(delta)
  }
  if (deltas.length === 0) return null
  return deltas.reduce((sum, delta) => sum + delta, 0) / deltas.length
}

export function rankItems(
  records: readonly MetricRecord[],
  summaries: readonly SummaryRecord[],
  options: RankOptions = {}
): SourceRanking[] {
  const counter = (options.counters ?? DEFAULT_COUNTERS)[0]
  if (!counter) return []

  const topN = Math.max(0, Math.trunc(options.topN ?? DEFAULT_TOP_N))
  const recentPoints = Math.max(1, Math.trunc(options.recentPoints ?? DEFAULT_RECENT_POINTS))

  const totals = new Map<string, Candidate[]>()
  for (const summary of summaries) {
    const last = summary.counters[counter.field]?.last ?? null
    const bucket = totals.get(summary.source) ?? []
    if (last !== null) {
      bucket.push({ itemId: summary.itemId, itemName: summary.itemName, value: last })
    }
    totals.set(summary.source, bucket)
  }

  const deltas = new Map<string, Candidate[]>()
  for (const series of groupSeries(records)) {
    const { source, itemId } = series[0]
    const bucket = deltas.get(source) ?? []
    const value = recentDeltaMean(series, counter.field, recentPoints)
    if (value !== null) {
      const itemName = series[series.length - 1].itemName || series[0].itemName
      bucket.push({ itemId, itemName, value })
    }
    deltas.set(source, bucket)
  }

  const sources = [...new Set([...totals.keys(), ...deltas.keys()])].sort(compareText)
  return sources.map((source) => ({
    source,
    counter,
    topTotals: takeTop(totals.get(source) ?? [], topN),
    topRecentDelta: takeTop(deltas.get(source) ?? [], topN),
  }))
}
