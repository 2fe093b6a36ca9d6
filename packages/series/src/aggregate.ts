/**
 * Per-item summaries.
 *
 * A pure reduction over metric records: reads deltas, rates and anomaly flags,
 * never re-derives them.
 */

import { DEFAULT_COUNTERS } from './counters.js'
import { groupSeries } from './metrics.js'
import type {
  AggregateResult,
  CounterSpec,
  CounterSummary,
  MetricRecord,
  StageOptions,
  SummaryRecord,
} from './types.js'

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null
  let sum = 0
  for (const value of values) sum += value
  return sum / values.length
}

function summarizeCounter(series: readonly MetricRecord[], field: string): CounterSummary {
  const first = series[0].counters[field] ?? null
  const last = series[series.length - 1].counters[field] ?? null
  const rates: number[] = []
  for (const record of series) {
    const rate = record.rates[field]
    if (rate !== null && rate !== undefined) rates.push(rate)
  }

  return {
    first,
    last,
    net: first !== null && last !== null ? last - first : null,
    avgRatePerMin: mean(rates),
  }
}

function pickText(series: readonly MetricRecord[], field: 'itemName' | 'artistName'): string {
  const last = series[series.length - 1][field]
  return last || series[0][field]
}

export function summarizeSeries(
  series: readonly MetricRecord[],
  counters: readonly CounterSpec[] = DEFAULT_COUNTERS
): SummaryRecord {
  const first = series[0]
  const last = series[series.length - 1]

  const summaries: Record<string, CounterSummary> = {}
  for (const { field } of counters) {
    summaries[field] = summarizeCounter(series, field)
  }

  return {
    source: first.source,
    itemId: first.itemId,
    itemName: pickText(series, 'itemName'),
    artistName: pickText(series, 'artistName'),
    firstTimestamp: new Date(first.timestamp.getTime()),
    lastTimestamp: new Date(last.timestamp.getTime()),
    counters: summaries,
    numPoints: series.length,
    numAnomaliesNegativeDiff: series.filter((record) => record.isAnomalyNegativeDiff).length,
  }
}

/**
 * Build one summary per (source, itemId) and total anomalies per source.
 */
export function buildSummaries(
  records: readonly MetricRecord[],
  options: StageOptions = {}
): AggregateResult {
  const counters = options.counters ?? DEFAULT_COUNTERS
  const summaries: SummaryRecord[] = []
  const anomaliesBySource: Record<string, number> = {}

  for (const series of groupSeries(records)) {
    const summary = summarizeSeries(series, counters)
    anomaliesBySource[summary.source] =
      (anomaliesBySource[summary.source] ?? 0) + summary.numAnomaliesNegativeDiff
    summaries.push(summary)
  }

  return { summaries, anomaliesBySource }
}
