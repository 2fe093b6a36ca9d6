/**
 * Derived series metrics.
 *
 * For every (source, itemId) series, in timestamp order:
 *   delta[i]        = value[i] - value[i-1]             (null at i=0 or when either side is null)
 *   deltaMinutes[i] = minutes between ts[i-1] and ts[i] (null at i=0)
 *   rate[i]         = delta[i] / deltaMinutes[i]        (only when deltaMinutes[i] > 0)
 *   anomaly[i]      = any present delta < 0
 *
 * Cumulative counters should never decrease; a negative delta is reported,
 * never corrected or dropped.
 */

import { DEFAULT_COUNTERS } from './counters.js'
import { logger as defaultLogger } from './logger.js'
import { compareText, seriesKey } from './normalize.js'
import { minutesBetween } from './timestamp.js'
import type {
  CanonicalRecord,
  CounterSpec,
  CounterValues,
  MetricRecord,
  MetricsResult,
  StageOptions,
} from './types.js'

/**
 * Group records by (source, itemId), keeping input order inside each group.
 * Groups come back ordered by (source, itemId); each group is sorted by
 * timestamp with a stable sort.
 */
export function groupSeries<T extends Pick<CanonicalRecord, 'source' | 'itemId' | 'timestamp'>>(
  records: readonly T[]
): T[][] {
  const groups = new Map<string, T[]>()
  for (const record of records) {
    const key = seriesKey(record.source, record.itemId)
    const group = groups.get(key)
    if (group) {
      group.push(record)
    } else {
      groups.set(key, [record])
    }
  }

  const ordered = [...groups.values()].sort(
    (a, b) => compareText(a[0].source, b[0].source) || compareText(a[0].itemId, b[0].itemId)
  )
  return ordered.map((group) =>
    [...group].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
  )
}

function subtract(current: number | null, previous: number | null): number | null {
  if (current === null || previous === null) return null
  return current - previous
}

function annotate(
  current: CanonicalRecord,
  previous: CanonicalRecord | undefined,
  counters: readonly CounterSpec[]
): MetricRecord {
  const deltas: CounterValues = {}
  const rates: CounterValues = {}
  const deltaMinutes = previous ? minutesBetween(previous.timestamp, current.timestamp) : null
  let isAnomalyNegativeDiff = false

  for (const { field } of counters) {
    const delta = previous
      ? subtract(current.counters[field] ?? null, previous.counters[field] ?? null)
      : null
    deltas[field] = delta
    rates[field] = delta !== null && deltaMinutes !== null && deltaMinutes > 0 ? delta / deltaMinutes : null
    if (delta !== null && delta < 0) {
      isAnomalyNegativeDiff = true
    }
  }

  return {
    ...current,
    timestamp: new Date(current.timestamp.getTime()),
    counters: { ...current.counters },
    deltas,
    deltaMinutes,
    rates,
    isAnomalyNegativeDiff,
  }
}

/**
 * Annotate every series with deltas, elapsed minutes, per-minute rates and
 * the negative-diff anomaly flag.
 */
export function computeMetrics(
  records: readonly CanonicalRecord[],
  options: StageOptions = {}
): MetricsResult {
  const log = options.logger ?? defaultLogger
  const counters = options.counters ?? DEFAULT_COUNTERS

  if (records.length === 0) {
    return { records: [], anomalyCount: 0 }
  }

  const output: MetricRecord[] = []
  let anomalyCount = 0

  for (const series of groupSeries(records)) {
    let previous: CanonicalRecord | undefined
    for (const record of series) {
      const annotated = annotate(record, previous, counters)
      if (annotated.isAnomalyNegativeDiff) anomalyCount++
      output.push(annotated)
      previous = record
    }
  }

  if (anomalyCount > 0) {
    log.warn('Cumulative counter decreased (negative diff)', { anomalyCount })
  }

  return { records: output, anomalyCount }
}
