import type { ILogger } from '@stream-metrics/logger'

/**
 * A raw snapshot as read from a JSONL line. Nothing about it is trusted:
 * any field may be missing, mistyped, or malformed.
 */
export type RawRecord = Record<string, unknown>

/**
 * A counter field a deployment tracks.
 *
 * `field` is the name in the input (`total_plays`), `key` the short name used
 * for derived fields (`delta_plays`, `rate_plays_per_min`, `net_plays`).
 */
export interface CounterSpec {
  field: string
  key: string
}

/** Counter values keyed by `CounterSpec.field`. `null` means absent. */
export type CounterValues = Record<string, number | null>

export interface CanonicalRecord {
  source: string
  itemId: string
  itemName: string
  artistName: string
  collectionName: string
  /** Minute resolution, UTC wall-clock */
  timestamp: Date
  counters: CounterValues
}

export interface MetricRecord extends CanonicalRecord {
  /** Difference from the previous point in the same series; null on the first point */
  deltas: CounterValues
  /** Minutes elapsed since the previous point; null on the first point */
  deltaMinutes: number | null
  /** delta / deltaMinutes, only when deltaMinutes > 0 */
  rates: CounterValues
  isAnomalyNegativeDiff: boolean
}

export interface CounterSummary {
  first: number | null
  last: number | null
  /** last - first; null unless both endpoints are present */
  net: number | null
  /** Mean of the present per-minute rates; null when none are present */
  avgRatePerMin: number | null
}

export interface SummaryRecord {
  source: string
  itemId: string
  itemName: string
  artistName: string
  firstTimestamp: Date
  lastTimestamp: Date
  counters: Record<string, CounterSummary>
  numPoints: number
  numAnomaliesNegativeDiff: number
}

export interface StageOptions {
  counters?: readonly CounterSpec[]
  logger?: ILogger
}

export interface NormalizeResult {
  records: CanonicalRecord[]
  /** Records discarded because a later record had the same dedup key */
  duplicateCount: number
  /** Records dropped after dedup because no timestamp could be built */
  invalidTimestampCount: number
}

export interface MetricsResult {
  records: MetricRecord[]
  anomalyCount: number
}

export interface AggregateResult {
  summaries: SummaryRecord[]
  anomaliesBySource: Record<string, number>
}
