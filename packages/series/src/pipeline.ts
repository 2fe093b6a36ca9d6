import { buildSummaries } from './aggregate.js'
import { DEFAULT_COUNTERS } from './counters.js'
import { logger as defaultLogger } from './logger.js'
import { computeMetrics } from './metrics.js'
import { normalizeRecords } from './normalize.js'
import type {
  CanonicalRecord,
  MetricRecord,
  RawRecord,
  StageOptions,
  SummaryRecord,
} from './types.js'

export interface PipelineFilters {
  source?: string
  itemId?: string
}

export interface PipelineOptions extends StageOptions {
  filters?: PipelineFilters
}

export interface PipelineStats {
  inputCount: number
  duplicateCount: number
  invalidTimestampCount: number
  /** Canonical records left after filtering */
  filteredCount: number
  anomalyCount: number
}

export interface PipelineResult {
  canonical: CanonicalRecord[]
  metrics: MetricRecord[]
  summaries: SummaryRecord[]
  anomaliesBySource: Record<string, number>
  stats: PipelineStats
}

export function applyFilters(
  records: readonly CanonicalRecord[],
  filters: PipelineFilters = {}
): CanonicalRecord[] {
  return records.filter(
    (record) =>
      (!filters.source || record.source === filters.source) &&
      (!filters.itemId || record.itemId === filters.itemId)
  )
}

/**
 * normalize -> filter -> metrics -> summaries.
 *
 * Empty input, or nothing left after filtering, is an empty result rather
 * than an error; the caller decides whether that is worth reporting.
 */
export function runPipeline(raw: readonly RawRecord[], options: PipelineOptions = {}): PipelineResult {
  const log = options.logger ?? defaultLogger
  const stage: StageOptions = { counters: options.counters ?? DEFAULT_COUNTERS, logger: log }

  const normalized = normalizeRecords(raw, stage)
  log.info('NORMALIZE_COMPLETE', {
    event_name: 'NORMALIZE_COMPLETE',
    inputCount: raw.length,
    recordCount: normalized.records.length,
    duplicateCount: normalized.duplicateCount,
    invalidTimestampCount: normalized.invalidTimestampCount,
  })

  const canonical = applyFilters(normalized.records, options.filters)
  const metrics = computeMetrics(canonical, stage)
  log.info('METRICS_COMPLETE', {
    event_name: 'METRICS_COMPLETE',
    recordCount: metrics.records.length,
    anomalyCount: metrics.anomalyCount,
  })

  const aggregated = buildSummaries(metrics.records, stage)
  log.info('SUMMARY_COMPLETE', {
    event_name: 'SUMMARY_COMPLETE',
    summaryCount: aggregated.summaries.length,
    anomaliesBySource: aggregated.anomaliesBySource,
  })

  return {
    canonical,
    metrics: metrics.records,
    summaries: aggregated.summaries,
    anomaliesBySource: aggregated.anomaliesBySource,
    stats: {
      inputCount: raw.length,
      duplicateCount: normalized.duplicateCount,
      invalidTimestampCount: normalized.invalidTimestampCount,
      filteredCount: canonical.length,
      anomalyCount: metrics.anomalyCount,
    },
  }
}
