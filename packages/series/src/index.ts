/**
 * @stream-metrics/series
 *
 * Normalization, derived metrics and per-item summaries for cumulative
 * counter snapshots.
 */

export * from './types.js'
export {
  DEFAULT_COUNTERS,
  DEFAULT_COUNTER_FIELDS,
  counterKey,
  parseCounterValue,
  toCounterSpecs,
} from './counters.js'
export { buildTimestamp, formatTimestamp, minutesBetween } from './timestamp.js'
export {
  coerceText,
  compareCanonical,
  compareText,
  dedupKey,
  normalizeRecords,
  seriesKey,
} from './normalize.js'
export { computeMetrics, groupSeries } from './metrics.js'
export { buildSummaries, summarizeSeries } from './aggregate.js'
export {
  DEFAULT_RECENT_POINTS,
  DEFAULT_TOP_N,
  rankItems,
  type RankOptions,
  type RankedItem,
  type SourceRanking,
} from './rank.js'
export {
  applyFilters,
  runPipeline,
  type PipelineFilters,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStats,
} from './pipeline.js'
