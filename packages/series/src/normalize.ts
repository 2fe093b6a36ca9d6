/**
 * Snapshot Normalizer
 *
 * Turns raw, duplicate-prone snapshot records into canonical records:
 * - coerces descriptive fields to strings and counters to number | null
 * - builds the minute timestamp
 * - resolves dedup keys (source, itemId, timestamp), last record wins
 * - drops records without a timestamp (after dedup)
 * - sorts by (source, itemId, timestamp)
 *
 * Bad fields degrade to absent values; nothing here throws on bad data.
 */

import { DEFAULT_COUNTERS, parseCounterValue } from './counters.js'
import { logger as defaultLogger } from './logger.js'
import { INVALID_TIMESTAMP_KEY, buildTimestamp, formatTimestamp } from './timestamp.js'
import type {
  CanonicalRecord,
  CounterValues,
  NormalizeResult,
  RawRecord,
  StageOptions,
} from './types.js'

/** Legacy collector field names, read when the canonical field is absent */
const FIELD_ALIASES: Record<string, string> = {
  source: 'platform',
  item_id: 'song_id',
  item_name: 'song_name',
  collection_name: 'album_name',
}

interface PendingRecord {
  record: Omit<CanonicalRecord, 'timestamp'> & { timestamp: Date | null }
  order: number
}

function readField(raw: RawRecord, field: string): unknown {
  const value = raw[field]
  if (value !== undefined && value !== null) return value
  const alias = FIELD_ALIASES[field]
  return alias === undefined ? undefined : raw[alias]
}

/**
 * Coerce a descriptive field to a string. Absent -> ''.
 */
export function coerceText(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value)
  }
  return ''
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Map key for a (source, itemId) series. Encoded as a JSON array so no
 * separator inside an id can make two series share a key.
 */
export function seriesKey(source: string, itemId: string): string {
  return JSON.stringify([source, itemId])
}

export function dedupKey(source: string, itemId: string, timestamp: Date | null): string {
  const rendered = timestamp ? formatTimestamp(timestamp) : INVALID_TIMESTAMP_KEY
  return JSON.stringify([source, itemId, rendered])
}

/**
 * Compare canonical records by (source, itemId, timestamp).
 */
export function compareCanonical(
  a: Pick<CanonicalRecord, 'source' | 'itemId' | 'timestamp'>,
  b: Pick<CanonicalRecord, 'source' | 'itemId' | 'timestamp'>
): number {
  return (
    compareText(a.source, b.source) ||
    compareText(a.itemId, b.itemId) ||
    a.timestamp.getTime() - b.timestamp.getTime()
  )
}

function coerceRecord(raw: RawRecord, options: StageOptions): PendingRecord['record'] {
  const counters: CounterValues = {}
  for (const counter of options.counters ?? DEFAULT_COUNTERS) {
    counters[counter.field] = parseCounterValue(raw[counter.field])
  }

  return {
    source: coerceText(readField(raw, 'source')),
    itemId: coerceText(readField(raw, 'item_id')),
    itemName: coerceText(readField(raw, 'item_name')),
    artistName: coerceText(readField(raw, 'artist_name')),
    collectionName: coerceText(readField(raw, 'collection_name')),
    timestamp: buildTimestamp({
      date: raw.date,
      hour: raw.hour,
      minute: raw.minute,
      timestamp: raw.timestamp,
    }),
    counters,
  }
}

function hasTimestamp(
  pending: PendingRecord
): pending is { record: CanonicalRecord; order: number } {
  return pending.record.timestamp !== null
}

/**
 * Normalize raw snapshot records into canonical, ordered, de-duplicated records.
 *
 * Precedence for duplicate keys follows input order, so callers that merge
 * several files must pass records in the order later files should win.
 */
export function normalizeRecords(
  raw: readonly RawRecord[],
  options: StageOptions = {}
): NormalizeResult {
  const log = options.logger ?? defaultLogger

  if (raw.length === 0) {
    return { records: [], duplicateCount: 0, invalidTimestampCount: 0 }
  }

  const byKey = new Map<string, PendingRecord>()
  raw.forEach((input, order) => {
    const record = coerceRecord(input, options)
    const key = dedupKey(record.source, record.itemId, record.timestamp)
    // Map keeps first-insertion position; last writer replaces the value
    byKey.set(key, { record, order })
  })

  const duplicateCount = raw.length - byKey.size
  if (duplicateCount > 0) {
    log.info('Duplicate dedup keys resolved, last record kept', { duplicateCount })
  }

  const winners = [...byKey.values()]
  const valid = winners.filter(hasTimestamp)
  const invalidTimestampCount = winners.length - valid.length
  if (invalidTimestampCount > 0) {
    log.warn('Dropped records without a valid timestamp', { invalidTimestampCount })
  }

  valid.sort((a, b) => compareCanonical(a.record, b.record) || a.order - b.order)

  return {
    records: valid.map((entry) => entry.record),
    duplicateCount,
    invalidTimestampCount,
  }
}
