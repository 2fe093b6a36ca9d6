import { createLogger } from '@stream-metrics/logger'
import { DEFAULT_COUNTERS } from '../counters.js'
import type { CanonicalRecord, RawRecord } from '../types.js'

export const silentLogger = createLogger('series-test', { sink: () => {} })

export const stage = { counters: DEFAULT_COUNTERS, logger: silentLogger }

export function raw(overrides: RawRecord = {}): RawRecord {
  return {
    source: 'GENIE',
    item_id: '1',
    item_name: 'Song A',
    artist_name: 'Artist A',
    date: '2025-12-17',
    hour: 10,
    minute: 0,
    total_plays: 100,
    total_listeners: 50,
    ...overrides,
  }
}

export function canonical(
  at: string,
  plays: number | null,
  overrides: Partial<CanonicalRecord> = {}
): CanonicalRecord {
  return {
    source: 'GENIE',
    itemId: '1',
    itemName: 'Song A',
    artistName: 'Artist A',
    collectionName: '',
    timestamp: new Date(`${at}:00.000Z`),
    counters: { total_plays: plays, total_listeners: null },
    ...overrides,
  }
}
