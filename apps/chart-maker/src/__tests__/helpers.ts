import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createLogger, type LogLevel } from '@stream-metrics/logger'
import {
  DEFAULT_COUNTERS,
  type CounterSummary,
  type MetricRecord,
  type SummaryRecord,
} from '@stream-metrics/series'
import type { Settings } from '../config/settings.js'

export const silentLogger = createLogger('chart-maker-test', { sink: () => {} })

export const testSettings: Settings = {
  counters: [...DEFAULT_COUNTERS],
  defaultOutdir: 'output',
}

/** Collects log lines; pair with LOG_FORMAT=json to parse them */
export function captureLogger() {
  const lines: Array<{ level: LogLevel; line: string }> = []
  const logger = createLogger('chart-maker-test', {
    sink: (level, line) => {
      lines.push({ level, line })
    },
  })
  const entries = (): Array<Record<string, unknown>> => lines.map(({ line }) => JSON.parse(line))
  return { logger, lines, entries }
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'chart-maker-'))
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}

function at(value: string): Date {
  return new Date(`${value}:00.000Z`)
}

export function metric(
  timestamp: string,
  values: { plays: number | null; listeners?: number | null },
  derived: Partial<Pick<MetricRecord, 'deltas' | 'deltaMinutes' | 'rates' | 'isAnomalyNegativeDiff'>> = {},
  overrides: Partial<MetricRecord> = {}
): MetricRecord {
  return {
    source: 'GENIE',
    itemId: '1',
    itemName: 'Song A',
    artistName: 'Artist A',
    collectionName: '',
    timestamp: at(timestamp),
    counters: { total_plays: values.plays, total_listeners: values.listeners ?? null },
    deltas: { total_plays: null, total_listeners: null },
    deltaMinutes: null,
    rates: { total_plays: null, total_listeners: null },
    isAnomalyNegativeDiff: false,
    ...derived,
    ...overrides,
  }
}

function counterSummary(partial: Partial<CounterSummary> = {}): CounterSummary {
  return { first: null, last: null, net: null, avgRatePerMin: null, ...partial }
}

export function summary(
  plays: Partial<CounterSummary>,
  listeners: Partial<CounterSummary> = {},
  overrides: Partial<SummaryRecord> = {}
): SummaryRecord {
  return {
    source: 'GENIE',
    itemId: '1',
    itemName: 'Song A',
    artistName: 'Artist A',
    firstTimestamp: at('2025-12-17T10:00'),
    lastTimestamp: at('2025-12-17T10:30'),
    counters: {
      total_plays: counterSummary(plays),
      total_listeners: counterSummary(listeners),
    },
    numPoints: 3,
    numAnomaliesNegativeDiff: 0,
    ...overrides,
  }
}
