import { describe, expect, it } from 'vitest'
import { buildSummaries } from '../aggregate.js'
import { computeMetrics } from '../metrics.js'
import type { CanonicalRecord } from '../types.js'
import { canonical, stage } from './helpers.js'

function summarize(records: CanonicalRecord[]) {
  return buildSummaries(computeMetrics(records, stage).records, stage)
}

describe('buildSummaries', () => {
  it('returns nothing for empty input', () => {
    expect(buildSummaries([], stage)).toEqual({ summaries: [], anomaliesBySource: {} })
  })

  it('summarizes boundary values, net change and point count', () => {
    const { summaries } = summarize([
      canonical('2025-12-17T10:00', 100),
      canonical('2025-12-17T10:10', 120),
      canonical('2025-12-17T10:20', 150),
    ])

    expect(summaries).toHaveLength(1)
    const [summary] = summaries
    expect(summary.counters.total_plays).toEqual({
      first: 100,
      last: 150,
      net: 50,
      avgRatePerMin: 2.5,
    })
    expect(summary.numPoints).toBe(3)
    expect(summary.numAnomaliesNegativeDiff).toBe(0)
    expect(summary.firstTimestamp.toISOString()).toBe('2025-12-17T10:00:00.000Z')
    expect(summary.lastTimestamp.toISOString()).toBe('2025-12-17T10:20:00.000Z')
  })

  it('owns its boundary timestamps', () => {
    const { records } = computeMetrics([canonical('2025-12-17T10:00', 1), canonical('2025-12-17T10:10', 2)], stage)
    const [summary] = buildSummaries(records, stage).summaries

    expect(summary.firstTimestamp).not.toBe(records[0].timestamp)
    expect(summary.lastTimestamp).not.toBe(records[1].timestamp)
    expect(summary.lastTimestamp).toEqual(records[1].timestamp)
  })

  it('leaves net absent when an endpoint is absent', () => {
    const { summaries } = summarize([
      canonical('2025-12-17T10:00', null),
      canonical('2025-12-17T10:10', 120),
      canonical('2025-12-17T10:20', 150),
    ])

    expect(summaries[0].counters.total_plays).toEqual({
      first: null,
      last: 150,
      net: null,
      avgRatePerMin: 3,
    })
  })

  it('leaves the average rate absent when no rate is present', () => {
    const { summaries } = summarize([canonical('2025-12-17T10:00', 100)])

    expect(summaries[0].counters.total_plays.avgRatePerMin).toBeNull()
    expect(summaries[0].counters.total_listeners).toEqual({
      first: null,
      last: null,
      net: null,
      avgRatePerMin: null,
    })
    expect(summaries[0].numPoints).toBe(1)
  })

  it('counts anomalies per item and totals them per source', () => {
    const { summaries, anomaliesBySource } = summarize([
      canonical('2025-12-17T10:00', 100),
      canonical('2025-12-17T10:10', 80),
      canonical('2025-12-17T10:20', 70),
      canonical('2025-12-17T10:00', 10, { itemId: '2' }),
      canonical('2025-12-17T10:10', 5, { itemId: '2' }),
      canonical('2025-12-17T10:00', 1, { source: 'MELON' }),
      canonical('2025-12-17T10:10', 2, { source: 'MELON' }),
    ])

    expect(summaries.map((s) => [s.source, s.itemId, s.numPoints, s.numAnomaliesNegativeDiff])).toEqual([
      ['GENIE', '1', 3, 2],
      ['GENIE', '2', 2, 1],
      ['MELON', '1', 2, 0],
    ])
    expect(anomaliesBySource).toEqual({ GENIE: 3, MELON: 0 })
  })

  it('prefers the latest non-empty descriptive fields', () => {
    const { summaries } = summarize([
      canonical('2025-12-17T10:00', 1, { itemName: 'Old Title', artistName: 'Artist' }),
      canonical('2025-12-17T10:10', 2, { itemName: 'New Title', artistName: '' }),
    ])

    expect(summaries[0].itemName).toBe('New Title')
    expect(summaries[0].artistName).toBe('Artist')
  })
})
