import { describe, expect, it } from 'vitest'
import { DEFAULT_COUNTERS, counterKey, parseCounterValue, toCounterSpecs } from '../counters.js'

describe('parseCounterValue', () => {
  it('passes finite numbers through', () => {
    expect(parseCounterValue(0)).toBe(0)
    expect(parseCounterValue(1234)).toBe(1234)
    expect(parseCounterValue(12.5)).toBe(12.5)
  })

  it('rejects non-finite numbers', () => {
    expect(parseCounterValue(Number.NaN)).toBeNull()
    expect(parseCounterValue(Number.POSITIVE_INFINITY)).toBeNull()
  })

  it('parses plain and comma-grouped numeric strings', () => {
    expect(parseCounterValue('1234')).toBe(1234)
    expect(parseCounterValue(' 1,234,567 ')).toBe(1234567)
    expect(parseCounterValue('12.5')).toBe(12.5)
  })

  it.each([
    ['12.3만', 123000],
    ['100만', 1000000],
    ['1.2M', 1200000],
    ['12.5m', 12500000],
    ['1.2K', 1200],
    ['12k', 12000],
  ])('parses unit suffix %s', (input, expected) => {
    expect(parseCounterValue(input)).toBe(expected)
  })

  it.each([[''], ['   '], ['abc'], ['12 plays'], ['1.2.3']])('returns null for %j', (input) => {
    expect(parseCounterValue(input)).toBeNull()
  })

  it('returns null for non-numeric types', () => {
    expect(parseCounterValue(undefined)).toBeNull()
    expect(parseCounterValue(null)).toBeNull()
    expect(parseCounterValue(true)).toBeNull()
    expect(parseCounterValue({ value: 1 })).toBeNull()
  })
})

describe('counter specs', () => {
  it('derives the short key by dropping the total_ prefix', () => {
    expect(counterKey('total_plays')).toBe('plays')
    expect(counterKey('likes')).toBe('likes')
    expect(counterKey('total_')).toBe('total_')
  })

  it('defaults to plays and listeners', () => {
    expect(DEFAULT_COUNTERS).toEqual([
      { field: 'total_plays', key: 'plays' },
      { field: 'total_listeners', key: 'listeners' },
    ])
  })

  it('trims, skips blanks and de-duplicates configured fields', () => {
    expect(toCounterSpecs([' total_plays', '', 'total_plays', 'likes'])).toEqual([
      { field: 'total_plays', key: 'plays' },
      { field: 'likes', key: 'likes' },
    ])
  })
})
