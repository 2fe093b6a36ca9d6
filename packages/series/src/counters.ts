/**
 * Counter configuration and value coercion.
 *
 * Scraped counters arrive as numbers, plain numeric strings, or display
 * strings such as "1,234,567", "12.3만", "1.2M". Anything that cannot be read
 * as a number becomes null; coercion never throws.
 */

import type { CounterSpec } from './types.js'

export const DEFAULT_COUNTER_FIELDS = ['total_plays', 'total_listeners'] as const

const TOTAL_PREFIX = 'total_'

const PLAIN_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)$/
const SUFFIXED_NUMBER = /^(\d+(?:\.\d+)?)\s*(만|[mMkK])$/

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  만: 10_000,
  m: 1_000_000,
  k: 1_000,
}

/**
 * Short name of a counter field: `total_plays` -> `plays`.
 */
export function counterKey(field: string): string {
  if (field.startsWith(TOTAL_PREFIX) && field.length > TOTAL_PREFIX.length) {
    return field.slice(TOTAL_PREFIX.length)
  }
  return field
}

export function toCounterSpecs(fields: readonly string[]): CounterSpec[] {
  const seen = new Set<string>()
  const specs: CounterSpec[] = []
  for (const raw of fields) {
    const field = raw.trim()
    if (!field || seen.has(field)) continue
    seen.add(field)
    specs.push({ field, key: counterKey(field) })
  }
  return specs
}

export const DEFAULT_COUNTERS: readonly CounterSpec[] = toCounterSpecs(DEFAULT_COUNTER_FIELDS)

/**
 * Coerce an untrusted counter value to a number, or null when absent/unparsable.
 *
 * Suffixed values are truncated to integers.
 */
export function parseCounterValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }

  if (typeof value !== 'string') {
    return null
  }

  const text = value.trim().replace(/,/g, '')
  if (!text) {
    return null
  }

  if (PLAIN_NUMBER.test(text)) {
    const parsed = Number(text)
    return Number.isFinite(parsed) ? parsed : null
  }

  const suffixed = SUFFIXED_NUMBER.exec(text)
  if (suffixed) {
    const base = Number.parseFloat(suffixed[1])
    const multiplier = SUFFIX_MULTIPLIERS[suffixed[2].toLowerCase()]
    if (Number.isFinite(base) && multiplier !== undefined) {
      return Math.trunc(base * multiplier)
    }
  }

  return null
}
