/**
 * Chart maker settings
 *
 * Environment variables:
 * - CHART_MAKER_COUNTERS: comma-separated counter fields. Default: total_plays,total_listeners
 * - CHART_MAKER_OUTDIR: default output root for `render`. Default: output
 *
 * The first counter is the primary one used for rankings.
 */

import { z } from 'zod'
import { DEFAULT_COUNTER_FIELDS, toCounterSpecs, type CounterSpec } from '@stream-metrics/series'

const envSchema = z.object({
  CHART_MAKER_COUNTERS: z
    .string()
    .default(DEFAULT_COUNTER_FIELDS.join(','))
    .transform((value) => toCounterSpecs(value.split(',')))
    .refine((counters) => counters.length > 0, {
      message: 'CHART_MAKER_COUNTERS must name at least one counter field',
    })
    .refine((counters) => new Set(counters.map(({ key }) => key)).size === counters.length, {
      message: 'CHART_MAKER_COUNTERS fields must not share a short name (e.g. total_plays and plays)',
    }),
  CHART_MAKER_OUTDIR: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || 'output'),
})

export interface Settings {
  counters: CounterSpec[]
  defaultOutdir: string
}

/**
 * Parse settings from the environment. Throws a ZodError on invalid values.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.parse(env)
  return {
    counters: parsed.CHART_MAKER_COUNTERS,
    defaultOutdir: parsed.CHART_MAKER_OUTDIR,
  }
}
