/**
 * Snapshot timestamps.
 *
 * A snapshot's time is a wall-clock minute. It is stored as a UTC Date so that
 * ordering and elapsed-minute arithmetic do not depend on the host time zone.
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const COMBINED_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{1,2}):(\d{2})(?::\d{2}(?:\.\d+)?)?)?$/

const MS_PER_MINUTE = 60_000

export const INVALID_TIMESTAMP_KEY = 'invalid'

/**
 * Read an hour/minute component. Missing or non-numeric values default to 0;
 * fractional values are truncated.
 */
export function coerceClockPart(value: unknown): number {
  let parsed = Number.NaN
  if (typeof value === 'number') {
    parsed = value
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value.trim())
  }
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0
}

function buildUtc(date: string, hour: number, minute: number): Date | null {
  const match = DATE_PATTERN.exec(date)
  if (!match) return null

  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return null

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const ms = Date.UTC(year, month - 1, day, hour, minute)
  const built = new Date(ms)

  // Date.UTC rolls 2025-02-30 over into March; reject instead
  if (
    built.getUTCFullYear() !== year ||
    built.getUTCMonth() !== month - 1 ||
    built.getUTCDate() !== day
  ) {
    return null
  }

  return built
}

export interface TimestampFields {
  date?: unknown
  hour?: unknown
  minute?: unknown
  timestamp?: unknown
}

/**
 * Build a snapshot timestamp from `date` + `hour` + `minute`, or from an
 * already-combined `timestamp` string when `date` is absent.
 *
 * @returns null when no valid minute can be built
 */
export function buildTimestamp(fields: TimestampFields): Date | null {
  if (typeof fields.date === 'string' && fields.date.trim() !== '') {
    return buildUtc(
      fields.date.trim(),
      coerceClockPart(fields.hour),
      coerceClockPart(fields.minute)
    )
  }

  if (fields.date !== undefined && fields.date !== null && fields.date !== '') {
    return null
  }

  if (typeof fields.timestamp === 'string') {
    const match = COMBINED_PATTERN.exec(fields.timestamp.trim())
    if (!match) return null
    const hour = match[2] === undefined ? 0 : Number(match[2])
    const minute = match[3] === undefined ? 0 : Number(match[3])
    return buildUtc(match[1], hour, minute)
  }

  return null
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Render as `YYYY-MM-DD HH:MM`.
 */
export function formatTimestamp(timestamp: Date): string {
  return (
    `${timestamp.getUTCFullYear()}-${pad2(timestamp.getUTCMonth() + 1)}-${pad2(timestamp.getUTCDate())}` +
    ` ${pad2(timestamp.getUTCHours())}:${pad2(timestamp.getUTCMinutes())}`
  )
}

export function minutesBetween(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / MS_PER_MINUTE
}
