import { formatTimestamp } from '@stream-metrics/series'

export type Cell = string | number

/** Absent values render as empty cells */
export function cell(value: number | null | undefined): Cell {
  return value === null || value === undefined ? '' : value
}

export function timestampCell(value: Date): string {
  return formatTimestamp(value)
}
