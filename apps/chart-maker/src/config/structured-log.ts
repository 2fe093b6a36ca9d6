/**
 * Structured logging helpers for chart-maker workflows.
 *
 * Enforces the common envelope fields (workflow, stage, runId, event_name)
 * and drops empty values so log lines stay comparable across runs.
 */

import type { ILogger, LogContext as BaseLogContext } from '@stream-metrics/logger'

export type LogContext = {
  workflow: string
  stage: string
  runId?: string
  source?: string
  itemId?: string
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface WorkflowLogger {
  debug: (event: string, meta?: LogMeta) => void
  info: (event: string, meta?: LogMeta) => void
  warn: (event: string, meta?: LogMeta, err?: unknown) => void
  error: (event: string, meta?: LogMeta, err?: unknown) => void
  child: (extra: Partial<LogContext>) => WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: LogContext): WorkflowLogger {
  const baseContext = compact(context)

  const payload = (event: string, meta?: LogMeta): BaseLogContext => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    child: (extra) =>
      createWorkflowLogger(base, { ...context, ...compact(extra) }),
  }
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
