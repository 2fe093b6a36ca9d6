/**
 * @stream-metrics/logger
 *
 * Leveled, structured logging for the series pipeline and the chart-maker CLI.
 * Every line goes to stderr; stdout is left to command output.
 *
 * Environment variables (read on every call):
 * - LOG_LEVEL: debug | info | warn | error | fatal | silent. Default: info
 * - LOG_FORMAT: json | pretty. Default: json when NODE_ENV=production, else pretty
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogThreshold = LogLevel | 'silent'

export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

/** Receives every formatted line */
export type LogSink = (level: LogLevel, line: string) => void

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: Number.POSITIVE_INFINITY,
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BOLD = '\x1b[1m'

/** Values printed bare in pretty output; anything else is JSON-encoded */
const BARE_VALUE = /^[\w.:/@+-]+$/

function isThreshold(value: string | undefined): value is LogThreshold {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY, value)
}

export function getLogLevel(): LogThreshold {
  const level = process.env.LOG_LEVEL?.trim().toLowerCase()
  return isThreshold(level) ? level : 'info'
}

export function getLogFormat(): LogFormat {
  const format = process.env.LOG_FORMAT?.trim().toLowerCase()
  if (format === 'json' || format === 'pretty') return format
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

export function isLevelEnabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[getLogLevel()]
}

function describeError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'UnknownError', message: String(error) }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

function formatMetaValue(value: unknown): string {
  if (typeof value === 'string' && BARE_VALUE.test(value)) return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  const encoded: string | undefined = JSON.stringify(value)
  return encoded ?? String(value)
}

/**
 * One human-readable line: time, level, `[service:component]`, message, then
 * metadata as `key=value` pairs. An error's stack follows on its own line.
 */
export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const time = timestamp.slice(11, 23)
  const scope = component ? `${service}:${component}` : service
  const pairs = Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatMetaValue(value)}`)
    .join(' ')

  let line = `${DIM}${time}${RESET} ${LEVEL_COLORS[level]}${BOLD}${level.toUpperCase().padEnd(5)}${RESET} ${DIM}[${scope}]${RESET} ${message}`
  if (pairs) line += ` ${DIM}${pairs}${RESET}`
  if (error) line += `\n  ${DIM}${error.stack ?? `${error.name}: ${error.message}`}${RESET}`
  return line
}

export const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`)
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * A string extends the component path (`render` -> `render:csv`) and may
   * bring extra context; an object only adds context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export interface LoggerOptions {
  component?: string
  defaultContext?: LogContext
  sink?: LogSink
  /** Source of entry timestamps */
  clock?: () => Date
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly context: LogContext
  private readonly sink: LogSink
  private readonly clock: () => Date

  constructor(service: string, options: LoggerOptions = {}) {
    this.service = service
    this.component = options.component
    this.context = options.defaultContext ?? {}
    this.sink = options.sink ?? stderrSink
    this.clock = options.clock ?? (() => new Date())
  }

  debug(message: string, meta?: LogContext): void {
    this.write('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.write('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.write('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.write('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.write('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext !== 'string') {
      return this.derive(this.component, componentOrContext)
    }
    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return this.derive(component, defaultContext)
  }

  private derive(component: string | undefined, context: LogContext): Logger {
    return new Logger(this.service, {
      component,
      defaultContext: { ...this.context, ...context },
      sink: this.sink,
      clock: this.clock,
    })
  }

  private write(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!isLevelEnabled(level)) return

    const entry: LogEntry = {
      ...this.context,
      ...meta,
      timestamp: this.clock().toISOString(),
      level,
      service: this.service,
      message,
    }
    if (this.component) entry.component = this.component

    const described = describeError(error)
    if (described) entry.error = described

    this.sink(level, getLogFormat() === 'json' ? formatJson(entry) : formatPretty(entry))
  }
}

/**
 * @example
 * ```ts
 * const logger = createLogger('chart-maker')
 * logger.child('ingest').warn('Skipped malformed JSONL line', { file: 'a.jsonl', line: 3 })
 * ```
 */
export function createLogger(service: string, options: Omit<LoggerOptions, 'component'> = {}): ILogger {
  return new Logger(service, options)
}
