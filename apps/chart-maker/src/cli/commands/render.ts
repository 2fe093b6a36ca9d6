/**
 * `render` command
 *
 * JSONL snapshots -> normalize -> metrics -> summaries, then writes:
 *   <outdir>/csv/<source>_summary.csv
 *   <outdir>/rankings/<source>_top<N>_{totals,delta}.csv   (unless --no-export-rankings)
 *   <outdir>/reports/<source>_<item>_report.html           (unless --no-export-html)
 *
 * Empty input, or nothing left after the source/item filters, is logged and
 * exits 0 without writing anything.
 */

import { randomUUID } from 'node:crypto'
import { z, ZodError } from 'zod'
import type { ILogger } from '@stream-metrics/logger'
import { DEFAULT_TOP_N, rankItems, runPipeline } from '@stream-metrics/series'
import { loggers } from '../../config/logger.js'
import { loadSettings, type Settings } from '../../config/settings.js'
import { createWorkflowLogger } from '../../config/structured-log.js'
import { loadJsonl } from '../../ingest/jsonl.js'
import { AppError, ERROR_CODES, classifyError, formatZodIssues } from '../../lib/errors.js'
import { writeItemReports } from '../../output/html-report.js'
import { outputLayout } from '../../output/paths.js'
import { writeRankingsCsv } from '../../output/rankings-csv.js'
import { writeSummaryCsv } from '../../output/summary-csv.js'

export interface RenderCommandArgs {
  input: string
  outdir?: string
  source?: string
  itemId?: string
  topN?: string | number
  exportHtml?: boolean
  exportRankings?: boolean
}

export interface RenderCommandDeps {
  logger?: ILogger
  settings?: Settings
}

const renderArgsSchema = z.object({
  input: z.string().trim().min(1, '--input is required'),
  outdir: z.string().trim().min(1).optional(),
  source: z.string().trim().min(1).optional(),
  itemId: z.string().trim().min(1).optional(),
  topN: z.coerce
    .number({ invalid_type_error: '--topn must be a number' })
    .int('--topn must be an integer')
    .positive('--topn must be positive')
    .default(DEFAULT_TOP_N),
  exportHtml: z.boolean().default(true),
  exportRankings: z.boolean().default(true),
})

function parseRenderArgs(args: RenderCommandArgs): z.infer<typeof renderArgsSchema> {
  const parsed = renderArgsSchema.safeParse(args)
  if (!parsed.success) {
    throw new AppError(ERROR_CODES.INVALID_FLAG, formatZodIssues(parsed.error), {
      issues: parsed.error.issues.map((issue) => issue.path.join('.')),
    })
  }
  return parsed.data
}

function resolveSettings(provided: Settings | undefined): Settings {
  if (provided) return provided
  try {
    return loadSettings()
  } catch (error) {
    const reason = error instanceof ZodError ? formatZodIssues(error) : String(error)
    throw new AppError(ERROR_CODES.CONFIGURATION_ERROR, `Invalid chart maker settings: ${reason}`, undefined, {
      cause: error,
    })
  }
}

async function writeOutputs<T>(label: string, write: () => Promise<T>): Promise<T> {
  try {
    return await write()
  } catch (error) {
    throw new AppError(ERROR_CODES.OUTPUT_WRITE_FAILED, `Failed to write ${label}`, undefined, {
      cause: error,
    })
  }
}

export async function runRenderCommand(
  args: RenderCommandArgs,
  deps: RenderCommandDeps = {}
): Promise<number> {
  const base = deps.logger ?? loggers.render
  const runId = randomUUID()
  const log = createWorkflowLogger(base, { workflow: 'render', stage: 'start', runId })

  try {
    const options = parseRenderArgs(args)
    const settings = resolveSettings(deps.settings)
    const outdir = options.outdir ?? settings.defaultOutdir

    log.info('RENDER_START', {
      input: options.input,
      outdir,
      source: options.source,
      itemId: options.itemId,
      topN: options.topN,
      counters: settings.counters.map((counter) => counter.field),
    })

    const loaded = await loadJsonl(options.input, base.child('ingest'))
    if (loaded.records.length === 0) {
      log.child({ stage: 'load' }).warn('RENDER_INPUT_EMPTY', { input: options.input })
      return 0
    }

    const result = runPipeline(loaded.records, {
      counters: settings.counters,
      logger: base.child('pipeline', { runId }),
      filters: { source: options.source, itemId: options.itemId },
    })

    const pipelineLog = log.child({ stage: 'pipeline' })
    if (result.canonical.length === 0) {
      pipelineLog.warn('RENDER_FILTERED_EMPTY', { ...result.stats })
      return 0
    }

    const outputLog = base.child('output', { runId })
    const layout = outputLayout(outdir)

    const summaryFiles = await writeOutputs('summary CSV', () =>
      writeSummaryCsv(result.summaries, layout.csvDir, settings.counters, outputLog)
    )

    let rankingFiles: string[] = []
    if (options.exportRankings) {
      const rankings = rankItems(result.metrics, result.summaries, {
        counters: settings.counters,
        topN: options.topN,
      })
      rankingFiles = await writeOutputs('ranking CSVs', () =>
        writeRankingsCsv(rankings, layout.rankingsDir, options.topN, outputLog)
      )
    }

    let reportFiles: string[] = []
    if (options.exportHtml) {
      reportFiles = await writeOutputs('HTML reports', () =>
        writeItemReports(result.metrics, result.summaries, layout.reportsDir, settings.counters, outputLog)
      )
    }

    log.child({ stage: 'complete' }).info('RENDER_COMPLETE', {
      outdir,
      ...result.stats,
      anomaliesBySource: result.anomaliesBySource,
      summaryFiles: summaryFiles.length,
      rankingFiles: rankingFiles.length,
      reportFiles: reportFiles.length,
      skippedLines: loaded.skippedLines,
    })
    return 0
  } catch (error) {
    const classified = classifyError(error)
    log.error(
      'RENDER_FAILED',
      { code: classified.code, category: classified.category, reason: classified.message, ...classified.details },
      classified.originalError?.cause ?? classified.originalError
    )
    return classified.exitCode
  }
}
