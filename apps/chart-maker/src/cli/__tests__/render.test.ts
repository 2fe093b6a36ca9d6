import { existsSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { captureLogger, makeTempDir, silentLogger, testSettings } from '../../__tests__/helpers.js'
import { runRenderCommand } from '../commands/render.js'
import { runCli } from '../run.js'

function snapshot(
  source: string,
  itemId: string,
  minute: number,
  plays: number,
  listeners?: number
): Record<string, unknown> {
  return {
    source,
    item_id: itemId,
    item_name: `Song ${itemId}`,
    artist_name: 'Artist',
    date: '2025-12-17',
    hour: 10,
    minute,
    total_plays: plays,
    ...(listeners === undefined ? {} : { total_listeners: listeners }),
  }
}

const SNAPSHOTS = [
  snapshot('GENIE', '1', 0, 100, 10),
  snapshot('GENIE', '1', 10, 130, 12),
  snapshot('GENIE', '1', 20, 120, 15),
  snapshot('GENIE', '2', 0, 500),
  snapshot('GENIE', '2', 10, 520),
  snapshot('MELON', '9', 0, 50),
  snapshot('GENIE', '2', 10, 530),
]

const deps = { logger: silentLogger, settings: testSettings }

describe('render command', () => {
  let dir = ''
  let cleanup = async () => {}
  let input = ''
  let outdir = ''

  beforeEach(async () => {
    const tmp = await makeTempDir()
    dir = tmp.dir
    cleanup = tmp.cleanup
    input = join(dir, 'snapshots.jsonl')
    outdir = join(dir, 'out')
    await writeFile(input, SNAPSHOTS.map((record) => JSON.stringify(record)).join('\n'))
  })

  afterEach(async () => {
    await cleanup()
  })

  const lines = async (...parts: string[]) => (await readFile(join(outdir, ...parts), 'utf-8')).split('\n')

  it('writes summaries, rankings and reports', async () => {
    expect(await runCli(['render', '--input', input, '--outdir', outdir], deps)).toBe(0)

    const genie = await lines('csv', 'GENIE_summary.csv')
    expect(genie[1]).toBe('GENIE,1,Song 1,Artist,2025-12-17 10:00,2025-12-17 10:20,100,120,20,10,15,5,1,0.25,3,1')
    expect(genie[2]).toBe('GENIE,2,Song 2,Artist,2025-12-17 10:00,2025-12-17 10:10,500,530,30,,,,3,,2,0')
    expect(existsSync(join(outdir, 'csv', 'MELON_summary.csv'))).toBe(true)

    expect(await lines('rankings', 'GENIE_top10_totals.csv')).toEqual([
      'rank,item_id,item_name,last_total_plays',
      '1,2,Song 2,530',
      '2,1,Song 1,120',
      '',
    ])
    expect(await lines('rankings', 'GENIE_top10_delta.csv')).toEqual([
      'rank,item_id,item_name,avg_delta_plays',
      '1,2,Song 2,30',
      '2,1,Song 1,10',
      '',
    ])

    for (const report of ['GENIE_1_report.html', 'GENIE_2_report.html', 'MELON_9_report.html']) {
      expect(existsSync(join(outdir, 'reports', report))).toBe(true)
    }
  })

  it('limits rankings to --topn and honors the export switches', async () => {
    const code = await runCli(
      ['render', '--input', input, '--outdir', outdir, '--topn', '1', '--no-export-html'],
      deps
    )

    expect(code).toBe(0)
    expect(await lines('rankings', 'GENIE_top1_totals.csv')).toEqual([
      'rank,item_id,item_name,last_total_plays',
      '1,2,Song 2,530',
      '',
    ])
    expect(existsSync(join(outdir, 'reports'))).toBe(false)

    await runCli(['render', '--input', input, '--outdir', join(dir, 'bare'), '--no-export-rankings'], deps)
    expect(existsSync(join(dir, 'bare', 'rankings'))).toBe(false)
    expect(existsSync(join(dir, 'bare', 'reports'))).toBe(true)
  })

  it('filters by source and item id', async () => {
    const code = await runRenderCommand({ input, outdir, source: 'GENIE', itemId: '2' }, deps)

    expect(code).toBe(0)
    expect(await lines('csv', 'GENIE_summary.csv')).toHaveLength(3)
    expect(existsSync(join(outdir, 'csv', 'MELON_summary.csv'))).toBe(false)
  })

  it('exits 0 without output when the filters match nothing', async () => {
    expect(await runRenderCommand({ input, outdir, source: 'BUGS' }, deps)).toBe(0)
    expect(existsSync(outdir)).toBe(false)
  })

  it('exits 0 without output for empty input', async () => {
    const empty = join(dir, 'empty.jsonl')
    await writeFile(empty, '\n')

    expect(await runRenderCommand({ input: empty, outdir }, deps)).toBe(0)
    expect(existsSync(outdir)).toBe(false)
  })

  it('uses the configured output directory when --outdir is absent', async () => {
    const settings = { ...testSettings, defaultOutdir: join(dir, 'default-out') }

    expect(await runRenderCommand({ input }, { logger: silentLogger, settings })).toBe(0)
    expect(existsSync(join(dir, 'default-out', 'csv', 'GENIE_summary.csv'))).toBe(true)
  })

  it.each([
    [['render', '--outdir', 'out']],
    [['render', '--input', 'x.jsonl', '--topn', 'ten']],
    [['render', '--input', 'x.jsonl', '--topn', '0']],
    [['render', '--input', 'x.jsonl', '--topn']],
    [['plot', '--input', 'x.jsonl']],
  ])('exits 2 on usage errors: %j', async (argv) => {
    expect(await runCli(argv, deps)).toBe(2)
  })

  it('exits 1 when output cannot be written', async () => {
    const blocker = join(dir, 'blocker')
    await writeFile(blocker, '')

    expect(await runRenderCommand({ input, outdir: join(blocker, 'out') }, deps)).toBe(1)
  })
})

describe('render usage errors', () => {
  beforeEach(() => {
    vi.stubEnv('LOG_FORMAT', 'json')
    vi.stubEnv('LOG_LEVEL', 'info')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('reports invalid flags as INVALID_FLAG', async () => {
    const { logger, entries } = captureLogger()

    expect(await runRenderCommand({ input: '' }, { logger, settings: testSettings })).toBe(2)
    expect(entries()).toHaveLength(1)
    expect(entries()[0]).toMatchObject({
      level: 'error',
      message: 'RENDER_FAILED',
      code: 'INVALID_FLAG',
      category: 'validation',
      reason: 'input: --input is required',
    })
  })

  it('reports invalid settings as CONFIGURATION_ERROR', async () => {
    vi.stubEnv('CHART_MAKER_COUNTERS', ' , ')
    const { logger, entries } = captureLogger()

    expect(await runRenderCommand({ input: 'x.jsonl' }, { logger })).toBe(2)
    expect(entries()[0]).toMatchObject({ message: 'RENDER_FAILED', code: 'CONFIGURATION_ERROR' })
  })

  it('reports an unknown command as UNKNOWN_COMMAND', async () => {
    const { logger, entries } = captureLogger()

    expect(await runCli(['plot'], { logger })).toBe(2)
    expect(entries()[0]).toMatchObject({
      level: 'error',
      message: 'Unknown command: plot',
      code: 'UNKNOWN_COMMAND',
      command: 'plot',
    })
  })
})
