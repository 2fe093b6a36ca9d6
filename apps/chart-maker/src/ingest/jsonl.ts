/**
 * JSONL snapshot loader
 *
 * Reads one file, or every *.jsonl file under a directory (recursively).
 * Files are read in sorted relative-path order and lines in file order; that
 * order is the precedence the normalizer's last-wins dedup relies on.
 *
 * Unreadable files and malformed lines are logged and skipped.
 */

import { readdir, readFile, stat } from 'node:fs/promises'
import { join, relative } from 'node:path'
import type { ILogger } from '@stream-metrics/logger'
import { compareText, type RawRecord } from '@stream-metrics/series'
import { loggers } from '../config/logger.js'

const JSONL_EXTENSION = '.jsonl'

export interface LoadResult {
  records: RawRecord[]
  files: string[]
  skippedLines: number
}

function isPlainObject(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const fullPath = join(dir, entry.name)
    if (entry.isDirectory()) {
      await walk(fullPath, out)
    } else if (entry.isFile() && entry.name.endsWith(JSONL_EXTENSION)) {
      out.push(fullPath)
    }
  }
}

/**
 * All *.jsonl files under `root`, sorted by path relative to `root`.
 */
export async function findJsonlFiles(root: string): Promise<string[]> {
  const files: string[] = []
  await walk(root, files)
  return files.sort((a, b) => compareText(relative(root, a), relative(root, b)))
}

/**
 * Parse JSONL text. Blank lines are ignored; lines that are not JSON objects
 * are reported through `onInvalid` and skipped.
 */
export function parseJsonl(
  content: string,
  onInvalid: (lineNumber: number, reason: string) => void = () => {}
): RawRecord[] {
  const records: RawRecord[] = []
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/)

  lines.forEach((line, index) => {
    const trimmed = line.trim()
    if (!trimmed) return

    let parsed: unknown
    try {
      parsed = JSON.parse(trimmed)
    } catch (error) {
      onInvalid(index + 1, error instanceof Error ? error.message : String(error))
      return
    }

    if (!isPlainObject(parsed)) {
      onInvalid(index + 1, 'line is not a JSON object')
      return
    }
    records.push(parsed)
  })

  return records
}

async function resolveInputFiles(inputPath: string, log: ILogger): Promise<string[]> {
  let isDirectory = false
  try {
    isDirectory = (await stat(inputPath)).isDirectory()
  } catch (error) {
    log.error('Input path cannot be read', { inputPath }, error)
    return []
  }

  if (!isDirectory) {
    return [inputPath]
  }

  const files = await findJsonlFiles(inputPath)
  log.info('Found JSONL files', { inputPath, fileCount: files.length })
  return files
}

export async function loadJsonl(inputPath: string, log: ILogger = loggers.ingest): Promise<LoadResult> {
  const files = await resolveInputFiles(inputPath, log)
  if (files.length === 0) {
    log.warn('No JSONL files found', { inputPath })
    return { records: [], files: [], skippedLines: 0 }
  }

  const records: RawRecord[] = []
  const loaded: string[] = []
  let skippedLines = 0

  for (const file of files) {
    let content: string
    try {
      content = await readFile(file, 'utf-8')
    } catch (error) {
      log.error('Failed to read JSONL file', { file }, error)
      continue
    }

    const parsed = parseJsonl(content, (line, reason) => {
      skippedLines++
      log.warn('Skipped malformed JSONL line', { file, line, reason })
    })
    records.push(...parsed)
    loaded.push(file)
  }

  if (records.length === 0) {
    log.warn('No records loaded from JSONL input', { inputPath })
  } else {
    log.info('Loaded JSONL records', { recordCount: records.length, fileCount: loaded.length })
  }

  return { records, files: loaded, skippedLines }
}
