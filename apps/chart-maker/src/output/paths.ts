import { createHash } from 'node:crypto'
import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'

export interface OutputLayout {
  csvDir: string
  rankingsDir: string
  reportsDir: string
}

export function outputLayout(outdir: string): OutputLayout {
  return {
    csvDir: join(outdir, 'csv'),
    rankingsDir: join(outdir, 'rankings'),
    reportsDir: join(outdir, 'reports'),
  }
}

/**
 * Make a source or item id usable as part of a file name.
 */
export function safeFileName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9._-]/g, '_')
  return cleaned.replace(/^\.+$/, '_') || '_'
}

function shortHash(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 8)
}

/**
 * Allocates file names within one output directory.
 *
 * Names are built from the cleaned `parts` joined with `_`. When that name is
 * already taken (compared case-insensitively), a hash of the raw parts is
 * appended to the base.
 */
export class FileNameAllocator {
  private readonly taken = new Set<string>()

  allocate(parts: readonly string[], suffix: string): string {
    const base = parts.map(safeFileName).join('_')
    let name = `${base}${suffix}`
    for (let attempt = 0; this.taken.has(name.toLowerCase()); attempt++) {
      name = `${base}-${shortHash(JSON.stringify([parts, attempt]))}${suffix}`
    }
    this.taken.add(name.toLowerCase())
    return name
  }
}

export async function ensureDir(dir: string): Promise<string> {
  await mkdir(dir, { recursive: true })
  return dir
}
