export type Flags = Record<string, string | boolean>

/**
 * Parse `--key value`, `--key=value` and bare `--switch` flags.
 *
 * Consecutive non-flag tokens after a key are joined with spaces so unquoted
 * multi-word values survive. Tokens before the first flag are ignored.
 */
export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[body] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[body] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

/**
 * A flag that takes a value: absent -> undefined, given without a value -> ''.
 */
export function asOptionalValue(value: string | boolean | undefined): string | undefined {
  if (value === undefined) return undefined
  return typeof value === 'string' ? value : ''
}
