import { runRenderCommand, type RenderCommandDeps } from './commands/render.js'
import { asOptionalValue, asString, parseFlags } from './parse-flags.js'
import { loggers } from '../config/logger.js'
import { AppError, ERROR_CODES, classifyError } from '../lib/errors.js'

const HELP = [
  'Chart maker',
  '',
  'Commands:',
  '  render --input <file|dir> [--outdir <dir>] [--source <name>] [--item-id <id>]',
  '         [--topn 10] [--no-export-html] [--no-export-rankings]',
]

export function printHelp(write: (line: string) => void = console.log): void {
  for (const line of HELP) write(line)
}

/**
 * Dispatch a command line (without the node and script arguments).
 *
 * @returns Process exit code: 0 success, 1 runtime failure, 2 usage error
 */
export async function runCli(argv: readonly string[], deps: RenderCommandDeps = {}): Promise<number> {
  const [command, ...rest] = argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  switch (command) {
    case 'render':
      return runRenderCommand(
        {
          input: asString(flags.input),
          outdir: asOptionalValue(flags.outdir),
          source: asOptionalValue(flags.source),
          itemId: asOptionalValue(flags['item-id']),
          topN: asOptionalValue(flags.topn),
          exportHtml: flags['no-export-html'] !== true,
          exportRankings: flags['no-export-rankings'] !== true,
        },
        deps
      )
    default: {
      const classified = classifyError(
        new AppError(ERROR_CODES.UNKNOWN_COMMAND, `Unknown command: ${command}`, { command })
      )
      const log = deps.logger ?? loggers.cli
      log.error(classified.message, { code: classified.code, ...classified.details })
      printHelp(console.error)
      return classified.exitCode
    }
  }
}
