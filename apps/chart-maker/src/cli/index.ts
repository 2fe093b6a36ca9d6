import '../env.js'
import { logger } from '../config/logger.js'
import { classifyError } from '../lib/errors.js'
import { runCli } from './run.js'

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2))
  process.exit(exitCode)
}

main().catch((error: unknown) => {
  const classified = classifyError(error)
  logger.fatal('Chart maker crashed', { code: classified.code }, error)
  process.exit(classified.exitCode)
})
