/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/chart-maker/.env.local in development. Production runs take
 * their settings from the process environment only.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'

if (process.env.NODE_ENV !== 'production') {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(__dirname, '..', '.env.local') })
}
