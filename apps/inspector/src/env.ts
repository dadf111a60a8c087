/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/inspector/.env.local outside production.
 * Scheduled runs in production receive their env from the scheduler.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
