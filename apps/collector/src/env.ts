/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/collector/.env.local outside production; production injects
 * the variables directly.
 */
import { config } from 'dotenv'
import { resolve } from 'path'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(__dirname, '..', '.env.local')
  config({ path: envPath })
}
