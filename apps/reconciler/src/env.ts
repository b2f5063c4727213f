/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/reconciler/.env.local in development.
 * Production runs get their variables from the platform.
 */
import { config } from 'dotenv'
import { resolve } from 'path'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(__dirname, '..', '.env.local')
  config({ path: envPath })
}
