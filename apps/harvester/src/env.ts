/**
 * Environment loader - import before anything that reads process.env
 *
 * Loads apps/harvester/.env.local in development only; production gets its
 * variables injected directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
