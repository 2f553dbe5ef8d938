import { z } from 'zod'
import { isLogLevel, type LogFormat, type LogLevel } from '@hanjadex/logger'
import { ConfigurationError } from '../ingestion/text/errors.js'

const settingsSchema = z.object({
  HARVESTER_INPUT_ROOT: z.string().min(1).default('data/input'),
  HARVESTER_OUTPUT_DIR: z.string().min(1).default('data'),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LOOKUP_MIN_DELAY_MS: z.coerce.number().int().min(0).default(500),
  LOG_LEVEL: z
    .string()
    .transform(value => value.toLowerCase())
    .refine(isLogLevel, 'must be one of debug, info, warn, error, fatal')
    .optional(),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
})

export interface HarvesterSettings {
  inputRoot: string
  outputDir: string
  lookupTimeoutMs: number
  lookupMinDelayMs: number
  logLevel?: LogLevel
  logFormat?: LogFormat
}

/**
 * Convert the first zod issue into a ConfigurationError naming its path.
 */
export function toConfigurationError(error: z.ZodError, source: string): ConfigurationError {
  const issue = error.issues[0]
  const path = issue?.path.join('.') || '(root)'
  return new ConfigurationError(`${source}: ${path}: ${issue?.message ?? 'invalid value'}`, {
    source,
    path: issue?.path ?? [],
    issues: error.issues.length,
  })
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): HarvesterSettings {
  // Blank values behave as unset so an empty line in .env.local keeps the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )
  const parsed = settingsSchema.safeParse(present)
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, 'environment')
  }

  const value = parsed.data
  return {
    inputRoot: value.HARVESTER_INPUT_ROOT,
    outputDir: value.HARVESTER_OUTPUT_DIR,
    lookupTimeoutMs: value.LOOKUP_TIMEOUT_MS,
    lookupMinDelayMs: value.LOOKUP_MIN_DELAY_MS,
    logLevel: value.LOG_LEVEL,
    logFormat: value.LOG_FORMAT,
  }
}
