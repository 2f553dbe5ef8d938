import { createLogger, type ILogger } from '@hanjadex/logger'
import type { HarvesterSettings } from './settings.js'

export function createHarvesterLogger(
  settings: Pick<HarvesterSettings, 'logLevel' | 'logFormat'> = {}
): ILogger {
  return createLogger('harvester', { level: settings.logLevel, format: settings.logFormat })
}
