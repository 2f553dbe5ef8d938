import {
  getRegisteredSitePluginIds,
  getRegisteredSitePluginManifest,
} from '../../ingestion/scrape/registry.js'
import { DEFAULT_SITE_ID } from '../../ingestion/scrape/sites/index.js'
import { EXIT_CODES, type ExitCode } from '../exit-codes.js'

export function listSources(): string[] {
  return getRegisteredSitePluginIds().map(id => {
    const manifest = getRegisteredSitePluginManifest(id)
    const marker = id === DEFAULT_SITE_ID ? ' (default)' : ''
    return manifest
      ? `${id}${marker}  ${manifest.name} v${manifest.version}  ${manifest.baseUrls.join(', ')}`
      : id
  })
}

export function runSourcesCommand(write: (line: string) => void = console.log): ExitCode {
  for (const line of listSources()) {
    write(line)
  }
  return EXIT_CODES.OK
}
