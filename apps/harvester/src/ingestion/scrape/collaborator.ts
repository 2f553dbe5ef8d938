import { silentLogger, type ILogger } from '@hanjadex/logger'
import type { FieldRecord, LookupCollaborator } from '../text/types.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import type {
  DictionarySitePlugin,
  RawCharacterEntry,
  RawWordEntry,
  ScrapeExtractFailReason,
} from './types.js'

export interface SiteLookupOptions {
  logger?: ILogger
  /** Per-request timeout handed to the plugin fetcher */
  timeoutMs?: number
  /** Minimum spacing between requests, on top of the plugin's own */
  minDelayMs?: number
}

/**
 * Adapt a dictionary site plugin to the batched lookup contract.
 *
 * Requests go out one at a time; spacing between them comes from the
 * plugin's rate limit. A failed fetch or an unreadable page never aborts the
 * batch: that item comes back as a record with null fields.
 */
export function createSiteLookup(
  plugin: DictionarySitePlugin,
  options: SiteLookupOptions = {}
): LookupCollaborator {
  const log = (options.logger ?? silentLogger).child('lookup', { sourceId: plugin.manifest.id })
  const { timeoutMs, minDelayMs } = options

  // A structural failure means the page no longer matches the plugin, not that the item is unknown.
  function logMiss(
    progress: string,
    query: string,
    failure: { reason: ScrapeExtractFailReason; details?: string }
  ): void {
    const fields = { reason: failure.reason, details: failure.details }
    if (failure.reason === 'PAGE_STRUCTURE_CHANGED') {
      log.warn(`${progress} ${query} page unreadable`, fields)
    } else {
      log.info(`${progress} ${query} not found`, fields)
    }
  }

  async function fetchPage(url: string, progress: string): Promise<string | null> {
    const result = await plugin.fetchRaw({ url, timeoutMs, minDelayMs })
    if (!result.ok || result.body === undefined) {
      log.warn(`${progress} Fetch failed`, {
        ...sanitizeUrl(url),
        statusCode: result.statusCode,
        reason: result.error,
      })
      return null
    }
    return result.body
  }

  async function lookupCharacter(
    hanja: string,
    progress: string
  ): Promise<{ entryId: string | null; raw: RawCharacterEntry | null }> {
    const searchPage = await fetchPage(plugin.searchUrl(hanja), progress)
    if (searchPage === null) return { entryId: null, raw: null }

    const search = plugin.extractCharacterSearch(searchPage, hanja)
    if (!search.ok) {
      logMiss(progress, hanja, search)
      return { entryId: null, raw: null }
    }

    const entryPage = await fetchPage(plugin.entryUrl(search.value.entryId), progress)
    if (entryPage === null) return { entryId: search.value.entryId, raw: null }

    const entry = plugin.extractCharacterEntry(entryPage)
    if (!entry.ok) {
      log.warn(`${progress} ${hanja} entry unreadable`, {
        reason: entry.reason,
        details: entry.details,
      })
      return { entryId: search.value.entryId, raw: null }
    }

    return { entryId: search.value.entryId, raw: entry.value }
  }

  async function lookupWord(word: string, progress: string): Promise<RawWordEntry | null> {
    const page = await fetchPage(plugin.searchUrl(word), progress)
    if (page === null) return null

    const extracted = plugin.extractWordSearch(page, word)
    if (!extracted.ok) {
      logMiss(progress, word, extracted)
      return null
    }
    return extracted.value
  }

  return {
    async lookupPrimary(identifiers) {
      const records: FieldRecord[] = []
      const total = identifiers.length

      for (const [index, hanja] of identifiers.entries()) {
        const progress = `[${index + 1} / ${total}]`
        const { entryId, raw } = await lookupCharacter(hanja, progress)
        if (raw) {
          log.info(`${progress} ${hanja} fetched`)
        }
        records.push(plugin.normalizeCharacter({ hanja, entryId, raw, manifest: plugin.manifest }))
      }

      return records
    },

    async lookupAssociated(pairs) {
      const requests = pairs.flatMap(([hanja, words]) => words.map(word => ({ hanja, word })))
      const records: FieldRecord[] = []

      for (const [index, { hanja, word }] of requests.entries()) {
        const progress = `[${index + 1} / ${requests.length}]`
        const raw = await lookupWord(word, progress)
        if (raw) {
          log.info(`${progress} ${word} fetched`)
        }
        records.push(plugin.normalizeWord({ hanja, word, raw, manifest: plugin.manifest }))
      }

      return records
    },
  }
}
