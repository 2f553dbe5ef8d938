import type { FieldRecord } from '../text/types.js'

export interface ScrapePluginRateLimit {
  requestsPerSecond?: number
  minDelayMs?: number
}

export interface ScrapePluginManifest {
  id: string
  name: string
  owner: string
  version: string
  baseUrls: string[]
  /** Output field that carries the site's own entry id, e.g. `naver_hanja_id` */
  entryIdField: string
  /** Output field for word entry ids, e.g. `naver_word_id` */
  wordIdField: string
  rateLimit?: ScrapePluginRateLimit
}

export interface RawCharacterEntry {
  meaning?: string
  radical?: string
  strokeCount?: string
  /** Only present for compound-shape (모양자) entries */
  formationLetters?: string[]
  unicode?: string
  usage: string[]
}

export interface RawWordEntry {
  word: string
  entryId?: string
  reading?: string
  meaning?: string
}

export type ScrapeExtractFailReason =
  | 'EMPTY_PAGE'
  | 'NO_RESULTS'
  | 'NOT_EXACT_MATCH'
  | 'SELECTOR_NOT_FOUND'
  | 'PAGE_STRUCTURE_CHANGED'

export type ScrapeExtractResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: ScrapeExtractFailReason; details?: string }

export interface ScrapePluginFetchInput {
  url: string
  headers?: Record<string, string>
  timeoutMs?: number
  /** Raises the manifest's minimum spacing between requests; never lowers it */
  minDelayMs?: number
}

export interface ScrapePluginFetchResult {
  ok: boolean
  statusCode?: number
  body?: string
  error?: string
  durationMs: number
}

export interface NormalizeCharacterInput {
  hanja: string
  entryId: string | null
  raw: RawCharacterEntry | null
  manifest: ScrapePluginManifest
}

export interface NormalizeWordInput {
  hanja: string
  word: string
  raw: RawWordEntry | null
  manifest: ScrapePluginManifest
}

/**
 * A dictionary site: how to address it, fetch it, and read its pages.
 * Lookup orchestration lives in `collaborator.ts`, not in plugins.
 */
export interface DictionarySitePlugin {
  manifest: ScrapePluginManifest
  searchUrl: (query: string) => string
  entryUrl: (entryId: string) => string
  fetchRaw: (input: ScrapePluginFetchInput) => Promise<ScrapePluginFetchResult>
  /** Search page → entry id of the first result, when it is the character asked for */
  extractCharacterSearch: (payload: string, hanja: string) => ScrapeExtractResult<{ entryId: string }>
  extractCharacterEntry: (payload: string) => ScrapeExtractResult<RawCharacterEntry>
  extractWordSearch: (payload: string, word: string) => ScrapeExtractResult<RawWordEntry>
  normalizeCharacter: (input: NormalizeCharacterInput) => FieldRecord
  normalizeWord: (input: NormalizeWordInput) => FieldRecord
}

export interface SitePluginRegistration {
  manifest: ScrapePluginManifest
  load: () => Promise<DictionarySitePlugin>
}
