import type { DictionarySitePlugin } from '../../types.js'
import { manifest } from './manifest.js'
import { entryUrl, fetchRaw, searchUrl } from './fetch.js'
import { extractCharacterEntry, extractCharacterSearch, extractWordSearch } from './extract.js'
import { normalizeCharacter, normalizeWord } from './normalize.js'

/**
 * Naver Hanja dictionary.
 *
 * Extraction reads server-rendered result and entry markup. The public site
 * currently renders both client-side, so a plain fetch returns an app shell
 * and every lookup reports PAGE_STRUCTURE_CHANGED. Point the plugin at
 * pre-rendered pages (a rendering proxy or saved HTML) to get records.
 */
export const plugin: DictionarySitePlugin = {
  manifest,
  searchUrl,
  entryUrl,
  fetchRaw,
  extractCharacterSearch,
  extractCharacterEntry,
  extractWordSearch,
  normalizeCharacter,
  normalizeWord,
}
