import type { CheerioAPI } from 'cheerio'
import type { RawCharacterEntry, RawWordEntry, ScrapeExtractResult } from '../../types.js'
import { cleanText, loadHtml } from '../../kit/html.js'
import { standardizeHanja } from '../../kit/hanja.js'

const SELECTORS = {
  resultList: '.component_keyword',
  resultRow: '.row',
  resultLink: '.hanja_word .hanja_link',
  resultReading: '.pronunciation',
  resultMeaning: '.mean',
  entry: '.component_entry',
  entryMeaning: '.entry_title .mean',
  infoItems: '.entry_infos .info_item',
  radical: 'button',
  infoCategory: '.cate',
  infoDescription: '.desc',
  strokeCount: '.entry_infos .stroke span.word',
  usage: '.entry_condition .unit_tooltip',
} as const

// Info item category for characters composed of shape components.
const SHAPE_COMPOSED_CATEGORY = '모양자'

/**
 * A page with no result rows is only "no results" when the result list
 * itself rendered. The live site ships an empty app shell and fills it in
 * with client-side script, so a shell page lands here as a structural failure.
 */
function missingResultsReason($: CheerioAPI): ScrapeExtractResult<never> {
  if ($(SELECTORS.resultList).length === 0) {
    return {
      ok: false,
      reason: 'PAGE_STRUCTURE_CHANGED',
      details: `no ${SELECTORS.resultList}; page may be client-rendered`,
    }
  }
  return { ok: false, reason: 'NO_RESULTS' }
}

function entryIdFromHref(href: string | undefined): string | undefined {
  if (!href) return undefined
  const last = href.split('?')[0].split('/').pop()?.trim()
  return last || undefined
}

export function extractCharacterSearch(
  payload: string,
  hanja: string
): ScrapeExtractResult<{ entryId: string }> {
  if (!payload.trim()) {
    return { ok: false, reason: 'EMPTY_PAGE' }
  }

  const $ = loadHtml(payload)
  const rows = $(SELECTORS.resultRow)
  if (rows.length === 0) {
    return missingResultsReason($)
  }

  const link = rows.first().find(SELECTORS.resultLink).first()
  if (link.length === 0) {
    return { ok: false, reason: 'SELECTOR_NOT_FOUND', details: SELECTORS.resultLink }
  }

  const found = cleanText(link)
  if (found !== standardizeHanja(hanja)) {
    return { ok: false, reason: 'NOT_EXACT_MATCH', details: `first result is '${found}'` }
  }

  const entryId = entryIdFromHref(link.attr('href'))
  if (!entryId) {
    return { ok: false, reason: 'SELECTOR_NOT_FOUND', details: 'result link has no entry id' }
  }

  return { ok: true, value: { entryId } }
}

export function extractCharacterEntry(payload: string): ScrapeExtractResult<RawCharacterEntry> {
  if (!payload.trim()) {
    return { ok: false, reason: 'EMPTY_PAGE' }
  }

  const $ = loadHtml(payload)
  const entry = $(SELECTORS.entry).first()
  if (entry.length === 0) {
    return { ok: false, reason: 'PAGE_STRUCTURE_CHANGED', details: `no ${SELECTORS.entry}` }
  }

  const meaning = cleanText(entry.find(SELECTORS.entryMeaning).first())
  if (!meaning) {
    return { ok: false, reason: 'SELECTOR_NOT_FOUND', details: SELECTORS.entryMeaning }
  }

  // Info items are positional: radical, formation, unicode.
  const infos = entry.find(SELECTORS.infoItems)
  const formationItem = infos.eq(1)
  const isShapeComposed =
    cleanText(formationItem.find(SELECTORS.infoCategory).first()) === SHAPE_COMPOSED_CATEGORY

  return {
    ok: true,
    value: {
      meaning,
      radical: cleanText(infos.eq(0).find(SELECTORS.radical).first()) || undefined,
      strokeCount: cleanText(entry.find(SELECTORS.strokeCount).first()) || undefined,
      formationLetters: isShapeComposed
        ? cleanText(formationItem.find(SELECTORS.infoDescription).first())
            .split(/\s*\+\s*/)
            .filter(Boolean)
        : undefined,
      unicode: cleanText(infos.eq(2).find(SELECTORS.infoDescription).first()) || undefined,
      usage: entry
        .find(SELECTORS.usage)
        .toArray()
        .map(element => cleanText($(element)))
        .filter(Boolean),
    },
  }
}

export function extractWordSearch(payload: string, word: string): ScrapeExtractResult<RawWordEntry> {
  if (!payload.trim()) {
    return { ok: false, reason: 'EMPTY_PAGE' }
  }

  const $ = loadHtml(payload)
  const rows = $(SELECTORS.resultRow).toArray()
  if (rows.length === 0) {
    return missingResultsReason($)
  }

  const wanted = standardizeHanja(word)
  for (const element of rows) {
    const row = $(element)
    const link = row.find(SELECTORS.resultLink).first()
    if (cleanText(link) !== wanted) continue

    return {
      ok: true,
      value: {
        word: wanted,
        entryId: entryIdFromHref(link.attr('href')),
        reading: cleanText(row.find(SELECTORS.resultReading).first()) || undefined,
        meaning: cleanText(row.find(SELECTORS.resultMeaning).first()) || undefined,
      },
    }
  }

  return { ok: false, reason: 'NOT_EXACT_MATCH', details: `no result row for '${wanted}'` }
}
