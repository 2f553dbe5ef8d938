import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/** Whitespace-collapsed text of a selection. */
export function cleanText(selection: { text(): string }): string {
  return selection.text().replace(/\s+/g, ' ').trim()
}
