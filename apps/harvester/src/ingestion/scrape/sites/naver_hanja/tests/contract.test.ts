import { describe, expect, it } from 'vitest'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { plugin } from '../index.js'

function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8')
}

describe('naver_hanja contract', () => {
  it('builds search and entry URLs on the dictionary host', () => {
    expect(plugin.searchUrl('木')).toBe('https://hanja.dict.naver.com/search?query=%E6%9C%A8')
    expect(plugin.entryUrl('a1b2c3')).toBe('https://hanja.dict.naver.com/entry/ccko/a1b2c3')
  })

  it('character search yields the entry id of an exact first result', () => {
    const extracted = plugin.extractCharacterSearch(readFixture('search-mok.html'), '木')

    expect(extracted).toEqual({ ok: true, value: { entryId: 'a1b2c3' } })
  })

  it('character search rejects a first result for another character', () => {
    const extracted = plugin.extractCharacterSearch(readFixture('search-mismatch.html'), '木')

    expect(extracted.ok).toBe(false)
    if (extracted.ok) return
    expect(extracted.reason).toBe('NOT_EXACT_MATCH')
    expect(extracted.details).toBe("first result is '本'")
  })

  it('character search reports pages without results', () => {
    expect(plugin.extractCharacterSearch(readFixture('search-no-results.html'), '木')).toEqual({
      ok: false,
      reason: 'NO_RESULTS',
    })
    expect(plugin.extractCharacterSearch('   ', '木')).toEqual({ ok: false, reason: 'EMPTY_PAGE' })
  })

  it('search pages without a result list are structural failures', () => {
    const shell = readFixture('entry-missing.html')
    const expected = {
      ok: false,
      reason: 'PAGE_STRUCTURE_CHANGED',
      details: 'no .component_keyword; page may be client-rendered',
    }

    expect(plugin.extractCharacterSearch(shell, '木')).toEqual(expected)
    expect(plugin.extractWordSearch(shell, '木材')).toEqual(expected)
  })

  it('entry fixture yields a normalized character record', () => {
    const extracted = plugin.extractCharacterEntry(readFixture('entry-mok.html'))

    expect(extracted.ok).toBe(true)
    if (!extracted.ok) return
    expect(extracted.value.formationLetters).toBeUndefined()

    const normalized = plugin.normalizeCharacter({
      hanja: '木',
      entryId: 'a1b2c3',
      raw: extracted.value,
      manifest: plugin.manifest,
    })

    expect(normalized).toEqual({
      hanja: '木',
      meaning: '나무 목',
      radical: '木',
      stroke_count: 4,
      formation_letter: null,
      unicode: 'U+6728',
      usage: ['중학용', '교육용 한자 8급'],
      naver_hanja_id: 'a1b2c3',
    })
  })

  it('compound-shape entries list their component glyphs', () => {
    const extracted = plugin.extractCharacterEntry(readFixture('entry-rim.html'))

    expect(extracted.ok).toBe(true)
    if (!extracted.ok) return
    expect(extracted.value.formationLetters).toEqual(['木 나무 목', '木 나무 목'])

    const normalized = plugin.normalizeCharacter({
      hanja: '林',
      entryId: 'r00042',
      raw: extracted.value,
      manifest: plugin.manifest,
    })

    expect(normalized.formation_letter).toEqual(['木', '木'])
    expect(normalized.stroke_count).toBe(8)
    expect(normalized.usage).toEqual([])
  })

  it('entry pages without the entry component are structural failures', () => {
    const extracted = plugin.extractCharacterEntry(readFixture('entry-missing.html'))

    expect(extracted).toEqual({
      ok: false,
      reason: 'PAGE_STRUCTURE_CHANGED',
      details: 'no .component_entry',
    })
  })

  it('word search picks the row for the requested word', () => {
    const extracted = plugin.extractWordSearch(readFixture('search-words.html'), '木手')

    expect(extracted.ok).toBe(true)
    if (!extracted.ok) return

    const normalized = plugin.normalizeWord({
      hanja: '木',
      word: '木手',
      raw: extracted.value,
      manifest: plugin.manifest,
    })

    expect(normalized).toEqual({
      hanja: '木',
      word: '木手',
      reading: '목수',
      meaning: '나무를 다루어 집을 짓는 사람',
      naver_word_id: 'w002',
    })
  })

  it('word search without a matching row is not an exact match', () => {
    const extracted = plugin.extractWordSearch(readFixture('search-words.html'), '木刀')

    expect(extracted).toEqual({
      ok: false,
      reason: 'NOT_EXACT_MATCH',
      details: "no result row for '木刀'",
    })
  })
})
