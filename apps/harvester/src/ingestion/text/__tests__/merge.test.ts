import { describe, expect, it } from 'vitest'
import { createLogger, type LogEntry } from '@hanjadex/logger'
import { ConfigurationError, MissingKeyError } from '../errors.js'
import { mergeRecords, parseEntrySchema } from '../merge.js'

describe('parseEntrySchema', () => {
  it('splits and trims a pipe-separated list', () => {
    expect(parseEntrySchema('meaning | radical|usage')).toEqual(['meaning', 'radical', 'usage'])
  })

  it('rejects empty, duplicate and identifying field names', () => {
    expect(() => parseEntrySchema('meaning||usage')).toThrow(
      new ConfigurationError('Empty field name at position 1 in entry list')
    )
    expect(() => parseEntrySchema('meaning|meaning')).toThrow("Duplicate field 'meaning' in entry list")
    expect(() => parseEntrySchema('hanja|meaning')).toThrow(
      "Identifying field 'hanja' must not be listed in entries"
    )
  })
})

describe('mergeRecords', () => {
  it('prefers non-null primary values and falls back to the secondary', () => {
    const merged = mergeRecords(
      ['meaning', 'radical'],
      [{ hanja: '木', meaning: 'tree' }],
      [{ meaning: 'wood', radical: '木' }]
    )

    expect(merged).toEqual([{ hanja: '木', meaning: 'tree', radical: '木' }])
  })

  it('treats a null primary value as absent', () => {
    const merged = mergeRecords(['meaning'], [{ hanja: '木', meaning: null }], [{ meaning: 'wood' }])

    expect(merged).toEqual([{ hanja: '木', meaning: 'wood' }])
  })

  it('emits exactly the schema fields plus the identifier', () => {
    const merged = mergeRecords(
      ['meaning', 'stroke_count'],
      [{ hanja: '木', reading: '목', words: ['木手'] }],
      [{ meaning: 'wood', naver_hanja_id: 'x' }]
    )

    expect(merged).toEqual([{ hanja: '木', meaning: 'wood', stroke_count: null }])
    expect(Object.keys(merged[0])).toEqual(['hanja', 'meaning', 'stroke_count'])
  })

  it('merges unequal lengths over the common prefix and warns', () => {
    const entries: LogEntry[] = []
    const logger = createLogger('test', { level: 'debug', sink: entry => entries.push(entry) })

    const merged = mergeRecords(
      ['meaning'],
      [{ hanja: '木' }, { hanja: '林' }, { hanja: '水' }],
      [{ meaning: 'wood' }, { meaning: 'forest' }],
      { logger }
    )

    expect(merged).toEqual([
      { hanja: '木', meaning: 'wood' },
      { hanja: '林', meaning: 'forest' },
    ])
    expect(entries).toHaveLength(1)
    expect(entries[0].level).toBe('warn')
    expect(entries[0].merged).toBe(2)
  })

  it('requires the identifying field on every primary record', () => {
    expect(() => mergeRecords(['meaning'], [{ hanja: '木' }, { meaning: 'x' }], [{}, {}])).toThrow(
      new MissingKeyError('hanja', 1)
    )
  })

  it('supports a custom identifying field', () => {
    expect(mergeRecords(['reading'], [{ char: '木' }], [{ reading: '목' }], { idField: 'char' })).toEqual([
      { char: '木', reading: '목' },
    ])
  })
})
