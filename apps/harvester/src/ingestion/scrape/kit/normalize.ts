import type { FieldRecord } from '../../text/types.js'
import type { NormalizeCharacterInput, NormalizeWordInput } from '../types.js'
import { firstGlyph, parseStrokeCount } from './hanja.js'

function textOrNull(value: string | undefined): string | null {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

/**
 * Formation letters come as segments like `木 나무 목`; only the leading glyph
 * of each segment is the component character.
 */
function formationGlyphs(segments: string[] | undefined): string[] | null {
  if (!segments || segments.length === 0) return null
  const glyphs = segments
    .map(segment => firstGlyph(segment))
    .filter((glyph): glyph is string => glyph !== undefined)
  return glyphs.length > 0 ? glyphs : null
}

/**
 * Map an extracted dictionary entry onto output fields. An unresolved lookup
 * (`raw` null) keeps every field, set to null, so exports stay rectangular.
 */
export function normalizeCharacterRecord(input: NormalizeCharacterInput): FieldRecord {
  const { raw, manifest } = input
  return {
    hanja: input.hanja,
    meaning: textOrNull(raw?.meaning),
    radical: textOrNull(raw?.radical),
    stroke_count: parseStrokeCount(raw?.strokeCount),
    formation_letter: formationGlyphs(raw?.formationLetters),
    unicode: textOrNull(raw?.unicode),
    usage: raw ? raw.usage.map(label => label.trim()).filter(Boolean) : null,
    [manifest.entryIdField]: raw ? input.entryId : null,
  }
}

/** Fields every normalized word record carries besides its owner and dictionary id. */
export const WORD_OUTPUT_FIELDS = ['word', 'reading', 'meaning'] as const

export function normalizeWordRecord(input: NormalizeWordInput): FieldRecord {
  const { raw, manifest } = input
  return {
    hanja: input.hanja,
    word: input.word,
    reading: textOrNull(raw?.reading),
    meaning: textOrNull(raw?.meaning),
    [manifest.wordIdField]: textOrNull(raw?.entryId),
  }
}
