/**
 * Character helpers shared by dictionary plugins.
 */

/**
 * Fold compatibility ideographs (U+F900 block) and other variants onto their
 * unified code points so search results can be compared with the input.
 */
export function standardizeHanja(value: string): string {
  return value.normalize('NFKC').trim()
}

/** First user-perceived code point, astral-safe. */
export function firstGlyph(value: string): string | undefined {
  const [first] = Array.from(value.trim())
  return first
}

/** `"9획"` → 9. Anything without a positive integer gives null. */
export function parseStrokeCount(value: string | undefined): number | null {
  if (!value) return null
  const match = /\d+/.exec(value)
  if (!match) return null
  const parsed = Number.parseInt(match[0], 10)
  return parsed > 0 ? parsed : null
}

export function encodeQuery(value: string): string {
  return encodeURIComponent(value.trim())
}
