import { MalformedChunkError } from './errors.js'
import { matchLine } from './patterns.js'
import type { ExtractOptions, FieldRecord, PatternSpec } from './types.js'

export const DEFAULT_CHUNK_DELIMITER = '\n\n'

/**
 * Parse one chunk: pattern `i` is applied to line `i`, and later patterns win
 * when two of them produce the same field.
 */
export function parseChunk(
  chunk: string,
  patterns: readonly PatternSpec[],
  chunkIndex = 0,
  missingLines: ExtractOptions['missingLines'] = 'skip'
): FieldRecord {
  const lines = chunk.trim().split('\n')
  const record: FieldRecord = {}

  for (const [i, pattern] of patterns.entries()) {
    if (i >= lines.length) {
      if (missingLines === 'fail') {
        throw new MalformedChunkError(chunkIndex, i, lines.length)
      }
      continue
    }
    Object.assign(record, matchLine(lines[i], pattern))
  }

  return record
}

/**
 * Split `text` into delimiter-bounded chunks and parse each into one record,
 * preserving chunk order.
 */
export function extractRecords(
  text: string,
  patterns: readonly PatternSpec[],
  options: ExtractOptions = {}
): FieldRecord[] {
  const delimiter = options.delimiter ?? DEFAULT_CHUNK_DELIMITER
  const chunks = text.split(delimiter)
  const records: FieldRecord[] = []

  for (const [chunkIndex, chunk] of chunks.entries()) {
    if (options.skipBlankChunks && !chunk.trim()) {
      continue
    }
    records.push(parseChunk(chunk, patterns, chunkIndex, options.missingLines))
  }

  return records
}
