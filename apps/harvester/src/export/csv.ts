import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { FieldRecord, FieldValue } from '../ingestion/text/types.js'

export const HANJA_RESULT_FILE = 'hanja_result.csv'
export const WORDS_RESULT_FILE = 'words_result.csv'

const SEQUENCE_SEPARATOR = ', '

export function toCell(value: FieldValue | undefined): string {
  if (value === null || value === undefined) return ''
  if (Array.isArray(value)) return value.join(SEQUENCE_SEPARATOR)
  return String(value)
}

/** Every field that appears in `records`, in first-seen order. */
export function inferColumns(records: readonly FieldRecord[]): string[] {
  const columns = new Set<string>()
  for (const record of records) {
    for (const key of Object.keys(record)) columns.add(key)
  }
  return [...columns]
}

/**
 * `base` first, then any other field found in `records` in first-seen order.
 * Keeps the header stable when a stream is empty.
 */
export function mergeColumns(base: readonly string[], records: readonly FieldRecord[]): string[] {
  return [...new Set([...base, ...inferColumns(records)])]
}

/** The header row is written even when there are no records. */
export function recordsToCsv(records: readonly FieldRecord[], columns: readonly string[]): string {
  const rows = records.map(record => columns.map(column => toCell(record[column])))
  return stringify([[...columns], ...rows])
}

export interface ResultFiles {
  hanja: string
  words: string
}

export interface ResultColumns {
  hanja: readonly string[]
  words: readonly string[]
}

/**
 * Write both result streams under `outputDir`, creating it if needed.
 * `columns` lead each header; fields outside them follow. Returns the paths written.
 */
export async function writeResultFiles(
  outputDir: string,
  results: { hanja: readonly FieldRecord[]; words: readonly FieldRecord[] },
  columns: ResultColumns = { hanja: [], words: [] }
): Promise<ResultFiles> {
  await mkdir(outputDir, { recursive: true })

  const files: ResultFiles = {
    hanja: join(outputDir, HANJA_RESULT_FILE),
    words: join(outputDir, WORDS_RESULT_FILE),
  }
  await writeFile(
    files.hanja,
    recordsToCsv(results.hanja, mergeColumns(columns.hanja, results.hanja)),
    'utf8'
  )
  await writeFile(
    files.words,
    recordsToCsv(results.words, mergeColumns(columns.words, results.words)),
    'utf8'
  )
  return files
}
