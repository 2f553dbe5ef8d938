/**
 * Shared record and configuration types for text ingestion.
 */

import type { ModifierError } from './errors.js'

export type FieldValue = string | number | boolean | string[] | null

/** One extracted, looked-up or merged entry. Keys are field names. */
export type FieldRecord = Record<string, FieldValue>

/** Ordered field names a canonical record must carry (besides the id field). */
export type EntrySchema = readonly string[]

export type PatternSpec =
  | { kind: 'single'; index: number; source: string; regex: RegExp }
  | { kind: 'delimited'; index: number; source: string; regex: RegExp; group: string; delimiter: string }

/**
 * Raw pattern shapes accepted from configuration: a bare regex, or a
 * `[regex, delimiter]` pair whose single named group is split by the delimiter.
 */
export type RawPatternSpec = string | readonly string[]

export type MissingLinePolicy = 'skip' | 'fail'

export interface ExtractOptions {
  /** Chunk delimiter. Default: a blank line */
  delimiter?: string
  /** What to do when a chunk has fewer lines than patterns. Default: skip */
  missingLines?: MissingLinePolicy
  /** Drop whitespace-only chunks instead of emitting empty records */
  skipBlankChunks?: boolean
}

export type CollectionTransform = (records: FieldRecord[]) => FieldRecord[]
export type FieldTransform = (value: FieldValue) => FieldValue

export type Modifier =
  | { kind: 'collection'; name?: string; apply: CollectionTransform }
  | { kind: 'field'; name?: string; field: string; apply: FieldTransform }

/**
 * Outcome of one modifier application that threw. The pipeline keeps going;
 * these are returned so callers can report them.
 */
export interface ModifierSkip {
  modifier: string
  /** Position of the modifier in the list */
  modifierIndex: number
  /** Record index for field-scoped modifiers; absent for collection modifiers */
  recordIndex?: number
  record?: FieldRecord
  error: ModifierError
}

export interface ModifierRunResult {
  records: FieldRecord[]
  skipped: ModifierSkip[]
}

/**
 * External lookup contract. Both calls return one entry per requested item,
 * in request order. Unresolvable items come back with absent fields, not errors.
 */
export interface LookupCollaborator {
  lookupPrimary(identifiers: readonly string[]): Promise<FieldRecord[]>
  lookupAssociated(pairs: ReadonlyArray<readonly [string, readonly string[]]>): Promise<FieldRecord[]>
}
