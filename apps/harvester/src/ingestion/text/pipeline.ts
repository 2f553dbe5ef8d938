import { randomUUID } from 'node:crypto'
import { silentLogger, type ILogger } from '@hanjadex/logger'
import { createWorkflowLogger } from '../../config/structured-log.js'
import { AlignmentError, MissingKeyError } from './errors.js'
import { extractRecords } from './extract.js'
import { loadInputText } from './input.js'
import { DEFAULT_ID_FIELD, mergeRecords, parseEntrySchema } from './merge.js'
import { applyModifiers } from './modifiers.js'
import { compilePatternSpecs } from './patterns.js'
import type {
  EntrySchema,
  ExtractOptions,
  FieldRecord,
  FieldValue,
  LookupCollaborator,
  Modifier,
  ModifierSkip,
  PatternSpec,
} from './types.js'

interface PipelineRunOptions {
  filePath: string
  lookup: LookupCollaborator
  hanjaModifiers?: readonly Modifier[] | null
  wordModifiers?: readonly Modifier[] | null
  inputRoot?: string
  idField?: string
  /** Field of the extracted record listing associated words. Default: words */
  wordsField?: string
  extract?: ExtractOptions
  logger?: ILogger
  runId?: string
}

export interface TextPipelineInput extends PipelineRunOptions {
  /** Raw pattern specs: regex strings or `[regex, delimiter]` pairs */
  patterns: readonly unknown[]
  /** Pipe-separated entry list, e.g. `meaning|radical|usage` */
  entries: string
}

/** Input whose patterns and entry schema were already compiled, e.g. by `compilePipelineConfig`. */
export interface CompiledTextPipelineInput extends PipelineRunOptions {
  patterns: readonly PatternSpec[]
  schema: EntrySchema
}

export interface TextPipelineResult {
  runId: string
  hanja: FieldRecord[]
  words: FieldRecord[]
  skipped: {
    hanja: ModifierSkip[]
    words: ModifierSkip[]
  }
}

export function associatedWords(value: FieldValue | undefined): string[] {
  if (Array.isArray(value)) return value.map(item => item.trim()).filter(Boolean)
  if (typeof value === 'string') return value.trim() ? [value.trim()] : []
  return []
}

function identifierOf(record: FieldRecord, idField: string, index: number): string {
  const value = record[idField]
  if (value === undefined || value === null) {
    throw new MissingKeyError(idField, index)
  }
  return Array.isArray(value) ? value.join('') : String(value)
}

/**
 * Validate → load → extract → enrich → merge → modify, for the entry stream
 * and the associated-word stream.
 *
 * Lookups are batched: one call for every identifier, one for every
 * (identifier, words) pair. Results must line up one-to-one with the request.
 */
export async function runTextPipeline(input: TextPipelineInput): Promise<TextPipelineResult> {
  const { patterns, entries, ...options } = input
  return runCompiledTextPipeline({
    ...options,
    patterns: compilePatternSpecs(patterns),
    schema: parseEntrySchema(entries, input.idField ?? DEFAULT_ID_FIELD),
  })
}

export async function runCompiledTextPipeline(
  input: CompiledTextPipelineInput
): Promise<TextPipelineResult> {
  const runId = input.runId ?? randomUUID()
  const idField = input.idField ?? DEFAULT_ID_FIELD
  const wordsField = input.wordsField ?? 'words'
  const log = createWorkflowLogger(input.logger ?? silentLogger, {
    workflow: 'text-ingest',
    stage: 'validate',
    runId,
    input: input.filePath,
  })

  const { patterns, schema } = input

  const text = await loadInputText(input.filePath, input.inputRoot)

  const extracted = extractRecords(text, patterns, input.extract)
  log.info('TEXT_EXTRACTED', { stage: 'extract', records: extracted.length })

  const identifiers = extracted.map((record, index) => identifierOf(record, idField, index))
  const pairs = extracted.map(
    (record, index) => [identifiers[index], associatedWords(record[wordsField])] as const
  )
  const wordOwners = pairs.flatMap(([id, words]) => words.map(() => id))

  const primaryLookup = await input.lookup.lookupPrimary(identifiers)
  if (primaryLookup.length !== identifiers.length) {
    throw new AlignmentError('lookupPrimary', identifiers.length, primaryLookup.length)
  }

  const associatedLookup = await input.lookup.lookupAssociated(pairs)
  if (associatedLookup.length !== wordOwners.length) {
    throw new AlignmentError('lookupAssociated', wordOwners.length, associatedLookup.length)
  }
  log.info('LOOKUP_COMPLETED', {
    stage: 'enrich',
    identifiers: identifiers.length,
    words: wordOwners.length,
  })

  const merged = mergeRecords(schema, extracted, primaryLookup, {
    idField,
    logger: log.child({ stage: 'merge' }),
  })
  const subRecords = associatedLookup.map((record, index): FieldRecord => ({
    [idField]: wordOwners[index],
    ...record,
  }))

  const hanja = applyModifiers(merged, input.hanjaModifiers, {
    logger: log.child({ stage: 'modify', stream: 'hanja' }),
  })
  const words = applyModifiers(subRecords, input.wordModifiers, {
    logger: log.child({ stage: 'modify', stream: 'words' }),
  })

  log.info('RUN_COMPLETED', {
    stage: 'done',
    hanja: hanja.records.length,
    words: words.records.length,
    skipped: hanja.skipped.length + words.skipped.length,
  })

  return {
    runId,
    hanja: hanja.records,
    words: words.records,
    skipped: { hanja: hanja.skipped, words: words.skipped },
  }
}
