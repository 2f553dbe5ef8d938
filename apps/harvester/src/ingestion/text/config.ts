import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { toConfigurationError } from '../../config/settings.js'
import { safeJsonParse } from '../scrape/kit/json.js'
import { buildModifier, modifierReferenceSchema } from './builtin-modifiers.js'
import { ConfigurationError, describeError } from './errors.js'
import { DEFAULT_ID_FIELD, parseEntrySchema } from './merge.js'
import { compilePatternSpecs } from './patterns.js'
import type { EntrySchema, ExtractOptions, Modifier, PatternSpec } from './types.js'

export const pipelineConfigSchema = z.object({
  input: z.string().min(1),
  delimiter: z.string().min(1).optional(),
  patterns: z.array(z.unknown()).min(1),
  entries: z.string().min(1),
  idField: z.string().min(1).default(DEFAULT_ID_FIELD),
  wordsField: z.string().min(1).default('words'),
  missingLines: z.enum(['skip', 'fail']).default('skip'),
  skipBlankChunks: z.boolean().default(false),
  hanjaModifiers: z.array(modifierReferenceSchema).default([]),
  wordModifiers: z.array(modifierReferenceSchema).default([]),
})

export type RawPipelineConfig = z.input<typeof pipelineConfigSchema>

export interface PipelineConfig {
  input: string
  patterns: PatternSpec[]
  entries: string
  schema: EntrySchema
  idField: string
  wordsField: string
  extract: ExtractOptions
  hanjaModifiers: Modifier[]
  wordModifiers: Modifier[]
}

/**
 * Validate a parsed config object. Pattern shapes, the entry list and modifier
 * references are all checked here, before any input is read.
 */
export function compilePipelineConfig(raw: unknown, source = 'pipeline config'): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, source)
  }

  const value = parsed.data
  return {
    input: value.input,
    patterns: compilePatternSpecs(value.patterns),
    entries: value.entries,
    schema: parseEntrySchema(value.entries, value.idField),
    idField: value.idField,
    wordsField: value.wordsField,
    extract: {
      delimiter: value.delimiter,
      missingLines: value.missingLines,
      skipBlankChunks: value.skipBlankChunks,
    },
    hanjaModifiers: value.hanjaModifiers.map(buildModifier),
    wordModifiers: value.wordModifiers.map(buildModifier),
  }
}

export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(`${path}: cannot read config: ${describeError(error)}`, { path })
  }
  const parsed = safeJsonParse(text)
  if (!parsed.ok) {
    throw new ConfigurationError(`${path}: invalid JSON: ${parsed.error}`, { path })
  }
  return compilePipelineConfig(parsed.value, path)
}
