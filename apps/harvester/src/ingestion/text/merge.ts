import type { ILogger } from '@hanjadex/logger'
import { ConfigurationError, MissingKeyError } from './errors.js'
import type { EntrySchema, FieldRecord, FieldValue } from './types.js'

export const DEFAULT_ID_FIELD = 'hanja'

/**
 * Parse a pipe-separated key list (`meaning|radical|usage`) into an ordered,
 * de-duplicated schema. The identifying field is implicit and may not be listed.
 */
export function parseEntrySchema(keyList: string, idField: string = DEFAULT_ID_FIELD): EntrySchema {
  const keys = keyList.split('|').map(key => key.trim())

  const emptyAt = keys.findIndex(key => !key)
  if (emptyAt !== -1) {
    throw new ConfigurationError(`Empty field name at position ${emptyAt} in entry list`, {
      keyList,
      position: emptyAt,
    })
  }

  const seen = new Set<string>()
  for (const key of keys) {
    if (seen.has(key)) {
      throw new ConfigurationError(`Duplicate field '${key}' in entry list`, { keyList, field: key })
    }
    if (key === idField) {
      throw new ConfigurationError(`Identifying field '${idField}' must not be listed in entries`, {
        keyList,
      })
    }
    seen.add(key)
  }

  return keys
}

export interface MergeOptions {
  idField?: string
  logger?: ILogger
}

function pick(record: FieldRecord, field: string): FieldValue | undefined {
  return Object.prototype.hasOwnProperty.call(record, field) ? record[field] : undefined
}

/**
 * Combine locally extracted records with looked-up records, pairing strictly by
 * position. For each schema field the primary value wins unless it is absent or
 * null, then the secondary value, then null.
 *
 * Sequences of different length are merged over their common prefix.
 */
export function mergeRecords(
  schema: EntrySchema,
  primary: readonly FieldRecord[],
  secondary: readonly FieldRecord[],
  options: MergeOptions = {}
): FieldRecord[] {
  const idField = options.idField ?? DEFAULT_ID_FIELD
  const length = Math.min(primary.length, secondary.length)

  if (primary.length !== secondary.length) {
    options.logger?.warn('Merge inputs differ in length; trailing records dropped', {
      primary: primary.length,
      secondary: secondary.length,
      merged: length,
    })
  }

  const merged: FieldRecord[] = []
  for (let i = 0; i < length; i++) {
    const local = primary[i]
    const remote = secondary[i]

    const id = pick(local, idField)
    if (id === undefined || id === null) {
      throw new MissingKeyError(idField, i)
    }

    const record: FieldRecord = { [idField]: id }
    for (const field of schema) {
      record[field] = pick(local, field) ?? pick(remote, field) ?? null
    }
    merged.push(record)
  }

  return merged
}
