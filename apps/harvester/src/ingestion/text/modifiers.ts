import type { ILogger } from '@hanjadex/logger'
import { ModifierError } from './errors.js'
import type { FieldRecord, Modifier, ModifierRunResult, ModifierSkip } from './types.js'

export interface ApplyModifiersOptions {
  logger?: ILogger
}

export function describeModifier(modifier: Modifier): string {
  if (modifier.name) {
    return modifier.name
  }
  return modifier.apply.name || modifier.apply.toString()
}

function hasField(record: FieldRecord, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field)
}

function isRecord(value: unknown): value is FieldRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Run `modifiers` in order over `records`, best effort.
 *
 * - Field modifiers touch every record carrying the field. A throw leaves that
 *   record as it was and moves on to the next record.
 * - Collection modifiers replace the whole collection. A throw keeps the
 *   previous collection for the modifiers that follow. They receive a copy, so
 *   in-place edits made before the throw are discarded too.
 *
 * Every failure is logged once and returned in `skipped`. Input records are not
 * mutated.
 */
export function applyModifiers(
  records: FieldRecord[],
  modifiers: readonly Modifier[] | null | undefined,
  options: ApplyModifiersOptions = {}
): ModifierRunResult {
  const skipped: ModifierSkip[] = []
  if (!modifiers || modifiers.length === 0) {
    return { records, skipped }
  }

  const report = (skip: ModifierSkip, cause: unknown): void => {
    skipped.push(skip)
    options.logger?.warn(
      'Modifier failed; continuing',
      {
        modifier: skip.modifier,
        modifierIndex: skip.modifierIndex,
        recordIndex: skip.recordIndex,
        record: skip.record,
      },
      cause
    )
  }

  let current = records

  for (const [modifierIndex, modifier] of modifiers.entries()) {
    const name = describeModifier(modifier)

    switch (modifier.kind) {
      case 'collection': {
        try {
          const next = modifier.apply(structuredClone(current))
          if (!Array.isArray(next)) {
            throw new TypeError('collection modifier must return an array of records')
          }
          const badIndex = next.findIndex(item => !isRecord(item))
          if (badIndex !== -1) {
            throw new TypeError(`collection modifier returned a non-record at index ${badIndex}`)
          }
          current = next
        } catch (error) {
          report({ modifier: name, modifierIndex, error: new ModifierError(name, error) }, error)
        }
        break
      }
      case 'field': {
        const next = current.slice()
        for (const [recordIndex, record] of current.entries()) {
          try {
            if (!hasField(record, modifier.field)) continue
            const value = modifier.apply(structuredClone(record[modifier.field]))
            next[recordIndex] = { ...record, [modifier.field]: value }
          } catch (error) {
            report(
              {
                modifier: name,
                modifierIndex,
                recordIndex,
                record,
                error: new ModifierError(name, error, recordIndex),
              },
              error
            )
          }
        }
        current = next
        break
      }
    }
  }

  return { records: current, skipped }
}
