import { z } from 'zod'
import type { FieldRecord, FieldValue, Modifier } from './types.js'

/**
 * Modifiers that can be referenced by name from a pipeline config file.
 */
export const modifierReferenceSchema = z.discriminatedUnion('use', [
  z.object({ use: z.literal('join'), field: z.string().min(1), separator: z.string().default(', ') }),
  z.object({ use: z.literal('trim'), field: z.string().min(1) }),
  z.object({ use: z.literal('toInteger'), field: z.string().min(1) }),
  z.object({ use: z.literal('dropUnresolved'), field: z.string().min(1) }),
  z.object({ use: z.literal('uniqueBy'), field: z.string().min(1) }),
])

export type ModifierReference = z.infer<typeof modifierReferenceSchema>

export function joinValues(separator: string): (value: FieldValue) => FieldValue {
  return value => (Array.isArray(value) ? value.join(separator) : value)
}

export function trimValue(value: FieldValue): FieldValue {
  if (typeof value === 'string') return value.trim()
  if (Array.isArray(value)) return value.map(item => item.trim())
  return value
}

const INTEGER_TEXT = /^[-+]?\d+$/

export function toInteger(value: FieldValue): FieldValue {
  if (value === null) return null
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value)
  if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
    return Number.parseInt(value.trim(), 10)
  }
  throw new TypeError(`Cannot convert ${JSON.stringify(value)} to an integer`)
}

export function dropUnresolved(field: string): (records: FieldRecord[]) => FieldRecord[] {
  return records => records.filter(record => record[field] !== undefined && record[field] !== null)
}

export function uniqueBy(field: string): (records: FieldRecord[]) => FieldRecord[] {
  return records => {
    const seen = new Set<string>()
    return records.filter(record => {
      const key = JSON.stringify(record[field] ?? null)
      if (seen.has(key)) return false
      seen.add(key)
      return true
    })
  }
}

export function buildModifier(reference: ModifierReference): Modifier {
  const name = `${reference.use}(${reference.field})`
  switch (reference.use) {
    case 'join':
      return { kind: 'field', name, field: reference.field, apply: joinValues(reference.separator) }
    case 'trim':
      return { kind: 'field', name, field: reference.field, apply: trimValue }
    case 'toInteger':
      return { kind: 'field', name, field: reference.field, apply: toInteger }
    case 'dropUnresolved':
      return { kind: 'collection', name, apply: dropUnresolved(reference.field) }
    case 'uniqueBy':
      return { kind: 'collection', name, apply: uniqueBy(reference.field) }
  }
}
