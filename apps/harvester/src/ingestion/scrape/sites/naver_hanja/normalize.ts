import type { FieldRecord } from '../../../text/types.js'
import type { NormalizeCharacterInput, NormalizeWordInput } from '../../types.js'
import { normalizeCharacterRecord, normalizeWordRecord } from '../../kit/normalize.js'

export function normalizeCharacter(input: NormalizeCharacterInput): FieldRecord {
  return normalizeCharacterRecord(input)
}

export function normalizeWord(input: NormalizeWordInput): FieldRecord {
  return normalizeWordRecord(input)
}
