import { ConfigurationError } from './errors.js'
import type { FieldRecord, PatternSpec } from './types.js'

function compileRegex(source: string, index: number): RegExp {
  try {
    // Sticky: matches must start at offset 0 but may stop before the end of the line.
    return new RegExp(source, 'y')
  } catch (error) {
    throw new ConfigurationError(`Invalid regex for pattern at index ${index}`, {
      index,
      source,
      reason: error instanceof Error ? error.message : String(error),
    })
  }
}

/**
 * Names of the named capture groups declared in `source`, in declaration order.
 */
export function namedGroups(source: string): string[] {
  // The trailing empty alternative always matches, which materializes every group key.
  const emptyMatch = new RegExp(`${source}|`).exec('')
  return Object.keys(emptyMatch?.groups ?? {})
}

function isStringArray(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

export function compilePatternSpec(raw: unknown, index: number): PatternSpec {
  if (typeof raw === 'string') {
    return { kind: 'single', index, source: raw, regex: compileRegex(raw, index) }
  }

  if (!isStringArray(raw)) {
    throw new ConfigurationError(`Invalid datatype for pattern at index ${index}`, { index })
  }

  if (raw.length !== 2) {
    throw new ConfigurationError(
      `Invalid number of elements in tuple pattern at index ${index}. Expected 2, got ${raw.length}`,
      { index, length: raw.length }
    )
  }

  const [source, delimiter] = raw
  if (!delimiter) {
    throw new ConfigurationError(`Empty delimiter for pattern at index ${index}`, { index })
  }

  const regex = compileRegex(source, index)
  const groups = namedGroups(source)
  if (groups.length !== 1) {
    throw new ConfigurationError(
      `Tuple pattern at index ${index} must declare exactly one named group, found ${groups.length}`,
      { index, groups }
    )
  }

  return { kind: 'delimited', index, source, regex, group: groups[0], delimiter }
}

/**
 * Validate and compile every pattern up front so a bad entry fails the run
 * before any input is read.
 */
export function compilePatternSpecs(raw: readonly unknown[]): PatternSpec[] {
  return raw.map((entry, index) => compilePatternSpec(entry, index))
}

/**
 * Apply one pattern to one line. A line that does not match contributes nothing.
 */
export function matchLine(line: string, spec: PatternSpec): FieldRecord {
  spec.regex.lastIndex = 0
  const match = spec.regex.exec(line)
  if (!match) {
    return {}
  }

  const result: FieldRecord = {}
  for (const [name, value] of Object.entries(match.groups ?? {})) {
    // Groups that did not take part in the match come back undefined.
    result[name] = value ?? null
  }

  if (spec.kind === 'delimited') {
    const captured = result[spec.group]
    if (typeof captured === 'string') {
      result[spec.group] = captured.split(spec.delimiter)
    }
  }

  return result
}
