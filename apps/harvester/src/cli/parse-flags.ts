export type FlagValue = string | boolean

export interface ParsedArgs {
  positionals: string[]
  flags: Record<string, FlagValue>
}

/**
 * `--key value words` → `{ key: 'value words' }`; a flag with no value is `true`.
 * Tokens before the first flag are positionals.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = []
  const flags: Record<string, FlagValue> = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      positionals.push(token)
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return { positionals, flags }
}

export function flagString(value: FlagValue | undefined): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined
}
