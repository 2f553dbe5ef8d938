import { readFile } from 'node:fs/promises'
import { isAbsolute, relative, resolve } from 'node:path'

export const DEFAULT_INPUT_ROOT = 'data/input'

/**
 * Resolve `filePath` against the input root unless it already points inside it.
 * Absolute paths outside the root are taken as given.
 */
export function resolveInputPath(filePath: string, inputRoot: string = DEFAULT_INPUT_ROOT): string {
  const root = resolve(inputRoot)
  const direct = resolve(filePath)
  const fromRoot = relative(root, direct)

  if (fromRoot === '' || (!fromRoot.startsWith('..') && !isAbsolute(fromRoot))) {
    return direct
  }
  if (isAbsolute(filePath)) {
    return filePath
  }
  return resolve(root, filePath)
}

/**
 * Read an input file as UTF-8 with line endings folded to `\n`.
 * I/O errors propagate unchanged.
 */
export async function loadInputText(filePath: string, inputRoot?: string): Promise<string> {
  const text = await readFile(resolveInputPath(filePath, inputRoot), 'utf8')
  return text.replace(/\r\n?/g, '\n')
}
