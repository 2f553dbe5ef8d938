import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { extractRecords } from '../extract.js'
import { loadInputText, resolveInputPath } from '../input.js'
import { compilePatternSpecs } from '../patterns.js'

describe('resolveInputPath', () => {
  it('resolves bare names against the input root', () => {
    expect(resolveInputPath('grade-8.txt', 'data/input')).toBe(resolve('data/input/grade-8.txt'))
  })

  it('keeps paths already under the root', () => {
    expect(resolveInputPath('data/input/grade-8.txt', 'data/input')).toBe(
      resolve('data/input/grade-8.txt')
    )
  })

  it('takes absolute paths outside the root as given', () => {
    const outside = resolve(tmpdir(), 'elsewhere.txt')
    expect(resolveInputPath(outside, 'data/input')).toBe(outside)
  })
})

describe('loadInputText', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hanjadex-input-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads UTF-8 text relative to the root', async () => {
    await mkdir(join(dir, 'nested'))
    await writeFile(join(dir, 'nested', 'grade-8.txt'), '木 목\n', 'utf8')

    expect(await loadInputText('nested/grade-8.txt', dir)).toBe('木 목\n')
  })

  it('folds CRLF and CR line endings so chunks still split', async () => {
    await writeFile(join(dir, 'windows.txt'), '木 목\r\n木材\r\n\r\n林 림\r\n森林\r\n', 'utf8')
    await writeFile(join(dir, 'classic.txt'), '木 목\r\r林 림', 'utf8')

    const text = await loadInputText('windows.txt', dir)
    const patterns = compilePatternSpecs(['(?<hanja>\\S) (?<reading>\\S+)', ['(?<words>.+)', ', ']])
    const records = extractRecords(text, patterns)

    expect(text).toBe('木 목\n木材\n\n林 림\n森林\n')
    expect(records).toEqual([
      { hanja: '木', reading: '목', words: ['木材'] },
      { hanja: '林', reading: '림', words: ['森林'] },
    ])
    expect(await loadInputText('classic.txt', dir)).toBe('木 목\n\n林 림')
  })

  it('lets I/O errors propagate', async () => {
    await expect(loadInputText('missing.txt', dir)).rejects.toMatchObject({ code: 'ENOENT' })
  })
})
