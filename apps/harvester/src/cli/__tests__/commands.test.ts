import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createLogger, type LogEntry } from '@hanjadex/logger'
import type { HarvesterSettings } from '../../config/settings.js'
import type { LookupCollaborator } from '../../ingestion/text/types.js'
import { runRunCommand } from '../commands/run.js'
import { listSources, runSourcesCommand } from '../commands/sources.js'
import { runValidateCommand } from '../commands/validate.js'
import { UsageError } from '../exit-codes.js'

const pipelineConfig = {
  input: 'grade-8.txt',
  patterns: ['(?<hanja>\\S) (?<reading>\\S+)', ['(?<words>.+)', ', ']],
  entries: 'reading|meaning|usage',
  hanjaModifiers: [{ use: 'join', field: 'usage', separator: ' / ' }],
}

const lookup: LookupCollaborator = {
  lookupPrimary: async identifiers =>
    identifiers.map(hanja => ({ hanja, meaning: `${hanja} meaning`, usage: ['중학용', '8급'] })),
  lookupAssociated: async pairs =>
    pairs.flatMap(([hanja, words]) => words.map(word => ({ hanja, word, reading: null }))),
}

describe('harvest commands', () => {
  let dir: string
  let settings: HarvesterSettings
  let entries: LogEntry[]
  const logger = createLogger('harvester', {
    level: 'debug',
    sink: entry => entries.push(entry),
  })

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hanjadex-cli-'))
    entries = []
    settings = {
      inputRoot: join(dir, 'input'),
      outputDir: join(dir, 'out'),
      lookupTimeoutMs: 1000,
      lookupMinDelayMs: 500,
    }
    await mkdir(settings.inputRoot)
    await writeFile(join(settings.inputRoot, 'grade-8.txt'), '木 목\n木手\n\n林 림\n山林, 林業', 'utf8')
    await writeFile(join(dir, 'pipeline.json'), JSON.stringify(pipelineConfig), 'utf8')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('run writes both result files', async () => {
    const code = await runRunCommand({ configPath: join(dir, 'pipeline.json') }, { settings, logger, lookup })

    expect(code).toBe(0)
    expect(await readFile(join(settings.outputDir, 'hanja_result.csv'), 'utf8')).toBe(
      'hanja,reading,meaning,usage\n' +
        '木,목,木 meaning,중학용 / 8급\n' +
        '林,림,林 meaning,중학용 / 8급\n'
    )
    expect(await readFile(join(settings.outputDir, 'words_result.csv'), 'utf8')).toBe(
      'hanja,word,reading\n木,木手,\n林,山林,\n林,林業,\n'
    )
    expect(entries.find(entry => entry.message === 'Results written')).toMatchObject({
      hanja: 2,
      words: 3,
    })
  })

  it('run writes headers for streams with no records', async () => {
    await writeFile(join(settings.inputRoot, 'grade-8.txt'), '\n', 'utf8')
    await writeFile(
      join(dir, 'pipeline.json'),
      JSON.stringify({ ...pipelineConfig, skipBlankChunks: true }),
      'utf8'
    )

    const code = await runRunCommand({ configPath: join(dir, 'pipeline.json') }, { settings, logger })

    expect(code).toBe(0)
    expect(await readFile(join(settings.outputDir, 'hanja_result.csv'), 'utf8')).toBe(
      'hanja,reading,meaning,usage\n'
    )
    expect(await readFile(join(settings.outputDir, 'words_result.csv'), 'utf8')).toBe(
      'hanja,word,reading,meaning,naver_word_id\n'
    )
  })

  it('run --dry-run writes nothing', async () => {
    const code = await runRunCommand(
      { configPath: join(dir, 'pipeline.json'), dryRun: true },
      { settings, logger, lookup }
    )

    expect(code).toBe(0)
    expect(existsSync(settings.outputDir)).toBe(false)
    expect(entries.find(entry => entry.message === 'Dry run; no files written')).toMatchObject({
      hanja: 2,
      words: 3,
    })
  })

  it('run requires a config and a known source', async () => {
    await expect(runRunCommand({}, { settings, logger, lookup })).rejects.toThrow(
      new UsageError('run requires --config <file>')
    )
    await expect(
      runRunCommand({ configPath: join(dir, 'pipeline.json'), sourceId: 'nope' }, { settings, logger })
    ).rejects.toThrow("Unknown source 'nope'")
  })

  it('validate checks the config without reading the input', async () => {
    await rm(settings.inputRoot, { recursive: true })

    const code = await runValidateCommand({ configPath: join(dir, 'pipeline.json') }, logger)

    expect(code).toBe(0)
    expect(entries[0]).toMatchObject({
      message: 'Config OK',
      patterns: 2,
      fields: ['hanja', 'reading', 'meaning', 'usage'],
      hanjaModifiers: 1,
    })
  })

  it('sources lists the registered dictionary plugins', () => {
    const write = vi.fn<(line: string) => void>()

    expect(runSourcesCommand(write)).toBe(0)
    expect(listSources()).toEqual([
      'naver_hanja (default)  Naver Hanja Dictionary v1.0.0  https://hanja.dict.naver.com',
    ])
    expect(write).toHaveBeenCalledWith(
      'naver_hanja (default)  Naver Hanja Dictionary v1.0.0  https://hanja.dict.naver.com'
    )
  })
})
