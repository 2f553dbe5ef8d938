import type { ILogger } from '@hanjadex/logger'
import type { HarvesterSettings } from '../../config/settings.js'
import { writeResultFiles } from '../../export/csv.js'
import { createSiteLookup } from '../../ingestion/scrape/collaborator.js'
import { WORD_OUTPUT_FIELDS } from '../../ingestion/scrape/kit/normalize.js'
import { loadSitePlugin } from '../../ingestion/scrape/registry.js'
import { DEFAULT_SITE_ID } from '../../ingestion/scrape/sites/index.js'
import { loadPipelineConfig } from '../../ingestion/text/config.js'
import { runCompiledTextPipeline } from '../../ingestion/text/pipeline.js'
import type { LookupCollaborator } from '../../ingestion/text/types.js'
import { EXIT_CODES, UsageError, type ExitCode } from '../exit-codes.js'

export interface RunCommandArgs {
  configPath?: string
  sourceId?: string
  dryRun?: boolean
}

export interface RunCommandDeps {
  settings: HarvesterSettings
  logger: ILogger
  /** Replaces the site lookup; tests pass an in-process fake */
  lookup?: LookupCollaborator
}

interface ResolvedLookup {
  lookup: LookupCollaborator
  /** Word-record fields the lookup is known to produce, besides the owner */
  wordFields: readonly string[]
}

async function resolveLookup(sourceId: string, deps: RunCommandDeps): Promise<ResolvedLookup> {
  if (deps.lookup) return { lookup: deps.lookup, wordFields: [] }

  const plugin = await loadSitePlugin(sourceId)
  if (!plugin) {
    throw new UsageError(`Unknown source '${sourceId}'. Run 'harvest sources' to list them.`)
  }
  return {
    lookup: createSiteLookup(plugin, {
      logger: deps.logger,
      timeoutMs: deps.settings.lookupTimeoutMs,
      minDelayMs: deps.settings.lookupMinDelayMs,
    }),
    wordFields: [...WORD_OUTPUT_FIELDS, plugin.manifest.wordIdField],
  }
}

export async function runRunCommand(args: RunCommandArgs, deps: RunCommandDeps): Promise<ExitCode> {
  if (!args.configPath) {
    throw new UsageError('run requires --config <file>')
  }

  const config = await loadPipelineConfig(args.configPath)
  const { lookup, wordFields } = await resolveLookup(args.sourceId ?? DEFAULT_SITE_ID, deps)

  const result = await runCompiledTextPipeline({
    filePath: config.input,
    patterns: config.patterns,
    schema: config.schema,
    lookup,
    hanjaModifiers: config.hanjaModifiers,
    wordModifiers: config.wordModifiers,
    inputRoot: deps.settings.inputRoot,
    idField: config.idField,
    wordsField: config.wordsField,
    extract: config.extract,
    logger: deps.logger,
  })

  const skipped = [...result.skipped.hanja, ...result.skipped.words]
  if (skipped.length > 0) {
    deps.logger.warn('Some modifier applications were skipped', {
      runId: result.runId,
      skipped: skipped.length,
      modifiers: [...new Set(skipped.map(skip => skip.modifier))],
    })
  }

  if (args.dryRun) {
    deps.logger.info('Dry run; no files written', {
      runId: result.runId,
      hanja: result.hanja.length,
      words: result.words.length,
    })
    return EXIT_CODES.OK
  }

  const files = await writeResultFiles(deps.settings.outputDir, result, {
    hanja: [config.idField, ...config.schema],
    words: [config.idField, ...wordFields],
  })
  deps.logger.info('Results written', {
    runId: result.runId,
    hanjaFile: files.hanja,
    wordsFile: files.words,
    hanja: result.hanja.length,
    words: result.words.length,
  })
  return EXIT_CODES.OK
}
