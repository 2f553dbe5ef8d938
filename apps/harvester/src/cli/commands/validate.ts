import type { ILogger } from '@hanjadex/logger'
import { loadPipelineConfig } from '../../ingestion/text/config.js'
import { EXIT_CODES, UsageError, type ExitCode } from '../exit-codes.js'

interface ValidateCommandArgs {
  configPath?: string
}

/** Check a pipeline config without reading its input or touching the network. */
export async function runValidateCommand(
  args: ValidateCommandArgs,
  logger: ILogger
): Promise<ExitCode> {
  if (!args.configPath) {
    throw new UsageError('validate requires --config <file>')
  }

  const config = await loadPipelineConfig(args.configPath)
  logger.info('Config OK', {
    config: args.configPath,
    input: config.input,
    patterns: config.patterns.length,
    fields: [config.idField, ...config.schema],
    hanjaModifiers: config.hanjaModifiers.length,
    wordModifiers: config.wordModifiers.length,
  })
  return EXIT_CODES.OK
}
