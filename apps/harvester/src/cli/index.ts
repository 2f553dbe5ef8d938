import '../env.js'
import { createHarvesterLogger } from '../config/logger.js'
import { loadSettings } from '../config/settings.js'
import { describeError } from '../ingestion/text/errors.js'
import { runRunCommand } from './commands/run.js'
import { runSourcesCommand } from './commands/sources.js'
import { runValidateCommand } from './commands/validate.js'
import { EXIT_CODES, exitCodeFor, type ExitCode } from './exit-codes.js'
import { flagString, parseArgs } from './parse-flags.js'

function printHelp(): void {
  console.log('Hanja harvester')
  console.log('')
  console.log('Commands:')
  console.log('  run --config <file> [--source <id>] [--dry-run]')
  console.log('  validate --config <file>')
  console.log('  sources')
}

async function main(): Promise<ExitCode> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return EXIT_CODES.OK
  }

  const { flags } = parseArgs(rest)
  if (flags.help === true) {
    printHelp()
    return EXIT_CODES.OK
  }

  const settings = loadSettings()
  const logger = createHarvesterLogger(settings).child('cli')

  switch (command) {
    case 'run':
      return runRunCommand(
        {
          configPath: flagString(flags.config),
          sourceId: flagString(flags.source),
          dryRun: flags['dry-run'] === true,
        },
        { settings, logger }
      )
    case 'validate':
      return runValidateCommand({ configPath: flagString(flags.config) }, logger)
    case 'sources':
      return runSourcesCommand()
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return EXIT_CODES.USAGE
  }
}

main()
  .then(exitCode => process.exit(exitCode))
  .catch(error => {
    console.error(describeError(error))
    process.exit(exitCodeFor(error))
  })
