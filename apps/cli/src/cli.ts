import { Command } from 'commander'
import chalk from 'chalk'
import { migrateCommand } from './commands/migrate/index.js'
import { queriesCommand } from './commands/queries/index.js'
import { queryCommand } from './commands/query/index.js'
import { healthCommand } from './commands/health/index.js'
import { defaultLoggerOptions, logger } from './utils/logger.js'
import { handleError } from './utils/errors.js'
import type { GlobalOptions } from './types.js'

export const VERSION = '0.1.0'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('storelens')
    .description('Schema management and analytical queries for the store database')
    .version(VERSION, '-v, --version', 'Show CLI version')
    .helpOption('-h, --help', 'Display help')
    .addHelpText(
      'after',
      `
${chalk.gray('Examples:')}
  ${chalk.cyan('storelens migrate up')}                               Create or update the schema
  ${chalk.cyan('storelens queries')}                                  List catalog queries
  ${chalk.cyan('storelens query top-products-by-revenue --limit 5')}  Run a query
  ${chalk.cyan('storelens health')}                                   Check the database
`
    )

  // Global options
  program
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--verbose', 'Verbose output', false)
    .option('--quiet', 'Suppress non-essential output', false)
    .option('--json', 'Output results as JSON', false)

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<GlobalOptions>()
    const defaults = defaultLoggerOptions()

    logger.configure({
      ...defaults,
      level: opts.verbose ? 'debug' : opts.quiet ? 'error' : defaults.level,
      json: opts.json === true || defaults.json === true
    })
  })

  program.addCommand(migrateCommand())
  program.addCommand(queriesCommand())
  program.addCommand(queryCommand())
  program.addCommand(healthCommand())

  overrideExit(program)

  return program
}

// Settings are not inherited by commands attached with addCommand
function overrideExit(command: Command): void {
  command.exitOverride()
  command.showSuggestionAfterError(true)
  for (const sub of command.commands) {
    overrideExit(sub)
  }
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function cli(argv: string[]): Promise<number> {
  try {
    await createProgram().parseAsync(argv)
    return 0
  } catch (error) {
    return handleError(error)
  }
}
