import { Command, CommanderError } from 'commander'
import type { OutputSink } from './core/output.js'
import type { AppContext } from './core/types.js'
import { createAlternativeCommand } from './commands/alternative.js'
import { createFredCommand } from './commands/fred.js'
import { createFundamentalCommand } from './commands/fundamental.js'
import { createNewsCommand, createSecCommand } from './commands/news.js'
import { createServeCommand, type PluginFactory } from './commands/serve.js'
import { createStockCommand } from './commands/stock.js'

export interface CliDeps {
  context: AppContext
  /** stdout in production */
  sink: OutputSink
  /** stderr in production */
  errorSink: OutputSink
  createPlugin?: PluginFactory
}

export function createProgram(deps: CliDeps): Command {
  const commandDeps = { context: deps.context, sink: deps.sink }

  const program = new Command('market-data-scraper')
    .description('Financial and economic data scraper')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.sink.log(text.trimEnd()),
      writeErr: (text) => deps.errorSink.log(text.trimEnd()),
    })

  program.addCommand(createStockCommand(commandDeps))
  program.addCommand(createFredCommand(commandDeps))
  program.addCommand(createFundamentalCommand(commandDeps))
  program.addCommand(createNewsCommand(commandDeps))
  program.addCommand(createSecCommand(commandDeps))
  program.addCommand(createAlternativeCommand(commandDeps))
  program.addCommand(createServeCommand(commandDeps, deps.createPlugin))

  // addCommand() does not pass settings down to commands built elsewhere
  for (const command of program.commands) command.copyInheritedSettings(program)

  return program
}

/**
 * Run one CLI invocation and return the process exit code. Scraper
 * failures are reported as a single "Error: ..." line.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps)

  if (argv.length === 0) {
    program.outputHelp()
    return 0
  }

  try {
    await program.parseAsync(argv, { from: 'user' })
    return 0
  } catch (err) {
    if (err instanceof CommanderError) {
      // usage errors were already written by commander
      return err.exitCode
    }
    const message = err instanceof Error ? err.message : String(err)
    deps.context.logger.error({ err }, 'command failed')
    deps.errorSink.log(`Error: ${message}`)
    return 1
  }
}
