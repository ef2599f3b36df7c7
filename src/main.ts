#!/usr/bin/env node
import 'dotenv/config'
import { loadConfig } from './core/config.js'
import { createAppContext } from './core/context.js'
import { createLogger } from './core/logger.js'
import { runCli } from './cli.js'

async function main() {
  const config = await loadConfig()
  const logger = createLogger(config.logging.level)
  const context = createAppContext(config, logger)

  process.exitCode = await runCli(process.argv.slice(2), {
    context,
    sink: { log: (line) => console.log(line) },
    errorSink: { log: (line) => console.error(line) },
  })
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
  process.exitCode = 1
})
