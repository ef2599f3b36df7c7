import { Command } from 'commander'
import type { Plugin } from '../core/types.js'
import { HttpPlugin } from '../plugins/http.js'
import { parsePositiveInt, type CommandDeps } from './shared.js'

interface ServeOptions {
  port?: number
}

export type PluginFactory = (port?: number) => Plugin

export function createServeCommand(
  deps: CommandDeps,
  createPlugin: PluginFactory = (port) => new HttpPlugin(port),
): Command {
  return new Command('serve')
    .description('Serve the same data as JSON over HTTP')
    .option('--port <n>', 'Port to listen on (defaults to server.port in config)', parsePositiveInt)
    .action(async (opts: ServeOptions) => {
      const plugin = createPlugin(opts.port)
      await plugin.start(deps.context)

      const shutdown = async () => {
        await plugin.stop()
        deps.context.logger.info({ plugin: plugin.name }, 'stopped')
      }
      const onSignal = () => {
        shutdown().catch((err: unknown) => deps.context.logger.error({ err }, 'shutdown failed'))
      }
      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)
    })
}
