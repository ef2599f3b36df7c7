import { Command } from 'commander'
import { fromRecord } from '../core/table.js'
import { normalizeSymbol } from '../extension/stock/index.js'
import { show, type CommandDeps } from './shared.js'

interface AlternativeOptions {
  symbol: string
  shortInterest?: boolean
  institutional?: boolean
  output?: string
}

export function createAlternativeCommand(deps: CommandDeps): Command {
  return new Command('alternative')
    .description('Get alternative data')
    .requiredOption('--symbol <symbol>', 'Stock ticker symbol')
    .option('--short-interest', 'Get short interest')
    .option('--institutional', 'Get institutional holdings')
    .option('--output <path>', 'Output file path (CSV)')
    .action(async (opts: AlternativeOptions) => {
      const { alternative } = deps.context.scrapers
      const symbol = normalizeSymbol(opts.symbol)

      if (opts.shortInterest) {
        const data = await alternative.getShortInterest(symbol)
        await show(fromRecord(data), `Short Interest: ${symbol}`, deps, opts)
      } else if (opts.institutional) {
        const data = await alternative.getInstitutionalHoldings(symbol)
        await show(data, `Institutional Holdings: ${symbol}`, deps, opts)
      } else {
        deps.sink.log('Please specify --short-interest or --institutional')
      }
    })
}
