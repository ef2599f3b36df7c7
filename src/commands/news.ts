import { Command } from 'commander'
import { normalizeSymbol } from '../extension/stock/index.js'
import { parsePositiveInt, show, type CommandDeps } from './shared.js'

interface NewsOptions {
  symbol: string
  limit: number
  output?: string
}

interface SecOptions extends NewsOptions {
  filingType?: string
}

export function createNewsCommand(deps: CommandDeps): Command {
  return new Command('news')
    .description('Get company news')
    .requiredOption('--symbol <symbol>', 'Stock ticker symbol')
    .option('--limit <n>', 'Number of articles', parsePositiveInt, 20)
    .option('--output <path>', 'Output file path (CSV)')
    .action(async (opts: NewsOptions) => {
      const symbol = normalizeSymbol(opts.symbol)
      const news = await deps.context.scrapers.news.getCompanyNews(symbol, opts.limit)
      await show(news, `Company News: ${symbol}`, deps, opts)
    })
}

export function createSecCommand(deps: CommandDeps): Command {
  return new Command('sec')
    .description('Get SEC filings')
    .requiredOption('--symbol <symbol>', 'Stock ticker symbol')
    .option('--filing-type <type>', 'Filing type (10-K, 10-Q, 8-K, etc.)')
    .option('--limit <n>', 'Number of filings', parsePositiveInt, 20)
    .option('--output <path>', 'Output file path (CSV)')
    .action(async (opts: SecOptions) => {
      const symbol = normalizeSymbol(opts.symbol)
      const filings = await deps.context.scrapers.news.getSecFilings(symbol, opts.filingType, opts.limit)
      await show(filings, `SEC Filings: ${symbol}`, deps, opts)
    })
}
