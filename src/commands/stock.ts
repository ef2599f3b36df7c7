import { Command } from 'commander'
import { fromRecord } from '../core/table.js'
import { normalizeSymbol } from '../extension/stock/index.js'
import { show, type CommandDeps } from './shared.js'

interface StockOptions {
  symbol: string
  quote?: boolean
  intraday?: boolean
  interval: string
  period?: string
  startDate?: string
  endDate?: string
  output?: string
}

export function createStockCommand(deps: CommandDeps): Command {
  return new Command('stock')
    .description('Get stock price data')
    .requiredOption('--symbol <symbol>', 'Stock ticker symbol')
    .option('--quote', 'Get real-time quote')
    .option('--period <period>', 'Period (1d, 5d, 1mo, 3mo, 6mo, 1y, 2y, 5y, 10y, ytd, max); defaults to 1y, or 1d with --intraday')
    .option('--start-date <date>', 'Start date (YYYY-MM-DD)')
    .option('--end-date <date>', 'End date (YYYY-MM-DD)')
    .option('--intraday', 'Get intraday data')
    .option('--interval <interval>', 'Bar size for intraday data', '1m')
    .option('--output <path>', 'Output file path (CSV)')
    .action(async (opts: StockOptions) => {
      const { stock } = deps.context.scrapers
      const symbol = normalizeSymbol(opts.symbol)

      if (opts.quote) {
        const quote = await stock.getRealTimeQuote(symbol)
        await show(fromRecord(quote), `Real-time Quote: ${symbol}`, deps, opts)
      } else if (opts.intraday) {
        const data = await stock.getIntradayData(symbol, opts.interval, opts.period ?? '1d')
        await show(data, `Intraday Data: ${symbol}`, deps, opts)
      } else {
        const data = await stock.getHistoricalData(symbol, opts.startDate, opts.endDate, opts.period ?? '1y')
        await show(data, `Historical Data: ${symbol}`, deps, opts)
      }
    })
}
