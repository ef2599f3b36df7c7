import { Command } from 'commander'
import { printTitle, renderTable, writeCsv } from '../core/output.js'
import { fromRecord, isEmpty } from '../core/table.js'
import { normalizeSymbol } from '../extension/stock/index.js'
import { show, suffixedPath, type CommandDeps } from './shared.js'

interface FundamentalOptions {
  symbol: string
  ratios?: boolean
  metrics?: boolean
  trend?: boolean
  output?: string
}

export function createFundamentalCommand(deps: CommandDeps): Command {
  return new Command('fundamental')
    .description('Get fundamental data')
    .requiredOption('--symbol <symbol>', 'Stock ticker symbol')
    .option('--ratios', 'Get valuation ratios')
    .option('--metrics', 'Get key metrics')
    .option('--trend', 'Get revenue/profit trend')
    .option('--output <path>', 'Output file path (CSV); statements are written one file each')
    .action(async (opts: FundamentalOptions) => {
      const { fundamental } = deps.context.scrapers
      const symbol = normalizeSymbol(opts.symbol)

      if (opts.ratios) {
        const ratios = await fundamental.getValuationRatios(symbol)
        await show(fromRecord(ratios), `Valuation Ratios: ${symbol}`, deps, opts)
        return
      }
      if (opts.metrics) {
        const metrics = await fundamental.getKeyMetrics(symbol)
        await show(fromRecord(metrics), `Key Metrics: ${symbol}`, deps, opts)
        return
      }
      if (opts.trend) {
        const trend = await fundamental.getRevenueProfitTrend(symbol)
        await show(trend, `Revenue/Profit Trend: ${symbol}`, deps, opts)
        return
      }

      const financials = await fundamental.getFinancials(symbol)
      printTitle(`Financial Statements: ${symbol}`, deps.sink)
      for (const [key, table] of Object.entries(financials)) {
        if (isEmpty(table)) continue
        deps.sink.log(`\n${key.toUpperCase().replace(/_/g, ' ')}:`)
        deps.sink.log(renderTable(table))
        if (opts.output) {
          const path = suffixedPath(opts.output, key)
          await writeCsv(table, path)
          deps.sink.log(`\nData saved to ${path}`)
        }
      }
    })
}
