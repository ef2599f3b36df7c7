import { Command } from 'commander'
import { resolveSeriesId } from '../extension/fred/index.js'
import { parsePositiveInt, show, type CommandDeps } from './shared.js'

interface FredOptions {
  series?: string
  releaseId?: number
  search?: string
  info?: boolean
  startDate?: string
  endDate?: string
  limit?: number
  nextCursor?: string
  output?: string
}

export function createFredCommand(deps: CommandDeps): Command {
  return new Command('fred')
    .description('Get FRED economic data')
    .option('--series <id>', 'FRED series ID or alias (e.g., GDP, UNRATE, CPI)')
    .option('--release-id <id>', 'FRED release ID', parsePositiveInt)
    .option('--search <text>', 'Search for series')
    .option('--info', 'Show metadata for --series instead of observations')
    .option('--start-date <date>', 'Start date (YYYY-MM-DD)')
    .option('--end-date <date>', 'End date (YYYY-MM-DD)')
    .option('--limit <n>', 'Maximum rows for --search and --release-id', parsePositiveInt)
    .option('--next-cursor <cursor>', 'Pagination cursor returned by a previous --release-id call')
    .option('--output <path>', 'Output file path (CSV)')
    .action(async (opts: FredOptions) => {
      const { fred } = deps.context.scrapers
      const csv = { output: opts.output, skipEmptyCsv: true }

      if (opts.search) {
        const data = await fred.searchSeries(opts.search, opts.limit)
        await show(data, `FRED Series Search: ${opts.search}`, deps, csv)
      } else if (opts.releaseId !== undefined) {
        const page = await fred.getReleaseObservations(opts.releaseId, {
          limit: opts.limit,
          nextCursor: opts.nextCursor,
        })
        await show(page.table, `FRED Release ${opts.releaseId}`, deps, csv)
        if (page.hasMore && page.nextCursor) {
          deps.sink.log(`\nNext cursor: ${page.nextCursor}`)
        }
      } else if (opts.series) {
        const seriesId = resolveSeriesId(opts.series)
        if (opts.info) {
          const data = await fred.getSeriesInfo(seriesId)
          await show(data, `FRED Series Info: ${seriesId}`, deps, csv)
        } else {
          const data = await fred.getSeries(seriesId, opts.startDate, opts.endDate)
          await show(data, `FRED Series: ${seriesId}`, deps, csv)
        }
      } else {
        deps.sink.log('Please specify --series, --release-id, or --search')
      }
    })
}
