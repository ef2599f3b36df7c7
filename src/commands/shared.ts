import { InvalidArgumentError } from 'commander'
import { extname } from 'path'
import { printTable, writeCsv, type OutputSink } from '../core/output.js'
import { isEmpty, type DataTable } from '../core/table.js'
import type { AppContext } from '../core/types.js'

export interface CommandDeps {
  context: AppContext
  sink: OutputSink
}

/** Commander argument parser for positive integers. */
export function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return n
}

export interface ShowOptions {
  output?: string
  /** FRED skips the CSV when there is nothing to write */
  skipEmptyCsv?: boolean
}

/** Print a table under a title and, when asked, save it as CSV. */
export async function show(table: DataTable, title: string, deps: CommandDeps, options: ShowOptions = {}): Promise<void> {
  printTable(table, title, deps.sink)

  if (!options.output) return
  if (options.skipEmptyCsv && isEmpty(table)) return

  await writeCsv(table, options.output)
  deps.context.logger.info({ path: options.output, rows: table.rows.length }, 'csv written')
  deps.sink.log(`\nData saved to ${options.output}`)
}

/** `out/aapl.csv` + `balance_sheet` → `out/aapl_balance_sheet.csv` */
export function suffixedPath(path: string, suffix: string): string {
  const ext = extname(path)
  const stem = ext ? path.slice(0, -ext.length) : path
  return `${stem}_${suffix}${ext || '.csv'}`
}
