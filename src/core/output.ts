import Table from 'cli-table3'
import { stringify } from 'csv-stringify/sync'
import { mkdir, writeFile } from 'fs/promises'
import { dirname, resolve } from 'path'
import { formatCell, truncate, type DataTable } from './table.js'

/** Where printed output goes. The CLI passes stdout; tests collect lines. */
export interface OutputSink {
  log(line: string): void
}

export const RULE = '='.repeat(60)

export function printTitle(title: string, sink: OutputSink): void {
  sink.log(`\n${RULE}`)
  sink.log(title)
  sink.log(RULE)
}

export function renderTable(table: DataTable): string {
  const rendered = new Table({
    head: table.columns.map((col) => truncate(col)),
    style: { head: [], border: [] },
  })
  for (const row of table.rows) {
    rendered.push(table.columns.map((col) => truncate(formatCell(row[col] ?? null))))
  }
  return rendered.toString()
}

export function printTable(table: DataTable, title: string, sink: OutputSink): void {
  if (title) printTitle(title, sink)

  if (table.rows.length === 0) {
    sink.log('No data available.')
    return
  }

  sink.log(renderTable(table))
  sink.log(`\nRows: ${table.rows.length}`)
}

export function toCsv(table: DataTable): string {
  return stringify(
    table.rows.map((row) => table.columns.map((col) => formatCell(row[col] ?? null))),
    { header: true, columns: table.columns },
  )
}

export async function writeCsv(table: DataTable, path: string): Promise<string> {
  const target = resolve(path)
  await mkdir(dirname(target), { recursive: true })
  await writeFile(target, toCsv(table), 'utf-8')
  return target
}
