/**
 * Tabular results.
 *
 * Every scraper reshapes its source response into a DataTable: an ordered
 * column list plus rows keyed by column name. Printing and CSV export only
 * ever see this shape.
 */

export type Cell = string | number | boolean | Date | null

export type Row = Record<string, Cell>

export interface DataTable {
  columns: string[]
  rows: Row[]
}

export const MAX_COLUMN_WIDTH = 50

/**
 * Build a table from records. Columns default to the union of record keys
 * in first-seen order; keys absent from a record become null.
 */
export function fromRecords(records: Row[], columns?: string[]): DataTable {
  const cols = columns ? [...columns] : []
  if (!columns) {
    const seen = new Set<string>()
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key)
          cols.push(key)
        }
      }
    }
  }

  const rows = records.map((record) => {
    const row: Row = {}
    for (const col of cols) row[col] = record[col] ?? null
    return row
  })
  return { columns: cols, rows }
}

export function fromRecord(record: Row): DataTable {
  return fromRecords([record])
}

export function emptyTable(columns: string[] = []): DataTable {
  return { columns: [...columns], rows: [] }
}

export function isEmpty(table: DataTable): boolean {
  return table.rows.length === 0
}

export function formatCell(cell: Cell): string {
  if (cell === null) return ''
  if (cell instanceof Date) {
    if (Number.isNaN(cell.getTime())) return ''
    const iso = cell.toISOString()
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso
  }
  return String(cell)
}

export function truncate(text: string, max: number = MAX_COLUMN_WIDTH): string {
  if (text.length <= max) return text
  return `${text.slice(0, Math.max(0, max - 3))}...`
}

/** Plain-JSON form of a table (dates as strings) for HTTP responses. */
export function toJson(table: DataTable): { columns: string[]; rows: Record<string, string | number | boolean | null>[] } {
  return {
    columns: table.columns,
    rows: table.rows.map((row) => {
      const out: Record<string, string | number | boolean | null> = {}
      for (const col of table.columns) {
        const cell = row[col] ?? null
        out[col] = cell instanceof Date ? formatCell(cell) : cell
      }
      return out
    }),
  }
}
