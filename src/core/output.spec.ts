import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { RULE, printTable, printTitle, renderTable, toCsv, writeCsv } from './output.js'
import { emptyTable, fromRecords } from './table.js'

function collect() {
  const lines: string[] = []
  return { lines, sink: { log: (line: string) => lines.push(line) } }
}

describe('printTitle', () => {
  it('frames the title with 60-character rules', () => {
    const { lines, sink } = collect()
    printTitle('Quote: AAPL', sink)
    expect(RULE).toHaveLength(60)
    expect(lines).toEqual([`\n${RULE}`, 'Quote: AAPL', RULE])
  })
})

describe('renderTable', () => {
  it('draws a boxed grid', () => {
    const table = fromRecords([{ a: 1, b: 'x' }])
    expect(renderTable(table)).toBe(
      ['┌───┬───┐', '│ a │ b │', '├───┼───┤', '│ 1 │ x │', '└───┴───┘'].join('\n'),
    )
  })
})

describe('printTable', () => {
  it('prints the empty message for a table without rows', () => {
    const { lines, sink } = collect()
    printTable(emptyTable(['a']), 'Nothing', sink)
    expect(lines).toEqual([`\n${RULE}`, 'Nothing', RULE, 'No data available.'])
  })

  it('prints the grid and a row count', () => {
    const { lines, sink } = collect()
    const table = fromRecords([{ a: 1, b: 'x' }])
    printTable(table, '', sink)
    expect(lines).toEqual([renderTable(table), '\nRows: 1'])
  })
})

describe('CSV export', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'csv-test-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('writes a header row and quotes cells that need it', () => {
    const table = fromRecords([
      { Date: new Date('2024-01-02T00:00:00Z'), title: 'a, b', value: null },
    ])
    expect(toCsv(table)).toBe('Date,title,value\n2024-01-02,"a, b",\n')
  })

  it('creates missing directories', async () => {
    const path = join(tempDir, 'nested', 'out.csv')
    const written = await writeCsv(fromRecords([{ n: 1 }]), path)
    expect(written).toBe(path)
    expect(await readFile(path, 'utf-8')).toBe('n\n1\n')
  })
})
