import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createProgram, runCli } from './cli.js'
import { RULE } from './core/output.js'
import { createTestContext, type TestContextOptions } from './core/testing.js'
import type { AppContext, Plugin } from './core/types.js'
import { FakeMarketDataProvider } from './extension/market-data/testing.js'

const provider = new FakeMarketDataProvider({
  quote: {
    symbol: 'AAPL',
    name: 'Apple Inc.',
    price: 190.5,
    previousClose: null,
    open: null,
    dayHigh: null,
    dayLow: null,
    volume: null,
    marketCap: null,
    fiftyTwoWeekHigh: null,
    fiftyTwoWeekLow: null,
    currency: 'USD',
    time: null,
  },
  bars: [
    {
      time: new Date('2024-06-14T00:00:00Z'),
      open: 10,
      high: 12,
      low: 9,
      close: 11,
      adjClose: 11,
      volume: 1000,
    },
  ],
  statements: {
    income: [{ endDate: new Date('2023-09-30T00:00:00Z'), items: { totalRevenue: 400 } }],
  },
})

async function run(argv: string[], options: Partial<TestContextOptions> = {}) {
  const { context, requests } = await createTestContext({ provider, ...options })
  const out: string[] = []
  const err: string[] = []
  const started: number[] = []
  const code = await runCli(argv, {
    context,
    sink: { log: (line) => out.push(line) },
    errorSink: { log: (line) => err.push(line) },
    createPlugin: (port): Plugin => ({
      name: 'fake-http',
      start: async (ctx: AppContext) => {
        started.push(port ?? ctx.config.server.port)
      },
      stop: async () => {},
    }),
  })
  return { code, out, err, requests, started }
}

let tempDir: string

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'cli-test-'))
})

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true })
})

describe('program', () => {
  it('is named after the installed binary', async () => {
    const { context } = await createTestContext({ provider })
    const program = createProgram({ context, sink: { log: () => {} }, errorSink: { log: () => {} } })
    expect(program.name()).toBe('market-data-scraper')
  })
})

describe('stock', () => {
  it('prints a titled quote table', async () => {
    const { code, out } = await run(['stock', '--symbol', 'aapl', '--quote'])

    expect(code).toBe(0)
    expect(out.slice(0, 3)).toEqual([`\n${RULE}`, 'Real-time Quote: AAPL', RULE])
    expect(out[4]).toBe('\nRows: 1')
  })

  it('saves historical bars as CSV', async () => {
    const path = join(tempDir, 'aapl.csv')
    const { code, out } = await run(['stock', '--symbol', 'AAPL', '--output', path])

    expect(code).toBe(0)
    expect(out[1]).toBe('Historical Data: AAPL')
    expect(out.at(-1)).toBe(`\nData saved to ${path}`)
    expect(await readFile(path, 'utf-8')).toBe(
      'Date,Open,High,Low,Close,Adj Close,Volume\n2024-06-14,10,12,9,11,11,1000\n',
    )
  })

  it('passes --period through to intraday data', async () => {
    const { code, out } = await run(['stock', '--symbol', 'AAPL', '--intraday', '--interval', '5m', '--period', '5d'])
    const { query } = provider.barQueries[provider.barQueries.length - 1]

    expect(code).toBe(0)
    expect(out[1]).toBe('Intraday Data: AAPL')
    expect(query.interval).toBe('5m')
    expect(query.period2 && query.period2.getTime() - query.period1.getTime()).toBe(12 * 24 * 60 * 60 * 1000)
  })

  it('reports usage errors through commander', async () => {
    const { code, err } = await run(['stock', '--quote'])
    expect(code).toBe(1)
    expect(err).toEqual(["error: required option '--symbol <symbol>' not specified"])
  })

  it('reports scraper failures as a single error line', async () => {
    const { code, err } = await run(['stock', '--symbol', 'AAPL', '--period', '7y'])
    expect(code).toBe(1)
    expect(err).toEqual([
      'Error: Unknown period "7y", expected one of 1d, 5d, 1mo, 3mo, 6mo, 1y, 2y, 5y, 10y, ytd, max',
    ])
  })
})

describe('fred', () => {
  it('asks for a selector when none is given', async () => {
    const { code, out } = await run(['fred'])
    expect(code).toBe(0)
    expect(out).toEqual(['Please specify --series, --release-id, or --search'])
  })

  it('resolves aliases before fetching', async () => {
    const { out, requests } = await run(['fred', '--series', 'cpi'], {
      env: { FRED_API_KEY: 'test-secret' },
      body: { observations: [{ date: '2024-01-01', value: '310.3' }] },
    })
    expect(requests[0].searchParams.get('series_id')).toBe('CPIAUCSL')
    expect(out[1]).toBe('FRED Series: CPIAUCSL')
  })

  it('does not write a CSV for an empty result', async () => {
    const path = join(tempDir, 'empty.csv')
    const { out } = await run(['fred', '--series', 'GDP', '--output', path], {
      env: { FRED_API_KEY: 'test-secret' },
      body: { observations: [] },
    })
    expect(out.at(-1)).toBe('No data available.')
    await expect(readFile(path, 'utf-8')).rejects.toThrow()
  })

  it('prints the cursor for the next release page', async () => {
    const { out } = await run(['fred', '--release-id', '53', '--limit', '1'], {
      env: { FRED_API_KEY: 'test-secret' },
      body: {
        has_more: true,
        next_cursor: 'cursor-2',
        series: [{ series_id: 'A', observations: [{ date: '2024-01-01', value: '1' }] }],
      },
    })
    expect(out[1]).toBe('FRED Release 53')
    expect(out.at(-1)).toBe('\nNext cursor: cursor-2')
  })

  it('fails without an API key', async () => {
    const { code, err } = await run(['fred', '--search', 'gdp'])
    expect(code).toBe(1)
    expect(err).toEqual([
      'Error: FRED_API_KEY is not set. Get a free key at https://fred.stlouisfed.org/docs/api/api_key.html',
    ])
  })

  it('rejects a non-numeric release id', async () => {
    const { code, err } = await run(['fred', '--release-id', 'abc'])
    expect(code).toBe(1)
    expect(err).toEqual(["error: option '--release-id <id>' argument 'abc' is invalid. Expected a positive integer."])
  })
})

describe('fundamental', () => {
  it('prints each non-empty statement under its heading', async () => {
    const { out } = await run(['fundamental', '--symbol', 'AAPL'])
    expect(out.slice(0, 4)).toEqual([`\n${RULE}`, 'Financial Statements: AAPL', RULE, '\nINCOME STATEMENT:'])
    expect(out).toHaveLength(5)
  })

  it('writes one CSV per statement', async () => {
    const base = join(tempDir, 'aapl.csv')
    const { out } = await run(['fundamental', '--symbol', 'AAPL', '--output', base])
    const path = join(tempDir, 'aapl_income_statement.csv')
    expect(out.at(-1)).toBe(`\nData saved to ${path}`)
    expect(await readFile(path, 'utf-8')).toBe('Item,2023-09-30\ntotalRevenue,400\n')
  })
})

describe('alternative', () => {
  it('asks for a flag when none is given', async () => {
    const { out } = await run(['alternative', '--symbol', 'AAPL'])
    expect(out).toEqual(['Please specify --short-interest or --institutional'])
  })

  it('prints institutional holdings', async () => {
    const { out } = await run(['alternative', '--symbol', 'AAPL', '--institutional'])
    expect(out).toEqual([`\n${RULE}`, 'Institutional Holdings: AAPL', RULE, 'No data available.'])
  })
})

describe('news and sec', () => {
  it('prints the news table', async () => {
    const { out, requests } = await run(['news', '--symbol', 'msft', '--limit', '5'], {
      body: '<rss><channel><title>Feed</title><item><title>Hello</title></item></channel></rss>',
    })
    expect(requests[0].searchParams.get('s')).toBe('MSFT')
    expect(out[1]).toBe('Company News: MSFT')
    expect(out.at(-1)).toBe('\nRows: 1')
  })

  it('passes the filing type through', async () => {
    const { out, requests } = await run(['sec', '--symbol', 'MSFT', '--filing-type', '8-K'], {
      body: '<feed><title>MSFT</title></feed>',
    })
    expect(requests[0].searchParams.get('type')).toBe('8-K')
    expect(out).toEqual([`\n${RULE}`, 'SEC Filings: MSFT', RULE, 'No data available.'])
  })
})

describe('serve', () => {
  it('starts the HTTP plugin on the requested port', async () => {
    const { code, started } = await run(['serve', '--port', '4010'])
    expect(code).toBe(0)
    expect(started).toEqual([4010])
  })

  it('defaults to the configured port', async () => {
    const { started } = await run(['serve'])
    expect(started).toEqual([3000])
  })
})
