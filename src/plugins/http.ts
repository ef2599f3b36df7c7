import { Hono } from 'hono'
import { serve } from '@hono/node-server'
import type { Server } from 'node:net'
import { ConfigError, HttpError, NetworkError, NotFoundError, ParseError } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import { fromRecord, toJson } from '../core/table.js'
import type { AppContext, Plugin, Scrapers } from '../core/types.js'
import { resolveSeriesId } from '../extension/fred/index.js'

type ErrorStatus = 400 | 404 | 500 | 502

export function errorStatus(err: unknown): ErrorStatus {
  if (err instanceof NotFoundError) return 404
  if (err instanceof ConfigError) return 400
  if (err instanceof HttpError || err instanceof NetworkError || err instanceof ParseError) return 502
  return 500
}

function optionalInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') return undefined
  const n = Number(value)
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new ConfigError(`Query parameter "${name}" must be a positive integer`)
  }
  return n
}

/** Read-only JSON view of the scrapers. Every table comes back as `{ columns, rows }`. */
export function createHttpApp(scrapers: Scrapers, logger?: Logger): Hono {
  const app = new Hono()

  app.onError((err, c) => {
    const status = errorStatus(err)
    if (status === 500) logger?.error({ err, path: c.req.path }, 'request failed')
    return c.json({ error: err.message }, status)
  })

  app.get('/health', (c) => c.json({ ok: true }))

  // ==================== Stock ====================

  app.get('/stock/:symbol/quote', async (c) => {
    const quote = await scrapers.stock.getRealTimeQuote(c.req.param('symbol'))
    return c.json(toJson(fromRecord(quote)))
  })

  app.get('/stock/:symbol/history', async (c) => {
    const table = await scrapers.stock.getHistoricalData(
      c.req.param('symbol'),
      c.req.query('start'),
      c.req.query('end'),
      c.req.query('period') ?? '1y',
    )
    return c.json(toJson(table))
  })

  app.get('/stock/:symbol/intraday', async (c) => {
    const table = await scrapers.stock.getIntradayData(
      c.req.param('symbol'),
      c.req.query('interval') ?? '1m',
      c.req.query('period') ?? '1d',
    )
    return c.json(toJson(table))
  })

  // ==================== FRED ====================

  app.get('/fred/search', async (c) => {
    const text = c.req.query('q')
    if (!text) throw new ConfigError('Query parameter "q" is required')
    const table = await scrapers.fred.searchSeries(text, optionalInt(c.req.query('limit'), 'limit'))
    return c.json(toJson(table))
  })

  app.get('/fred/series/:id', async (c) => {
    const table = await scrapers.fred.getSeries(
      resolveSeriesId(c.req.param('id')),
      c.req.query('start'),
      c.req.query('end'),
    )
    return c.json(toJson(table))
  })

  app.get('/fred/series/:id/info', async (c) => {
    const table = await scrapers.fred.getSeriesInfo(resolveSeriesId(c.req.param('id')))
    return c.json(toJson(table))
  })

  app.get('/fred/release/:id', async (c) => {
    const releaseId = optionalInt(c.req.param('id'), 'id')
    if (releaseId === undefined) throw new ConfigError('A release id is required')
    const page = await scrapers.fred.getReleaseObservations(releaseId, {
      limit: optionalInt(c.req.query('limit'), 'limit'),
      nextCursor: c.req.query('cursor'),
    })
    return c.json({ ...toJson(page.table), nextCursor: page.nextCursor, hasMore: page.hasMore })
  })

  // ==================== Fundamentals ====================

  app.get('/fundamental/:symbol/financials', async (c) => {
    const f = await scrapers.fundamental.getFinancials(c.req.param('symbol'))
    return c.json({
      income_statement: toJson(f.income_statement),
      balance_sheet: toJson(f.balance_sheet),
      cash_flow: toJson(f.cash_flow),
    })
  })

  app.get('/fundamental/:symbol/ratios', async (c) => {
    const ratios = await scrapers.fundamental.getValuationRatios(c.req.param('symbol'))
    return c.json(toJson(fromRecord(ratios)))
  })

  app.get('/fundamental/:symbol/metrics', async (c) => {
    const metrics = await scrapers.fundamental.getKeyMetrics(c.req.param('symbol'))
    return c.json(toJson(fromRecord(metrics)))
  })

  app.get('/fundamental/:symbol/trend', async (c) => {
    const table = await scrapers.fundamental.getRevenueProfitTrend(c.req.param('symbol'))
    return c.json(toJson(table))
  })

  // ==================== News / SEC ====================

  app.get('/news/:symbol', async (c) => {
    const table = await scrapers.news.getCompanyNews(
      c.req.param('symbol'),
      optionalInt(c.req.query('limit'), 'limit'),
    )
    return c.json(toJson(table))
  })

  app.get('/sec/:symbol', async (c) => {
    const table = await scrapers.news.getSecFilings(
      c.req.param('symbol'),
      c.req.query('type'),
      optionalInt(c.req.query('limit'), 'limit'),
    )
    return c.json(toJson(table))
  })

  // ==================== Alternative ====================

  app.get('/alternative/:symbol/short-interest', async (c) => {
    const data = await scrapers.alternative.getShortInterest(c.req.param('symbol'))
    return c.json(toJson(fromRecord(data)))
  })

  app.get('/alternative/:symbol/institutional', async (c) => {
    const table = await scrapers.alternative.getInstitutionalHoldings(c.req.param('symbol'))
    return c.json(toJson(table))
  })

  return app
}

export class HttpPlugin implements Plugin {
  name = 'http'
  private server: Server | null = null

  constructor(private port?: number) {}

  /** Resolves once the server is listening; a bind failure rejects with ConfigError. */
  async start(ctx: AppContext) {
    const app = createHttpApp(ctx.scrapers, ctx.logger.child({ component: 'http-server' }))
    const port = this.port ?? ctx.config.server.port

    this.server = await new Promise<Server>((resolve, reject) => {
      const server: Server = serve({ fetch: app.fetch, port }, (info) => {
        server.off('error', onError)
        ctx.logger.info({ port: info.port }, 'http server listening')
        console.error(`Listening on http://localhost:${info.port}`)
        resolve(server)
      })
      const onError = (err: Error) => {
        reject(new ConfigError(`Cannot listen on port ${port}: ${err.message}`))
      }
      server.once('error', onError)
    })
  }

  /** The port actually bound, or null before start(). */
  address(): number | null {
    const address = this.server?.address()
    return address && typeof address === 'object' ? address.port : null
  }

  async stop() {
    const server = this.server
    this.server = null
    if (!server) return
    await new Promise<void>((resolve) => server.close(() => resolve()))
  }
}
