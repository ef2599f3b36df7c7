import type { Config } from './config.js'
import { HttpClient } from './http.js'
import type { Logger } from './logger.js'
import type { AppContext, Scrapers } from './types.js'
import { createMarketDataProvider, type IMarketDataProvider } from '../extension/market-data/index.js'
import { StockScraper } from '../extension/stock/index.js'
import { FredClient } from '../extension/fred/index.js'
import { FundamentalScraper } from '../extension/fundamental/index.js'
import { NewsScraper } from '../extension/news/index.js'
import { AlternativeDataScraper } from '../extension/alternative/index.js'

export interface ScraperDeps {
  /** Defaults to the provider selected in config */
  provider?: IMarketDataProvider
  /** Injectable for testing */
  fetchFn?: typeof globalThis.fetch
}

export function createScrapers(config: Config, logger: Logger, deps: ScraperDeps = {}): Scrapers {
  const provider = deps.provider ?? createMarketDataProvider(config, logger)
  const http = new HttpClient({
    userAgent: config.http.userAgent,
    timeoutMs: config.http.timeoutMs,
    logger: logger.child({ component: 'http' }),
    fetchFn: deps.fetchFn,
  })

  return {
    stock: new StockScraper({ provider }),
    fred: new FredClient({
      http,
      apiKey: config.fred.apiKey,
      baseUrl: config.fred.baseUrl,
      searchLimit: config.fred.searchLimit,
      logger: logger.child({ component: 'fred' }),
    }),
    fundamental: new FundamentalScraper(provider),
    news: new NewsScraper({
      http,
      feedUrl: config.news.feedUrl,
      region: config.news.region,
      lang: config.news.lang,
      secBaseUrl: config.sec.baseUrl,
      secUserAgent: config.sec.userAgent,
      logger: logger.child({ component: 'news' }),
    }),
    alternative: new AlternativeDataScraper(provider),
  }
}

export function createAppContext(config: Config, logger: Logger, deps: ScraperDeps = {}): AppContext {
  return { config, logger, scrapers: createScrapers(config, logger, deps) }
}
