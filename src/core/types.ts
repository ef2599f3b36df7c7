import type { Config } from './config.js'
import type { Logger } from './logger.js'
import type { StockScraper } from '../extension/stock/index.js'
import type { FredClient } from '../extension/fred/index.js'
import type { FundamentalScraper } from '../extension/fundamental/index.js'
import type { NewsScraper } from '../extension/news/index.js'
import type { AlternativeDataScraper } from '../extension/alternative/index.js'

export type { Config }

/** Every data source the CLI and HTTP mode can reach. */
export interface Scrapers {
  stock: StockScraper
  fred: FredClient
  fundamental: FundamentalScraper
  news: NewsScraper
  alternative: AlternativeDataScraper
}

export interface AppContext {
  config: Config
  logger: Logger
  scrapers: Scrapers
}

export interface Plugin {
  name: string
  start(ctx: AppContext): Promise<void>
  stop(): Promise<void>
}
