export type {
  IMarketDataProvider,
  ChartInterval,
  ChartQuery,
  QuoteSnapshot,
  Bar,
  KeyStatistics,
  StatementPeriod,
  FinancialStatements,
  InstitutionalHolder,
} from './interfaces.js';

export { YahooFinanceProvider, createYahooClient } from './providers/yahoo/index.js';
export type { YahooClient, SummaryModule } from './providers/yahoo/index.js';

export { createMarketDataProvider } from './factory.js';
