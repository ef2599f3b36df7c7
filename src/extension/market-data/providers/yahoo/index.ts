export { YahooFinanceProvider, createYahooClient } from './YahooFinanceProvider.js';
export type { YahooClient, YahooFinanceProviderOptions, SummaryModule } from './YahooFinanceProvider.js';
