export { FundamentalScraper, statementTable, toPercent, TREND_COLUMNS } from './FundamentalScraper.js';
export type { Financials } from './FundamentalScraper.js';
