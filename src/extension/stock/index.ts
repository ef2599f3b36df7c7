export { StockScraper, normalizeSymbol, HISTORY_COLUMNS, INTRADAY_COLUMNS, INTRADAY_INTERVALS } from './StockScraper.js';
export type { StockScraperOptions } from './StockScraper.js';
export { PERIODS, isPeriod, parseDate, periodStart, monthsBefore, sessionCount, lastSessions } from './periods.js';
export type { Period } from './periods.js';
