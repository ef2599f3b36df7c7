/**
 * Market data provider interface definitions
 *
 * Prices, fundamentals and ownership for listed equities. Scrapers depend
 * only on this interface; each provider normalizes its own wire format.
 */

export interface IMarketDataProvider {
  getQuote(symbol: string): Promise<QuoteSnapshot>;
  getBars(symbol: string, query: ChartQuery): Promise<Bar[]>;
  getKeyStatistics(symbol: string): Promise<KeyStatistics>;
  getStatements(symbol: string): Promise<FinancialStatements>;
  getInstitutionalHolders(symbol: string): Promise<InstitutionalHolder[]>;
}

// ==================== Prices ====================

export type ChartInterval =
  | '1m' | '2m' | '5m' | '15m' | '30m' | '60m' | '90m' | '1h'
  | '1d' | '5d' | '1wk' | '1mo' | '3mo';

export interface ChartQuery {
  period1: Date;
  period2?: Date;
  interval: ChartInterval;
}

export interface QuoteSnapshot {
  symbol: string;
  name: string | null;
  price: number | null;
  previousClose: number | null;
  open: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  volume: number | null;
  marketCap: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  currency: string | null;
  time: Date | null;
}

/** One OHLCV bar. Bars without a close are never emitted. */
export interface Bar {
  time: Date;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number;
  adjClose: number | null;
  volume: number | null;
}

// ==================== Fundamentals ====================

export interface KeyStatistics {
  symbol: string;
  // valuation
  marketCap: number | null;
  enterpriseValue: number | null;
  trailingPE: number | null;
  forwardPE: number | null;
  pegRatio: number | null;
  priceToBook: number | null;
  priceToSales: number | null;
  enterpriseToRevenue: number | null;
  enterpriseToEbitda: number | null;
  // financial data (ratios are fractions, e.g. 0.25 = 25%)
  totalRevenue: number | null;
  grossProfits: number | null;
  ebitda: number | null;
  netIncome: number | null;
  profitMargins: number | null;
  operatingMargins: number | null;
  returnOnEquity: number | null;
  returnOnAssets: number | null;
  revenueGrowth: number | null;
  earningsGrowth: number | null;
  debtToEquity: number | null;
  currentRatio: number | null;
  totalCash: number | null;
  totalDebt: number | null;
  freeCashflow: number | null;
  // short interest
  sharesShort: number | null;
  sharesShortPriorMonth: number | null;
  shortRatio: number | null;
  shortPercentOfFloat: number | null;
  dateShortInterest: Date | null;
  sharesOutstanding: number | null;
  floatShares: number | null;
}

/** One reporting period: line item name → value. */
export interface StatementPeriod {
  endDate: Date;
  items: Record<string, number | null>;
}

export interface FinancialStatements {
  income: StatementPeriod[];
  balance: StatementPeriod[];
  cashflow: StatementPeriod[];
}

// ==================== Ownership ====================

export interface InstitutionalHolder {
  organization: string;
  position: number | null;
  reportDate: Date | null;
  pctHeld: number | null;
  value: number | null;
}
