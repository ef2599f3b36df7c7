/**
 * In-memory IMarketDataProvider for specs. Every method returns the canned
 * value it was given and records the calls it received.
 */

import type {
  Bar,
  ChartQuery,
  FinancialStatements,
  IMarketDataProvider,
  InstitutionalHolder,
  KeyStatistics,
  QuoteSnapshot,
} from './interfaces.js';

export function emptyKeyStatistics(symbol: string): KeyStatistics {
  return {
    symbol,
    marketCap: null,
    enterpriseValue: null,
    trailingPE: null,
    forwardPE: null,
    pegRatio: null,
    priceToBook: null,
    priceToSales: null,
    enterpriseToRevenue: null,
    enterpriseToEbitda: null,
    totalRevenue: null,
    grossProfits: null,
    ebitda: null,
    netIncome: null,
    profitMargins: null,
    operatingMargins: null,
    returnOnEquity: null,
    returnOnAssets: null,
    revenueGrowth: null,
    earningsGrowth: null,
    debtToEquity: null,
    currentRatio: null,
    totalCash: null,
    totalDebt: null,
    freeCashflow: null,
    sharesShort: null,
    sharesShortPriorMonth: null,
    shortRatio: null,
    shortPercentOfFloat: null,
    dateShortInterest: null,
    sharesOutstanding: null,
    floatShares: null,
  };
}

export interface FakeProviderData {
  quote?: QuoteSnapshot;
  bars?: Bar[];
  keyStatistics?: Partial<KeyStatistics>;
  statements?: Partial<FinancialStatements>;
  holders?: InstitutionalHolder[];
}

export class FakeMarketDataProvider implements IMarketDataProvider {
  barQueries: { symbol: string; query: ChartQuery }[] = [];
  symbols: string[] = [];

  constructor(private data: FakeProviderData = {}) {}

  async getQuote(symbol: string): Promise<QuoteSnapshot> {
    this.symbols.push(symbol);
    if (!this.data.quote) throw new Error(`no quote for ${symbol}`);
    return this.data.quote;
  }

  async getBars(symbol: string, query: ChartQuery): Promise<Bar[]> {
    this.barQueries.push({ symbol, query });
    return this.data.bars ?? [];
  }

  async getKeyStatistics(symbol: string): Promise<KeyStatistics> {
    this.symbols.push(symbol);
    return { ...emptyKeyStatistics(symbol), ...this.data.keyStatistics };
  }

  async getStatements(symbol: string): Promise<FinancialStatements> {
    this.symbols.push(symbol);
    return { income: [], balance: [], cashflow: [], ...this.data.statements };
  }

  async getInstitutionalHolders(symbol: string): Promise<InstitutionalHolder[]> {
    this.symbols.push(symbol);
    return this.data.holders ?? [];
  }
}
