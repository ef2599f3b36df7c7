/**
 * Yahoo Finance market data provider
 *
 * Yahoo implementation of IMarketDataProvider on top of yahoo-finance2.
 * All access goes through a YahooClient so the provider can be exercised
 * without the network; createYahooClient() binds the real library.
 *
 * quoteSummary modules used:
 * - summaryDetail / defaultKeyStatistics / financialData → KeyStatistics
 * - institutionOwnership → institutional holders
 *
 * Statements come from fundamentalsTimeSeries (annual financials,
 * balance-sheet and cash-flow), since Yahoo stopped filling the
 * quoteSummary statement histories.
 */

import YahooFinance from 'yahoo-finance2';
import { NotFoundError, ScraperError } from '../../../../core/errors.js';
import { silentLogger, type Logger } from '../../../../core/logger.js';
import { parseResponse } from '../../../../core/validate.js';
import type {
  IMarketDataProvider,
  Bar,
  ChartQuery,
  FinancialStatements,
  InstitutionalHolder,
  KeyStatistics,
  QuoteSnapshot,
  StatementPeriod,
} from '../../interfaces.js';
import {
  chartSchema,
  keyStatisticsSchema,
  ownershipSchema,
  quoteSchema,
  statementsSchema,
} from './schemas.js';

export type SummaryModule =
  | 'summaryDetail'
  | 'defaultKeyStatistics'
  | 'financialData'
  | 'institutionOwnership';

export type StatementModule = 'financials' | 'balance-sheet' | 'cash-flow';

export interface StatementQuery {
  period1: Date;
  module: StatementModule;
}

/** The slice of yahoo-finance2 this provider calls. Results stay unknown until validated. */
export interface YahooClient {
  quote(symbol: string): Promise<unknown>;
  chart(symbol: string, query: ChartQuery): Promise<unknown>;
  quoteSummary(symbol: string, modules: SummaryModule[]): Promise<unknown>;
  fundamentalsTimeSeries(symbol: string, query: StatementQuery): Promise<unknown>;
}

export function createYahooClient(): YahooClient {
  const yf = new YahooFinance({ suppressNotices: ['yahooSurvey'] });
  return {
    quote: (symbol) => yf.quote(symbol),
    chart: (symbol, query) =>
      yf.chart(symbol, {
        period1: query.period1,
        period2: query.period2,
        interval: query.interval,
      }),
    quoteSummary: (symbol, modules) => yf.quoteSummary(symbol, { modules }),
    // Rows carry whichever line items Yahoo has; strict validation rejects sparse ones
    fundamentalsTimeSeries: (symbol, query) =>
      yf.fundamentalsTimeSeries(
        symbol,
        { period1: query.period1, type: 'annual', module: query.module },
        { validateResult: false },
      ),
  };
}

/** How far back annual statements are requested. */
const STATEMENT_YEARS = 10;

export interface YahooFinanceProviderOptions {
  client?: YahooClient;
  logger?: Logger;
  now?: () => Date;
}

export class YahooFinanceProvider implements IMarketDataProvider {
  private client: YahooClient;
  private logger: Logger;
  private now: () => Date;

  constructor(options: YahooFinanceProviderOptions = {}) {
    this.client = options.client ?? createYahooClient();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async getQuote(symbol: string): Promise<QuoteSnapshot> {
    const raw = await this.call(symbol, 'quote', () => this.client.quote(symbol));
    if (raw === undefined || raw === null) {
      throw new NotFoundError(`No quote found for ${symbol}`);
    }
    const q = parseResponse(quoteSchema, raw, 'Yahoo Finance quote');

    return {
      symbol: q.symbol,
      name: q.longName ?? q.shortName ?? null,
      price: q.regularMarketPrice ?? null,
      previousClose: q.regularMarketPreviousClose ?? null,
      open: q.regularMarketOpen ?? null,
      dayHigh: q.regularMarketDayHigh ?? null,
      dayLow: q.regularMarketDayLow ?? null,
      volume: q.regularMarketVolume ?? null,
      marketCap: q.marketCap ?? null,
      fiftyTwoWeekHigh: q.fiftyTwoWeekHigh ?? null,
      fiftyTwoWeekLow: q.fiftyTwoWeekLow ?? null,
      currency: q.currency ?? null,
      time: q.regularMarketTime ?? null,
    };
  }

  async getBars(symbol: string, query: ChartQuery): Promise<Bar[]> {
    const raw = await this.call(symbol, 'chart', () => this.client.chart(symbol, query));
    const chart = parseResponse(chartSchema, raw, 'Yahoo Finance chart');

    const bars: Bar[] = [];
    for (const q of chart.quotes) {
      // Yahoo pads halted sessions with null bars
      if (q.close === null || q.close === undefined) continue;
      bars.push({
        time: q.date,
        open: q.open ?? null,
        high: q.high ?? null,
        low: q.low ?? null,
        close: q.close,
        adjClose: q.adjclose ?? null,
        volume: q.volume ?? null,
      });
    }
    bars.sort((a, b) => a.time.getTime() - b.time.getTime());
    return bars;
  }

  async getKeyStatistics(symbol: string): Promise<KeyStatistics> {
    const raw = await this.call(symbol, 'quoteSummary', () =>
      this.client.quoteSummary(symbol, ['summaryDetail', 'defaultKeyStatistics', 'financialData']),
    );
    const {
      summaryDetail: sd,
      defaultKeyStatistics: ks,
      financialData: fd,
    } = parseResponse(keyStatisticsSchema, raw, 'Yahoo Finance quoteSummary');

    return {
      symbol,
      marketCap: sd?.marketCap ?? null,
      enterpriseValue: ks?.enterpriseValue ?? null,
      trailingPE: sd?.trailingPE ?? null,
      forwardPE: sd?.forwardPE ?? ks?.forwardPE ?? null,
      pegRatio: ks?.pegRatio ?? null,
      priceToBook: ks?.priceToBook ?? null,
      priceToSales: sd?.priceToSalesTrailing12Months ?? null,
      enterpriseToRevenue: ks?.enterpriseToRevenue ?? null,
      enterpriseToEbitda: ks?.enterpriseToEbitda ?? null,
      totalRevenue: fd?.totalRevenue ?? null,
      grossProfits: fd?.grossProfits ?? null,
      ebitda: fd?.ebitda ?? null,
      netIncome: ks?.netIncomeToCommon ?? null,
      profitMargins: fd?.profitMargins ?? null,
      operatingMargins: fd?.operatingMargins ?? null,
      returnOnEquity: fd?.returnOnEquity ?? null,
      returnOnAssets: fd?.returnOnAssets ?? null,
      revenueGrowth: fd?.revenueGrowth ?? null,
      earningsGrowth: fd?.earningsGrowth ?? null,
      debtToEquity: fd?.debtToEquity ?? null,
      currentRatio: fd?.currentRatio ?? null,
      totalCash: fd?.totalCash ?? null,
      totalDebt: fd?.totalDebt ?? null,
      freeCashflow: fd?.freeCashflow ?? null,
      sharesShort: ks?.sharesShort ?? null,
      sharesShortPriorMonth: ks?.sharesShortPriorMonth ?? null,
      shortRatio: ks?.shortRatio ?? null,
      shortPercentOfFloat: ks?.shortPercentOfFloat ?? null,
      dateShortInterest: ks?.dateShortInterest ?? null,
      sharesOutstanding: ks?.sharesOutstanding ?? null,
      floatShares: ks?.floatShares ?? null,
    };
  }

  async getStatements(symbol: string): Promise<FinancialStatements> {
    const period1 = new Date(this.now());
    period1.setUTCFullYear(period1.getUTCFullYear() - STATEMENT_YEARS);

    const [income, balance, cashflow] = await Promise.all(
      (['financials', 'balance-sheet', 'cash-flow'] as const).map(async (module) => {
        const raw = await this.call(symbol, 'fundamentalsTimeSeries', () =>
          this.client.fundamentalsTimeSeries(symbol, { period1, module }),
        );
        return toPeriods(parseResponse(statementsSchema, raw, `Yahoo Finance ${module}`));
      }),
    );
    return { income, balance, cashflow };
  }

  async getInstitutionalHolders(symbol: string): Promise<InstitutionalHolder[]> {
    const raw = await this.call(symbol, 'quoteSummary', () =>
      this.client.quoteSummary(symbol, ['institutionOwnership']),
    );
    const ownership = parseResponse(ownershipSchema, raw, 'Yahoo Finance quoteSummary');

    return (ownership.institutionOwnership?.ownershipList ?? []).map((h) => ({
      organization: h.organization,
      position: h.position ?? null,
      reportDate: h.reportDate ?? null,
      pctHeld: h.pctHeld ?? null,
      value: h.value ?? null,
    }));
  }

  // ==================== Internals ====================

  private async call(symbol: string, endpoint: string, fn: () => Promise<unknown>): Promise<unknown> {
    this.logger.debug({ symbol, endpoint }, 'yahoo request');
    try {
      return await fn();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (/not found|no data found|delisted/i.test(message)) {
        throw new NotFoundError(`Yahoo Finance has no ${endpoint} data for ${symbol}`);
      }
      this.logger.error({ err, symbol, endpoint }, 'yahoo request failed');
      throw new ScraperError(`Yahoo Finance ${endpoint} failed for ${symbol}: ${message}`, { cause: err });
    }
  }
}

const NON_ITEM_KEYS = new Set(['date', 'TYPE', 'periodType']);

function toPeriods(items: Record<string, unknown>[]): StatementPeriod[] {
  const periods: StatementPeriod[] = [];
  for (const item of items) {
    const endDate = toDate(item.date);
    if (!endDate) continue;

    const values: Record<string, number | null> = {};
    for (const [key, value] of Object.entries(item)) {
      if (NON_ITEM_KEYS.has(key)) continue;
      if (typeof value === 'number') values[key] = value;
      else if (value === null) values[key] = null;
    }
    periods.push({ endDate, items: values });
  }
  periods.sort((a, b) => b.endDate.getTime() - a.endDate.getTime());
  return periods;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'string' || typeof value === 'number') {
    const d = new Date(value);
    return Number.isNaN(d.getTime()) ? null : d;
  }
  return null;
}
