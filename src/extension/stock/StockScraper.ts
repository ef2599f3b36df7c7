/**
 * Stock price scraper
 *
 * Real-time quotes plus daily and intraday OHLCV bars, reshaped into
 * tables. All fetching is delegated to the market data provider.
 */

import { ConfigError } from '../../core/errors.js';
import { fromRecords, type DataTable, type Row } from '../../core/table.js';
import type { Bar, ChartInterval, IMarketDataProvider } from '../market-data/index.js';
import { lastSessions, parseDate, periodStart, sessionCount } from './periods.js';

export const HISTORY_COLUMNS = ['Date', 'Open', 'High', 'Low', 'Close', 'Adj Close', 'Volume'];
export const INTRADAY_COLUMNS = ['Datetime', 'Open', 'High', 'Low', 'Close', 'Adj Close', 'Volume'];

export const INTRADAY_INTERVALS: readonly ChartInterval[] = ['1m', '2m', '5m', '15m', '30m', '60m', '90m', '1h'];

export interface StockScraperOptions {
  provider: IMarketDataProvider;
  /** Injectable clock for testing */
  now?: () => Date;
}

export function normalizeSymbol(symbol: string): string {
  const trimmed = symbol.trim().toUpperCase();
  if (!trimmed) throw new ConfigError('A ticker symbol is required');
  return trimmed;
}

export class StockScraper {
  private provider: IMarketDataProvider;
  private now: () => Date;

  constructor(options: StockScraperOptions) {
    this.provider = options.provider;
    this.now = options.now ?? (() => new Date());
  }

  async getRealTimeQuote(symbol: string): Promise<Row> {
    const q = await this.provider.getQuote(normalizeSymbol(symbol));
    return {
      symbol: q.symbol,
      name: q.name,
      current_price: q.price,
      previous_close: q.previousClose,
      open: q.open,
      day_high: q.dayHigh,
      day_low: q.dayLow,
      volume: q.volume,
      market_cap: q.marketCap,
      fifty_two_week_high: q.fiftyTwoWeekHigh,
      fifty_two_week_low: q.fiftyTwoWeekLow,
      currency: q.currency,
      timestamp: q.time,
    };
  }

  /**
   * Daily bars. An explicit start date takes precedence over `period`;
   * the end date is exclusive and defaults to now. `1d` and `5d` mean the
   * last one or five sessions.
   */
  async getHistoricalData(
    symbol: string,
    startDate?: string,
    endDate?: string,
    period: string = '1y',
  ): Promise<DataTable> {
    const end = endDate ? parseDate(endDate, 'end date') : this.now();
    const start = startDate ? parseDate(startDate, 'start date') : periodStart(period, end);
    if (start.getTime() >= end.getTime()) {
      throw new ConfigError(`Start date must be before end date (${start.toISOString().slice(0, 10)} >= ${end.toISOString().slice(0, 10)})`);
    }

    const fetched = await this.provider.getBars(normalizeSymbol(symbol), {
      period1: start,
      period2: end,
      interval: '1d',
    });
    const sessions = startDate ? undefined : sessionCount(period);
    const bars = sessions ? lastSessions(fetched, sessions) : fetched;

    return fromRecords(
      bars.map((bar) => barRow('Date', bar.time.toISOString().slice(0, 10), bar)),
      HISTORY_COLUMNS,
    );
  }

  async getIntradayData(symbol: string, interval: string = '1m', period: string = '1d'): Promise<DataTable> {
    const chartInterval = INTRADAY_INTERVALS.find((i) => i === interval);
    if (!chartInterval) {
      throw new ConfigError(`Unsupported intraday interval "${interval}", expected one of ${INTRADAY_INTERVALS.join(', ')}`);
    }

    const end = this.now();
    const fetched = await this.provider.getBars(normalizeSymbol(symbol), {
      period1: periodStart(period, end),
      period2: end,
      interval: chartInterval,
    });
    const sessions = sessionCount(period);
    const bars = sessions ? lastSessions(fetched, sessions) : fetched;

    return fromRecords(
      bars.map((bar) => barRow('Datetime', bar.time, bar)),
      INTRADAY_COLUMNS,
    );
  }
}

function barRow(timeColumn: string, time: string | Date, bar: Bar): Row {
  return {
    [timeColumn]: time,
    Open: bar.open,
    High: bar.high,
    Low: bar.low,
    Close: bar.close,
    'Adj Close': bar.adjClose,
    Volume: bar.volume,
  };
}
