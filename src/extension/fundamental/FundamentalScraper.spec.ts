import { describe, it, expect } from 'vitest';
import { FakeMarketDataProvider } from '../market-data/testing.js';
import type { StatementPeriod } from '../market-data/index.js';
import { FundamentalScraper, TREND_COLUMNS, statementTable, toPercent } from './FundamentalScraper.js';

const income: StatementPeriod[] = [
  {
    endDate: new Date('2023-09-30T00:00:00Z'),
    items: { totalRevenue: 400, grossProfit: 180, operatingIncome: 120, netIncome: 100 },
  },
  {
    endDate: new Date('2022-09-30T00:00:00Z'),
    items: { totalRevenue: 0, grossProfit: null, netIncome: 50, researchDevelopment: 7 },
  },
];

describe('toPercent', () => {
  it('rounds to two decimals', () => {
    expect(toPercent(0.25314)).toBe(25.31);
    expect(toPercent(null)).toBeNull();
  });
});

describe('statementTable', () => {
  it('pivots line items into rows with one column per period', () => {
    expect(statementTable(income)).toEqual({
      columns: ['Item', '2023-09-30', '2022-09-30'],
      rows: [
        { Item: 'totalRevenue', '2023-09-30': 400, '2022-09-30': 0 },
        { Item: 'grossProfit', '2023-09-30': 180, '2022-09-30': null },
        { Item: 'operatingIncome', '2023-09-30': 120, '2022-09-30': null },
        { Item: 'netIncome', '2023-09-30': 100, '2022-09-30': 50 },
        { Item: 'researchDevelopment', '2023-09-30': null, '2022-09-30': 7 },
      ],
    });
  });
});

describe('FundamentalScraper', () => {
  const provider = new FakeMarketDataProvider({
    statements: { income },
    keyStatistics: {
      marketCap: 1000,
      trailingPE: 25.5,
      forwardPE: 22,
      priceToSales: 6.1,
      profitMargins: 0.2531,
      operatingMargins: 0.3,
      returnOnEquity: 1.5,
    },
  });
  const scraper = new FundamentalScraper(provider);

  it('returns all three statements', async () => {
    const f = await scraper.getFinancials('aapl');
    expect(f.income_statement.columns).toEqual(['Item', '2023-09-30', '2022-09-30']);
    expect(f.balance_sheet).toEqual({ columns: ['Item'], rows: [] });
    expect(f.cash_flow.rows).toEqual([]);
  });

  it('maps valuation ratios', async () => {
    expect(await scraper.getValuationRatios('AAPL')).toEqual({
      symbol: 'AAPL',
      market_cap: 1000,
      enterprise_value: null,
      pe_ratio: 25.5,
      forward_pe: 22,
      peg_ratio: null,
      price_to_book: null,
      price_to_sales: 6.1,
      ev_to_revenue: null,
      ev_to_ebitda: null,
    });
  });

  it('reports margins in percent and other ratios raw', async () => {
    const metrics = await scraper.getKeyMetrics('AAPL');
    expect(metrics.profit_margin).toBe(25.31);
    expect(metrics.operating_margin).toBe(30);
    expect(metrics.return_on_equity).toBe(1.5);
  });

  it('builds the trend oldest first with a net margin', async () => {
    const trend = await scraper.getRevenueProfitTrend('AAPL');
    expect(trend.columns).toEqual(TREND_COLUMNS);
    expect(trend.rows).toEqual([
      {
        Date: '2022-09-30',
        Revenue: 0,
        'Gross Profit': null,
        'Operating Income': null,
        'Net Income': 50,
        'Profit Margin': null,
      },
      {
        Date: '2023-09-30',
        Revenue: 400,
        'Gross Profit': 180,
        'Operating Income': 120,
        'Net Income': 100,
        'Profit Margin': 25,
      },
    ]);
  });
});
