/**
 * Company fundamentals
 *
 * Financial statements, valuation ratios, key metrics and the
 * revenue/profit trend, all derived from the market data provider.
 */

import { fromRecords, type DataTable, type Row } from '../../core/table.js';
import type { IMarketDataProvider, StatementPeriod } from '../market-data/index.js';
import { normalizeSymbol } from '../stock/index.js';

export const TREND_COLUMNS = ['Date', 'Revenue', 'Gross Profit', 'Operating Income', 'Net Income', 'Profit Margin'];

export interface Financials {
  income_statement: DataTable;
  balance_sheet: DataTable;
  cash_flow: DataTable;
}

/** Fraction → percent, two decimals. 0.2531 → 25.31 */
export function toPercent(ratio: number | null): number | null {
  if (ratio === null) return null;
  return Math.round(ratio * 10_000) / 100;
}

/**
 * Pivot periods into a statement table: one row per line item, one
 * column per period end date (most recent first).
 */
export function statementTable(periods: StatementPeriod[]): DataTable {
  const dates = periods.map((p) => p.endDate.toISOString().slice(0, 10));
  const items: string[] = [];
  const seen = new Set<string>();
  for (const period of periods) {
    for (const item of Object.keys(period.items)) {
      if (!seen.has(item)) {
        seen.add(item);
        items.push(item);
      }
    }
  }

  const rows = items.map((item) => {
    const row: Row = { Item: item };
    periods.forEach((period, i) => {
      row[dates[i]] = period.items[item] ?? null;
    });
    return row;
  });
  return fromRecords(rows, ['Item', ...dates]);
}

export class FundamentalScraper {
  constructor(private provider: IMarketDataProvider) {}

  async getFinancials(symbol: string): Promise<Financials> {
    const statements = await this.provider.getStatements(normalizeSymbol(symbol));
    return {
      income_statement: statementTable(statements.income),
      balance_sheet: statementTable(statements.balance),
      cash_flow: statementTable(statements.cashflow),
    };
  }

  async getValuationRatios(symbol: string): Promise<Row> {
    const s = await this.provider.getKeyStatistics(normalizeSymbol(symbol));
    return {
      symbol: s.symbol,
      market_cap: s.marketCap,
      enterprise_value: s.enterpriseValue,
      pe_ratio: s.trailingPE,
      forward_pe: s.forwardPE,
      peg_ratio: s.pegRatio,
      price_to_book: s.priceToBook,
      price_to_sales: s.priceToSales,
      ev_to_revenue: s.enterpriseToRevenue,
      ev_to_ebitda: s.enterpriseToEbitda,
    };
  }

  /** Margins are reported in percent; the other ratios stay as fractions. */
  async getKeyMetrics(symbol: string): Promise<Row> {
    const s = await this.provider.getKeyStatistics(normalizeSymbol(symbol));
    return {
      symbol: s.symbol,
      revenue: s.totalRevenue,
      gross_profit: s.grossProfits,
      ebitda: s.ebitda,
      net_income: s.netIncome,
      profit_margin: toPercent(s.profitMargins),
      operating_margin: toPercent(s.operatingMargins),
      return_on_equity: s.returnOnEquity,
      return_on_assets: s.returnOnAssets,
      revenue_growth: s.revenueGrowth,
      earnings_growth: s.earningsGrowth,
      debt_to_equity: s.debtToEquity,
      current_ratio: s.currentRatio,
      total_cash: s.totalCash,
      total_debt: s.totalDebt,
      free_cash_flow: s.freeCashflow,
    };
  }

  /** Yearly revenue and profit, oldest first. */
  async getRevenueProfitTrend(symbol: string): Promise<DataTable> {
    const { income } = await this.provider.getStatements(normalizeSymbol(symbol));

    const rows = [...income]
      .sort((a, b) => a.endDate.getTime() - b.endDate.getTime())
      .map((period) => {
        const revenue = period.items.totalRevenue ?? null;
        const netIncome = period.items.netIncome ?? null;
        const margin = revenue && netIncome !== null ? toPercent(netIncome / revenue) : null;
        return {
          Date: period.endDate.toISOString().slice(0, 10),
          Revenue: revenue,
          'Gross Profit': period.items.grossProfit ?? null,
          'Operating Income': period.items.operatingIncome ?? null,
          'Net Income': netIncome,
          'Profit Margin': margin,
        };
      });

    return fromRecords(rows, TREND_COLUMNS);
  }
}
