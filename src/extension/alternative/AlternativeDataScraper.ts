/**
 * Alternative data: short interest and institutional ownership.
 */

import { fromRecords, type DataTable, type Row } from '../../core/table.js';
import type { IMarketDataProvider } from '../market-data/index.js';
import { normalizeSymbol } from '../stock/index.js';

export const HOLDER_COLUMNS = ['Holder', 'Shares', 'Date Reported', '% Out', 'Value'];

export class AlternativeDataScraper {
  constructor(private provider: IMarketDataProvider) {}

  async getShortInterest(symbol: string): Promise<Row> {
    const s = await this.provider.getKeyStatistics(normalizeSymbol(symbol));
    return {
      symbol: s.symbol,
      shares_short: s.sharesShort,
      shares_short_prior_month: s.sharesShortPriorMonth,
      short_ratio: s.shortRatio,
      short_percent_of_float: s.shortPercentOfFloat,
      date_short_interest: s.dateShortInterest,
      shares_outstanding: s.sharesOutstanding,
      float_shares: s.floatShares,
    };
  }

  /** Largest holders first. */
  async getInstitutionalHoldings(symbol: string): Promise<DataTable> {
    const holders = await this.provider.getInstitutionalHolders(normalizeSymbol(symbol));

    const rows = [...holders]
      .sort((a, b) => (b.position ?? 0) - (a.position ?? 0))
      .map((h) => ({
        Holder: h.organization,
        Shares: h.position,
        'Date Reported': h.reportDate,
        '% Out': h.pctHeld,
        Value: h.value,
      }));

    return fromRecords(rows, HOLDER_COLUMNS);
  }
}
