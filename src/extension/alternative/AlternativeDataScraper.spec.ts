import { describe, it, expect } from 'vitest';
import { FakeMarketDataProvider } from '../market-data/testing.js';
import { AlternativeDataScraper, HOLDER_COLUMNS } from './AlternativeDataScraper.js';

const reported = new Date('2024-03-31T00:00:00Z');

const provider = new FakeMarketDataProvider({
  keyStatistics: {
    sharesShort: 120,
    sharesShortPriorMonth: 100,
    shortRatio: 1.4,
    shortPercentOfFloat: 0.007,
    dateShortInterest: reported,
    sharesOutstanding: 15_000,
    floatShares: 14_900,
  },
  holders: [
    { organization: 'Small Fund', position: 10, reportDate: reported, pctHeld: 0.001, value: 1900 },
    { organization: 'Unknown Size', position: null, reportDate: null, pctHeld: null, value: null },
    { organization: 'Big Fund', position: 500, reportDate: reported, pctHeld: 0.08, value: 95_000 },
  ],
});
const scraper = new AlternativeDataScraper(provider);

describe('AlternativeDataScraper', () => {
  it('reports short interest', async () => {
    expect(await scraper.getShortInterest('gme')).toEqual({
      symbol: 'GME',
      shares_short: 120,
      shares_short_prior_month: 100,
      short_ratio: 1.4,
      short_percent_of_float: 0.007,
      date_short_interest: reported,
      shares_outstanding: 15_000,
      float_shares: 14_900,
    });
  });

  it('lists holders largest first, unknown sizes last', async () => {
    const table = await scraper.getInstitutionalHoldings('GME');
    expect(table.columns).toEqual(HOLDER_COLUMNS);
    expect(table.rows.map((r) => r.Holder)).toEqual(['Big Fund', 'Small Fund', 'Unknown Size']);
    expect(table.rows[0]).toEqual({
      Holder: 'Big Fund',
      Shares: 500,
      'Date Reported': reported,
      '% Out': 0.08,
      Value: 95_000,
    });
  });
});
