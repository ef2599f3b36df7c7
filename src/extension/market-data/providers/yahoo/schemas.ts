/**
 * Shapes of the yahoo-finance2 results we read.
 *
 * yahoo-finance2 already unwraps Yahoo's `{ raw, fmt }` numbers and turns
 * epoch fields into Date objects; these schemas only pin down the fields
 * the scrapers use and tolerate everything else being absent.
 */

import { z } from 'zod';

const num = z.number().nullable().optional();
const date = z.coerce.date().nullable().optional();

export const quoteSchema = z.object({
  symbol: z.string(),
  shortName: z.string().nullable().optional(),
  longName: z.string().nullable().optional(),
  currency: z.string().nullable().optional(),
  regularMarketPrice: num,
  regularMarketPreviousClose: num,
  regularMarketOpen: num,
  regularMarketDayHigh: num,
  regularMarketDayLow: num,
  regularMarketVolume: num,
  regularMarketTime: date,
  marketCap: num,
  fiftyTwoWeekHigh: num,
  fiftyTwoWeekLow: num,
});

export const chartSchema = z.object({
  quotes: z.array(
    z.object({
      date: z.coerce.date(),
      open: num,
      high: num,
      low: num,
      close: num,
      adjclose: num,
      volume: num,
    }),
  ),
});

const statementItem = z.record(z.string(), z.unknown());

export const keyStatisticsSchema = z.object({
  summaryDetail: z
    .object({
      marketCap: num,
      trailingPE: num,
      forwardPE: num,
      priceToSalesTrailing12Months: num,
    })
    .optional(),
  defaultKeyStatistics: z
    .object({
      enterpriseValue: num,
      forwardPE: num,
      pegRatio: num,
      priceToBook: num,
      enterpriseToRevenue: num,
      enterpriseToEbitda: num,
      netIncomeToCommon: num,
      sharesShort: num,
      sharesShortPriorMonth: num,
      shortRatio: num,
      shortPercentOfFloat: num,
      dateShortInterest: date,
      sharesOutstanding: num,
      floatShares: num,
    })
    .optional(),
  financialData: z
    .object({
      totalRevenue: num,
      grossProfits: num,
      ebitda: num,
      profitMargins: num,
      operatingMargins: num,
      returnOnEquity: num,
      returnOnAssets: num,
      revenueGrowth: num,
      earningsGrowth: num,
      debtToEquity: num,
      currentRatio: num,
      totalCash: num,
      totalDebt: num,
      freeCashflow: num,
    })
    .optional(),
});

/** One fundamentalsTimeSeries row per fiscal year, keyed by `date`. */
export const statementsSchema = z.array(statementItem);

export const ownershipSchema = z.object({
  institutionOwnership: z
    .object({
      ownershipList: z
        .array(
          z.object({
            organization: z.string(),
            reportDate: date,
            pctHeld: num,
            position: num,
            value: num,
          }),
        )
        .default([]),
    })
    .optional(),
});
