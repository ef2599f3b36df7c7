/**
 * Company news and SEC filings
 *
 * - News: Yahoo Finance headline RSS feed (`?s=<symbol>`)
 * - Filings: EDGAR company browse page in Atom form
 *
 * EDGAR rejects anonymous clients, so filing requests carry the configured
 * SEC user agent instead of the generic one.
 */

import { z } from 'zod';
import type { HttpClient } from '../../core/http.js';
import { silentLogger, type Logger } from '../../core/logger.js';
import { fromRecords, type DataTable } from '../../core/table.js';
import { parseResponse } from '../../core/validate.js';
import { normalizeSymbol } from '../stock/index.js';
import { htmlToText, parseFeed, textOf, xmlText } from './xml.js';

export const NEWS_COLUMNS = ['title', 'link', 'published_date', 'summary', 'source'];
export const FILING_COLUMNS = ['filing_type', 'title', 'published', 'link', 'summary'];

/** Page sizes the EDGAR browse endpoint accepts. */
const EDGAR_PAGE_SIZES = [10, 20, 40, 80, 100];

export interface NewsScraperOptions {
  http: HttpClient;
  feedUrl?: string;
  region?: string;
  lang?: string;
  secBaseUrl?: string;
  secUserAgent: string;
  logger?: Logger;
}

// ==================== Feed schemas ====================

const rssSchema = z.object({
  rss: z
    .object({
      channel: z
        .object({
          title: xmlText,
          item: z
            .array(
              z.object({
                title: xmlText,
                link: xmlText,
                description: xmlText,
                pubDate: xmlText,
                source: xmlText,
              }),
            )
            .default([]),
        })
        .optional(),
    })
    .optional(),
});

const atomSchema = z.object({
  feed: z
    .object({
      entry: z
        .array(
          z.object({
            title: xmlText,
            updated: xmlText,
            summary: xmlText,
            link: z.object({ '@_href': z.string().optional() }).optional(),
            category: z.object({ '@_term': z.string().optional() }).optional(),
            content: z.object({ 'filing-type': xmlText }).optional(),
          }),
        )
        .default([]),
    })
    .optional(),
});

export function edgarPageSize(limit: number): number {
  return EDGAR_PAGE_SIZES.find((size) => size >= limit) ?? EDGAR_PAGE_SIZES[EDGAR_PAGE_SIZES.length - 1];
}

function parsePubDate(value: string | null): Date | string | null {
  if (value === null) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date;
}

// ==================== Scraper ====================

export class NewsScraper {
  private http: HttpClient;
  private feedUrl: string;
  private region: string;
  private lang: string;
  private secBaseUrl: string;
  private secUserAgent: string;
  private logger: Logger;

  constructor(options: NewsScraperOptions) {
    this.http = options.http;
    this.feedUrl = options.feedUrl ?? 'https://feeds.finance.yahoo.com/rss/2.0/headline';
    this.region = options.region ?? 'US';
    this.lang = options.lang ?? 'en-US';
    this.secBaseUrl = (options.secBaseUrl ?? 'https://www.sec.gov').replace(/\/$/, '');
    this.secUserAgent = options.secUserAgent;
    this.logger = options.logger ?? silentLogger;
  }

  async getCompanyNews(symbol: string, limit: number = 20): Promise<DataTable> {
    const ticker = normalizeSymbol(symbol);
    const xml = await this.http.getText(this.feedUrl, { s: ticker, region: this.region, lang: this.lang });
    const { rss } = parseResponse(rssSchema, parseFeed(xml, 'news feed'), 'news feed');

    const channel = rss?.channel;
    if (!channel) {
      this.logger.warn({ symbol: ticker }, 'news feed has no channel');
      return fromRecords([], NEWS_COLUMNS);
    }

    const channelTitle = textOf(channel.title);
    const rows = channel.item.slice(0, Math.max(0, limit)).map((item) => ({
      title: textOf(item.title),
      link: textOf(item.link),
      published_date: parsePubDate(textOf(item.pubDate)),
      summary: htmlToText(textOf(item.description)),
      source: textOf(item.source) ?? channelTitle,
    }));

    return fromRecords(rows, NEWS_COLUMNS);
  }

  async getSecFilings(symbol: string, filingType?: string, limit: number = 20): Promise<DataTable> {
    const ticker = normalizeSymbol(symbol);
    const xml = await this.http.getText(
      `${this.secBaseUrl}/cgi-bin/browse-edgar`,
      {
        action: 'getcompany',
        CIK: ticker,
        type: filingType?.trim() || undefined,
        dateb: '',
        owner: 'include',
        count: edgarPageSize(limit),
        output: 'atom',
      },
      { 'User-Agent': this.secUserAgent, Accept: 'application/atom+xml' },
    );
    const { feed } = parseResponse(atomSchema, parseFeed(xml, 'EDGAR feed'), 'EDGAR feed');

    if (!feed) {
      // EDGAR answers unknown tickers with an HTML page rather than an error
      this.logger.warn({ symbol: ticker }, 'EDGAR returned no feed');
      return fromRecords([], FILING_COLUMNS);
    }

    const rows = feed.entry.slice(0, Math.max(0, limit)).map((entry) => ({
      filing_type: entry.category?.['@_term'] ?? textOf(entry.content?.['filing-type']),
      title: textOf(entry.title),
      published: textOf(entry.updated),
      link: entry.link?.['@_href'] ?? null,
      summary: htmlToText(textOf(entry.summary)),
    }));

    return fromRecords(rows, FILING_COLUMNS);
  }
}
