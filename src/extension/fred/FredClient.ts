/**
 * FRED (Federal Reserve Economic Data) client
 *
 * Thin wrapper over the FRED REST API:
 * - /fred/series/observations      → one series as date/value rows
 * - /fred/series/search            → series matching free text
 * - /fred/series                   → series metadata
 * - /fred/v2/release/observations  → every series of a release, cursor paginated
 *
 * FRED marks missing observations with "."; those become null.
 */

import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import type { HttpClient, QueryParams } from '../../core/http.js';
import { silentLogger, type Logger } from '../../core/logger.js';
import { parseResponse } from '../../core/validate.js';
import { emptyTable, fromRecord, fromRecords, type DataTable, type Row } from '../../core/table.js';

export const SERIES_COLUMNS = ['date', 'value', 'series_id'];
export const SEARCH_COLUMNS = [
  'id',
  'title',
  'frequency',
  'units',
  'seasonal_adjustment',
  'observation_start',
  'observation_end',
  'popularity',
  'last_updated',
];
export const RELEASE_COLUMNS = ['series_id', 'title', 'date', 'value'];

export interface FredClientOptions {
  http: HttpClient;
  apiKey?: string;
  baseUrl?: string;
  searchLimit?: number;
  logger?: Logger;
}

export interface ReleaseObservationsOptions {
  limit?: number;
  nextCursor?: string;
}

export interface ReleaseObservationsPage {
  table: DataTable;
  /** Pass back as `nextCursor` to fetch the following page. */
  nextCursor: string | null;
  hasMore: boolean;
}

// ==================== Response schemas ====================

const rawValue = z.union([z.string(), z.number()]).nullable().optional();

const observationsSchema = z.object({
  observations: z.array(z.object({ date: z.string(), value: rawValue })),
});

const seriesMetaSchema = z.object({
  id: z.string(),
  title: z.string(),
  frequency: z.string().optional(),
  units: z.string().optional(),
  seasonal_adjustment: z.string().optional(),
  observation_start: z.string().optional(),
  observation_end: z.string().optional(),
  popularity: z.number().optional(),
  last_updated: z.string().optional(),
  notes: z.string().optional(),
});

const seriesListSchema = z.object({
  seriess: z.array(seriesMetaSchema),
});

const releaseObservationsSchema = z.object({
  has_more: z.boolean().optional(),
  next_cursor: z.string().nullable().optional(),
  series: z
    .array(
      z.object({
        series_id: z.string(),
        title: z.string().optional(),
        observations: z.array(z.object({ date: z.string(), value: rawValue })).default([]),
      }),
    )
    .default([]),
});

export function parseObservationValue(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === '.') return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

// ==================== Client ====================

export class FredClient {
  private http: HttpClient;
  private apiKey: string | undefined;
  private baseUrl: string;
  private searchLimit: number;
  private logger: Logger;

  constructor(options: FredClientOptions) {
    this.http = options.http;
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.stlouisfed.org').replace(/\/$/, '');
    this.searchLimit = options.searchLimit ?? 20;
    this.logger = options.logger ?? silentLogger;
  }

  async getSeries(seriesId: string, startDate?: string, endDate?: string): Promise<DataTable> {
    const raw = await this.request('/fred/series/observations', {
      series_id: seriesId,
      observation_start: startDate,
      observation_end: endDate,
    });
    const { observations } = parseResponse(observationsSchema, raw, 'FRED series/observations');

    return fromRecords(
      observations.map((o) => ({
        date: o.date,
        value: parseObservationValue(o.value),
        series_id: seriesId,
      })),
      SERIES_COLUMNS,
    );
  }

  async searchSeries(text: string, limit: number = this.searchLimit): Promise<DataTable> {
    const raw = await this.request('/fred/series/search', {
      search_text: text,
      limit,
      order_by: 'popularity',
      sort_order: 'desc',
    });
    const { seriess } = parseResponse(seriesListSchema, raw, 'FRED series/search');

    return fromRecords(seriess.map(metaRow), SEARCH_COLUMNS);
  }

  async getSeriesInfo(seriesId: string): Promise<DataTable> {
    const raw = await this.request('/fred/series', { series_id: seriesId });
    const { seriess } = parseResponse(seriesListSchema, raw, 'FRED series');
    const meta = seriess[0];
    if (!meta) return emptyTable(SEARCH_COLUMNS);

    return fromRecord({ ...metaRow(meta), notes: meta.notes ?? null });
  }

  /**
   * One page of observations for every series in a release. The cursor
   * FRED hands back is passed through untouched.
   */
  async getReleaseObservations(
    releaseId: number,
    options: ReleaseObservationsOptions = {},
  ): Promise<ReleaseObservationsPage> {
    const key = this.requireKey();
    const raw = await this.http.getJson(
      `${this.baseUrl}/fred/v2/release/observations`,
      {
        release_id: releaseId,
        limit: options.limit,
        next_cursor: options.nextCursor,
        format: 'json',
      },
      { Authorization: `Bearer ${key}` },
    );
    const page = parseResponse(releaseObservationsSchema, raw, 'FRED v2/release/observations');

    const rows: Row[] = [];
    for (const series of page.series) {
      for (const o of series.observations) {
        rows.push({
          series_id: series.series_id,
          title: series.title ?? null,
          date: o.date,
          value: parseObservationValue(o.value),
        });
      }
    }

    const nextCursor = page.next_cursor ? page.next_cursor : null;
    return {
      table: fromRecords(rows, RELEASE_COLUMNS),
      nextCursor,
      hasMore: page.has_more ?? nextCursor !== null,
    };
  }

  // ==================== Internals ====================

  private requireKey(): string {
    if (!this.apiKey) {
      throw new ConfigError('FRED_API_KEY is not set. Get a free key at https://fred.stlouisfed.org/docs/api/api_key.html');
    }
    return this.apiKey;
  }

  private request(path: string, params: QueryParams): Promise<unknown> {
    const key = this.requireKey();
    this.logger.debug({ path }, 'fred request');
    return this.http.getJson(`${this.baseUrl}${path}`, { ...params, api_key: key, file_type: 'json' });
  }
}

function metaRow(meta: z.infer<typeof seriesMetaSchema>): Row {
  return {
    id: meta.id,
    title: meta.title,
    frequency: meta.frequency ?? null,
    units: meta.units ?? null,
    seasonal_adjustment: meta.seasonal_adjustment ?? null,
    observation_start: meta.observation_start ?? null,
    observation_end: meta.observation_end ?? null,
    popularity: meta.popularity ?? null,
    last_updated: meta.last_updated ?? null,
  };
}
