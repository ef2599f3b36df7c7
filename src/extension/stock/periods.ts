import { ConfigError } from '../../core/errors.js';

export const PERIODS = ['1d', '5d', '1mo', '3mo', '6mo', '1y', '2y', '5y', '10y', 'ytd', 'max'] as const;

export type Period = (typeof PERIODS)[number];

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isPeriod(value: string): value is Period {
  return PERIODS.some((period) => period === value);
}

/**
 * Parse a `YYYY-MM-DD` date as UTC midnight.
 * Rejects impossible dates such as 2024-02-30.
 */
export function parseDate(value: string, label = 'date'): Date {
  if (!DATE_RE.test(value)) {
    throw new ConfigError(`Invalid ${label} "${value}", expected YYYY-MM-DD`);
  }
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    throw new ConfigError(`Invalid ${label} "${value}", expected YYYY-MM-DD`);
  }
  return date;
}

/**
 * `1d` and `5d` count trading sessions, not calendar days. The fetch window
 * reaches back far enough to cover that many sessions across weekends and
 * holidays; `lastSessions` then trims the surplus.
 */
const SESSION_LOOKBACK_DAYS: Partial<Record<Period, number>> = { '1d': 7, '5d': 12 };
const SESSION_COUNTS: Partial<Record<Period, number>> = { '1d': 1, '5d': 5 };

/** Number of sessions a period covers, or undefined for calendar periods. */
export function sessionCount(period: string): number | undefined {
  return isPeriod(period) ? SESSION_COUNTS[period] : undefined;
}

/** Same day-of-month `months` earlier, clamped to the end of a shorter month. */
export function monthsBefore(date: Date, months: number): Date {
  const result = new Date(date.getTime());
  result.setUTCDate(1);
  result.setUTCMonth(result.getUTCMonth() - months);
  const lastDay = new Date(Date.UTC(result.getUTCFullYear(), result.getUTCMonth() + 1, 0)).getUTCDate();
  result.setUTCDate(Math.min(date.getUTCDate(), lastDay));
  return result;
}

/** Start of the window to fetch for `period` ending at `end`. */
export function periodStart(period: string, end: Date): Date {
  if (!isPeriod(period)) {
    throw new ConfigError(`Unknown period "${period}", expected one of ${PERIODS.join(', ')}`);
  }

  switch (period) {
    case '1d':
    case '5d': {
      const start = new Date(end.getTime());
      start.setUTCDate(start.getUTCDate() - (SESSION_LOOKBACK_DAYS[period] ?? 0));
      return start;
    }
    case '1mo':
      return monthsBefore(end, 1);
    case '3mo':
      return monthsBefore(end, 3);
    case '6mo':
      return monthsBefore(end, 6);
    case '1y':
      return monthsBefore(end, 12);
    case '2y':
      return monthsBefore(end, 24);
    case '5y':
      return monthsBefore(end, 60);
    case '10y':
      return monthsBefore(end, 120);
    case 'ytd':
      return new Date(Date.UTC(end.getUTCFullYear(), 0, 1));
    case 'max':
      return new Date(0);
  }
}

/** Keep the bars of the last `count` distinct (UTC) session dates. Bars must be sorted by time. */
export function lastSessions<T extends { time: Date }>(bars: T[], count: number): T[] {
  const sessions: string[] = [];
  for (const bar of bars) {
    const day = bar.time.toISOString().slice(0, 10);
    if (sessions[sessions.length - 1] !== day) sessions.push(day);
  }
  const keep = new Set(sessions.slice(-count));
  return bars.filter((bar) => keep.has(bar.time.toISOString().slice(0, 10)));
}
