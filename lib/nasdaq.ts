import { pRateLimit } from 'p-ratelimit';
import { DataUnavailableError, errorMessage } from './errors';
import { fetchJson, type FetchJsonOptions } from './http';
import { isRecord, parseMoney, readPath, readString } from './parse';
import type { CalendarSource, CatalogEntry } from './types';
import { normalizeTicker } from '../utils/input';

const CALENDAR_URL = 'https://api.nasdaq.com/api/calendar/earnings';

// The API rejects requests without browser-like headers.
const HEADERS: Record<string, string> = {
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  Origin: 'https://www.nasdaq.com',
  Referer: 'https://www.nasdaq.com',
  'User-Agent': 'Mozilla/5.0 (compatible; earnings-overreaction)'
};

export function parseCalendarRows(payload: unknown): CatalogEntry[] {
  const rows = readPath(payload, 'data', 'rows');
  if (rows === null) return [];
  if (!Array.isArray(rows)) {
    throw new Error('Invalid data format received from NASDAQ API');
  }

  const entries: CatalogEntry[] = [];
  rows.forEach((row: unknown) => {
    if (!isRecord(row)) return;
    const symbol = readString(row.symbol);
    if (!symbol) return;
    entries.push({
      symbol: normalizeTicker(symbol),
      companyName: readString(row.name),
      marketCap: parseMoney(row.marketCap),
      epsForecast: parseMoney(row.epsForecast)
    });
  });
  return entries;
}

export class NasdaqCalendar implements CalendarSource {
  // 30 calls per minute, spread evenly
  private readonly limiter = pRateLimit({ interval: 2_000, rate: 1, concurrency: 1 });

  constructor(private readonly http: Pick<FetchJsonOptions, 'fetchImpl' | 'sleep'> = {}) {}

  async getCalendar(date: string): Promise<CatalogEntry[]> {
    try {
      const payload = await fetchJson(CALENDAR_URL, {
        ...this.http,
        params: { date },
        headers: HEADERS,
        throttle: this.limiter
      });
      return parseCalendarRows(payload);
    } catch (error) {
      throw new DataUnavailableError({
        source: 'nasdaq',
        message: `Earnings calendar for ${date} unavailable: ${errorMessage(error)}`,
        cause: error
      });
    }
  }
}
