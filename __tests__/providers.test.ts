import { describe, expect, it, vi } from 'vitest';
import { ApiError, DataUnavailableError } from '../lib/errors';
import { FmpEarningsSource, parseEarningsEntry } from '../lib/fmp';
import { fetchJson } from '../lib/http';
import { NasdaqCalendar, parseCalendarRows } from '../lib/nasdaq';
import { parseMoney } from '../lib/parse';
import { YahooMarketData, parseBeta, parseChartCloses, parseQuotePrice, yahooQuota, type YahooClient } from '../lib/yahoo';

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });
const noSleep = vi.fn(async () => undefined);

describe('parseMoney', () => {
  it('reads display money strings', () => {
    expect(parseMoney('$1,234,567')).toBe(1234567);
    expect(parseMoney('$1.43')).toBe(1.43);
    expect(parseMoney('($0.12)')).toBe(-0.12);
    expect(parseMoney('-$0.05')).toBe(-0.05);
    expect(parseMoney('$-0.12')).toBe(-0.12);
    expect(parseMoney('$ -1,250')).toBe(-1250);
    expect(parseMoney(2.5)).toBe(2.5);
  });

  it('returns null for placeholders', () => {
    expect(parseMoney('N/A')).toBeNull();
    expect(parseMoney('')).toBeNull();
    expect(parseMoney(undefined)).toBeNull();
  });
});

describe('fetchJson', () => {
  it('retries a rate-limited request with exponential backoff', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('', { status: 429 }))
      .mockResolvedValueOnce(json({ ok: true }));
    const sleep = vi.fn(async () => undefined);

    await expect(fetchJson('https://example.test/data', { fetchImpl, sleep })).resolves.toEqual({ ok: true });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('retries network failures', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(json([1, 2]));
    await expect(fetchJson('https://example.test/data', { fetchImpl, sleep: noSleep })).resolves.toEqual([1, 2]);
  });

  it('gives up after the last attempt', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('', { status: 503 }));
    await expect(fetchJson('https://example.test/data', { fetchImpl, sleep: noSleep })).rejects.toMatchObject({
      name: 'ApiError',
      status: 503,
      message: 'API Error 503: Service unavailable'
    });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('fails at once on a client error', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('', { status: 401 }));
    await expect(fetchJson('https://example.test/data', { fetchImpl, sleep: noSleep })).rejects.toBeInstanceOf(ApiError);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('appends query parameters', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json({}));
    await fetchJson('https://example.test/data', { fetchImpl, params: { date: '2025-07-15', symbol: 'AAA' } });
    expect(fetchImpl).toHaveBeenCalledWith('https://example.test/data?date=2025-07-15&symbol=AAA', { headers: {} });
  });
});

describe('NASDAQ earnings calendar', () => {
  const payload = {
    data: {
      rows: [
        { symbol: 'aapl ', name: 'Apple Inc.', marketCap: '$3,000,000,000', epsForecast: '$1.43' },
        { symbol: 'XYZ', name: 'Loss Maker', marketCap: 'N/A', epsForecast: '($0.12)' },
        { name: 'Row without a symbol' }
      ]
    }
  };

  it('parses calendar rows into catalog entries', () => {
    expect(parseCalendarRows(payload)).toEqual([
      { symbol: 'AAPL', companyName: 'Apple Inc.', marketCap: 3_000_000_000, epsForecast: 1.43 },
      { symbol: 'XYZ', companyName: 'Loss Maker', marketCap: null, epsForecast: -0.12 }
    ]);
  });

  it('treats a null row list as a day without reports', () => {
    expect(parseCalendarRows({ data: { rows: null } })).toEqual([]);
  });

  it('rejects an unexpected payload', () => {
    expect(() => parseCalendarRows({ data: {} })).toThrow('Invalid data format received from NASDAQ API');
  });

  it('requests the calendar for the report date', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json(payload));
    const entries = await new NasdaqCalendar({ fetchImpl, sleep: noSleep }).getCalendar('2025-07-15');
    expect(entries.map((entry) => entry.symbol)).toEqual(['AAPL', 'XYZ']);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://api.nasdaq.com/api/calendar/earnings?date=2025-07-15');
  });

  it('wraps failures as unavailable data', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('', { status: 403 }));
    await expect(new NasdaqCalendar({ fetchImpl, sleep: noSleep }).getCalendar('2025-07-15')).rejects.toBeInstanceOf(
      DataUnavailableError
    );
  });
});

describe('FMP earnings', () => {
  const history = [
    { symbol: 'AAA', date: '2025-10-30', epsActual: null, epsEstimated: 1.6, revenueActual: null, revenueEstimated: 9e10 },
    { symbol: 'AAA', date: '2025-07-15', epsActual: 1.57, epsEstimated: 1.43, revenueActual: 9.4e10, revenueEstimated: null }
  ];

  it('picks the entry reported on the requested date', () => {
    expect(parseEarningsEntry('AAA', '2025-07-15', history)).toEqual({
      symbol: 'AAA',
      epsActual: 1.57,
      epsEstimated: 1.43,
      revenueActual: 9.4e10,
      revenueEstimated: null
    });
    expect(parseEarningsEntry('AAA', '2025-10-30', history)?.epsActual).toBeNull();
  });

  it('returns null when nothing was reported on the date', () => {
    expect(parseEarningsEntry('AAA', '2025-01-01', history)).toBeNull();
  });

  it('skips symbols whose lookup fails', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async (input) =>
      String(input).includes('symbol=AAA') ? json(history) : new Response('', { status: 404 })
    );
    const log = vi.fn();
    const source = new FmpEarningsSource({ apiKey: 'test-key', http: { fetchImpl, sleep: noSleep } });

    const records = await source.getEarnings('2025-07-15', ['AAA', 'BBB'], log);

    expect(records.map((record) => record.symbol)).toEqual(['AAA']);
    expect(String(fetchImpl.mock.calls[0][0])).toBe(
      'https://financialmodelingprep.com/stable/earnings?symbol=AAA&apikey=test-key'
    );
    expect(log).toHaveBeenCalledWith({
      level: 'warn',
      stage: 'fetch',
      message: 'Earnings lookup failed for BBB: API Error 404: Data not found'
    });
  });

  it('fails when every lookup fails', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('', { status: 401 }));
    const source = new FmpEarningsSource({ apiKey: 'test-key', http: { fetchImpl, sleep: noSleep } });
    await expect(source.getEarnings('2025-07-15', ['AAA'])).rejects.toBeInstanceOf(DataUnavailableError);
  });
});

describe('Yahoo market data', () => {
  const chart = {
    quotes: [
      { date: new Date('2025-07-14T13:30:00Z'), close: 100 },
      { date: new Date('2025-07-15T13:30:00Z'), close: 101 },
      { date: new Date('2025-07-16T13:30:00Z'), close: null }
    ]
  };

  function fakeClient(overrides: Partial<YahooClient> = {}): YahooClient {
    return {
      dailyChart: vi.fn(async () => chart),
      quote: vi.fn(async () => ({ marketState: 'REGULAR', regularMarketPrice: 105 })),
      riskProfile: vi.fn(async () => ({ summaryDetail: { beta: 1.2 } })),
      ...overrides
    };
  }

  it('orders closes most recent first and drops empty sessions', () => {
    expect(parseChartCloses(chart)).toEqual([
      { date: new Date('2025-07-15T13:30:00Z'), close: 101 },
      { date: new Date('2025-07-14T13:30:00Z'), close: 100 }
    ]);
    expect(parseChartCloses({})).toEqual([]);
  });

  it('prefers the post-market price once the session has closed', () => {
    expect(parseQuotePrice({ marketState: 'POST', postMarketPrice: 106, regularMarketPrice: 105 })).toBe(106);
    expect(parseQuotePrice({ marketState: 'REGULAR', postMarketPrice: 106, regularMarketPrice: 105 })).toBe(105);
    expect(parseQuotePrice({ marketState: 'POST', regularMarketPrice: 105 })).toBe(105);
    expect(parseQuotePrice(null)).toBeNull();
  });

  it('reads beta from the summary detail, then key statistics', () => {
    expect(parseBeta({ summaryDetail: { beta: 1.2 } })).toBe(1.2);
    expect(parseBeta({ summaryDetail: {}, defaultKeyStatistics: { beta: 0.8 } })).toBe(0.8);
    expect(parseBeta({})).toBeNull();
  });

  it('serves the latest reference rate observation', async () => {
    const client = fakeClient();
    const now = new Date('2025-07-16T20:00:00Z');
    const yahoo = new YahooMarketData({ client, rateSymbol: '^IRX', rateWindowDays: 10, now: () => now });

    await expect(yahoo.getShortTermRate()).resolves.toBe(101);
    expect(client.dailyChart).toHaveBeenCalledWith('^IRX', new Date('2025-07-06T20:00:00Z'));
  });

  it('fails the reference rate when the window is empty', async () => {
    const yahoo = new YahooMarketData({ client: fakeClient({ dailyChart: async () => ({ quotes: [] }) }) });
    await expect(yahoo.getShortTermRate()).rejects.toBeInstanceOf(DataUnavailableError);
  });

  it('wraps chart failures for a symbol', async () => {
    const yahoo = new YahooMarketData({
      client: fakeClient({
        dailyChart: async () => {
          throw new Error('Not Found');
        }
      })
    });
    await expect(yahoo.getHistoricalCloses('ZZZZ')).rejects.toMatchObject({
      name: 'DataUnavailableError',
      symbol: 'ZZZZ',
      message: 'Price history unavailable for ZZZZ: Not Found'
    });
  });

  it('spaces requests to honour fractional request rates', () => {
    expect(yahooQuota(0.5)).toEqual({ interval: 2000, rate: 1, concurrency: 1 });
    expect(yahooQuota(4)).toEqual({ interval: 250, rate: 1, concurrency: 1 });
  });

  it('reads quote and beta through the client', async () => {
    const yahoo = new YahooMarketData({ client: fakeClient() });
    await expect(yahoo.getCurrentQuote('AAA')).resolves.toBe(105);
    await expect(yahoo.getBeta('AAA')).resolves.toBe(1.2);
  });
});
