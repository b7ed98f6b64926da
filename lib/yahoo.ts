import YahooFinance from 'yahoo-finance2';
import { pRateLimit } from 'p-ratelimit';
import { DataUnavailableError, errorMessage } from './errors';
import type { Throttle } from './http';
import { isRecord, readNumber, readPath, readString } from './parse';
import type { PricePoint, PriceSource, ProfileSource, RateSource } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

/** The subset of yahoo-finance2 this module calls, with results left untyped for narrowing. */
export interface YahooClient {
  dailyChart(symbol: string, period1: Date): Promise<unknown>;
  quote(symbol: string): Promise<unknown>;
  riskProfile(symbol: string): Promise<unknown>;
}

export function createYahooClient(): YahooClient {
  const yahoo = new YahooFinance();
  return {
    dailyChart: (symbol, period1) => yahoo.chart(symbol, { period1, interval: '1d' }),
    quote: (symbol) => yahoo.quote(symbol),
    riskProfile: (symbol) => yahoo.quoteSummary(symbol, { modules: ['summaryDetail', 'defaultKeyStatistics'] })
  };
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

/** Chart quotes to closes, most recent first. Sessions without a close are dropped. */
/** One request every `1000 / maxQps` ms, so fractional rates such as 0.5 are honoured. */
export function yahooQuota(maxQps: number) {
  return { interval: 1000 / maxQps, rate: 1, concurrency: 1 };
}

export function parseChartCloses(result: unknown): PricePoint[] {
  const quotes = readPath(result, 'quotes');
  if (!Array.isArray(quotes)) return [];
  const points: PricePoint[] = [];
  quotes.forEach((quote: unknown) => {
    if (!isRecord(quote)) return;
    const date = toDate(quote.date);
    const close = readNumber(quote.close);
    if (date && close !== null) {
      points.push({ date, close });
    }
  });
  return points.sort((a, b) => b.date.getTime() - a.date.getTime());
}

export function parseQuotePrice(result: unknown): number | null {
  if (!isRecord(result)) return null;
  const marketState = readString(result.marketState);
  const postMarket = readNumber(result.postMarketPrice);
  if (postMarket !== null && (marketState === 'POST' || marketState === 'POSTPOST' || marketState === 'CLOSED')) {
    return postMarket;
  }
  return readNumber(result.regularMarketPrice);
}

export function parseBeta(result: unknown): number | null {
  return readNumber(readPath(result, 'summaryDetail', 'beta')) ?? readNumber(readPath(result, 'defaultKeyStatistics', 'beta'));
}

export interface YahooMarketDataOptions {
  client?: YahooClient;
  maxQps?: number;
  historyDays?: number;
  rateSymbol?: string;
  rateWindowDays?: number;
  now?: () => Date;
}

export class YahooMarketData implements PriceSource, ProfileSource, RateSource {
  private readonly client: YahooClient;
  private readonly throttled: Throttle;
  private readonly historyDays: number;
  private readonly rateSymbol: string;
  private readonly rateWindowDays: number;
  private readonly now: () => Date;

  constructor(options: YahooMarketDataOptions = {}) {
    this.client = options.client ?? createYahooClient();
    this.throttled = pRateLimit(yahooQuota(options.maxQps ?? 1));
    this.historyDays = options.historyDays ?? 400;
    this.rateSymbol = options.rateSymbol ?? '^IRX';
    this.rateWindowDays = options.rateWindowDays ?? 10;
    this.now = options.now ?? (() => new Date());
  }

  private daysAgo(days: number): Date {
    return new Date(this.now().getTime() - days * DAY_MS);
  }

  private async closesSince(symbol: string, days: number): Promise<PricePoint[]> {
    try {
      const result = await this.throttled(() => this.client.dailyChart(symbol, this.daysAgo(days)));
      return parseChartCloses(result);
    } catch (error) {
      throw new DataUnavailableError({
        source: 'yahoo',
        symbol,
        message: `Price history unavailable for ${symbol}: ${errorMessage(error)}`,
        cause: error
      });
    }
  }

  async getHistoricalCloses(symbol: string): Promise<PricePoint[]> {
    const closes = await this.closesSince(symbol, this.historyDays);
    if (!closes.length) {
      throw new DataUnavailableError({ source: 'yahoo', symbol, message: `No price history returned for ${symbol}` });
    }
    return closes;
  }

  async getCurrentQuote(symbol: string): Promise<number | null> {
    const result = await this.throttled(() => this.client.quote(symbol));
    return parseQuotePrice(result);
  }

  async getBeta(symbol: string): Promise<number | null> {
    const result = await this.throttled(() => this.client.riskProfile(symbol));
    return parseBeta(result);
  }

  async getShortTermRate(): Promise<number> {
    const closes = await this.closesSince(this.rateSymbol, this.rateWindowDays);
    const latest = closes[0];
    if (!latest) {
      throw new DataUnavailableError({
        source: 'yahoo',
        symbol: this.rateSymbol,
        message: `No ${this.rateSymbol} observation in the last ${this.rateWindowDays} days`
      });
    }
    return latest.close;
  }
}
