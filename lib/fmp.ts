import { pRateLimit } from 'p-ratelimit';
import { DataUnavailableError, errorMessage } from './errors';
import { fetchJson, type FetchJsonOptions } from './http';
import { isRecord, readNumber, readString } from './parse';
import type { EarningsRecord, EarningsSource, LogSink } from './types';

const EARNINGS_URL = 'https://financialmodelingprep.com/stable/earnings';

export function parseEarningsEntry(symbol: string, date: string, payload: unknown): EarningsRecord | null {
  if (!Array.isArray(payload)) {
    throw new Error(`Invalid earnings payload for ${symbol}`);
  }
  const entry = payload.find((item: unknown) => isRecord(item) && readString(item.date) === date);
  if (!isRecord(entry)) return null;
  return Object.freeze({
    symbol,
    epsActual: readNumber(entry.epsActual),
    epsEstimated: readNumber(entry.epsEstimated),
    revenueActual: readNumber(entry.revenueActual),
    revenueEstimated: readNumber(entry.revenueEstimated)
  });
}

export interface FmpEarningsOptions {
  apiKey: string;
  http?: Pick<FetchJsonOptions, 'fetchImpl' | 'sleep'>;
}

export class FmpEarningsSource implements EarningsSource {
  // 10 calls per 3 seconds
  private readonly limiter = pRateLimit({ interval: 3_000, rate: 10, concurrency: 1 });

  constructor(private readonly options: FmpEarningsOptions) {}

  async getEarningsForSymbol(symbol: string, date: string): Promise<EarningsRecord | null> {
    const payload = await fetchJson(EARNINGS_URL, {
      ...this.options.http,
      params: { symbol, apikey: this.options.apiKey },
      throttle: this.limiter,
      attempts: 3,
      backoffMs: 1000
    });
    return parseEarningsEntry(symbol, date, payload);
  }

  /**
   * Records reported on `date`. A symbol whose lookup fails is logged and
   * left out; the call fails only when every lookup fails.
   */
  async getEarnings(date: string, symbols: string[], log?: LogSink): Promise<EarningsRecord[]> {
    const records: EarningsRecord[] = [];
    let failures = 0;
    let lastError: unknown = null;

    for (const symbol of symbols) {
      try {
        const record = await this.getEarningsForSymbol(symbol, date);
        if (record) records.push(record);
      } catch (error) {
        failures += 1;
        lastError = error;
        log?.({
          level: 'warn',
          stage: 'fetch',
          message: `Earnings lookup failed for ${symbol}: ${errorMessage(error)}`
        });
      }
    }

    if (symbols.length > 0 && failures === symbols.length) {
      throw new DataUnavailableError({
        source: 'fmp',
        message: `Earnings unavailable for all ${symbols.length} symbol(s): ${errorMessage(lastError)}`,
        cause: lastError
      });
    }
    return records;
  }
}
