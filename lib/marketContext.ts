import { calculatePriceChange } from './calculations';
import { CriticalContextError, errorMessage } from './errors';
import type { LogSink, MarketContext, PricePoint, RateSource } from './types';

export interface MarketContextSources {
  getMarketCloses: () => Promise<PricePoint[]>;
  rates: RateSource;
}

export interface MarketContextOptions {
  riskFreeFallback: number;
  log?: LogSink;
}

/**
 * Builds the read-only market context shared by every symbol in a run.
 *
 * A missing market return is fatal for the run. A missing risk-free rate is
 * replaced by `riskFreeFallback` and reported through `riskFreeRateSource`.
 */
export async function buildMarketContext(
  sources: MarketContextSources,
  options: MarketContextOptions
): Promise<MarketContext> {
  let closes: PricePoint[];
  try {
    closes = await sources.getMarketCloses();
  } catch (error) {
    throw new CriticalContextError('market return', `Market proxy history unavailable: ${errorMessage(error)}`, error);
  }

  if (closes.length < 2) {
    throw new CriticalContextError(
      'market return',
      `Market proxy history has ${closes.length} point(s); at least 2 are required`
    );
  }

  const marketReturn = calculatePriceChange(closes[0].close, closes[1].close);
  if (marketReturn === null) {
    throw new CriticalContextError('market return', 'Market return could not be computed from the latest closes');
  }

  let riskFreeRate: number;
  let riskFreeRateSource: MarketContext['riskFreeRateSource'] = 'fetched';
  try {
    riskFreeRate = await sources.rates.getShortTermRate();
  } catch (error) {
    riskFreeRate = options.riskFreeFallback;
    riskFreeRateSource = 'fallback';
    options.log?.({
      level: 'warn',
      stage: 'context',
      message: `Risk-free rate unavailable (${errorMessage(error)}); using fallback ${options.riskFreeFallback}%`
    });
  }

  options.log?.({
    level: 'info',
    stage: 'context',
    message: `Market return ${marketReturn.toFixed(2)}%, risk-free rate ${riskFreeRate.toFixed(2)}% (${riskFreeRateSource})`
  });

  return Object.freeze({ marketReturn, riskFreeRate, riskFreeRateSource });
}
