import type {
  EarningsRecord,
  HistoricalChanges,
  MarketContext,
  Overreaction,
  OverreactionStrategy,
  PricePoint,
  SymbolMetrics
} from './types';

type Maybe = number | null | undefined;

function isPresent(value: Maybe): value is number {
  return value !== null && value !== undefined && Number.isFinite(value);
}

// Nominal trading sessions back from the latest close.
export const TRADING_DAY_OFFSETS = {
  oneWeek: 5,
  oneMonth: 22,
  threeMonth: 66,
  oneYear: 252
} as const satisfies Record<keyof HistoricalChanges, number>;

export const DEFAULT_OVERREACTION_THRESHOLD = 2.0;
export const NO_SURPRISE_THRESHOLD = 1.0;

export function calculateEpsSurprise(epsActual: Maybe, epsEstimated: Maybe): number | null {
  if (!isPresent(epsActual) || !isPresent(epsEstimated)) return null;
  if (epsEstimated === 0) return 0;
  return ((epsActual - epsEstimated) / Math.abs(epsEstimated)) * 100;
}

export function calculatePriceChange(currentPrice: Maybe, previousPrice: Maybe): number | null {
  if (!isPresent(currentPrice) || !isPresent(previousPrice)) return null;
  if (previousPrice === 0) return null;
  return ((currentPrice - previousPrice) / previousPrice) * 100;
}

/** `closes` must already be ordered most recent first. */
export function calculateHistoricalChanges(closes: PricePoint[]): HistoricalChanges {
  const latest = closes[0]?.close;
  const changeAt = (offset: number) => calculatePriceChange(latest, closes[offset]?.close);
  return {
    oneWeek: changeAt(TRADING_DAY_OFFSETS.oneWeek),
    oneMonth: changeAt(TRADING_DAY_OFFSETS.oneMonth),
    threeMonth: changeAt(TRADING_DAY_OFFSETS.threeMonth),
    oneYear: changeAt(TRADING_DAY_OFFSETS.oneYear)
  };
}

export function calculateExpectedReturn(marketReturn: Maybe, beta: Maybe, riskFreeRate: Maybe): number | null {
  if (!isPresent(marketReturn) || !isPresent(beta) || !isPresent(riskFreeRate)) return null;
  return riskFreeRate + beta * (marketReturn - riskFreeRate);
}

/** CAPM abnormal return. All inputs in percentage points. */
export function calculateAbnormalReturn(
  actualReturn: Maybe,
  marketReturn: Maybe,
  beta: Maybe,
  riskFreeRate: Maybe
): number | null {
  if (!isPresent(actualReturn)) return null;
  const expected = calculateExpectedReturn(marketReturn, beta, riskFreeRate);
  if (expected === null) return null;
  return actualReturn - expected;
}

export interface OverreactionInput {
  abnormalReturn?: number | null;
  priceChange?: number | null;
  epsSurprise: number | null | undefined;
}

export interface OverreactionOptions {
  strategy?: OverreactionStrategy;
  threshold?: number;
}

function classifyMagnitude(move: number, epsSurprise: number, threshold: number, requireSameDirection: boolean): Overreaction {
  if (epsSurprise === 0) {
    return Math.abs(move) > NO_SURPRISE_THRESHOLD ? 'Yes' : 'No';
  }
  const disproportionate = Math.abs(move) > Math.abs(epsSurprise) * threshold;
  // A zero move counts as the same direction.
  const sameDirection = move * epsSurprise >= 0;
  if (disproportionate && (sameDirection || !requireSameDirection)) return 'Yes';
  return 'No';
}

/**
 * Flags a price reaction that is disproportionate to the earnings surprise.
 *
 * `capm` compares the abnormal return and requires it to point the same way as the
 * surprise; `raw` compares the unadjusted price change with no direction check;
 * `auto` uses `capm` when the abnormal return is known and `raw` otherwise.
 */
export function determineOverreaction(input: OverreactionInput, options: OverreactionOptions = {}): Overreaction {
  const strategy = options.strategy ?? 'capm';
  const threshold = options.threshold ?? DEFAULT_OVERREACTION_THRESHOLD;
  const { abnormalReturn, priceChange, epsSurprise } = input;

  if (!isPresent(epsSurprise)) return 'Unknown';

  const useCapm = strategy === 'capm' || (strategy === 'auto' && isPresent(abnormalReturn));
  if (useCapm) {
    if (!isPresent(abnormalReturn)) return 'Unknown';
    return classifyMagnitude(abnormalReturn, epsSurprise, threshold, true);
  }

  if (!isPresent(priceChange)) return 'Unknown';
  return classifyMagnitude(priceChange, epsSurprise, threshold, false);
}

export interface SymbolInputs {
  symbol: string;
  earnings: EarningsRecord | null;
  /** Most recent first. */
  closes: PricePoint[];
  currentQuote: number | null;
  beta: number | null;
}

export interface PriceSnapshot {
  currentPrice: number | null;
  previousClose: number | null;
}

export function resolvePrices(closes: PricePoint[], currentQuote: number | null): PriceSnapshot {
  return {
    currentPrice: currentQuote ?? closes[0]?.close ?? null,
    previousClose: closes[1]?.close ?? null
  };
}

export function computeSymbolMetrics(
  inputs: SymbolInputs,
  context: MarketContext,
  options: OverreactionOptions = {}
): SymbolMetrics {
  const epsSurprisePct = calculateEpsSurprise(inputs.earnings?.epsActual, inputs.earnings?.epsEstimated);
  const { currentPrice, previousClose } = resolvePrices(inputs.closes, inputs.currentQuote);
  const actualReturnPct = calculatePriceChange(currentPrice, previousClose);
  const abnormalReturnPct = calculateAbnormalReturn(
    actualReturnPct,
    context.marketReturn,
    inputs.beta,
    context.riskFreeRate
  );

  return {
    symbol: inputs.symbol,
    epsSurprisePct,
    actualReturnPct,
    abnormalReturnPct,
    overreaction: determineOverreaction(
      { abnormalReturn: abnormalReturnPct, priceChange: actualReturnPct, epsSurprise: epsSurprisePct },
      options
    ),
    historicalChanges: calculateHistoricalChanges(inputs.closes)
  };
}
