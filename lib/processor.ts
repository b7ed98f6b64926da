import type {
  CalendarSource,
  CatalogEntry,
  EarningsRecord,
  EarningsSource,
  LogSink,
  OverreactionStrategy,
  PricePoint,
  PriceSource,
  ProcessingLogItem,
  ProfileSource,
  RateSource,
  ResultRow,
  RunResponse,
  SymbolMetrics
} from './types';
import { computeSymbolMetrics, resolvePrices, type PriceSnapshot } from './calculations';
import { CriticalContextError, errorMessage } from './errors';
import { buildMarketContext } from './marketContext';

export interface ProcessDependencies {
  calendar: CalendarSource;
  earnings: EarningsSource;
  prices: PriceSource;
  profiles: ProfileSource;
  rates: RateSource;
}

export interface ProcessOptions {
  reportDate: string;
  /** Replaces the earnings calendar as the symbol catalog when given. */
  catalog?: CatalogEntry[];
  marketProxy: string;
  riskFreeFallback: number;
  overreactionThreshold: number;
  strategy: OverreactionStrategy;
}

export function buildResultRow(
  entry: CatalogEntry,
  earnings: EarningsRecord | null,
  prices: PriceSnapshot,
  metrics: SymbolMetrics
): ResultRow {
  return {
    symbol: entry.symbol,
    companyName: entry.companyName,
    marketCap: entry.marketCap,
    // The calendar forecast stands in only when there is no earnings record,
    // so the estimate shown is always the one the surprise was computed from.
    epsEstimated: earnings ? earnings.epsEstimated : entry.epsForecast,
    epsActual: earnings?.epsActual ?? null,
    epsSurprisePct: metrics.epsSurprisePct,
    revenueEstimated: earnings?.revenueEstimated ?? null,
    revenueActual: earnings?.revenueActual ?? null,
    previousClose: prices.previousClose,
    currentPrice: prices.currentPrice,
    returnPct: metrics.actualReturnPct,
    abnormalReturnPct: metrics.abnormalReturnPct,
    change1W: metrics.historicalChanges.oneWeek,
    change1M: metrics.historicalChanges.oneMonth,
    change3M: metrics.historicalChanges.threeMonth,
    change1Y: metrics.historicalChanges.oneYear,
    overreaction: metrics.overreaction
  };
}

export async function processEarningsDay(deps: ProcessDependencies, options: ProcessOptions): Promise<RunResponse> {
  const logs: ProcessingLogItem[] = [];
  const log: LogSink = (item) => {
    logs.push({ ...item, timestamp: new Date().toISOString() });
  };

  let catalog: CatalogEntry[];
  if (options.catalog) {
    catalog = options.catalog;
    log({ level: 'info', stage: 'calendar', message: `Using watchlist with ${catalog.length} symbols` });
  } else {
    try {
      catalog = await deps.calendar.getCalendar(options.reportDate);
    } catch (error) {
      throw new CriticalContextError('earnings calendar', errorMessage(error), error);
    }
    log({
      level: 'info',
      stage: 'calendar',
      message: `Found ${catalog.length} companies reporting on ${options.reportDate}`
    });
  }

  if (!catalog.length) {
    return { reportDate: options.reportDate, context: null, rows: [], logs };
  }

  const context = await buildMarketContext(
    {
      getMarketCloses: () => deps.prices.getHistoricalCloses(options.marketProxy),
      rates: deps.rates
    },
    { riskFreeFallback: options.riskFreeFallback, log }
  );

  const symbols = catalog.map((entry) => entry.symbol);
  const earningsBySymbol = new Map<string, EarningsRecord>();
  try {
    const records = await deps.earnings.getEarnings(options.reportDate, symbols, log);
    records.forEach((record) => earningsBySymbol.set(record.symbol, record));
    log({
      level: 'info',
      stage: 'fetch',
      message: `Collected earnings data for ${records.length} of ${symbols.length} companies`
    });
  } catch (error) {
    log({ level: 'warn', stage: 'fetch', message: `Earnings data unavailable: ${errorMessage(error)}` });
  }

  const orBlank = async <T>(what: string, symbol: string, blank: T, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      log({ level: 'warn', stage: 'fetch', message: `${what} failed for ${symbol}: ${errorMessage(error)}` });
      return blank;
    }
  };

  const rows: ResultRow[] = [];
  for (const entry of catalog) {
    const { symbol } = entry;
    const closes = await orBlank<PricePoint[]>('Price history', symbol, [], () => deps.prices.getHistoricalCloses(symbol));
    const currentQuote = await orBlank('Quote', symbol, null, () => deps.prices.getCurrentQuote(symbol));
    const beta = await orBlank('Beta lookup', symbol, null, () => deps.profiles.getBeta(symbol));
    const earnings = earningsBySymbol.get(symbol) ?? null;

    const metrics = computeSymbolMetrics({ symbol, earnings, closes, currentQuote, beta }, context, {
      strategy: options.strategy,
      threshold: options.overreactionThreshold
    });
    rows.push(buildResultRow(entry, earnings, resolvePrices(closes, currentQuote), metrics));

    log({
      level: 'info',
      stage: 'compute',
      message: `Computed metrics for ${symbol} (overreaction: ${metrics.overreaction})`
    });
  }

  return { reportDate: options.reportDate, context, rows, logs };
}
