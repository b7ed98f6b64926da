export type LogLevel = 'info' | 'warn' | 'error';

export interface ProcessingLogItem {
  timestamp: string;
  level: LogLevel;
  stage: 'calendar' | 'context' | 'fetch' | 'compute' | 'save';
  message: string;
}

export type LogSink = (item: Omit<ProcessingLogItem, 'timestamp'>) => void;

export type Overreaction = 'Yes' | 'No' | 'Unknown';

export type OverreactionStrategy = 'capm' | 'raw' | 'auto';

export interface EarningsRecord {
  readonly symbol: string;
  readonly epsActual: number | null;
  readonly epsEstimated: number | null;
  readonly revenueActual: number | null;
  readonly revenueEstimated: number | null;
}

export interface PricePoint {
  date: Date;
  close: number;
}

export interface MarketContext {
  readonly marketReturn: number | null;
  readonly riskFreeRate: number | null;
  readonly riskFreeRateSource: 'fetched' | 'fallback';
}

export interface HistoricalChanges {
  oneWeek: number | null;
  oneMonth: number | null;
  threeMonth: number | null;
  oneYear: number | null;
}

export interface SymbolMetrics {
  symbol: string;
  epsSurprisePct: number | null;
  actualReturnPct: number | null;
  abnormalReturnPct: number | null;
  overreaction: Overreaction;
  historicalChanges: HistoricalChanges;
}

export interface CatalogEntry {
  symbol: string;
  companyName: string | null;
  marketCap: number | null;
  epsForecast: number | null;
}

export interface ResultRow {
  symbol: string;
  companyName: string | null;
  marketCap: number | null;
  epsEstimated: number | null;
  epsActual: number | null;
  epsSurprisePct: number | null;
  revenueEstimated: number | null;
  revenueActual: number | null;
  previousClose: number | null;
  currentPrice: number | null;
  returnPct: number | null;
  abnormalReturnPct: number | null;
  change1W: number | null;
  change1M: number | null;
  change3M: number | null;
  change1Y: number | null;
  overreaction: Overreaction;
}

export interface RunResponse {
  reportDate: string;
  context: MarketContext | null;
  rows: ResultRow[];
  logs: ProcessingLogItem[];
}

// Data source contracts. Implementations live in yahoo.ts, nasdaq.ts and fmp.ts.

export interface CalendarSource {
  getCalendar(date: string): Promise<CatalogEntry[]>;
}

export interface EarningsSource {
  /** Per-symbol failures are reported through `log` rather than thrown. */
  getEarnings(date: string, symbols: string[], log?: LogSink): Promise<EarningsRecord[]>;
}

export interface PriceSource {
  /** Daily closes, most recent first. */
  getHistoricalCloses(symbol: string): Promise<PricePoint[]>;
  getCurrentQuote(symbol: string): Promise<number | null>;
}

export interface ProfileSource {
  getBeta(symbol: string): Promise<number | null>;
}

export interface RateSource {
  /** Latest short-maturity reference yield, in percent. Throws when unavailable. */
  getShortTermRate(): Promise<number>;
}
