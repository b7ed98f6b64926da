import type { OverreactionStrategy } from './types';

export interface ScannerConfig {
  fmpApiKey: string | null;
  riskFreeFallback: number;
  overreactionThreshold: number;
  strategy: OverreactionStrategy;
  marketProxy: string;
  rateSymbol: string;
  rateWindowDays: number;
  historyDays: number;
  yahooMaxQps: number;
}

export const DEFAULT_CONFIG: ScannerConfig = {
  fmpApiKey: null,
  riskFreeFallback: 5.0,
  overreactionThreshold: 2.0,
  strategy: 'capm',
  marketProxy: '^GSPC',
  // 13-week T-bill yield, quoted in percent
  rateSymbol: '^IRX',
  rateWindowDays: 10,
  historyDays: 400,
  yahooMaxQps: 1
};

const STRATEGIES: readonly OverreactionStrategy[] = ['capm', 'raw', 'auto'];

export function parseStrategy(value: string): OverreactionStrategy {
  const match = STRATEGIES.find((strategy) => strategy === value.trim().toLowerCase());
  if (!match) {
    throw new Error(`Unknown overreaction strategy "${value}". Expected one of: ${STRATEGIES.join(', ')}`);
  }
  return match;
}

export function parseNumberOption(name: string, value: string, opts: { positive?: boolean } = {}): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Option ${name} must be a number, got "${value}"`);
  }
  if (opts.positive && parsed <= 0) {
    throw new Error(`Option ${name} must be greater than zero, got ${parsed}`);
  }
  return parsed;
}

/**
 * Calendar date (YYYY-MM-DD) at `now` on the exchange's clock, so an evening
 * run in New York still analyses that day's reports.
 */
export function defaultReportDate(now: Date = new Date(), timeZone = 'America/New_York'): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((item) => item.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function loadConfig(
  env: Record<string, string | undefined>,
  overrides: Partial<ScannerConfig> = {}
): ScannerConfig {
  const apiKey = env.FINANCIAL_API_KEY?.trim();
  const fromEnv: Partial<ScannerConfig> = {
    fmpApiKey: apiKey ? apiKey : null
  };
  if (env.RISK_FREE_FALLBACK) {
    fromEnv.riskFreeFallback = parseNumberOption('RISK_FREE_FALLBACK', env.RISK_FREE_FALLBACK);
  }
  if (env.MARKET_PROXY?.trim()) {
    fromEnv.marketProxy = env.MARKET_PROXY.trim();
  }

  return { ...DEFAULT_CONFIG, ...fromEnv, ...pickDefined(overrides) };
}

function pickDefined<T extends object>(value: Partial<T>): Partial<T> {
  const result: Partial<T> = {};
  (Object.keys(value) as Array<keyof T>).forEach((key) => {
    const entry = value[key];
    if (entry !== undefined) {
      result[key] = entry;
    }
  });
  return result;
}
