import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'csv-parse/sync';
import type { CatalogEntry } from '../lib/types';
import { parseMoney } from '../lib/parse';

export interface RawWatchlistRow {
  Symbol?: string;
  Name?: string;
  MarketCap?: string;
}

export function normalizeTicker(value: string): string {
  return value.trim().toUpperCase().replace(/\s+/g, '');
}

export function detectDelimiter(sample: string): string {
  const candidates: Array<{ delimiter: string; score: number }> = [
    { delimiter: ',', score: 0 },
    { delimiter: ';', score: 0 },
    { delimiter: '\t', score: 0 },
    { delimiter: '|', score: 0 }
  ];

  const firstLine = sample.split(/\r?\n/u).find((line) => line.trim().length > 0) ?? '';
  candidates.forEach((candidate) => {
    candidate.score = firstLine.split(candidate.delimiter).length - 1;
  });

  const best = candidates.reduce((prev, next) => (next.score > prev.score ? next : prev));
  return best.score > 0 ? best.delimiter : ',';
}

const columnAliases: Record<keyof RawWatchlistRow, string[]> = {
  Symbol: ['Symbol', 'symbol', 'Ticker', 'ticker'],
  Name: ['Name', 'name', 'Company', 'company', 'Company Name'],
  MarketCap: ['Market Cap', 'MarketCap', 'marketCap', 'market_cap', 'Market Capitalization']
};

function extractValue(row: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = row[key];
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed) {
        return trimmed;
      }
    }
  }
  return undefined;
}

export function parseWatchlist(text: string): CatalogEntry[] {
  const rawRows = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    delimiter: detectDelimiter(text)
  }) as Record<string, unknown>[];

  const seen = new Set<string>();
  const entries: CatalogEntry[] = [];
  rawRows.forEach((row) => {
    const normalized: RawWatchlistRow = {};
    (Object.keys(columnAliases) as Array<keyof RawWatchlistRow>).forEach((field) => {
      const value = extractValue(row, columnAliases[field]);
      if (value) {
        normalized[field] = value;
      }
    });
    if (!normalized.Symbol) return;
    const symbol = normalizeTicker(normalized.Symbol);
    if (seen.has(symbol)) return;
    seen.add(symbol);
    entries.push({
      symbol,
      companyName: normalized.Name ?? null,
      marketCap: parseMoney(normalized.MarketCap),
      epsForecast: null
    });
  });
  return entries;
}

export function loadWatchlist(filePath: string): CatalogEntry[] {
  const text = readFileSync(resolve(filePath), 'utf8');
  const entries = parseWatchlist(text);
  if (!entries.length) {
    throw new Error(`No symbols found in ${filePath}. Provide a Symbol or Ticker column.`);
  }
  return entries;
}
