import Papa from 'papaparse';
import type { MarketContext, ResultRow } from './types';

// Presentation only: numbers are rounded here, never in the calculators.

export function formatPercent(value: number | null): string {
  return value === null ? '' : `${value.toFixed(2)}%`;
}

export function formatPrice(value: number | null): string {
  return value === null ? '' : `$${value.toFixed(2)}`;
}

export function formatDecimal(value: number | null): string {
  return value === null ? '' : value.toFixed(2);
}

export function formatAmount(value: number | null): string {
  return value === null ? '' : Math.round(value).toLocaleString('en-US');
}

interface Column {
  header: string;
  align: 'left' | 'right';
  value: (row: ResultRow) => string;
}

export const COLUMNS: Column[] = [
  { header: 'Symbol', align: 'left', value: (row) => row.symbol },
  { header: 'Company', align: 'left', value: (row) => row.companyName ?? '' },
  { header: 'Market Cap', align: 'right', value: (row) => formatAmount(row.marketCap) },
  { header: 'EPS Forecast', align: 'right', value: (row) => formatDecimal(row.epsEstimated) },
  { header: 'EPS Actual', align: 'right', value: (row) => formatDecimal(row.epsActual) },
  { header: 'EPS Surprise', align: 'right', value: (row) => formatPercent(row.epsSurprisePct) },
  { header: 'Revenue Forecast', align: 'right', value: (row) => formatAmount(row.revenueEstimated) },
  { header: 'Revenue Actual', align: 'right', value: (row) => formatAmount(row.revenueActual) },
  { header: 'Previous Close', align: 'right', value: (row) => formatPrice(row.previousClose) },
  { header: 'Current Price', align: 'right', value: (row) => formatPrice(row.currentPrice) },
  { header: 'Price % Change', align: 'right', value: (row) => formatPercent(row.returnPct) },
  { header: 'Abnormal Return', align: 'right', value: (row) => formatPercent(row.abnormalReturnPct) },
  { header: '1 Week', align: 'right', value: (row) => formatPercent(row.change1W) },
  { header: '1 Month', align: 'right', value: (row) => formatPercent(row.change1M) },
  { header: '3 Month', align: 'right', value: (row) => formatPercent(row.change3M) },
  { header: '1 Year', align: 'right', value: (row) => formatPercent(row.change1Y) },
  { header: 'Overreaction?', align: 'left', value: (row) => (row.overreaction === 'Unknown' ? '' : row.overreaction) }
];

export function renderCsv(rows: ResultRow[]): string {
  return Papa.unparse(
    {
      fields: COLUMNS.map((column) => column.header),
      data: rows.map((row) => COLUMNS.map((column) => column.value(row)))
    },
    { quotes: false, newline: '\n' }
  );
}

export function renderTable(rows: ResultRow[]): string {
  const cells = rows.map((row) => COLUMNS.map((column) => column.value(row)));
  const widths = COLUMNS.map((column, index) =>
    Math.max(column.header.length, ...cells.map((line) => line[index].length))
  );
  const pad = (text: string, index: number) =>
    COLUMNS[index].align === 'right' ? text.padStart(widths[index]) : text.padEnd(widths[index]);
  const renderLine = (line: string[]) => line.map(pad).join('  ').trimEnd();

  return [
    renderLine(COLUMNS.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...cells.map(renderLine)
  ].join('\n');
}

export function describeContext(context: MarketContext): string {
  const rate = context.riskFreeRateSource === 'fallback' ? ' (fallback)' : '';
  return `Market return ${formatPercent(context.marketReturn)} | Risk-free rate ${formatPercent(context.riskFreeRate)}${rate}`;
}
