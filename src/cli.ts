#!/usr/bin/env tsx
import 'dotenv/config';
import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { defaultReportDate, loadConfig, parseNumberOption, parseStrategy, type ScannerConfig } from '../lib/config';
import { CriticalContextError } from '../lib/errors';
import { FmpEarningsSource } from '../lib/fmp';
import { describeContext, renderCsv, renderTable } from '../lib/format';
import { NasdaqCalendar } from '../lib/nasdaq';
import { processEarningsDay } from '../lib/processor';
import type { ProcessingLogItem } from '../lib/types';
import { YahooMarketData } from '../lib/yahoo';
import { loadWatchlist } from '../utils/input';

interface CliOptions {
  input?: string;
  output?: string;
  format: string;
  threshold?: string;
  strategy?: string;
  riskFreeFallback?: string;
  marketProxy?: string;
  maxQps?: string;
  verbose?: boolean;
}

function parseReportDate(value: string | undefined): string {
  if (!value) return defaultReportDate();
  if (!/^\d{4}-\d{2}-\d{2}$/u.test(value) || Number.isNaN(Date.parse(value))) {
    throw new Error(`Report date must be YYYY-MM-DD, got "${value}"`);
  }
  return value;
}

function buildOverrides(opts: CliOptions): Partial<ScannerConfig> {
  return {
    overreactionThreshold: opts.threshold ? parseNumberOption('--threshold', opts.threshold, { positive: true }) : undefined,
    strategy: opts.strategy ? parseStrategy(opts.strategy) : undefined,
    riskFreeFallback: opts.riskFreeFallback ? parseNumberOption('--risk-free-fallback', opts.riskFreeFallback) : undefined,
    marketProxy: opts.marketProxy,
    yahooMaxQps: opts.maxQps ? parseNumberOption('--max-qps', opts.maxQps, { positive: true }) : undefined
  };
}

function printLog(item: ProcessingLogItem) {
  // eslint-disable-next-line no-console
  console.error(`[${item.timestamp}] ${item.level.toUpperCase()} ${item.stage}: ${item.message}`);
}

async function main() {
  const program = new Command();
  program
    .name('earnings-overreaction')
    .description('Compare post-earnings price moves with EPS surprises and flag overreactions')
    .argument('[date]', 'Earnings report date (YYYY-MM-DD), defaults to today in New York')
    .option('-i, --input <file>', 'CSV watchlist with a Symbol column, used instead of the earnings calendar')
    .option('-o, --output <file>', 'Write results to a file instead of stdout')
    .option('-f, --format <format>', 'Output format: table or csv', 'table')
    .option('-t, --threshold <number>', 'Abnormal return to EPS surprise ratio that counts as an overreaction')
    .option('-s, --strategy <name>', 'Overreaction strategy: capm, raw or auto')
    .option('--risk-free-fallback <percent>', 'Risk-free rate used when the reference rate cannot be fetched')
    .option('--market-proxy <symbol>', 'Index used for the market return')
    .option('--max-qps <number>', 'Maximum Yahoo Finance requests per second')
    .option('-v, --verbose', 'Print processing logs to stderr')
    .parse(process.argv);

  const opts = program.opts<CliOptions>();
  const reportDate = parseReportDate(program.args[0]);
  if (opts.format !== 'table' && opts.format !== 'csv') {
    throw new Error(`Unknown format "${opts.format}". Use table or csv.`);
  }

  const config = loadConfig(process.env, buildOverrides(opts));
  if (!config.fmpApiKey) {
    throw new Error('FINANCIAL_API_KEY not set in environment variables');
  }

  const catalog = opts.input ? loadWatchlist(opts.input) : undefined;
  const yahoo = new YahooMarketData({
    maxQps: config.yahooMaxQps,
    historyDays: config.historyDays,
    rateSymbol: config.rateSymbol,
    rateWindowDays: config.rateWindowDays
  });

  const result = await processEarningsDay(
    {
      calendar: new NasdaqCalendar(),
      earnings: new FmpEarningsSource({ apiKey: config.fmpApiKey }),
      prices: yahoo,
      profiles: yahoo,
      rates: yahoo
    },
    {
      reportDate,
      catalog,
      marketProxy: config.marketProxy,
      riskFreeFallback: config.riskFreeFallback,
      overreactionThreshold: config.overreactionThreshold,
      strategy: config.strategy
    }
  );

  result.logs.filter((item) => opts.verbose || item.level !== 'info').forEach(printLog);

  if (!result.rows.length) {
    // eslint-disable-next-line no-console
    console.error(`No earnings reports found for ${reportDate}`);
    return;
  }

  const rendered = opts.format === 'csv' ? renderCsv(result.rows) : renderTable(result.rows);
  if (opts.output) {
    const outputPath = resolve(opts.output);
    writeFileSync(outputPath, `${rendered}\n`, 'utf8');
    // eslint-disable-next-line no-console
    console.log(`Saved ${result.rows.length} rows to ${outputPath}`);
  } else {
    if (result.context && opts.format === 'table') {
      // eslint-disable-next-line no-console
      console.log(`${reportDate} | ${describeContext(result.context)}\n`);
    }
    // eslint-disable-next-line no-console
    console.log(rendered);
  }
}

main().catch((error) => {
  if (error instanceof CriticalContextError) {
    // eslint-disable-next-line no-console
    console.error(`Analysis aborted while building the ${error.stage}: ${error.message}`);
  } else {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
