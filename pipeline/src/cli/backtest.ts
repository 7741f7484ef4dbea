/**
 * Replay a date range and report accuracy metrics
 *
 * Usage: tsx pipeline/src/cli/backtest.ts --start YYYY-MM-DD --end YYYY-MM-DD [--source log|mlb] [--top N]
 */

import dotenv from 'dotenv';
import { createScorer, loadAppConfig, loadScoringConfig } from '../config.js';
import { formatBacktestReport, runBacktest } from '../backtest/runner.js';
import { parseIntArg, runCli } from './args.js';
import { openSource, parseRangeArgs } from './range.js';

async function main(): Promise<void> {
  dotenv.config();
  const args = process.argv.slice(2);
  const range = parseRangeArgs(args, 'backtest --start YYYY-MM-DD --end YYYY-MM-DD [--source log|mlb] [--top N]');
  const config = loadAppConfig();
  const topN = parseIntArg(args, '--top') ?? config.topN;
  const scorer = createScorer(config, loadScoringConfig(config));

  const { source, close } = await openSource(config, range.source);
  try {
    const report = await runBacktest({ start: range.start, end: range.end, source, scorer, topN });
    console.log('\n' + formatBacktestReport(report));
  } finally {
    close();
  }
}

runCli(main);
