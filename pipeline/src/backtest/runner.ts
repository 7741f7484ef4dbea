/**
 * Backtest runner: replay a date range through a scorer and measure it
 */

import { eachDayOfInterval, format, parseISO } from 'date-fns';
import type { HrScorer, ScoringInput } from '@hrcast/model';
import { ConfigurationError, describeError } from '../errors.js';
import { logStep } from '../log.js';
import { validateMatchup } from '../validate.js';
import { computeMetrics, type BacktestMetrics, type LabeledResult } from './metrics.js';
import type { HistoricalDay, HistoricalSource } from './sources.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface BacktestOptions {
  start: string;
  end: string;
  source: HistoricalSource;
  scorer: HrScorer;
  topN?: number;
}

export interface BacktestSample extends LabeledResult {
  input: ScoringInput;
}

export interface BacktestReport {
  start: string;
  end: string;
  source: string;
  scorer: string;
  days: number;
  failedDays: string[];
  unlabeled: number;
  invalid: number;
  samples: BacktestSample[];
  metrics: BacktestMetrics;
}

export function backtestDates(start: string, end: string): string[] {
  if (!DATE_PATTERN.test(start) || !DATE_PATTERN.test(end)) {
    throw new ConfigurationError(`Backtest dates must be YYYY-MM-DD, got ${start} and ${end}`);
  }
  if (start > end) {
    throw new ConfigurationError(`Backtest start ${start} is after end ${end}`);
  }
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map((day) => format(day, 'yyyy-MM-dd'));
}

export async function runBacktest(options: BacktestOptions): Promise<BacktestReport> {
  const { source, scorer, topN = 10 } = options;
  const dates = backtestDates(options.start, options.end);

  const samples: BacktestSample[] = [];
  const failedDays: string[] = [];
  let unlabeled = 0;
  let invalid = 0;

  logStep(`🔁 Backtesting ${scorer.name} on ${source.name} from ${options.start} to ${options.end}`);
  for (const date of dates) {
    let day: HistoricalDay;
    try {
      day = await source.day(date);
    } catch (error) {
      failedDays.push(date);
      console.error(`  ❌ [Backtest] ${date}: ${describeError(error)}`);
      continue;
    }

    unlabeled += day.unlabeled;
    for (const { input, hit } of day.samples) {
      try {
        validateMatchup(input.matchup);
      } catch (error) {
        invalid++;
        console.warn(`  ⚠️ [Backtest] ${describeError(error)}; skipped`);
        continue;
      }
      samples.push({ date, input, hit, result: scorer.score(input) });
    }
    if (day.samples.length > 0) {
      console.log(`  ✓ ${date}: ${day.samples.length} samples`);
    }
  }

  samples.sort((a, b) => (a.date === b.date ? compare(a.result.matchupId, b.result.matchupId) : compare(a.date, b.date)));

  return {
    start: options.start,
    end: options.end,
    source: source.name,
    scorer: scorer.name,
    days: dates.length,
    failedDays,
    unlabeled,
    invalid,
    samples,
    metrics: computeMetrics(samples, topN),
  };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function fixed(value: number | null, digits: number = 3): string {
  return value === null ? 'n/a' : value.toFixed(digits);
}

export function formatBacktestReport(report: BacktestReport): string {
  const { metrics } = report;
  const lines = [
    `📊 Backtest ${report.start} → ${report.end} (${report.scorer}, source: ${report.source})`,
    `   Days: ${report.days}, failed: ${report.failedDays.length}, unlabeled: ${report.unlabeled}, invalid: ${report.invalid}`,
    `   Samples: ${metrics.samples}, hits: ${metrics.hits}, base rate: ${fixed(metrics.baseRate)}`,
    `   AUC: ${fixed(metrics.auc)}  Brier: ${fixed(metrics.brier, 4)}  Log loss: ${fixed(metrics.logLoss, 4)}`,
    `   Precision@${metrics.precisionAtN.n}: ${fixed(metrics.precisionAtN.value)} over ${metrics.precisionAtN.days} days`,
    '',
    '   Tier      Count   Hits   Hit rate   Mean score',
  ];
  for (const [tier, stats] of Object.entries(metrics.tiers)) {
    lines.push(
      `   ${tier.padEnd(8)}  ${String(stats.count).padStart(5)}  ${String(stats.hits).padStart(5)}  ${fixed(stats.hitRate).padStart(9)}  ${fixed(stats.meanScore).padStart(11)}`
    );
  }
  lines.push('', '   Calibration (predicted → observed)');
  for (const bin of metrics.calibration) {
    if (bin.count === 0) continue;
    lines.push(
      `   ${bin.lower.toFixed(1)}-${bin.upper.toFixed(1)}  n=${String(bin.count).padStart(5)}  ${fixed(bin.meanProbability)} → ${fixed(bin.hitRate)}`
    );
  }
  return lines.join('\n');
}
