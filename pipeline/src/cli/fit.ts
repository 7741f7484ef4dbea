/**
 * Refit component weights and calibration from a backtest
 *
 * Usage: tsx pipeline/src/cli/fit.ts --start YYYY-MM-DD --end YYYY-MM-DD [--source log|mlb] [--out path]
 *
 * Point HR_SCORING_CONFIG at the written file to use the fitted values.
 */

import dotenv from 'dotenv';
import { RuleBasedScorer } from '@hrcast/model';
import { loadAppConfig, loadScoringConfig } from '../config.js';
import { fitFromBacktest, writeScoringOverride } from '../backtest/fit.js';
import { formatBacktestReport, runBacktest } from '../backtest/runner.js';
import { logStep } from '../log.js';
import { parseArg, runCli } from './args.js';
import { openSource, parseRangeArgs } from './range.js';

const DEFAULT_OUT = 'results/scoring-override.json';

async function main(): Promise<void> {
  dotenv.config();
  const args = process.argv.slice(2);
  const range = parseRangeArgs(args, 'fit --start YYYY-MM-DD --end YYYY-MM-DD [--source log|mlb] [--out path]');
  const out = parseArg(args, '--out') ?? DEFAULT_OUT;
  const config = loadAppConfig();
  const scoring = loadScoringConfig(config);

  const { source, close } = await openSource(config, range.source);
  try {
    const report = await runBacktest({
      start: range.start,
      end: range.end,
      source,
      scorer: new RuleBasedScorer(scoring),
      topN: config.topN,
    });
    console.log('\n' + formatBacktestReport(report) + '\n');

    logStep(`🧮 Fitting on ${report.samples.length} samples`);
    const fit = fitFromBacktest(report.samples, scoring);
    writeScoringOverride(out, fit.override);

    const { components } = fit.override.weights;
    console.log(
      `  ✓ Weights: power ${components.power.toFixed(3)}, vulnerability ${components.vulnerability.toFixed(3)}, ` +
        `form ${components.form.toFixed(3)}, pitchMatchup ${components.pitchMatchup.toFixed(3)}, platoon ${components.platoon.toFixed(3)}`
    );
    console.log(
      `  ✓ Calibration: slope ${fit.override.calibration.slope.toFixed(3)}, intercept ${fit.override.calibration.intercept.toFixed(3)} (log loss ${fit.logLoss.toFixed(4)})`
    );
    console.log(`\n✅ Wrote ${out}`);
  } finally {
    close();
  }
}

runCli(main);
