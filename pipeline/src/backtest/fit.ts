/**
 * Recalibrate scoring constants from a labeled backtest
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  fitCalibration,
  fitComponentWeights,
  RuleBasedScorer,
  createScoringConfig,
  type FitOptions,
  type ScoringConfig,
} from '@hrcast/model';
import type { BacktestSample } from './runner.js';

export interface ScoringOverride {
  weights: { components: ScoringConfig['weights']['components'] };
  calibration: ScoringConfig['calibration'];
}

export interface FitResult {
  override: ScoringOverride;
  samples: number;
  logLoss: number;
}

/**
 * Fit component weights first, rescore every input with them, then fit
 * the score → probability curve on the new scores.
 */
export function fitFromBacktest(
  samples: readonly BacktestSample[],
  base: ScoringConfig,
  options: FitOptions = {}
): FitResult {
  if (samples.length === 0) {
    throw new Error('No labeled samples to fit');
  }

  const reweighting = new RuleBasedScorer(base);
  const components = fitComponentWeights(
    samples.map(({ input, hit }) => ({ components: reweighting.score(input).components, hit })),
    base.weights.components,
    options
  );

  const reweighted = createScoringConfig({ ...base, weights: { ...base.weights, components } });
  const rescorer = new RuleBasedScorer(reweighted);
  const calibration = fitCalibration(
    samples.map(({ input, hit }) => ({ score: rescorer.score(input).score, hit })),
    options
  );

  return {
    override: {
      weights: { components },
      calibration: { slope: calibration.slope, intercept: calibration.intercept },
    },
    samples: samples.length,
    logLoss: calibration.logLoss,
  };
}

/**
 * Write an override file that HR_SCORING_CONFIG can point at
 */
export function writeScoringOverride(file: string, override: ScoringOverride): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(override, null, 2) + '\n');
}
