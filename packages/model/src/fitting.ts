/**
 * Logistic fitting for recalibrating the scorer from labeled backtests
 *
 * Plain batch gradient descent from a zero start: no randomness, so the
 * same samples always produce the same coefficients.
 */

import type { ScoringConfig } from './config.js';
import { DEFAULT_SCORING_CONFIG } from './config.js';
import type { ComponentSignals } from './types.js';
import { COMPONENT_KEYS } from './types.js';
import { logistic } from './utils.js';

export interface FitOptions {
  learningRate?: number;
  iterations?: number;
  /** L2 penalty on the weights (not the intercept) */
  l2?: number;
}

export interface LogisticFit {
  weights: number[];
  intercept: number;
  /** Mean log loss on the training samples */
  logLoss: number;
}

export interface CalibrationSample {
  score: number;
  hit: boolean;
}

export interface ComponentSample {
  components: ComponentSignals;
  hit: boolean;
}

const EPS = 1e-12;

function meanLogLoss(rows: number[][], labels: number[], weights: number[], intercept: number): number {
  let total = 0;
  for (let i = 0; i < rows.length; i++) {
    const p = predict(rows[i], weights, intercept);
    total -= labels[i] * Math.log(Math.max(p, EPS)) + (1 - labels[i]) * Math.log(Math.max(1 - p, EPS));
  }
  return total / rows.length;
}

function predict(row: number[], weights: number[], intercept: number): number {
  let z = intercept;
  for (let j = 0; j < weights.length; j++) {
    z += weights[j] * row[j];
  }
  return logistic(z);
}

/**
 * Fit P(y = 1 | x) = logistic(w·x + b)
 */
export function fitLogistic(rows: number[][], labels: number[], options: FitOptions = {}): LogisticFit {
  const { learningRate = 0.5, iterations = 3000, l2 = 0 } = options;

  if (rows.length === 0) {
    throw new Error('Cannot fit a logistic model without samples');
  }
  if (rows.length !== labels.length) {
    throw new Error(`Got ${rows.length} rows but ${labels.length} labels`);
  }
  const width = rows[0].length;
  if (rows.some((row) => row.length !== width)) {
    throw new Error('All rows must have the same number of features');
  }

  const weights = new Array<number>(width).fill(0);
  let intercept = 0;
  const n = rows.length;

  for (let iter = 0; iter < iterations; iter++) {
    const gradW = new Array<number>(width).fill(0);
    let gradB = 0;

    for (let i = 0; i < n; i++) {
      const error = predict(rows[i], weights, intercept) - labels[i];
      for (let j = 0; j < width; j++) {
        gradW[j] += error * rows[i][j];
      }
      gradB += error;
    }

    for (let j = 0; j < width; j++) {
      weights[j] -= learningRate * (gradW[j] / n + l2 * weights[j]);
    }
    intercept -= learningRate * (gradB / n);
  }

  return { weights, intercept, logLoss: meanLogLoss(rows, labels, weights, intercept) };
}

/**
 * Refit the score → probability curve
 */
export function fitCalibration(
  samples: CalibrationSample[],
  options: FitOptions = {}
): ScoringConfig['calibration'] & { logLoss: number } {
  const fit = fitLogistic(
    samples.map((s) => [s.score]),
    samples.map((s) => (s.hit ? 1 : 0)),
    options
  );
  return { slope: fit.weights[0], intercept: fit.intercept, logLoss: fit.logLoss };
}

/**
 * Refit the top-level component weights.
 *
 * Negative coefficients are clipped to 0 and the rest normalized to sum
 * to 1. If every coefficient clips, the fallback weights are returned.
 */
export function fitComponentWeights(
  samples: ComponentSample[],
  fallback: ScoringConfig['weights']['components'] = DEFAULT_SCORING_CONFIG.weights.components,
  options: FitOptions = {}
): ScoringConfig['weights']['components'] {
  const fit = fitLogistic(
    samples.map((s) => COMPONENT_KEYS.map((key) => s.components[key])),
    samples.map((s) => (s.hit ? 1 : 0)),
    options
  );

  const clipped = fit.weights.map((w) => Math.max(0, w));
  const sum = clipped.reduce((a, b) => a + b, 0);
  if (sum <= 0) {
    return { ...fallback };
  }

  const weights = { ...fallback };
  COMPONENT_KEYS.forEach((key, i) => {
    weights[key] = clipped[i] / sum;
  });
  return weights;
}
