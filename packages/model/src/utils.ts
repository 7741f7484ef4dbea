/**
 * Utility functions for the scoring model
 */

import type { Range } from './config.js';

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Scale a raw metric into [0, 1] against its reference range.
 * Values outside the range are clamped to the ends.
 */
export function minMax(value: number, range: Range): number {
  return clamp((value - range.min) / (range.max - range.min), 0, 1);
}

/**
 * Weighted mean of named signals. Keys missing from `weights` count as 0.
 */
export function weightedMean<K extends string>(
  signals: Record<K, number>,
  weights: Record<K, number>
): number {
  let total = 0;
  let weightSum = 0;
  for (const key of Object.keys(weights) as K[]) {
    total += signals[key] * weights[key];
    weightSum += weights[key];
  }
  return weightSum > 0 ? total / weightSum : 0;
}

export function logistic(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

export function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Round to a fixed number of decimal places for display and storage
 */
export function round(value: number, decimals: number = 3): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
