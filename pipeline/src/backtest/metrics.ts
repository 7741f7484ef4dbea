/**
 * Backtest metrics over labeled predictions
 */

import type { ScoreResult, Tier } from '@hrcast/model';
import { rankResults } from '@hrcast/model';

export const CALIBRATION_BINS = 10;

const EPS = 1e-15;

export interface LabeledResult {
  date: string;
  result: ScoreResult;
  hit: boolean;
}

export interface TierStats {
  count: number;
  hits: number;
  hitRate: number | null;
  meanScore: number | null;
}

export interface CalibrationBin {
  lower: number;
  upper: number;
  count: number;
  meanProbability: number | null;
  hitRate: number | null;
}

export interface BacktestMetrics {
  samples: number;
  hits: number;
  baseRate: number | null;
  /** null when every label is the same */
  auc: number | null;
  brier: number | null;
  logLoss: number | null;
  tiers: Record<Tier, TierStats>;
  calibration: CalibrationBin[];
  precisionAtN: { n: number; value: number | null; days: number };
}

/**
 * ROC AUC from ranks (Mann-Whitney U); tied scores share their average rank
 */
export function rocAuc(scores: readonly number[], labels: readonly boolean[]): number | null {
  const positives = labels.filter(Boolean).length;
  const negatives = labels.length - positives;
  if (positives === 0 || negatives === 0) return null;

  const order = scores.map((score, index) => ({ score, index })).sort((a, b) => a.score - b.score);
  const ranks = new Array<number>(scores.length);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].score === order[i].score) j++;
    // Ranks are 1-based; positions i..j share the mean of i+1..j+1
    const rank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) ranks[order[k].index] = rank;
    i = j + 1;
  }

  let positiveRankSum = 0;
  labels.forEach((label, index) => {
    if (label) positiveRankSum += ranks[index];
  });
  return (positiveRankSum - (positives * (positives + 1)) / 2) / (positives * negatives);
}

export function brierScore(probabilities: readonly number[], labels: readonly boolean[]): number | null {
  if (probabilities.length === 0) return null;
  let total = 0;
  probabilities.forEach((p, i) => {
    total += (p - (labels[i] ? 1 : 0)) ** 2;
  });
  return total / probabilities.length;
}

export function logLoss(probabilities: readonly number[], labels: readonly boolean[]): number | null {
  if (probabilities.length === 0) return null;
  let total = 0;
  probabilities.forEach((raw, i) => {
    const p = Math.min(Math.max(raw, EPS), 1 - EPS);
    total -= labels[i] ? Math.log(p) : Math.log(1 - p);
  });
  return total / probabilities.length;
}

export function tierStats(labeled: readonly LabeledResult[]): Record<Tier, TierStats> {
  const stats: Record<Tier, TierStats> = {
    Lock: { count: 0, hits: 0, hitRate: null, meanScore: null },
    Sleeper: { count: 0, hits: 0, hitRate: null, meanScore: null },
    Risky: { count: 0, hits: 0, hitRate: null, meanScore: null },
  };
  const scoreSums: Record<Tier, number> = { Lock: 0, Sleeper: 0, Risky: 0 };

  for (const { result, hit } of labeled) {
    const row = stats[result.tier];
    row.count++;
    if (hit) row.hits++;
    scoreSums[result.tier] += result.score;
  }
  for (const tier of ['Lock', 'Sleeper', 'Risky'] as const) {
    const row = stats[tier];
    if (row.count > 0) {
      row.hitRate = row.hits / row.count;
      row.meanScore = scoreSums[tier] / row.count;
    }
  }
  return stats;
}

/**
 * Equal-width probability bins. A probability of exactly 1 falls in the top bin.
 */
export function calibrationBins(
  probabilities: readonly number[],
  labels: readonly boolean[],
  bins: number = CALIBRATION_BINS
): CalibrationBin[] {
  const sums = Array.from({ length: bins }, () => ({ count: 0, probability: 0, hits: 0 }));
  probabilities.forEach((p, i) => {
    const index = Math.min(bins - 1, Math.max(0, Math.floor(p * bins)));
    sums[index].count++;
    sums[index].probability += p;
    if (labels[i]) sums[index].hits++;
  });

  return sums.map((bin, index) => ({
    lower: index / bins,
    upper: (index + 1) / bins,
    count: bin.count,
    meanProbability: bin.count > 0 ? bin.probability / bin.count : null,
    hitRate: bin.count > 0 ? bin.hits / bin.count : null,
  }));
}

/**
 * Mean over days of the hit rate among each day's top N picks
 */
export function precisionAtN(labeled: readonly LabeledResult[], n: number): { n: number; value: number | null; days: number } {
  const byDate = new Map<string, LabeledResult[]>();
  for (const item of labeled) {
    const day = byDate.get(item.date) ?? [];
    day.push(item);
    byDate.set(item.date, day);
  }

  let total = 0;
  let days = 0;
  for (const day of byDate.values()) {
    const ranked = rankResults(day.map((item) => ({ ...item.result, hit: item.hit })));
    const top = ranked.slice(0, n);
    if (top.length === 0) continue;
    total += top.filter((item) => item.hit).length / top.length;
    days++;
  }
  return { n, value: days > 0 ? total / days : null, days };
}

export function computeMetrics(labeled: readonly LabeledResult[], topN: number): BacktestMetrics {
  const probabilities = labeled.map((item) => item.result.probability);
  const labels = labeled.map((item) => item.hit);
  const hits = labels.filter(Boolean).length;

  return {
    samples: labeled.length,
    hits,
    baseRate: labeled.length > 0 ? hits / labeled.length : null,
    auc: rocAuc(
      labeled.map((item) => item.result.score),
      labels
    ),
    brier: brierScore(probabilities, labels),
    logLoss: logLoss(probabilities, labels),
    tiers: tierStats(labeled),
    calibration: calibrationBins(probabilities, labels),
    precisionAtN: precisionAtN(labeled, topN),
  };
}
