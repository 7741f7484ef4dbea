import { describe, expect, it } from 'vitest';
import type { Tier } from '@hrcast/model';
import {
  brierScore,
  calibrationBins,
  computeMetrics,
  logLoss,
  precisionAtN,
  rocAuc,
  tierStats,
  type LabeledResult,
} from './metrics.js';
import { makeMatchup, makeResult } from '../../test/helpers/fixtures.js';

function labeled(date: string, id: string, score: number, hit: boolean, tier: Tier = 'Sleeper'): LabeledResult {
  const matchup = makeMatchup({ id, gameDate: date });
  return { date, hit, result: makeResult({ matchup, score, tier, probability: score / 2 }) };
}

describe('rocAuc', () => {
  it('should compute the area from ranks', () => {
    expect(rocAuc([0.1, 0.4, 0.35, 0.8], [false, false, true, true])).toBe(0.75);
    expect(rocAuc([0.1, 0.2, 0.3], [false, true, true])).toBe(1);
  });

  it('should give tied scores their average rank', () => {
    expect(rocAuc([0.5, 0.5], [true, false])).toBe(0.5);
  });

  it('should be undefined when only one class is present', () => {
    expect(rocAuc([0.1, 0.9], [true, true])).toBeNull();
    expect(rocAuc([], [])).toBeNull();
  });
});

describe('brierScore and logLoss', () => {
  it('should average squared error', () => {
    expect(brierScore([0.2, 0.8], [false, true])).toBeCloseTo(0.04, 12);
    expect(brierScore([], [])).toBeNull();
  });

  it('should average log loss and clip certain predictions', () => {
    expect(logLoss([0.5, 0.5], [true, false])).toBeCloseTo(Math.LN2, 12);
    expect(logLoss([0], [true])).toBeCloseTo(-Math.log(1e-15), 6);
    expect(logLoss([], [])).toBeNull();
  });
});

describe('tierStats', () => {
  it('should count hits and mean score per tier', () => {
    const stats = tierStats([
      labeled('2024-06-01', 'a', 0.8, true, 'Lock'),
      labeled('2024-06-01', 'b', 0.6, false, 'Lock'),
      labeled('2024-06-01', 'c', 0.2, false, 'Risky'),
    ]);

    expect(stats.Lock.count).toBe(2);
    expect(stats.Lock.hits).toBe(1);
    expect(stats.Lock.hitRate).toBe(0.5);
    expect(stats.Lock.meanScore).toBeCloseTo(0.7, 12);
    expect(stats.Risky).toEqual({ count: 1, hits: 0, hitRate: 0, meanScore: 0.2 });
    expect(stats.Sleeper).toEqual({ count: 0, hits: 0, hitRate: null, meanScore: null });
  });
});

describe('calibrationBins', () => {
  it('should place probabilities in equal-width bins', () => {
    const bins = calibrationBins([0.05, 0.15, 1], [true, false, true]);

    expect(bins).toHaveLength(10);
    expect(bins[0]).toEqual({ lower: 0, upper: 0.1, count: 1, meanProbability: 0.05, hitRate: 1 });
    expect(bins[1]).toEqual({ lower: 0.1, upper: 0.2, count: 1, meanProbability: 0.15, hitRate: 0 });
    expect(bins[9].count).toBe(1);
    expect(bins[9].hitRate).toBe(1);
    expect(bins[5]).toEqual({ lower: 0.5, upper: 0.6, count: 0, meanProbability: null, hitRate: null });
  });
});

describe('precisionAtN', () => {
  it('should average the top-N hit rate over days', () => {
    const result = precisionAtN(
      [
        labeled('2024-06-01', 'a', 0.9, true),
        labeled('2024-06-01', 'b', 0.8, false),
        labeled('2024-06-01', 'c', 0.1, true),
        labeled('2024-06-02', 'd', 0.5, true),
      ],
      2
    );

    expect(result).toEqual({ n: 2, value: 0.75, days: 2 });
  });

  it('should have no value without samples', () => {
    expect(precisionAtN([], 5)).toEqual({ n: 5, value: null, days: 0 });
  });
});

describe('computeMetrics', () => {
  it('should summarize a labeled set', () => {
    const metrics = computeMetrics(
      [
        labeled('2024-06-01', 'a', 0.9, true, 'Lock'),
        labeled('2024-06-01', 'b', 0.4, false),
        labeled('2024-06-01', 'c', 0.2, false, 'Risky'),
        labeled('2024-06-01', 'd', 0.1, false, 'Risky'),
      ],
      1
    );

    expect(metrics.samples).toBe(4);
    expect(metrics.hits).toBe(1);
    expect(metrics.baseRate).toBe(0.25);
    expect(metrics.auc).toBe(1);
    expect(metrics.precisionAtN).toEqual({ n: 1, value: 1, days: 1 });
    expect(metrics.tiers.Lock.hits).toBe(1);
  });
});
