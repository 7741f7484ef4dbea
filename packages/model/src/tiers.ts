/**
 * Tier ladder
 *
 * Tiers come from an ordered threshold table rather than branches, so the
 * ladder can be tuned from config and tested as data.
 */

import type { TierThreshold } from './config.js';
import type { ScoreResult, Tier } from './types.js';

/**
 * First tier whose floor the score reaches. The table is validated to be
 * strictly descending and to end at 0, so every score in [0, 1] lands somewhere;
 * anything below the last floor still gets the last tier.
 */
export function assignTier(score: number, table: readonly TierThreshold[]): Tier {
  for (const row of table) {
    if (score >= row.min) {
      return row.tier;
    }
  }
  return table[table.length - 1].tier;
}

/**
 * Rank of a tier in the table, 0 = best. Used to compare tiers.
 */
export function tierRank(tier: Tier, table: readonly TierThreshold[]): number {
  const index = table.findIndex((row) => row.tier === tier);
  return index === -1 ? table.length : index;
}

/**
 * Order results best first: score, then probability, then matchup id, so
 * ties always come out the same way.
 */
export function rankResults<T extends Pick<ScoreResult, 'score' | 'probability' | 'matchupId'>>(results: readonly T[]): T[] {
  return [...results].sort(
    (a, b) =>
      b.score - a.score ||
      b.probability - a.probability ||
      (a.matchupId < b.matchupId ? -1 : a.matchupId > b.matchupId ? 1 : 0)
  );
}
