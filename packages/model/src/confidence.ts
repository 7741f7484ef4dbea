import type { ScoringConfig } from './config.js';
import type { Confidence, Matchup } from './types.js';

const LEVELS: Confidence[] = ['high', 'medium', 'low'];

function lower(level: Confidence): Confidence {
  return LEVELS[Math.min(LEVELS.indexOf(level) + 1, LEVELS.length - 1)];
}

/**
 * Confidence in a score given how much of it rests on defaults and on
 * unconfirmed game information.
 *
 * - any imputed field drops high to medium
 * - more than `lowImputedThreshold` imputed fields drops to low
 * - a probable (unconfirmed) starter or a projected lineup lowers one more level
 */
export function assessConfidence(
  matchup: Matchup,
  imputed: readonly string[],
  config: ScoringConfig
): Confidence {
  let level: Confidence = 'high';
  if (imputed.length > config.confidence.lowImputedThreshold) {
    level = 'low';
  } else if (imputed.length > 0) {
    level = 'medium';
  }

  if (matchup.pitcherStatus === 'probable' || matchup.lineupStatus === 'projected') {
    level = lower(level);
  }
  return level;
}
