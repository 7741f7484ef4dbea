/**
 * Rule-based HR scorer
 *
 * score = clamp(base × park × weather, 0, 1)
 *
 * where base is the weighted mean of five normalized component signals
 * (power, pitcher vulnerability, recent form, pitch matchup, platoon) and
 * park and weather are multiplicative adjustments. The score is mapped to
 * a probability with a logistic calibration curve.
 */

import type { ScoringConfig } from './config.js';
import { DEFAULT_SCORING_CONFIG } from './config.js';
import { assessConfidence } from './confidence.js';
import { computeSignals, parkMultiplier, resolveInputs, weatherMultiplier } from './signals/index.js';
import { assignTier } from './tiers.js';
import type { HrScorer, ScoreResult, ScoringInput } from './types.js';
import { clamp, logistic, weightedMean } from './utils.js';

export class RuleBasedScorer implements HrScorer {
  readonly name = 'rules';
  private readonly config: ScoringConfig;

  constructor(config: ScoringConfig = DEFAULT_SCORING_CONFIG) {
    this.config = config;
  }

  /**
   * Score one matchup. Missing profile fields are replaced with league
   * averages and listed in `imputed`; this never throws on missing data.
   */
  score(input: ScoringInput): ScoreResult {
    const { config } = this;
    const { resolved, imputed } = resolveInputs(input, config);

    const components = computeSignals(resolved, config);
    const base = weightedMean(components, config.weights.components);

    const park = parkMultiplier(resolved.environment);
    const weather = weatherMultiplier(resolved.environment, config);

    const score = clamp(base * park * weather, 0, 1);
    const probability = logistic(config.calibration.slope * score + config.calibration.intercept);

    return {
      matchupId: input.matchup.id,
      matchup: input.matchup,
      score,
      probability,
      tier: assignTier(score, config.tiers),
      confidence: assessConfidence(input.matchup, imputed, config),
      imputed,
      components,
      multipliers: { park, weather },
      scorer: this.name,
    };
  }
}
