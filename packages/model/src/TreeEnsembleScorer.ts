/**
 * Tree-ensemble HR scorer
 *
 * Evaluates a gradient-boosted binary classifier exported with LightGBM's
 * `dump_model()` (trimmed to the fields inference needs). Trees are walked
 * in plain TypeScript, the leaf values summed and passed through a sigmoid.
 *
 * Features are looked up by name from the same resolved inputs the rule-based
 * scorer uses, so imputation and confidence behave identically.
 */

import { z } from 'zod';
import type { ScoringConfig, TierThreshold } from './config.js';
import { DEFAULT_SCORING_CONFIG, validateTierTable } from './config.js';
import { assessConfidence } from './confidence.js';
import { ConfigurationError } from './errors.js';
import {
  computeSignals,
  parkMultiplier,
  pitchMatchupIso,
  platoonSignal,
  resolveInputs,
  weatherMultiplier,
  windOutMph,
  type ResolvedInputs,
} from './signals/index.js';
import { assignTier } from './tiers.js';
import type { HrScorer, ScoreResult, ScoringInput } from './types.js';
import { clamp, logistic } from './utils.js';

// ============================================================================
// MODEL FORMAT
// ============================================================================

export interface LeafNode {
  leaf_value: number;
}

export interface SplitNode {
  split_feature: number;
  threshold: number;
  /** Direction for a missing (NaN) feature value */
  default_left?: boolean;
  left_child: TreeNode;
  right_child: TreeNode;
}

export type TreeNode = LeafNode | SplitNode;

export interface TreeInfo {
  tree_index: number;
  tree_structure: TreeNode;
}

export interface TreeEnsembleModel {
  name?: string;
  feature_names: string[];
  tree_info: TreeInfo[];
  /** Optional tier ladder over the model's probability output */
  tier_thresholds?: TierThreshold[];
}

const leafSchema = z.object({ leaf_value: z.number().finite() });

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    leafSchema,
    z.object({
      split_feature: z.number().int().nonnegative(),
      threshold: z.number(),
      default_left: z.boolean().optional(),
      left_child: treeNodeSchema,
      right_child: treeNodeSchema,
    }),
  ])
);

const modelSchema = z.object({
  name: z.string().optional(),
  feature_names: z.array(z.string()).min(1),
  tree_info: z.array(z.object({ tree_index: z.number().int(), tree_structure: treeNodeSchema })),
  tier_thresholds: z
    .array(z.object({ tier: z.enum(['Lock', 'Sleeper', 'Risky']), min: z.number().finite() }))
    .optional(),
});

// ============================================================================
// FEATURES
// ============================================================================

type FeatureExtractor = (inputs: ResolvedInputs, config: ScoringConfig) => number;

/**
 * Feature names a model may reference, and how each is built
 */
export const FEATURE_EXTRACTORS: Readonly<Record<string, FeatureExtractor>> = {
  iso: ({ batter }) => batter.iso,
  barrel_pct: ({ batter }) => batter.barrelPct,
  xhr: ({ batter }) => batter.xHr,
  launch_angle: ({ batter }) => batter.launchAngle,
  recent_iso: ({ batter }) => batter.recentIso,
  hr_last_10: ({ batter }) => batter.homeRunsLast10,
  hr_per_9: ({ pitcher }) => pitcher.hrPer9,
  barrel_pct_allowed: ({ pitcher }) => pitcher.barrelPctAllowed,
  hard_hit_pct_allowed: ({ pitcher }) => pitcher.hardHitPctAllowed,
  park_factor: ({ environment }) => environment.parkFactor,
  wind_out_mph: ({ environment }) => windOutMph(environment),
  temperature_f: ({ environment }, config) =>
    environment.dome || environment.temperatureF === null ? config.weather.baselineTempF : environment.temperatureF,
  pitch_matchup: ({ batter, pitcher }) => pitchMatchupIso(batter, pitcher),
  platoon: ({ batter, pitcher }, config) => platoonSignal(batter.bats, pitcher.throws, config),
};

// ============================================================================
// TREE TRAVERSAL
// ============================================================================

/**
 * Walk one tree to its leaf. LightGBM sends `value <= threshold` left;
 * missing values follow `default_left`.
 */
function traverseTree(node: TreeNode, features: number[]): number {
  let current = node;
  while (!('leaf_value' in current)) {
    const value = features[current.split_feature];
    const goLeft = Number.isNaN(value) ? current.default_left === true : value <= current.threshold;
    current = goLeft ? current.left_child : current.right_child;
  }
  return current.leaf_value;
}

function maxSplitFeature(node: TreeNode): number {
  if ('leaf_value' in node) return -1;
  return Math.max(node.split_feature, maxSplitFeature(node.left_child), maxSplitFeature(node.right_child));
}

// ============================================================================
// SCORER
// ============================================================================

export class TreeEnsembleScorer implements HrScorer {
  readonly name: string;
  private readonly model: TreeEnsembleModel;
  private readonly config: ScoringConfig;
  private readonly extractors: FeatureExtractor[];
  private readonly tiers: readonly TierThreshold[];

  constructor(model: TreeEnsembleModel, config: ScoringConfig = DEFAULT_SCORING_CONFIG) {
    this.model = model;
    this.config = config;
    this.name = `model:${model.name ?? 'tree-ensemble'}`;

    this.extractors = model.feature_names.map((feature) => {
      if (!Object.prototype.hasOwnProperty.call(FEATURE_EXTRACTORS, feature)) {
        throw new ConfigurationError(`Model references unknown feature "${feature}"`);
      }
      return FEATURE_EXTRACTORS[feature];
    });

    for (const tree of model.tree_info) {
      if (maxSplitFeature(tree.tree_structure) >= model.feature_names.length) {
        throw new ConfigurationError(`Tree ${tree.tree_index} splits on a feature index outside feature_names`);
      }
    }

    if (model.tier_thresholds) {
      validateTierTable(model.tier_thresholds);
      this.tiers = model.tier_thresholds;
    } else {
      this.tiers = config.tiers;
    }
  }

  /**
   * Validate a parsed JSON model file and build a scorer from it
   */
  static fromJSON(json: unknown, config: ScoringConfig = DEFAULT_SCORING_CONFIG): TreeEnsembleScorer {
    const parsed = modelSchema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ConfigurationError(`Invalid tree-ensemble model: ${detail}`);
    }
    return new TreeEnsembleScorer(parsed.data, config);
  }

  /**
   * Feature vector in the model's feature order
   */
  features(inputs: ResolvedInputs): number[] {
    return this.extractors.map((extract) => extract(inputs, this.config));
  }

  /** Sum of leaf values before the sigmoid */
  rawScore(features: number[]): number {
    let total = 0;
    for (const tree of this.model.tree_info) {
      total += traverseTree(tree.tree_structure, features);
    }
    return total;
  }

  score(input: ScoringInput): ScoreResult {
    const { config } = this;
    const { resolved, imputed } = resolveInputs(input, config);

    const probability = logistic(clamp(this.rawScore(this.features(resolved)), -500, 500));
    const score = clamp(probability, 0, 1);

    return {
      matchupId: input.matchup.id,
      matchup: input.matchup,
      score,
      probability,
      tier: assignTier(score, this.tiers),
      confidence: assessConfidence(input.matchup, imputed, config),
      imputed,
      components: computeSignals(resolved, config),
      multipliers: {
        park: parkMultiplier(resolved.environment),
        weather: weatherMultiplier(resolved.environment, config),
      },
      scorer: this.name,
    };
  }
}
