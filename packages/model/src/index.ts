/**
 * @hrcast/model - Home Run Likelihood Scoring Engine
 *
 * Combines batter power, pitcher vulnerability, recent form, pitch-type
 * matchup and platoon advantage into one score per batter-vs-starter
 * matchup, adjusted for park and weather, then tiers it.
 *
 * Two interchangeable scorers share the HrScorer interface:
 * - RuleBasedScorer: weighted normalized signals with a logistic calibration
 * - TreeEnsembleScorer: an exported gradient-boosted tree model
 */

// Core types
export type {
  BatSide,
  ThrowHand,
  PitcherStatus,
  LineupStatus,
  Tier,
  Confidence,
  PlayerRef,
  VenueRef,
  Matchup,
  BatterProfile,
  PitcherProfile,
  ParkFactor,
  WeatherAdjustment,
  ScoringInput,
  ComponentSignals,
  ScoreResult,
  HrScorer,
} from './types.js';
export { COMPONENT_KEYS } from './types.js';

// Configuration
export type { Range, TierThreshold, ScoringConfig, DeepPartial } from './config.js';
export {
  DEFAULT_SCORING_CONFIG,
  createScoringConfig,
  validateScoringConfig,
  validateTierTable,
} from './config.js';
export { ConfigurationError } from './errors.js';

// Scorers
export { RuleBasedScorer } from './RuleBasedScorer.js';
export { TreeEnsembleScorer, FEATURE_EXTRACTORS } from './TreeEnsembleScorer.js';
export type { TreeEnsembleModel, TreeNode, LeafNode, SplitNode, TreeInfo } from './TreeEnsembleScorer.js';

// Scoring building blocks
export { assignTier, tierRank, rankResults } from './tiers.js';
export { assessConfidence } from './confidence.js';
export {
	resolveInputs,
	computeSignals,
	powerSignal,
	formSignal,
	vulnerabilitySignal,
	starterVulnerability,
	pitchMatchupIso,
	pitchMatchupSignal,
	platoonSignal,
	windOutMph,
	weatherMultiplier,
	parkMultiplier
} from './signals/index.js';
export type {
	ResolvedBatter,
	ResolvedPitcher,
	ResolvedEnvironment,
	ResolvedInputs,
	Resolution
} from './signals/index.js';

// Fitting
export { fitLogistic, fitCalibration, fitComponentWeights } from './fitting.js';
export type { FitOptions, LogisticFit, CalibrationSample, ComponentSample } from './fitting.js';

// Utility functions
export { clamp, minMax, weightedMean, logistic, isFiniteNumber, round } from './utils.js';
