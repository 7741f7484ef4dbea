/**
 * Scoring configuration
 *
 * Every constant the scorers use lives here. The numbers are starting
 * defaults meant to be recalibrated from backtests, not fixed truths.
 */

import type { Tier } from './types.js';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export interface Range {
  min: number;
  max: number;
}

export interface TierThreshold {
  tier: Tier;
  min: number;
}

export interface ScoringConfig {
  /** Substituted for any missing profile field */
  leagueAverages: {
    iso: number;
    barrelPct: number;
    xHr: number;
    launchAngle: number;
    recentIso: number;
    recentBarrelPct: number;
    homeRunsLast10: number;
    hrPer9: number;
    barrelPctAllowed: number;
    hardHitPctAllowed: number;
    recentHrPer9: number;
    avgInningsPerStart: number;
    bullpenHrPer9: number;
  };
  /** Min-max reference ranges used to scale raw metrics into [0, 1] */
  ranges: {
    iso: Range;
    barrelPct: Range;
    xHr: Range;
    launchAngle: Range;
    homeRunsLast10: Range;
    hrPer9: Range;
    barrelPctAllowed: Range;
    hardHitPctAllowed: Range;
  };
  weights: {
    components: {
      power: number;
      vulnerability: number;
      form: number;
      pitchMatchup: number;
      platoon: number;
    };
    power: {
      iso: number;
      barrelPct: number;
      xHr: number;
      launchAngle: number;
    };
    vulnerability: {
      hrPer9: number;
      barrelPctAllowed: number;
      hardHitPctAllowed: number;
      recentHrPer9: number;
    };
    form: {
      iso: number;
      barrelPct: number;
      homeRunsLast10: number;
    };
  };
  platoon: {
    switchHitter: number;
    leftVsRight: number;
    rightVsLeft: number;
    sameSide: number;
    unknown: number;
  };
  weather: {
    /** Multiplier gained per mph of wind blowing out to center */
    perMphOut: number;
    maxWindEffect: number;
    baselineTempF: number;
    perDegreeF: number;
    maxTempEffect: number;
    per1000FtElevation: number;
  };
  /** Ordered from highest floor to lowest; the last floor must be 0 */
  tiers: TierThreshold[];
  /** probability = logistic(slope * score + intercept) */
  calibration: {
    slope: number;
    intercept: number;
  };
  confidence: {
    /** More imputed fields than this drops confidence to low */
    lowImputedThreshold: number;
  };
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends (infer U)[]
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = deepFreeze<ScoringConfig>({
  leagueAverages: {
    iso: 0.165,
    barrelPct: 7.5,
    xHr: 0.03,
    launchAngle: 12.5,
    recentIso: 0.165,
    recentBarrelPct: 7.5,
    homeRunsLast10: 1,
    hrPer9: 1.15,
    barrelPctAllowed: 7.5,
    hardHitPctAllowed: 38,
    recentHrPer9: 1.15,
    avgInningsPerStart: 5.5,
    bullpenHrPer9: 1.15,
  },
  ranges: {
    iso: { min: 0.05, max: 0.35 },
    barrelPct: { min: 0, max: 20 },
    xHr: { min: 0, max: 0.1 },
    launchAngle: { min: 0, max: 25 },
    homeRunsLast10: { min: 0, max: 5 },
    hrPer9: { min: 0.5, max: 2.0 },
    barrelPctAllowed: { min: 3, max: 12 },
    hardHitPctAllowed: { min: 28, max: 48 },
  },
  weights: {
    components: {
      power: 0.4,
      vulnerability: 0.25,
      form: 0.15,
      pitchMatchup: 0.1,
      platoon: 0.1,
    },
    power: { iso: 0.35, barrelPct: 0.3, xHr: 0.25, launchAngle: 0.1 },
    vulnerability: {
      hrPer9: 0.5,
      barrelPctAllowed: 0.2,
      hardHitPctAllowed: 0.15,
      recentHrPer9: 0.15,
    },
    form: { iso: 0.5, barrelPct: 0.3, homeRunsLast10: 0.2 },
  },
  platoon: {
    switchHitter: 0.8,
    leftVsRight: 0.6,
    rightVsLeft: 0.7,
    sameSide: 0.4,
    unknown: 0.5,
  },
  weather: {
    perMphOut: 0.01,
    maxWindEffect: 0.15,
    baselineTempF: 70,
    perDegreeF: 0.002,
    maxTempEffect: 0.06,
    per1000FtElevation: 0.01,
  },
  tiers: [
    { tier: 'Lock', min: 0.7 },
    { tier: 'Sleeper', min: 0.5 },
    { tier: 'Risky', min: 0 },
  ],
  calibration: { slope: 6, intercept: -4.4 },
  confidence: { lowImputedThreshold: 4 },
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}

const rangeSchema = z.object({ min: z.number().finite(), max: z.number().finite() }).strict();
const weight = z.number().finite().nonnegative();

const scoringConfigSchema: z.ZodType<ScoringConfig> = z
  .object({
    leagueAverages: z
      .object({
        iso: z.number().finite(),
        barrelPct: z.number().finite(),
        xHr: z.number().finite(),
        launchAngle: z.number().finite(),
        recentIso: z.number().finite(),
        recentBarrelPct: z.number().finite(),
        homeRunsLast10: z.number().finite(),
        hrPer9: z.number().finite(),
        barrelPctAllowed: z.number().finite(),
        hardHitPctAllowed: z.number().finite(),
        recentHrPer9: z.number().finite(),
        avgInningsPerStart: z.number().finite(),
        bullpenHrPer9: z.number().finite(),
      })
      .strict(),
    ranges: z
      .object({
        iso: rangeSchema,
        barrelPct: rangeSchema,
        xHr: rangeSchema,
        launchAngle: rangeSchema,
        homeRunsLast10: rangeSchema,
        hrPer9: rangeSchema,
        barrelPctAllowed: rangeSchema,
        hardHitPctAllowed: rangeSchema,
      })
      .strict(),
    weights: z
      .object({
        components: z
          .object({ power: weight, vulnerability: weight, form: weight, pitchMatchup: weight, platoon: weight })
          .strict(),
        power: z.object({ iso: weight, barrelPct: weight, xHr: weight, launchAngle: weight }).strict(),
        vulnerability: z
          .object({ hrPer9: weight, barrelPctAllowed: weight, hardHitPctAllowed: weight, recentHrPer9: weight })
          .strict(),
        form: z.object({ iso: weight, barrelPct: weight, homeRunsLast10: weight }).strict(),
      })
      .strict(),
    platoon: z
      .object({
        switchHitter: z.number().min(0).max(1),
        leftVsRight: z.number().min(0).max(1),
        rightVsLeft: z.number().min(0).max(1),
        sameSide: z.number().min(0).max(1),
        unknown: z.number().min(0).max(1),
      })
      .strict(),
    weather: z
      .object({
        perMphOut: z.number().finite(),
        maxWindEffect: z.number().finite().nonnegative(),
        baselineTempF: z.number().finite(),
        perDegreeF: z.number().finite(),
        maxTempEffect: z.number().finite().nonnegative(),
        per1000FtElevation: z.number().finite(),
      })
      .strict(),
    tiers: z.array(
      z.object({ tier: z.enum(['Lock', 'Sleeper', 'Risky']), min: z.number().finite() }).strict()
    ),
    calibration: z.object({ slope: z.number().finite(), intercept: z.number().finite() }).strict(),
    confidence: z.object({ lowImputedThreshold: z.number().int().nonnegative() }).strict(),
  })
  .strict();

/**
 * Merge a partial override onto a base value. Objects merge key by key,
 * everything else (numbers, the tier table) is replaced wholesale.
 */
function mergeValue(base: unknown, patch: unknown): unknown {
  if (patch === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(patch)) return patch;

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    merged[key] = mergeValue(base[key], value);
  }
  return merged;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function validateWeightGroup(group: Record<string, number>, label: string): void {
  const sum = Object.values(group).reduce((a, b) => a + b, 0);
  if (sum <= 0) {
    throw new ConfigurationError(`Weights in ${label} sum to 0`);
  }
}

/**
 * Validate the ordered threshold table: strictly descending floors,
 * ending with a floor of 0 so every score lands in a tier.
 */
export function validateTierTable(tiers: TierThreshold[]): void {
  if (tiers.length === 0) {
    throw new ConfigurationError('Tier table is empty');
  }
  for (let i = 1; i < tiers.length; i++) {
    if (tiers[i].min >= tiers[i - 1].min) {
      throw new ConfigurationError(
        `Tier table must be strictly descending: ${tiers[i - 1].tier} (${tiers[i - 1].min}) before ${tiers[i].tier} (${tiers[i].min})`
      );
    }
  }
  if (tiers[tiers.length - 1].min !== 0) {
    throw new ConfigurationError('The last tier must have a floor of 0');
  }
}

export function validateScoringConfig(config: ScoringConfig): void {
  for (const [key, range] of Object.entries(config.ranges)) {
    if (range.min >= range.max) {
      throw new ConfigurationError(`Range ${key} has min ${range.min} >= max ${range.max}`);
    }
  }

  validateWeightGroup(config.weights.components, 'components');
  validateWeightGroup(config.weights.power, 'power');
  validateWeightGroup(config.weights.vulnerability, 'vulnerability');
  validateWeightGroup(config.weights.form, 'form');
  validateTierTable(config.tiers);

  if (config.confidence.lowImputedThreshold < 0) {
    throw new ConfigurationError('confidence.lowImputedThreshold must be >= 0');
  }
}

/**
 * Build an immutable scoring config from defaults plus a partial override.
 * Objects merge key by key; the tier table is replaced wholesale.
 */
export function createScoringConfig(overrides: unknown = {}): ScoringConfig {
  if (!isPlainObject(overrides)) {
    throw new ConfigurationError('Scoring config override must be an object');
  }
  const parsed = scoringConfigSchema.safeParse(mergeValue(DEFAULT_SCORING_CONFIG, overrides));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid scoring config: ${describeIssues(parsed.error)}`);
  }
  validateScoringConfig(parsed.data);
  return deepFreeze(parsed.data);
}
