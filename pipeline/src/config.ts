/**
 * Application configuration
 *
 * Read once from the environment (a .env file is loaded by the CLI through
 * dotenv), validated with zod and frozen. Nothing else reads process.env.
 */

import * as fs from 'fs';
import { z } from 'zod';
import {
  createScoringConfig,
  RuleBasedScorer,
  TreeEnsembleScorer,
  type HrScorer,
  type ScoringConfig,
  type TierThreshold,
} from '@hrcast/model';
import { CACHE_KINDS, type CacheKind } from './cache/file-cache.js';
import { ConfigurationError } from './errors.js';

export type RunMode = 'live' | 'test';
export type ScorerKind = 'rules' | 'model';

export interface AppConfig {
  mode: RunMode;
  cacheDir: string;
  dbPath: string;
  topN: number;
  scorer: ScorerKind;
  modelPath: string | null;
  scoringConfigPath: string | null;
  tierOverrides: { lock: number | null; sleeper: number | null };
  fetch: {
    maxAttempts: number;
    baseDelayMs: number;
    timeoutMs: number;
  };
  cacheMaxAgeMs: Partial<Record<CacheKind, number>>;
  credentials: {
    openWeatherApiKey: string | null;
    telegramBotToken: string | null;
    telegramChatId: string | null;
  };
}

export interface LiveCredentials {
  openWeatherApiKey: string;
  telegramBotToken: string;
  telegramChatId: string;
}

// Empty strings in .env files mean "unset"
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? null : value.trim()));

const optionalNumber = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()))
  .pipe(z.coerce.number().finite().optional());

const envSchema = z.object({
  HRCAST_MODE: z.enum(['live', 'test']).default('live'),
  HRCAST_CACHE_DIR: z.string().min(1).default('cache'),
  HRCAST_DB_PATH: z.string().min(1).default('results/predictions.sqlite'),
  HRCAST_TOP_N: z.coerce.number().int().positive().default(10),
  HRCAST_SCORER: z.enum(['rules', 'model']).default('rules'),
  HRCAST_MODEL_PATH: optionalString,
  HR_SCORING_CONFIG: optionalString,
  HR_TIER_LOCK: optionalNumber,
  HR_TIER_SLEEPER: optionalNumber,
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  FETCH_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(500),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  OPENWEATHER_API_KEY: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
});

/**
 * CACHE_MAX_AGE_PLAYER_STATS_MINUTES for the 'player-stats' kind, etc.
 */
export function cacheAgeVariable(kind: CacheKind): string {
  return `CACHE_MAX_AGE_${kind.toUpperCase().replace(/-/g, '_')}_MINUTES`;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: { mode?: RunMode } = {}
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  const cacheMaxAgeMs: Partial<Record<CacheKind, number>> = {};
  for (const kind of CACHE_KINDS) {
    const name = cacheAgeVariable(kind);
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const minutes = Number(raw);
    if (!Number.isFinite(minutes) || minutes < 0) {
      throw new ConfigurationError(`${name} must be a non-negative number of minutes, got "${raw}"`);
    }
    cacheMaxAgeMs[kind] = minutes * 60 * 1000;
  }

  if (vars.HRCAST_SCORER === 'model' && vars.HRCAST_MODEL_PATH === null) {
    throw new ConfigurationError('HRCAST_SCORER=model requires HRCAST_MODEL_PATH');
  }

  return Object.freeze({
    mode: overrides.mode ?? vars.HRCAST_MODE,
    cacheDir: vars.HRCAST_CACHE_DIR,
    dbPath: vars.HRCAST_DB_PATH,
    topN: vars.HRCAST_TOP_N,
    scorer: vars.HRCAST_SCORER,
    modelPath: vars.HRCAST_MODEL_PATH,
    scoringConfigPath: vars.HR_SCORING_CONFIG,
    tierOverrides: { lock: vars.HR_TIER_LOCK ?? null, sleeper: vars.HR_TIER_SLEEPER ?? null },
    fetch: {
      maxAttempts: vars.FETCH_MAX_ATTEMPTS,
      baseDelayMs: vars.FETCH_BACKOFF_BASE_MS,
      timeoutMs: vars.FETCH_TIMEOUT_MS,
    },
    cacheMaxAgeMs,
    credentials: {
      openWeatherApiKey: vars.OPENWEATHER_API_KEY,
      telegramBotToken: vars.TELEGRAM_BOT_TOKEN,
      telegramChatId: vars.TELEGRAM_CHAT_ID,
    },
  });
}

/**
 * Live runs need every credential up front so a missing one fails before
 * any fetching or scoring.
 */
export function requireLiveCredentials(config: AppConfig): LiveCredentials {
  const { openWeatherApiKey, telegramBotToken, telegramChatId } = config.credentials;
  const missing: string[] = [];
  if (openWeatherApiKey === null) missing.push('OPENWEATHER_API_KEY');
  if (telegramBotToken === null) missing.push('TELEGRAM_BOT_TOKEN');
  if (telegramChatId === null) missing.push('TELEGRAM_CHAT_ID');

  if (openWeatherApiKey === null || telegramBotToken === null || telegramChatId === null) {
    throw new ConfigurationError(`Missing credentials for a live run: ${missing.join(', ')}`);
  }
  return { openWeatherApiKey, telegramBotToken, telegramChatId };
}

function readJsonFile(file: string, label: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${label} ${file}: ${String(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`${label} ${file} is not valid JSON: ${String(error)}`);
  }
}

function withTierOverrides(tiers: readonly TierThreshold[], lock: number | null, sleeper: number | null): TierThreshold[] {
  return tiers.map((row) => {
    if (row.tier === 'Lock' && lock !== null) return { tier: row.tier, min: lock };
    if (row.tier === 'Sleeper' && sleeper !== null) return { tier: row.tier, min: sleeper };
    return { tier: row.tier, min: row.min };
  });
}

/**
 * Defaults, then the HR_SCORING_CONFIG file, then HR_TIER_* thresholds
 */
export function loadScoringConfig(config: AppConfig): ScoringConfig {
  const fileOverrides: unknown = config.scoringConfigPath
    ? readJsonFile(config.scoringConfigPath, 'scoring config')
    : {};
  const base = createScoringConfig(fileOverrides);

  const { lock, sleeper } = config.tierOverrides;
  if (lock === null && sleeper === null) return base;

  return createScoringConfig({ ...base, tiers: withTierOverrides(base.tiers, lock, sleeper) });
}

export function createScorer(config: AppConfig, scoring: ScoringConfig): HrScorer {
  if (config.scorer === 'rules') {
    return new RuleBasedScorer(scoring);
  }
  if (config.modelPath === null) {
    throw new ConfigurationError('HRCAST_SCORER=model requires HRCAST_MODEL_PATH');
  }
  return TreeEnsembleScorer.fromJSON(readJsonFile(config.modelPath, 'model file'), scoring);
}
