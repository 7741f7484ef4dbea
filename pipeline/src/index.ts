/**
 * @hrcast/pipeline - data fetching, daily runs, prediction log and backtests
 */

// Configuration and errors
export type { AppConfig, LiveCredentials, RunMode, ScorerKind } from './config.js';
export { loadAppConfig, requireLiveCredentials, loadScoringConfig, createScorer, cacheAgeVariable } from './config.js';
export { ConfigurationError, DataUnavailableError, HttpError, MalformedInputError, describeError } from './errors.js';
export { validateMatchup } from './validate.js';

// Cache and HTTP
export { FileCache, CACHE_KINDS, DEFAULT_MAX_AGE_MS } from './cache/file-cache.js';
export type { CacheKind, CacheLookup, FileCacheOptions } from './cache/file-cache.js';
export { withRetry, backoffDelay, isTransientError } from './http/retry.js';
export type { RetryOptions } from './http/retry.js';
export { fetchJson, fetchText, postJson, ResponseShapeError } from './http/fetch-json.js';
export type { FetchLike, HttpOptions } from './http/fetch-json.js';

// Fetchers
export { cachedFetch } from './fetchers/cached-fetch.js';
export type { FetchContext, FetchOutcome, CachedFetchRequest } from './fetchers/cached-fetch.js';
export { MlbStatsClient, homeRunHitters } from './fetchers/mlb-stats.js';
export { SavantClient, parseCsv } from './fetchers/savant.js';
export { WeatherClient, slotNearest } from './fetchers/weather.js';
export { BallparkTable, normalizeVenueName } from './fetchers/venues.js';
export type { Ballpark, VenueLookup } from './fetchers/venues.js';
export { buildSlate, projectLineup, matchupId } from './fetchers/slate.js';
export type { SlateResult } from './fetchers/slate.js';
export { ProfileBuilder } from './fetchers/profiles.js';
export type { ProfileResult, StatsWindow } from './fetchers/profiles.js';
export { createClients } from './clients.js';
export type { Clients, ClientOverrides } from './clients.js';

// Daily run
export { LiveMatchupSource, SampleMatchupSource } from './matchup-source.js';
export type { MatchupSource, MatchupInput } from './matchup-source.js';
export { loadSampleSlate, scoringInputSchema } from './inputs.js';
export { runDaily, formatRunSummary } from './daily-run.js';
export type { DailyRunOptions, RunSummary, Notifier } from './daily-run.js';
export { PredictionLog } from './store/prediction-log.js';
export type { LoggedPrediction, PredictionRecord } from './store/prediction-log.js';
export { updateResults } from './results.js';
export type { ResultsUpdate } from './results.js';

// Notifications
export {
  escapeMarkdownV2,
  formatTierMessages,
  formatPlainText,
  formatErrorAlert,
  chunkMessage,
  TELEGRAM_MESSAGE_LIMIT,
} from './notify/format.js';
export { TelegramNotifier } from './notify/telegram.js';
export type { DeliveryReport, TelegramOptions } from './notify/telegram.js';

// Backtesting
export { runBacktest, backtestDates, formatBacktestReport } from './backtest/runner.js';
export type { BacktestOptions, BacktestReport, BacktestSample } from './backtest/runner.js';
export { PredictionLogSource, MlbHistoricalSource } from './backtest/sources.js';
export type { HistoricalSource, HistoricalDay, HistoricalSample } from './backtest/sources.js';
export { computeMetrics, rocAuc, brierScore, logLoss, calibrationBins, precisionAtN, tierStats } from './backtest/metrics.js';
export type { BacktestMetrics, LabeledResult, TierStats, CalibrationBin } from './backtest/metrics.js';
export { fitFromBacktest, writeScoringOverride } from './backtest/fit.js';
export type { ScoringOverride, FitResult } from './backtest/fit.js';
