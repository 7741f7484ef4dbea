/**
 * Wiring: build the cache, fetch context and API clients from AppConfig
 */

import { FileCache } from './cache/file-cache.js';
import type { AppConfig } from './config.js';
import type { FetchContext } from './fetchers/cached-fetch.js';
import { MlbStatsClient } from './fetchers/mlb-stats.js';
import { ProfileBuilder } from './fetchers/profiles.js';
import { SavantClient } from './fetchers/savant.js';
import { BallparkTable } from './fetchers/venues.js';
import { WeatherClient } from './fetchers/weather.js';
import type { FetchLike, HttpOptions } from './http/fetch-json.js';

export interface Clients {
  ctx: FetchContext;
  http: HttpOptions;
  mlb: MlbStatsClient;
  savant: SavantClient;
  weather: WeatherClient | null;
  ballparks: BallparkTable;
  profiles: ProfileBuilder;
}

export interface ClientOverrides {
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  ballparks?: BallparkTable;
}

export function createClients(config: AppConfig, overrides: ClientOverrides = {}): Clients {
  const cache = new FileCache({ dir: config.cacheDir, maxAgeMs: config.cacheMaxAgeMs, now: overrides.now });
  const ctx: FetchContext = {
    cache,
    retry: {
      maxAttempts: config.fetch.maxAttempts,
      baseDelayMs: config.fetch.baseDelayMs,
      sleep: overrides.sleep,
    },
  };
  const http: HttpOptions = { fetch: overrides.fetch, timeoutMs: config.fetch.timeoutMs };

  const mlb = new MlbStatsClient({ ctx, http });
  const savant = new SavantClient({ ctx, http });
  const apiKey = config.credentials.openWeatherApiKey;
  const weather = apiKey === null ? null : new WeatherClient({ ctx, http, apiKey });
  const ballparks = overrides.ballparks ?? BallparkTable.load();

  return {
    ctx,
    http,
    mlb,
    savant,
    weather,
    ballparks,
    profiles: new ProfileBuilder({ mlb, ballparks, savant, weather }),
  };
}
