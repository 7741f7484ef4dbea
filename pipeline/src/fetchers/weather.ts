/**
 * OpenWeather 5-day / 3-hour forecast client
 */

import { z } from 'zod';
import { fetchJson, type HttpOptions } from '../http/fetch-json.js';
import { cachedFetch, type FetchContext, type FetchOutcome } from './cached-fetch.js';

export const OPENWEATHER_FORECAST_URL = 'https://api.openweathermap.org/data/2.5/forecast';

export const forecastSchema = z.object({
  list: z.array(
    z.object({
      dt: z.number(),
      main: z.object({ temp: z.number() }),
      wind: z.object({ speed: z.number(), deg: z.number().optional() }),
    })
  ),
});

export type Forecast = z.infer<typeof forecastSchema>;

export interface GameWeather {
  temperatureF: number | null;
  windSpeedMph: number | null;
  windFromDeg: number | null;
}

const NO_WEATHER: GameWeather = { temperatureF: null, windSpeedMph: null, windFromDeg: null };

export interface WeatherClientOptions {
  ctx: FetchContext;
  http: HttpOptions;
  apiKey: string;
  baseUrl?: string;
}

/**
 * Forecast slot closest to first pitch. Slots are 3 hours apart, so
 * anything more than 3 hours off means the forecast does not reach the game.
 */
export function slotNearest(forecast: Forecast, gameTime: string): GameWeather {
  const target = Date.parse(gameTime) / 1000;
  if (!Number.isFinite(target) || forecast.list.length === 0) return NO_WEATHER;

  let best = forecast.list[0];
  for (const slot of forecast.list) {
    if (Math.abs(slot.dt - target) < Math.abs(best.dt - target)) {
      best = slot;
    }
  }
  if (Math.abs(best.dt - target) > 3 * 3600) return NO_WEATHER;

  return {
    temperatureF: best.main.temp,
    windSpeedMph: best.wind.speed,
    windFromDeg: best.wind.deg ?? null,
  };
}

export class WeatherClient {
  private readonly ctx: FetchContext;
  private readonly http: HttpOptions;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: WeatherClientOptions) {
    this.ctx = options.ctx;
    this.http = options.http;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? OPENWEATHER_FORECAST_URL;
  }

  forecast(lat: number, lon: number): Promise<FetchOutcome<Forecast>> {
    const url = `${this.baseUrl}?lat=${lat}&lon=${lon}&units=imperial&appid=${encodeURIComponent(this.apiKey)}`;
    return cachedFetch(this.ctx, {
      kind: 'weather',
      key: `forecast:${lat.toFixed(3)},${lon.toFixed(3)}`,
      source: 'openweather',
      schema: forecastSchema,
      fallback: { list: [] },
      load: () => fetchJson(url, forecastSchema, this.http),
    });
  }

  async forGame(lat: number, lon: number, gameTime: string): Promise<FetchOutcome<GameWeather>> {
    const outcome = await this.forecast(lat, lon);
    return { ...outcome, value: slotNearest(outcome.value, gameTime) };
  }
}
