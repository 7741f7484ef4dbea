/**
 * MLB Stats API client (statsapi.mlb.com)
 *
 * Every call goes through cachedFetch, so a failing endpoint yields an empty
 * but well-typed payload and a degraded flag instead of an exception.
 */

import { z } from 'zod';
import type { CacheKind } from '../cache/file-cache.js';
import { fetchJson, type HttpOptions } from '../http/fetch-json.js';
import { cachedFetch, type FetchContext, type FetchOutcome } from './cached-fetch.js';

export const MLB_STATS_BASE_URL = 'https://statsapi.mlb.com/api/v1';

const SOURCE = 'mlb-stats';

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const personRefSchema = z.object({ id: z.number(), fullName: z.string() });

const scheduleTeamSchema = z.object({
  team: z.object({ id: z.number(), name: z.string() }),
  probablePitcher: personRefSchema.optional(),
});

const scheduleGameSchema = z.object({
  gamePk: z.number(),
  gameDate: z.string(),
  officialDate: z.string().optional(),
  status: z.object({ abstractGameState: z.string().optional(), detailedState: z.string() }).optional(),
  venue: z.object({ id: z.number(), name: z.string() }),
  teams: z.object({ away: scheduleTeamSchema, home: scheduleTeamSchema }),
  lineups: z
    .object({
      homePlayers: z.array(personRefSchema).optional(),
      awayPlayers: z.array(personRefSchema).optional(),
    })
    .optional(),
});

export const scheduleSchema = z.object({
  dates: z.array(z.object({ date: z.string(), games: z.array(scheduleGameSchema) })),
});

export const rosterSchema = z.object({
  roster: z.array(
    z.object({
      person: personRefSchema,
      position: z.object({ abbreviation: z.string(), type: z.string() }),
    })
  ),
});

export const peopleSchema = z.object({
  people: z.array(
    z.object({
      id: z.number(),
      fullName: z.string(),
      batSide: z.object({ code: z.string() }).optional(),
      pitchHand: z.object({ code: z.string() }).optional(),
    })
  ),
});

/** Rate stats come back as strings like ".265" */
const rateString = z.union([z.string(), z.number()]).optional();

const statLineSchema = z.object({
  avg: rateString,
  slg: rateString,
  atBats: z.number().optional(),
  plateAppearances: z.number().optional(),
  hits: z.number().optional(),
  doubles: z.number().optional(),
  triples: z.number().optional(),
  homeRuns: z.number().optional(),
  inningsPitched: z.union([z.string(), z.number()]).optional(),
  gamesStarted: z.number().optional(),
  battersFaced: z.number().optional(),
});

export type StatLine = z.infer<typeof statLineSchema>;

export const statsSchema = z.object({
  stats: z.array(
    z.object({
      type: z.object({ displayName: z.string() }),
      splits: z.array(
        z.object({
          date: z.string().optional(),
          stat: statLineSchema,
        })
      ),
    })
  ),
});

export const boxscoreSchema = z.object({
  teams: z.object({
    away: z.object({
      players: z.record(
        z.object({
          person: personRefSchema,
          stats: z.object({ batting: z.object({ homeRuns: z.number().optional() }).optional() }).optional(),
        })
      ),
    }),
    home: z.object({
      players: z.record(
        z.object({
          person: personRefSchema,
          stats: z.object({ batting: z.object({ homeRuns: z.number().optional() }).optional() }).optional(),
        })
      ),
    }),
  }),
});

export type ScheduleResponse = z.infer<typeof scheduleSchema>;
export type ScheduleGame = z.infer<typeof scheduleGameSchema>;
export type RosterResponse = z.infer<typeof rosterSchema>;
export type PeopleResponse = z.infer<typeof peopleSchema>;
export type StatsResponse = z.infer<typeof statsSchema>;
export type BoxscoreResponse = z.infer<typeof boxscoreSchema>;

// ============================================================================
// STAT HELPERS
// ============================================================================

export function parseRate(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Innings are reported in thirds notation: "123.2" is 123⅔ innings
 */
export function parseInnings(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const text = String(value);
  const [whole, thirds = '0'] = text.split('.');
  const innings = parseInt(whole, 10) + parseInt(thirds, 10) / 3;
  return Number.isFinite(innings) ? innings : null;
}

/**
 * Splits of one stat type ("season", "gameLog", "byDateRange"), in feed order
 */
export function splitsOf(response: StatsResponse, type: string): StatsResponse['stats'][number]['splits'] {
  return response.stats.find((group) => group.type.displayName === type)?.splits ?? [];
}

// ============================================================================
// CLIENT
// ============================================================================

export interface MlbStatsClientOptions {
  ctx: FetchContext;
  http: HttpOptions;
  baseUrl?: string;
}

export class MlbStatsClient {
  private readonly ctx: FetchContext;
  private readonly http: HttpOptions;
  private readonly baseUrl: string;

  constructor(options: MlbStatsClientOptions) {
    this.ctx = options.ctx;
    this.http = options.http;
    this.baseUrl = options.baseUrl ?? MLB_STATS_BASE_URL;
  }

  schedule(date: string): Promise<FetchOutcome<ScheduleResponse>> {
    const url = `${this.baseUrl}/schedule?sportId=1&date=${date}&hydrate=probablePitcher,lineups,venue,team`;
    return this.get('schedule', `schedule:${date}`, url, scheduleSchema, { dates: [] });
  }

  activeRoster(teamId: string): Promise<FetchOutcome<RosterResponse>> {
    const url = `${this.baseUrl}/teams/${teamId}/roster/active`;
    return this.get('roster', `roster:${teamId}`, url, rosterSchema, { roster: [] });
  }

  person(personId: string): Promise<FetchOutcome<PeopleResponse>> {
    const url = `${this.baseUrl}/people/${personId}`;
    return this.get('person', `person:${personId}`, url, peopleSchema, { people: [] });
  }

  /** Season line plus game log */
  hittingStats(personId: string, season: number): Promise<FetchOutcome<StatsResponse>> {
    const url = `${this.baseUrl}/people/${personId}/stats?stats=season,gameLog&group=hitting&season=${season}`;
    return this.get('player-stats', `hitting:${personId}:${season}`, url, statsSchema, { stats: [] });
  }

  pitchingStats(personId: string, season: number): Promise<FetchOutcome<StatsResponse>> {
    const url = `${this.baseUrl}/people/${personId}/stats?stats=season,gameLog&group=pitching&season=${season}`;
    return this.get('player-stats', `pitching:${personId}:${season}`, url, statsSchema, { stats: [] });
  }

  /** Team staff pitching line, the bullpen HR/9 proxy */
  bullpenStats(teamId: string, season: number): Promise<FetchOutcome<StatsResponse>> {
    const url = `${this.baseUrl}/teams/${teamId}/stats?stats=season&group=pitching&season=${season}`;
    return this.get('player-stats', `team-pitching:${teamId}:${season}`, url, statsSchema, { stats: [] });
  }

  hittingStatsByRange(personId: string, start: string, end: string): Promise<FetchOutcome<StatsResponse>> {
    const url = `${this.baseUrl}/people/${personId}/stats?stats=byDateRange,gameLog&group=hitting&startDate=${start}&endDate=${end}`;
    return this.get('player-stats', `hitting:${personId}:${start}:${end}`, url, statsSchema, { stats: [] });
  }

  pitchingStatsByRange(personId: string, start: string, end: string): Promise<FetchOutcome<StatsResponse>> {
    const url = `${this.baseUrl}/people/${personId}/stats?stats=byDateRange,gameLog&group=pitching&startDate=${start}&endDate=${end}`;
    return this.get('player-stats', `pitching:${personId}:${start}:${end}`, url, statsSchema, { stats: [] });
  }

  boxscore(gamePk: string): Promise<FetchOutcome<BoxscoreResponse>> {
    const url = `${this.baseUrl}/game/${gamePk}/boxscore`;
    const empty: BoxscoreResponse = { teams: { away: { players: {} }, home: { players: {} } } };
    return this.get('boxscore', `boxscore:${gamePk}`, url, boxscoreSchema, empty);
  }

  private get<T>(
    kind: CacheKind,
    key: string,
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: T
  ): Promise<FetchOutcome<T>> {
    return cachedFetch(this.ctx, {
      kind,
      key,
      source: SOURCE,
      schema,
      fallback,
      load: () => fetchJson(url, schema, this.http),
    });
  }
}

// Postponed and cancelled games also report abstractGameState "Final"
const FINISHED_STATES = ['Final', 'Game Over', 'Completed Early'];

/**
 * True once a game is over and its box score will not change
 */
export function isGameFinal(game: ScheduleGame): boolean {
  const state = game.status?.detailedState;
  if (state === undefined) return false;
  return FINISHED_STATES.some((finished) => state === finished || state.startsWith(`${finished}:`));
}

/**
 * Game ids of a date's finished games
 */
export function finalGameIds(schedule: ScheduleResponse, date: string): Set<string> {
  const ids = new Set<string>();
  for (const day of schedule.dates) {
    if (day.date !== date) continue;
    for (const game of day.games) {
      if (isGameFinal(game)) ids.add(String(game.gamePk));
    }
  }
  return ids;
}

/**
 * Player ids with at least one home run in a box score
 */
export function homeRunHitters(boxscore: BoxscoreResponse): Set<string> {
  const hitters = new Set<string>();
  for (const side of [boxscore.teams.away, boxscore.teams.home]) {
    for (const player of Object.values(side.players)) {
      if ((player.stats?.batting?.homeRuns ?? 0) > 0) {
        hitters.add(String(player.person.id));
      }
    }
  }
  return hitters;
}
