/**
 * Profile assembly: gather everything the scorer needs for one matchup
 */

import type {
  BatSide,
  BatterProfile,
  Matchup,
  PitcherProfile,
  ScoringInput,
  ThrowHand,
  WeatherAdjustment,
} from '@hrcast/model';
import { format, parseISO, subDays } from 'date-fns';
import type { FetchOutcome } from './cached-fetch.js';
import {
  parseInnings,
  parseRate,
  splitsOf,
  type MlbStatsClient,
  type StatLine,
  type StatsResponse,
} from './mlb-stats.js';
import type { SavantClient } from './savant.js';
import type { BallparkTable } from './venues.js';
import type { WeatherClient } from './weather.js';

export const RECENT_GAMES = 10;
export const RECENT_STARTS = 5;
/** Days of batted balls behind recent barrel% */
export const RECENT_BARREL_DAYS = 30;

export interface ProfileResult {
  input: ScoringInput;
  degradedSources: string[];
}

/**
 * Stats window. `season` reads full-season lines plus Savant leaderboards
 * and the last RECENT_BARREL_DAYS of batted balls;
 * `range` reads only games in [start, end], which keeps backtests free of
 * information from after the game being replayed.
 */
export type StatsWindow = { kind: 'season' } | { kind: 'range'; start: string; end: string };

export interface ProfileBuilderOptions {
  mlb: MlbStatsClient;
  ballparks: BallparkTable;
  savant?: SavantClient | null;
  weather?: WeatherClient | null;
}

// ============================================================================
// STAT DERIVATIONS
// ============================================================================

export function isoFromLine(line: StatLine | undefined): number | null {
  if (!line) return null;
  const slg = parseRate(line.slg);
  const avg = parseRate(line.avg);
  return slg !== null && avg !== null ? slg - avg : null;
}

/**
 * Recent form over the last `games` game-log entries
 */
export function recentHitting(
  gameLog: { stat: StatLine }[],
  games: number = RECENT_GAMES
): { iso: number | null; homeRuns: number | null } {
  const window = gameLog.slice(-games);
  if (window.length === 0) return { iso: null, homeRuns: null };

  let atBats = 0;
  let extraBases = 0;
  let homeRuns = 0;
  for (const { stat } of window) {
    const hr = stat.homeRuns ?? 0;
    atBats += stat.atBats ?? 0;
    extraBases += (stat.doubles ?? 0) + 2 * (stat.triples ?? 0) + 3 * hr;
    homeRuns += hr;
  }
  return { iso: atBats > 0 ? extraBases / atBats : null, homeRuns };
}

export function hrPer9(line: { homeRuns?: number; inningsPitched?: string | number } | undefined): number | null {
  if (!line) return null;
  const innings = parseInnings(line.inningsPitched);
  if (innings === null || innings <= 0 || line.homeRuns === undefined) return null;
  return (line.homeRuns * 9) / innings;
}

export function recentHrPer9(gameLog: { stat: StatLine }[], starts: number = RECENT_STARTS): number | null {
  const window = gameLog.slice(-starts);
  let homeRuns = 0;
  let innings = 0;
  for (const { stat } of window) {
    homeRuns += stat.homeRuns ?? 0;
    innings += parseInnings(stat.inningsPitched) ?? 0;
  }
  return innings > 0 ? (homeRuns * 9) / innings : null;
}

export function avgInningsPerStart(line: StatLine | undefined): number | null {
  if (!line || !line.gamesStarted) return null;
  const innings = parseInnings(line.inningsPitched);
  return innings === null ? null : innings / line.gamesStarted;
}

function batSide(code: string | undefined): BatSide | null {
  return code === 'L' || code === 'R' || code === 'S' ? code : null;
}

function throwHand(code: string | undefined): ThrowHand | null {
  return code === 'L' || code === 'R' ? code : null;
}

// ============================================================================
// BUILDER
// ============================================================================

export class ProfileBuilder {
  private readonly mlb: MlbStatsClient;
  private readonly ballparks: BallparkTable;
  private readonly savant: SavantClient | null;
  private readonly weather: WeatherClient | null;

  constructor(options: ProfileBuilderOptions) {
    this.mlb = options.mlb;
    this.ballparks = options.ballparks;
    this.savant = options.savant ?? null;
    this.weather = options.weather ?? null;
  }

  async forMatchup(matchup: Matchup, window: StatsWindow = { kind: 'season' }): Promise<ProfileResult> {
    const degradedSources: string[] = [];
    const track = <T>(label: string, outcome: FetchOutcome<T>): T => {
      if (outcome.degraded) degradedSources.push(label);
      return outcome.value;
    };

    const season = parseInt(matchup.gameDate.slice(0, 4), 10);
    const batter = await this.batterProfile(matchup.batter.id, matchup.gameDate, season, window, track);
    const pitcher = await this.pitcherProfile(matchup.pitcher.id, matchup.pitcher.teamId, season, window, track);

    const { park, location } = this.ballparks.lookup(matchup.venue.name);
    let weather: WeatherAdjustment = {
      windSpeedMph: null,
      windFromDeg: null,
      temperatureF: null,
      elevationFt: location?.elevationFt ?? null,
    };
    if (this.weather && location && !park.dome) {
      const forecast = track(
        `openweather:${matchup.venue.name}`,
        await this.weather.forGame(location.lat, location.lon, matchup.gameTime)
      );
      weather = { ...forecast, elevationFt: location.elevationFt };
    }

    return {
      input: { matchup, batter, pitcher, park, weather },
      degradedSources,
    };
  }

  private async batterProfile(
    batterId: string,
    gameDate: string,
    season: number,
    window: StatsWindow,
    track: <T>(label: string, outcome: FetchOutcome<T>) => T
  ): Promise<BatterProfile> {
    const stats: StatsResponse = track(
      `mlb-stats:hitting:${batterId}`,
      window.kind === 'season'
        ? await this.mlb.hittingStats(batterId, season)
        : await this.mlb.hittingStatsByRange(batterId, window.start, window.end)
    );
    const line = splitsOf(stats, window.kind === 'season' ? 'season' : 'byDateRange')[0]?.stat;
    const recent = recentHitting(splitsOf(stats, 'gameLog'));

    const person = track(`mlb-stats:person:${batterId}`, await this.mlb.person(batterId));

    const profile: BatterProfile = {
      iso: isoFromLine(line),
      barrelPct: null,
      xHr: null,
      launchAngle: null,
      bats: batSide(person.people[0]?.batSide?.code),
      recent: { iso: recent.iso, barrelPct: null, homeRunsLast10: recent.homeRuns },
      isoByPitchType: {},
    };

    if (this.savant && window.kind === 'season') {
      const statcast = track('savant:batter', await this.savant.batterStatcast(season));
      const xhr = track('savant:xhr', await this.savant.expectedHomeRuns(season));
      const arsenal = track('savant:arsenal:batter', await this.savant.pitchArsenal(season, 'batter'));

      const batted = statcast.get(batterId);
      profile.barrelPct = batted?.barrelPct ?? null;
      profile.launchAngle = batted?.launchAngle ?? null;
      profile.xHr = xhr.get(batterId) ?? null;
      for (const [pitchType, entry] of Object.entries(arsenal.get(batterId) ?? {})) {
        profile.isoByPitchType[pitchType] = entry.iso;
      }

      const day = parseISO(gameDate);
      profile.recent.barrelPct = track(
        `savant:recent:${batterId}`,
        await this.savant.recentBarrelPct(
          batterId,
          format(subDays(day, RECENT_BARREL_DAYS), 'yyyy-MM-dd'),
          format(subDays(day, 1), 'yyyy-MM-dd')
        )
      );
    }

    return profile;
  }

  private async pitcherProfile(
    pitcherId: string,
    teamId: string,
    season: number,
    window: StatsWindow,
    track: <T>(label: string, outcome: FetchOutcome<T>) => T
  ): Promise<PitcherProfile> {
    const stats = track(
      `mlb-stats:pitching:${pitcherId}`,
      window.kind === 'season'
        ? await this.mlb.pitchingStats(pitcherId, season)
        : await this.mlb.pitchingStatsByRange(pitcherId, window.start, window.end)
    );
    const line = splitsOf(stats, window.kind === 'season' ? 'season' : 'byDateRange')[0]?.stat;

    const person = track(`mlb-stats:person:${pitcherId}`, await this.mlb.person(pitcherId));
    const staff = track(`mlb-stats:team-pitching:${teamId}`, await this.mlb.bullpenStats(teamId, season));

    const profile: PitcherProfile = {
      hrPer9: hrPer9(line),
      barrelPctAllowed: null,
      hardHitPctAllowed: null,
      throws: throwHand(person.people[0]?.pitchHand?.code),
      pitchMix: {},
      recent: { hrPer9: recentHrPer9(splitsOf(stats, 'gameLog')) },
      avgInningsPerStart: avgInningsPerStart(line),
      bullpenHrPer9: hrPer9(splitsOf(staff, 'season')[0]?.stat),
    };

    if (this.savant && window.kind === 'season') {
      const statcast = track('savant:pitcher', await this.savant.pitcherStatcast(season));
      const arsenal = track('savant:arsenal:pitcher', await this.savant.pitchArsenal(season, 'pitcher'));

      const allowed = statcast.get(pitcherId);
      profile.barrelPctAllowed = allowed?.barrelPctAllowed ?? null;
      profile.hardHitPctAllowed = allowed?.hardHitPctAllowed ?? null;
      for (const [pitchType, entry] of Object.entries(arsenal.get(pitcherId) ?? {})) {
        if (entry.usage !== null) profile.pitchMix[pitchType] = entry.usage;
      }
    }

    return profile;
  }
}
