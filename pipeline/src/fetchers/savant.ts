/**
 * Baseball Savant client
 *
 * Leaderboards and Statcast searches are downloaded as CSV, cached as raw
 * text and parsed on read. Column names follow Savant's CSV exports; a
 * missing column reads as null.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { fetchText, type HttpOptions } from '../http/fetch-json.js';
import { cachedFetch, type FetchContext, type FetchOutcome } from './cached-fetch.js';

export const SAVANT_BASE_URL = 'https://baseballsavant.mlb.com/leaderboard';
export const SAVANT_SEARCH_URL = 'https://baseballsavant.mlb.com/statcast_search/csv';

const SOURCE = 'savant';

export type CsvRow = Record<string, string>;

const csvRowsSchema = z.array(z.record(z.string()));

export function parseCsv(text: string): CsvRow[] {
  if (text.trim() === '') return [];
  const records: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    relax_column_count: true,
    trim: true,
  });
  return csvRowsSchema.parse(records);
}

export function numberCell(row: CsvRow, column: string): number | null {
  const raw = row[column];
  if (raw === undefined || raw === '' || raw === 'null') return null;
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : null;
}

/** Statcast launch_speed_angle code for a barrel */
const BARREL_CODE = 6;

/**
 * Barrels per batted-ball event, as a percentage, from pitch-level search
 * rows. `type` "X" marks a ball put in play.
 */
export function barrelPctFromPitches(rows: CsvRow[]): number | null {
  let battedBalls = 0;
  let barrels = 0;
  for (const row of rows) {
    if (row['type'] !== 'X') continue;
    battedBalls++;
    if (numberCell(row, 'launch_speed_angle') === BARREL_CODE) barrels++;
  }
  return battedBalls > 0 ? (barrels / battedBalls) * 100 : null;
}

export interface BatterStatcast {
  barrelPct: number | null;
  launchAngle: number | null;
}

export interface PitcherStatcast {
  barrelPctAllowed: number | null;
  hardHitPctAllowed: number | null;
}

export interface PitchArsenalEntry {
  /** Share of pitches of this type, 0-1 */
  usage: number | null;
  /** SLG − BA against/with this pitch type */
  iso: number | null;
}

export type Leaderboard<T> = Map<string, T>;

export interface SavantClientOptions {
  ctx: FetchContext;
  http: HttpOptions;
  baseUrl?: string;
  searchUrl?: string;
}

export class SavantClient {
  private readonly ctx: FetchContext;
  private readonly http: HttpOptions;
  private readonly baseUrl: string;
  private readonly searchUrl: string;
  // Parsed CSVs by request; leaderboards are shared by every matchup in a run
  private readonly parsed = new Map<string, Promise<FetchOutcome<CsvRow[]>>>();

  constructor(options: SavantClientOptions) {
    this.ctx = options.ctx;
    this.http = options.http;
    this.baseUrl = options.baseUrl ?? SAVANT_BASE_URL;
    this.searchUrl = options.searchUrl ?? SAVANT_SEARCH_URL;
  }

  async batterStatcast(season: number): Promise<FetchOutcome<Leaderboard<BatterStatcast>>> {
    const outcome = await this.leaderboard(`statcast?type=batter&year=${season}&position=&team=&min=q&csv=true`, `batter:${season}`);
    return mapOutcome(outcome, (rows) =>
      byPlayer(rows, (row) => ({
        barrelPct: numberCell(row, 'brl_percent'),
        launchAngle: numberCell(row, 'avg_hit_angle'),
      }))
    );
  }

  async pitcherStatcast(season: number): Promise<FetchOutcome<Leaderboard<PitcherStatcast>>> {
    const outcome = await this.leaderboard(`statcast?type=pitcher&year=${season}&position=&team=&min=q&csv=true`, `pitcher:${season}`);
    return mapOutcome(outcome, (rows) =>
      byPlayer(rows, (row) => ({
        barrelPctAllowed: numberCell(row, 'brl_percent'),
        hardHitPctAllowed: numberCell(row, 'ev95percent'),
      }))
    );
  }

  /**
   * Expected home runs per plate appearance
   */
  async expectedHomeRuns(season: number): Promise<FetchOutcome<Leaderboard<number | null>>> {
    const outcome = await this.leaderboard(`home-runs?type=batter&year=${season}&team=&min=0&csv=true`, `xhr:${season}`);
    return mapOutcome(outcome, (rows) =>
      byPlayer(rows, (row) => {
        const xhr = numberCell(row, 'xhr');
        const pa = numberCell(row, 'pa');
        return xhr !== null && pa !== null && pa > 0 ? xhr / pa : null;
      })
    );
  }

  /**
   * Per-pitch-type arsenal. For pitchers: usage share and ISO allowed.
   * For batters: ISO against each pitch type.
   */
  async pitchArsenal(
    season: number,
    type: 'pitcher' | 'batter'
  ): Promise<FetchOutcome<Leaderboard<Record<string, PitchArsenalEntry>>>> {
    const outcome = await this.leaderboard(
      `pitch-arsenal-stats?type=${type}&pitchType=&year=${season}&team=&min=10&csv=true`,
      `arsenal:${type}:${season}`
    );
    return mapOutcome(outcome, (rows) => {
      const board: Leaderboard<Record<string, PitchArsenalEntry>> = new Map();
      for (const row of rows) {
        const playerId = row['player_id'];
        const pitchType = row['pitch_type'];
        if (!playerId || !pitchType) continue;

        const slg = numberCell(row, 'slg');
        const ba = numberCell(row, 'ba');
        const usage = numberCell(row, 'pitch_usage');
        const entries = board.get(playerId) ?? {};
        entries[pitchType] = {
          usage: usage === null ? null : usage / 100,
          iso: slg !== null && ba !== null ? slg - ba : null,
        };
        board.set(playerId, entries);
      }
      return board;
    });
  }

  /**
   * Barrel% over a batter's batted balls with game dates in [start, end]
   */
  async recentBarrelPct(batterId: string, start: string, end: string): Promise<FetchOutcome<number | null>> {
    const params = new URLSearchParams({
      all: 'true',
      type: 'details',
      player_type: 'batter',
      'batters_lookup[]': batterId,
      game_date_gt: start,
      game_date_lt: end,
    });
    const outcome = await this.csv(`${this.searchUrl}?${params.toString()}`, `search:${batterId}:${start}:${end}`);
    return mapOutcome(outcome, barrelPctFromPitches);
  }

  private leaderboard(path: string, key: string): Promise<FetchOutcome<CsvRow[]>> {
    return this.csv(`${this.baseUrl}/${path}`, key);
  }

  private csv(url: string, key: string): Promise<FetchOutcome<CsvRow[]>> {
    const pending = this.parsed.get(key);
    if (pending) return pending;

    const loaded = cachedFetch(this.ctx, {
      kind: 'statcast',
      key: `savant:${key}`,
      source: SOURCE,
      schema: z.string(),
      fallback: '',
      load: () => fetchText(url, this.http),
    }).then((outcome) => mapOutcome(outcome, parseCsv));
    this.parsed.set(key, loaded);
    return loaded;
  }
}

function byPlayer<T>(rows: CsvRow[], pick: (row: CsvRow) => T): Leaderboard<T> {
  const board: Leaderboard<T> = new Map();
  for (const row of rows) {
    const playerId = row['player_id'];
    if (playerId) board.set(playerId, pick(row));
  }
  return board;
}

function mapOutcome<A, B>(outcome: FetchOutcome<A>, fn: (value: A) => B): FetchOutcome<B> {
  return { ...outcome, value: fn(outcome.value) };
}
