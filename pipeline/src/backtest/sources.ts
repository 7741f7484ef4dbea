/**
 * Historical sources: pre-game scoring inputs plus what actually happened
 */

import { subDays, format, parseISO } from 'date-fns';
import type { ScoringInput } from '@hrcast/model';
import { finalGameIds, homeRunHitters, type MlbStatsClient } from '../fetchers/mlb-stats.js';
import { ProfileBuilder } from '../fetchers/profiles.js';
import { buildSlate } from '../fetchers/slate.js';
import type { BallparkTable } from '../fetchers/venues.js';
import type { PredictionLog } from '../store/prediction-log.js';

export interface HistoricalSample {
  input: ScoringInput;
  hit: boolean;
}

export interface HistoricalDay {
  date: string;
  samples: HistoricalSample[];
  /** Inputs left out because their outcome is unknown */
  unlabeled: number;
}

export interface HistoricalSource {
  readonly name: string;
  day(date: string): Promise<HistoricalDay>;
}

/**
 * Replays the inputs stored with each logged prediction. Only rows with a
 * recorded outcome are returned.
 */
export class PredictionLogSource implements HistoricalSource {
  readonly name = 'log';
  private readonly log: PredictionLog;
  private readonly scorer: string | undefined;

  constructor(log: PredictionLog, scorer?: string) {
    this.log = log;
    this.scorer = scorer;
  }

  async day(date: string): Promise<HistoricalDay> {
    const seen = new Set<string>();
    const samples: HistoricalSample[] = [];
    let unlabeled = 0;

    // The same matchup may be logged once per scorer; the inputs are shared
    for (const row of this.log.forDate(date, this.scorer)) {
      if (seen.has(row.matchupId)) continue;
      seen.add(row.matchupId);
      if (row.hitHr === null) {
        unlabeled++;
        continue;
      }
      samples.push({ input: row.input, hit: row.hitHr });
    }
    return { date, samples, unlabeled };
  }
}

/**
 * Rebuilds inputs from MLB Stats API date-range lines ending the day before
 * the game, and labels them from box scores of finished games. Savant leaderboards and
 * forecasts are season-level or current-only, so they are left out.
 */
export class MlbHistoricalSource implements HistoricalSource {
  readonly name = 'mlb';
  private readonly mlb: MlbStatsClient;
  private readonly profiles: ProfileBuilder;

  constructor(mlb: MlbStatsClient, ballparks: BallparkTable) {
    this.mlb = mlb;
    this.profiles = new ProfileBuilder({ mlb, ballparks });
  }

  async day(date: string): Promise<HistoricalDay> {
    const slate = await buildSlate(date, this.mlb);
    // Served from the cache entry buildSlate just wrote
    const finished = finalGameIds((await this.mlb.schedule(date)).value, date);
    const seasonStart = `${date.slice(0, 4)}-01-01`;
    const dayBefore = format(subDays(parseISO(date), 1), 'yyyy-MM-dd');

    const hittersByGame = new Map<string, Set<string> | null>();
    const samples: HistoricalSample[] = [];
    let unlabeled = 0;

    for (const matchup of slate.matchups) {
      let hitters = hittersByGame.get(matchup.gameId);
      if (hitters === undefined) {
        const box = finished.has(matchup.gameId) ? await this.mlb.boxscore(matchup.gameId) : null;
        hitters = box && !box.degraded ? homeRunHitters(box.value) : null;
        hittersByGame.set(matchup.gameId, hitters);
      }
      if (hitters === null) {
        unlabeled++;
        continue;
      }

      const { input } = await this.profiles.forMatchup(matchup, {
        kind: 'range',
        start: seasonStart,
        end: dayBefore,
      });
      samples.push({ input, hit: hitters.has(matchup.batter.id) });
    }
    return { date, samples, unlabeled };
  }
}
