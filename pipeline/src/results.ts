/**
 * Record actual home runs against logged predictions
 */

import { finalGameIds, homeRunHitters, type MlbStatsClient } from './fetchers/mlb-stats.js';
import type { PredictionLog } from './store/prediction-log.js';

export interface ResultsUpdate {
  date: string;
  games: number;
  /**
   * Games not yet final, or whose box score could not be fetched. Their
   * predictions stay unlabeled and are retried on the next run.
   */
  pendingGames: string[];
  rowsUpdated: number;
  homeRuns: number;
}

export async function updateResults(log: PredictionLog, mlb: MlbStatsClient, date: string): Promise<ResultsUpdate> {
  const update: ResultsUpdate = { date, games: 0, pendingGames: [], rowsUpdated: 0, homeRuns: 0 };
  const gameIds = log.gameIds(date);
  if (gameIds.length === 0) return update;

  // Box scores are only read, and so only cached, once a game is final
  const schedule = await mlb.schedule(date);
  const finished = finalGameIds(schedule.value, date);

  for (const gameId of gameIds) {
    update.games++;
    if (!finished.has(gameId)) {
      update.pendingGames.push(gameId);
      continue;
    }
    const box = await mlb.boxscore(gameId);
    if (box.degraded) {
      update.pendingGames.push(gameId);
      continue;
    }
    const hitters = homeRunHitters(box.value);
    update.homeRuns += hitters.size;
    update.rowsUpdated += log.recordGameOutcome(gameId, hitters);
  }

  const status = update.pendingGames.length > 0 ? '⚠️' : '✓';
  console.log(
    `  ${status} ${date}: ${update.rowsUpdated} predictions labeled from ${update.games - update.pendingGames.length}/${update.games} games`
  );
  return update;
}
