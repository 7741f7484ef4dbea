import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MlbStatsClient } from './fetchers/mlb-stats.js';
import { updateResults } from './results.js';
import { PredictionLog } from './store/prediction-log.js';
import { makeInput, makeMatchup, makeResult } from '../test/helpers/fixtures.js';
import { removeDir, stubFetch, tempDir, testContext } from '../test/helpers/http.js';

function scheduleWith(states: Record<string, string>) {
  return {
    dates: [
      {
        date: '2024-06-01',
        games: Object.entries(states).map(([gamePk, detailedState]) => ({
          gamePk: Number(gamePk),
          gameDate: '2024-06-01T23:05:00Z',
          status: { detailedState },
          venue: { id: 1, name: 'Test Park' },
          teams: { away: { team: { id: 10, name: 'Away Club' } }, home: { team: { id: 20, name: 'Home Club' } } },
        })),
      },
    ],
  };
}

const homerBox = {
  json: {
    teams: {
      away: { players: { ID101: { person: { id: 101, fullName: 'Test Batter' }, stats: { batting: { homeRuns: 1 } } } } },
      home: { players: {} },
    },
  },
};

describe('updateResults', () => {
  let dir: string;
  let log: PredictionLog;

  beforeEach(async () => {
    dir = tempDir();
    log = await PredictionLog.open(':memory:');
    const early = makeMatchup();
    const late = makeMatchup({
      id: '111-vs-211-2024-06-01',
      gameId: '700002',
      batter: { id: '111', name: 'Late Batter', teamId: '11' },
      pitcher: { id: '211', name: 'Late Pitcher', teamId: '21' },
    });
    log.record([early, late].map((matchup) => ({ input: makeInput(matchup), result: makeResult({ matchup }) })));
  });

  afterEach(() => {
    log.close();
    removeDir(dir);
  });

  it('should label finished games and leave unavailable ones pending', async () => {
    const stub = stubFetch({
      '/schedule': { json: scheduleWith({ '700001': 'Final', '700002': 'Final' }) },
      '/game/700001/boxscore': homerBox,
      '/game/700002/boxscore': { status: 503 },
    });
    const { ctx, http } = testContext(dir, stub.fetch);

    const update = await updateResults(log, new MlbStatsClient({ ctx, http }), '2024-06-01');

    expect(update).toEqual({ date: '2024-06-01', games: 2, pendingGames: ['700002'], rowsUpdated: 1, homeRuns: 1 });
    expect(log.forDate('2024-06-01').map((row) => [row.gameId, row.hitHr])).toEqual([
      ['700001', true],
      ['700002', null],
    ]);
    expect(log.pendingDates()).toEqual(['2024-06-01']);
  });

  it('should leave unfinished games pending without reading their box scores', async () => {
    const live = stubFetch({
      '/schedule': { json: scheduleWith({ '700001': 'In Progress', '700002': 'Postponed' }) },
      '/boxscore': homerBox,
    });
    const during = testContext(dir, live.fetch);

    const first = await updateResults(log, new MlbStatsClient({ ctx: during.ctx, http: during.http }), '2024-06-01');

    expect(first).toEqual({
      date: '2024-06-01',
      games: 2,
      pendingGames: ['700001', '700002'],
      rowsUpdated: 0,
      homeRuns: 0,
    });
    expect(live.calls.filter((call) => call.url.includes('/boxscore'))).toEqual([]);
    expect(log.pendingDates()).toEqual(['2024-06-01']);

    // Later, once the schedule cache has expired
    const laterDir = tempDir();
    try {
      const done = stubFetch({
        '/schedule': { json: scheduleWith({ '700001': 'Final', '700002': 'Postponed' }) },
        '/boxscore': homerBox,
      });
      const after = testContext(laterDir, done.fetch);

      const second = await updateResults(log, new MlbStatsClient({ ctx: after.ctx, http: after.http }), '2024-06-01');

      expect(second).toEqual({ date: '2024-06-01', games: 2, pendingGames: ['700002'], rowsUpdated: 1, homeRuns: 1 });
      expect(log.forDate('2024-06-01').map((row) => [row.gameId, row.hitHr])).toEqual([
        ['700001', true],
        ['700002', null],
      ]);
    } finally {
      removeDir(laterDir);
    }
  });

  it('should keep every game pending when the schedule is unavailable', async () => {
    const stub = stubFetch({ '/schedule': { status: 503 }, '/boxscore': homerBox });
    const { ctx, http } = testContext(dir, stub.fetch);

    const update = await updateResults(log, new MlbStatsClient({ ctx, http }), '2024-06-01');

    expect(update.pendingGames).toEqual(['700001', '700002']);
    expect(update.rowsUpdated).toBe(0);
    expect(stub.calls.some((call) => call.url.includes('/boxscore'))).toBe(false);
  });

  it('should do nothing for a date without predictions', async () => {
    const stub = stubFetch({});
    const { ctx, http } = testContext(dir, stub.fetch);

    const update = await updateResults(log, new MlbStatsClient({ ctx, http }), '2024-06-02');

    expect(update).toEqual({ date: '2024-06-02', games: 0, pendingGames: [], rowsUpdated: 0, homeRuns: 0 });
    expect(stub.calls).toEqual([]);
  });
});
