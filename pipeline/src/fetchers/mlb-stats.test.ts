import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  finalGameIds,
  homeRunHitters,
  isGameFinal,
  MlbStatsClient,
  parseInnings,
  parseRate,
  splitsOf,
  type BoxscoreResponse,
  type ScheduleGame,
} from './mlb-stats.js';
import { removeDir, stubFetch, tempDir, testContext } from '../../test/helpers/http.js';

describe('stat helpers', () => {
  it('should parse innings in thirds notation', () => {
    expect(parseInnings('123.2')).toBeCloseTo(123 + 2 / 3, 10);
    expect(parseInnings('6.1')).toBeCloseTo(6 + 1 / 3, 10);
    expect(parseInnings(7)).toBe(7);
    expect(parseInnings(undefined)).toBeNull();
    expect(parseInnings('-.--')).toBeNull();
  });

  it('should parse rate strings', () => {
    expect(parseRate('.265')).toBe(0.265);
    expect(parseRate(0.5)).toBe(0.5);
    expect(parseRate('.---')).toBeNull();
    expect(parseRate(undefined)).toBeNull();
  });

  it('should pick splits by stat type', () => {
    const response = {
      stats: [
        { type: { displayName: 'season' }, splits: [{ stat: { homeRuns: 20 } }] },
        { type: { displayName: 'gameLog' }, splits: [{ stat: { homeRuns: 1 } }, { stat: { homeRuns: 0 } }] },
      ],
    };
    expect(splitsOf(response, 'gameLog')).toHaveLength(2);
    expect(splitsOf(response, 'season')[0].stat.homeRuns).toBe(20);
    expect(splitsOf(response, 'byDateRange')).toEqual([]);
  });
});

function game(gamePk: number, detailedState?: string): ScheduleGame {
  return {
    gamePk,
    gameDate: '2024-06-01T23:05:00Z',
    status: detailedState === undefined ? undefined : { detailedState },
    venue: { id: 1, name: 'Test Park' },
    teams: { away: { team: { id: 10, name: 'Away Club' } }, home: { team: { id: 20, name: 'Home Club' } } },
  };
}

describe('game status', () => {
  it('should treat only finished games as final', () => {
    expect(isGameFinal(game(1, 'Final'))).toBe(true);
    expect(isGameFinal(game(1, 'Game Over'))).toBe(true);
    expect(isGameFinal(game(1, 'Final: Tied'))).toBe(true);
    expect(isGameFinal(game(1, 'Completed Early: Rain'))).toBe(true);
    expect(isGameFinal(game(1, 'In Progress'))).toBe(false);
    expect(isGameFinal(game(1, 'Postponed'))).toBe(false);
    expect(isGameFinal(game(1, 'Suspended: Rain'))).toBe(false);
    expect(isGameFinal(game(1))).toBe(false);
  });

  it('should list the final games of the requested date', () => {
    const schedule = {
      dates: [
        { date: '2024-06-01', games: [game(700001, 'Final'), game(700002, 'Delayed Start')] },
        { date: '2024-06-02', games: [game(700003, 'Final')] },
      ],
    };
    expect(finalGameIds(schedule, '2024-06-01')).toEqual(new Set(['700001']));
  });
});

describe('homeRunHitters', () => {
  it('should collect players with at least one home run on either side', () => {
    const box: BoxscoreResponse = {
      teams: {
        away: {
          players: {
            ID1: { person: { id: 1, fullName: 'A' }, stats: { batting: { homeRuns: 2 } } },
            ID2: { person: { id: 2, fullName: 'B' }, stats: { batting: { homeRuns: 0 } } },
          },
        },
        home: {
          players: {
            ID3: { person: { id: 3, fullName: 'C' }, stats: { batting: { homeRuns: 1 } } },
            ID4: { person: { id: 4, fullName: 'D' }, stats: {} },
          },
        },
      },
    };
    expect([...homeRunHitters(box)].sort()).toEqual(['1', '3']);
  });
});

describe('MlbStatsClient', () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should request the schedule with lineups and probable pitchers hydrated', async () => {
    const stub = stubFetch({ '/schedule': { json: { dates: [] } } });
    const { ctx, http } = testContext(dir, stub.fetch);
    const mlb = new MlbStatsClient({ ctx, http, baseUrl: 'https://mlb.test/api/v1' });

    const outcome = await mlb.schedule('2024-06-01');

    expect(outcome.degraded).toBe(false);
    expect(stub.calls[0].url).toBe(
      'https://mlb.test/api/v1/schedule?sportId=1&date=2024-06-01&hydrate=probablePitcher,lineups,venue,team'
    );
  });

  it('should answer a repeat request from the cache', async () => {
    const stub = stubFetch({ '/people/7': { json: { people: [{ id: 7, fullName: 'X', batSide: { code: 'L' } }] } } });
    const { ctx, http } = testContext(dir, stub.fetch);
    const mlb = new MlbStatsClient({ ctx, http });

    await mlb.person('7');
    const second = await mlb.person('7');

    expect(stub.calls).toHaveLength(1);
    expect(second.fromCache).toBe(true);
    expect(second.value.people[0].batSide?.code).toBe('L');
  });

  it('should fall back to an empty roster when the endpoint keeps failing', async () => {
    const stub = stubFetch({ '/roster/active': { status: 500 } });
    const { ctx, http } = testContext(dir, stub.fetch, 2);
    const mlb = new MlbStatsClient({ ctx, http });

    const outcome = await mlb.activeRoster('10');

    expect(outcome.degraded).toBe(true);
    expect(outcome.value).toEqual({ roster: [] });
    expect(stub.calls).toHaveLength(2);
  });

  it('should not retry a response with the wrong shape', async () => {
    const stub = stubFetch({ '/boxscore': { json: { teams: 'nope' } } });
    const { ctx, http } = testContext(dir, stub.fetch, 3);
    const mlb = new MlbStatsClient({ ctx, http });

    const outcome = await mlb.boxscore('700001');

    expect(outcome.degraded).toBe(true);
    expect(outcome.value).toEqual({ teams: { away: { players: {} }, home: { players: {} } } });
    expect(stub.calls).toHaveLength(1);
  });
});
