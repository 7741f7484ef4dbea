import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MlbStatsClient, type RosterResponse, type ScheduleResponse } from './mlb-stats.js';
import { buildSlate, matchupId, projectLineup } from './slate.js';
import { removeDir, stubFetch, tempDir, testContext } from '../../test/helpers/http.js';

const schedule: ScheduleResponse = {
  dates: [
    {
      date: '2024-06-01',
      games: [
        {
          gamePk: 700001,
          gameDate: '2024-06-01T23:05:00Z',
          officialDate: '2024-06-01',
          venue: { id: 1, name: 'Test Park' },
          teams: {
            away: { team: { id: 10, name: 'Away Club' }, probablePitcher: { id: 201, fullName: 'Away Starter' } },
            home: { team: { id: 20, name: 'Home Club' }, probablePitcher: { id: 301, fullName: 'Home Starter' } },
          },
          lineups: {
            awayPlayers: [
              { id: 101, fullName: 'Away One' },
              { id: 102, fullName: 'Away Two' },
            ],
          },
        },
        {
          gamePk: 700002,
          gameDate: '2024-06-01T20:10:00Z',
          venue: { id: 2, name: 'Other Park' },
          teams: {
            away: { team: { id: 30, name: 'Visitors' }, probablePitcher: { id: 501, fullName: 'Visiting Starter' } },
            home: { team: { id: 40, name: 'Hosts' } },
          },
          lineups: {
            homePlayers: [{ id: 601, fullName: 'Host One' }],
          },
        },
      ],
    },
  ],
};

function roster(): RosterResponse {
  const players = [{ person: { id: 499, fullName: 'Relief Arm' }, position: { abbreviation: 'P', type: 'Pitcher' } }];
  for (let i = 1; i <= 10; i++) {
    players.push({ person: { id: 400 + i, fullName: `Home ${i}` }, position: { abbreviation: 'CF', type: 'Outfielder' } });
  }
  return { roster: players };
}

describe('projectLineup', () => {
  it('should take the first nine position players', () => {
    const lineup = projectLineup(roster());

    expect(lineup).toHaveLength(9);
    expect(lineup[0].id).toBe(401);
    expect(lineup[8].id).toBe(409);
  });
});

describe('buildSlate', () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  async function slate() {
    const stub = stubFetch({
      '/schedule': { json: schedule },
      '/teams/20/roster/active': { json: roster() },
    });
    const { ctx, http } = testContext(dir, stub.fetch);
    return buildSlate('2024-06-01', new MlbStatsClient({ ctx, http }));
  }

  it('should pair each batter with the opposing probable pitcher', async () => {
    const result = await slate();

    expect(result.matchups).toHaveLength(12);
    expect(result.matchups[0]).toEqual({
      id: '101-vs-301-2024-06-01',
      gameId: '700001',
      gameDate: '2024-06-01',
      gameTime: '2024-06-01T23:05:00Z',
      venue: { id: '1', name: 'Test Park' },
      batter: { id: '101', name: 'Away One', teamId: '10' },
      pitcher: { id: '301', name: 'Home Starter', teamId: '20' },
      // The home club has not posted its card
      pitcherStatus: 'probable',
      lineupStatus: 'confirmed',
    });
  });

  it('should project a lineup from the roster when none is posted', async () => {
    const result = await slate();
    const home = result.matchups.filter((m) => m.batter.teamId === '20');

    expect(home).toHaveLength(9);
    expect(home.every((m) => m.lineupStatus === 'projected')).toBe(true);
    expect(home.every((m) => m.pitcher.id === '201' && m.pitcherStatus === 'confirmed')).toBe(true);
  });

  it('should skip batters whose opponent has no probable pitcher', async () => {
    const result = await slate();

    expect(result.matchups.some((m) => m.batter.teamId === '30')).toBe(false);
    expect(result.skipped).toEqual(['Visitors (game 700002): no probable pitcher listed for Hosts']);

    const hosts = result.matchups.filter((m) => m.batter.teamId === '40');
    expect(hosts.map((m) => m.id)).toEqual([matchupId('601', '501', '2024-06-01')]);
  });

  it('should produce an empty slate when the schedule is unavailable', async () => {
    const stub = stubFetch({ '/schedule': { status: 503 } });
    const { ctx, http } = testContext(dir, stub.fetch);

    const result = await buildSlate('2024-06-01', new MlbStatsClient({ ctx, http }));

    expect(result.matchups).toEqual([]);
    expect(result.degradedSources).toEqual(['mlb-stats:schedule:2024-06-01']);
  });
});
