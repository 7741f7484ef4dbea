import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RuleBasedScorer, type Matchup } from '@hrcast/model';
import { createClients } from './clients.js';
import { loadAppConfig } from './config.js';
import { formatRunSummary, runDaily, type Notifier, type RunSummary } from './daily-run.js';
import { loadSampleSlate } from './inputs.js';
import { LiveMatchupSource, SampleMatchupSource, type MatchupInput, type MatchupSource } from './matchup-source.js';
import { formatTierMessages } from './notify/format.js';
import type { SlateResult } from './fetchers/slate.js';
import type { DeliveryReport } from './notify/telegram.js';
import { PredictionLog } from './store/prediction-log.js';
import { makeInput, makeMatchup } from '../test/helpers/fixtures.js';
import { removeDir, stubFetch, tempDir } from '../test/helpers/http.js';

const NOON = Date.parse('2024-06-01T12:00:00Z');

class RecordingNotifier implements Notifier {
  readonly sent: string[][] = [];

  async sendAll(messages: string[]): Promise<DeliveryReport> {
    this.sent.push(messages);
    return { sent: messages.length, failed: 0, errors: [] };
  }
}

/**
 * One good matchup, one with no batter name, one whose inputs cannot be built
 */
class UnevenSource implements MatchupSource {
  readonly name = 'uneven';
  private readonly good = makeMatchup();
  private readonly unnamed = makeMatchup({
    id: '102-vs-201-2024-06-01',
    batter: { id: '102', name: '', teamId: '10' },
  });
  private readonly broken = makeMatchup({
    id: '103-vs-201-2024-06-01',
    batter: { id: '103', name: 'Broken Feed', teamId: '10' },
  });

  async slate(date: string): Promise<SlateResult> {
    return {
      date,
      matchups: [this.good, this.unnamed, this.broken],
      skipped: ['Visitors (game 700002): no probable pitcher listed for Hosts'],
      degradedSources: ['mlb-stats:roster:10'],
    };
  }

  async inputFor(matchup: Matchup): Promise<MatchupInput> {
    if (matchup.id === this.broken.id) throw new Error('profile exploded');
    return { input: makeInput(matchup), degradedSources: ['savant:batter', 'mlb-stats:person:101'] };
  }
}

describe('runDaily', () => {
  it('should score the sample slate without logging or sending', async () => {
    const summary = await runDaily({
      date: '2024-07-04',
      topN: 3,
      source: new SampleMatchupSource(loadSampleSlate()),
      scorer: new RuleBasedScorer(),
      now: () => NOON,
    });

    expect(summary.date).toBe('2024-06-01');
    expect(summary.source).toBe('sample');
    expect(summary.scorer).toBe('rules');
    expect(summary.matchups).toBe(5);
    expect(summary.scored).toBe(5);
    expect(summary.top).toHaveLength(3);
    expect(summary.tierCounts.Lock + summary.tierCounts.Sleeper + summary.tierCounts.Risky).toBe(5);
    expect(summary.logged).toBe(0);
    expect(summary.delivery).toBeNull();
    expect(summary.durationMs).toBe(0);
  });

  it('should skip malformed and failing matchups and keep going', async () => {
    const summary = await runDaily({
      date: '2024-06-01',
      topN: 10,
      source: new UnevenSource(),
      scorer: new RuleBasedScorer(),
    });

    expect(summary.matchups).toBe(3);
    expect(summary.scored).toBe(1);
    expect(summary.malformed).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.top.map((r) => r.matchupId)).toEqual(['101-vs-201-2024-06-01']);
    expect(summary.skippedSides).toHaveLength(1);
    expect(summary.degradedSources).toEqual(['mlb-stats:person:101', 'mlb-stats:roster:10', 'savant:batter']);
  });

  it('should log every prediction and send the tier messages', async () => {
    const log = await PredictionLog.open(':memory:');
    const notifier = new RecordingNotifier();

    const summary = await runDaily({
      date: '2024-06-01',
      topN: 2,
      source: new SampleMatchupSource(loadSampleSlate()),
      scorer: new RuleBasedScorer(),
      log,
      notifier,
      now: () => NOON,
    });

    const rows = log.forDate('2024-06-01');
    expect(summary.logged).toBe(5);
    expect(rows).toHaveLength(5);
    expect(rows[0].createdAt).toBe('2024-06-01T12:00:00.000Z');
    expect(notifier.sent).toEqual([formatTierMessages(summary.top, 2)]);
    expect(summary.delivery).toEqual({ sent: notifier.sent[0].length, failed: 0, errors: [] });
    log.close();
  });
});

describe('runDaily with live sources', () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should still score when every stat feed is down', async () => {
    const schedule = {
      dates: [
        {
          date: '2024-06-01',
          games: [
            {
              gamePk: 700001,
              gameDate: '2024-06-01T23:05:00Z',
              venue: { id: 1, name: 'Test Park' },
              teams: {
                away: { team: { id: 10, name: 'Away Club' }, probablePitcher: { id: 201, fullName: 'Away Starter' } },
                home: { team: { id: 20, name: 'Home Club' }, probablePitcher: { id: 301, fullName: 'Home Starter' } },
              },
              lineups: {
                awayPlayers: [{ id: 101, fullName: 'Away Bat' }],
                homePlayers: [{ id: 102, fullName: 'Home Bat' }],
              },
            },
          ],
        },
      ],
    };
    const stub = stubFetch({ '/schedule': { json: schedule } });
    const config = loadAppConfig({ HRCAST_CACHE_DIR: dir, FETCH_MAX_ATTEMPTS: '1' });
    const clients = createClients(config, { fetch: stub.fetch });

    const summary = await runDaily({
      date: '2024-06-01',
      topN: 10,
      source: new LiveMatchupSource(clients.mlb, clients.profiles),
      scorer: new RuleBasedScorer(),
    });

    expect(summary.scored).toBe(2);
    expect(summary.failed).toBe(0);
    expect(summary.degradedSources).toContain('mlb-stats:person:101');
    expect(summary.degradedSources).toContain('savant:batter');
    expect(summary.top.every((result) => result.confidence === 'low')).toBe(true);
  });
});

describe('formatRunSummary', () => {
  it('should report counts and delivery', () => {
    const summary: RunSummary = {
      date: '2024-06-01',
      source: 'live',
      scorer: 'rules',
      matchups: 20,
      scored: 18,
      malformed: 1,
      failed: 1,
      skippedSides: [],
      degradedSources: ['savant:batter'],
      tierCounts: { Lock: 2, Sleeper: 5, Risky: 11 },
      top: [],
      logged: 18,
      delivery: { sent: 3, failed: 0, errors: [] },
      durationMs: 1200,
    };

    expect(formatRunSummary(summary).split('\n').slice(1, -1)).toEqual([
      '📅 2024-06-01 (live, rules)',
      '✅ Scored: 18 of 20',
      '⏭️  Malformed: 1, failed: 1, sides skipped: 0',
      '🔒 2 Lock  🌙 5 Sleeper  ⚠️ 11 Risky',
      '💾 Logged: 18',
      '📨 Alerts sent: 3, failed: 0',
      '⚠️  Degraded sources: 1',
    ]);
  });
});
