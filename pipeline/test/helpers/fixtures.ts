/**
 * Matchup, input and result fixtures for pipeline tests
 */

import type { Matchup, ScoreResult, ScoringInput } from '@hrcast/model';

export function makeMatchup(overrides: Partial<Matchup> = {}): Matchup {
  return {
    id: '101-vs-201-2024-06-01',
    gameId: '700001',
    gameDate: '2024-06-01',
    gameTime: '2024-06-01T23:05:00Z',
    venue: { id: '1', name: 'Test Park' },
    batter: { id: '101', name: 'Test Batter', teamId: '10' },
    pitcher: { id: '201', name: 'Test Pitcher', teamId: '20' },
    pitcherStatus: 'confirmed',
    lineupStatus: 'confirmed',
    ...overrides,
  };
}

/**
 * Input with every profile field present, in a neutral park
 */
export function makeInput(matchup: Matchup = makeMatchup(), iso: number = 0.2): ScoringInput {
  return {
    matchup,
    batter: {
      iso,
      barrelPct: 10,
      xHr: 0.05,
      launchAngle: 12.5,
      bats: 'L',
      recent: { iso, barrelPct: 10, homeRunsLast10: 1 },
      isoByPitchType: {},
    },
    pitcher: {
      hrPer9: 1.25,
      barrelPctAllowed: 7.5,
      hardHitPctAllowed: 38,
      throws: 'R',
      pitchMix: { FF: 1 },
      recent: { hrPer9: 1.25 },
      avgInningsPerStart: 6,
      bullpenHrPer9: 1.25,
    },
    park: { venueName: matchup.venue.name, factor: 1, centerFieldBearingDeg: null, dome: false },
    weather: { windSpeedMph: null, windFromDeg: null, temperatureF: 70, elevationFt: 0 },
  };
}

export function makeResult(overrides: Partial<ScoreResult> = {}): ScoreResult {
  const matchup = overrides.matchup ?? makeMatchup();
  return {
    matchupId: matchup.id,
    matchup,
    score: 0.5,
    probability: 0.2,
    tier: 'Sleeper',
    confidence: 'high',
    imputed: [],
    components: { power: 0.5, vulnerability: 0.5, form: 0.5, pitchMatchup: 0.5, platoon: 0.6 },
    multipliers: { park: 1, weather: 1 },
    scorer: 'rules',
    ...overrides,
  };
}
