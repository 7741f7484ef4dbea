/**
 * Test fixtures for scoring inputs
 */

import type {
  BatterProfile,
  Matchup,
  ParkFactor,
  PitcherProfile,
  ScoringInput,
  WeatherAdjustment,
} from '../../src/types.js';

export function makeMatchup(overrides: Partial<Matchup> = {}): Matchup {
  return {
    id: 'b1-vs-p1-2024-06-01',
    gameId: '745001',
    gameDate: '2024-06-01',
    gameTime: '2024-06-01T23:05:00Z',
    venue: { id: 'v1', name: 'Test Park' },
    batter: { id: 'b1', name: 'Test Batter', teamId: 't1' },
    pitcher: { id: 'p1', name: 'Test Pitcher', teamId: 't2' },
    pitcherStatus: 'confirmed',
    lineupStatus: 'confirmed',
    ...overrides,
  };
}

export function nullBatter(): BatterProfile {
  return {
    iso: null,
    barrelPct: null,
    xHr: null,
    launchAngle: null,
    bats: null,
    recent: { iso: null, barrelPct: null, homeRunsLast10: null },
    isoByPitchType: {},
  };
}

export function nullPitcher(): PitcherProfile {
  return {
    hrPer9: null,
    barrelPctAllowed: null,
    hardHitPctAllowed: null,
    throws: null,
    pitchMix: {},
    recent: { hrPer9: null },
    avgInningsPerStart: null,
    bullpenHrPer9: null,
  };
}

export function noWeather(): WeatherAdjustment {
  return { windSpeedMph: null, windFromDeg: null, temperatureF: null, elevationFt: null };
}

/**
 * Power bat with every field populated
 */
export function completeBatter(): BatterProfile {
  return {
    iso: 0.25,
    barrelPct: 12,
    xHr: 0.08,
    launchAngle: 14,
    bats: 'L',
    recent: { iso: 0.24, barrelPct: 11, homeRunsLast10: 2 },
    isoByPitchType: { FF: 0.28, SL: 0.2, CH: 0.24 },
  };
}

export function completePitcher(): PitcherProfile {
  return {
    hrPer9: 1.3,
    barrelPctAllowed: 9,
    hardHitPctAllowed: 41,
    throws: 'R',
    pitchMix: { FF: 0.5, SL: 0.3, CH: 0.2 },
    recent: { hrPer9: 1.4 },
    avgInningsPerStart: 5.5,
    bullpenHrPer9: 1.2,
  };
}

export function makePark(overrides: Partial<ParkFactor> = {}): ParkFactor {
  return {
    venueName: 'Test Park',
    factor: 1,
    centerFieldBearingDeg: null,
    dome: false,
    ...overrides,
  };
}

/**
 * A hitter with ISO .250, barrel 12%, xHR .08 against a 1.3 HR/9 starter
 * in a 1.15 park; every other field is missing.
 */
export function powerBatInHitterPark(weather: WeatherAdjustment = noWeather()): ScoringInput {
  return {
    matchup: makeMatchup(),
    batter: { ...nullBatter(), iso: 0.25, barrelPct: 12, xHr: 0.08 },
    pitcher: { ...nullPitcher(), hrPer9: 1.3 },
    park: makePark({ factor: 1.15 }),
    weather,
  };
}
