/**
 * Core types for the home run scoring model
 */

export type BatSide = 'L' | 'R' | 'S';
export type ThrowHand = 'L' | 'R';

/**
 * Whether the listed starter has been confirmed by an official lineup
 * or is only the announced probable.
 */
export type PitcherStatus = 'confirmed' | 'probable';

/**
 * Lineups posted by the club are confirmed; lineups inferred from the
 * active roster are projected.
 */
export type LineupStatus = 'confirmed' | 'projected';

export type Tier = 'Lock' | 'Sleeper' | 'Risky';

export type Confidence = 'high' | 'medium' | 'low';

export interface PlayerRef {
  id: string;
  name: string;
  teamId: string;
}

export interface VenueRef {
  id: string;
  name: string;
}

/**
 * One batter against one starting pitcher in one game
 */
export interface Matchup {
  readonly id: string;
  readonly gameId: string;
  readonly gameDate: string; // YYYY-MM-DD
  readonly gameTime: string; // ISO instant of first pitch
  readonly venue: Readonly<VenueRef>;
  readonly batter: Readonly<PlayerRef>;
  readonly pitcher: Readonly<PlayerRef>;
  readonly pitcherStatus: PitcherStatus;
  readonly lineupStatus: LineupStatus;
}

/**
 * Rolling statistical snapshot for a batter.
 * Any field may be null when the feed had nothing for the player.
 */
export interface BatterProfile {
  iso: number | null;
  barrelPct: number | null; // percent, 12 = 12%
  xHr: number | null; // expected home runs per plate appearance
  launchAngle: number | null; // degrees
  bats: BatSide | null;
  recent: {
    iso: number | null;
    barrelPct: number | null;
    homeRunsLast10: number | null;
  };
  /** ISO by pitch type code (FF, SL, CH, ...) */
  isoByPitchType: Record<string, number | null>;
}

/**
 * HR-vulnerability snapshot for a pitcher
 */
export interface PitcherProfile {
  hrPer9: number | null;
  barrelPctAllowed: number | null; // percent
  hardHitPctAllowed: number | null; // percent
  throws: ThrowHand | null;
  /** Usage share by pitch type code; shares need not sum to 1 */
  pitchMix: Record<string, number>;
  recent: {
    hrPer9: number | null;
  };
  avgInningsPerStart: number | null;
  bullpenHrPer9: number | null;
}

export interface ParkFactor {
  venueName: string;
  /** Home run multiplier, 1.0 = league neutral; null when the venue is unmapped */
  factor: number | null;
  /** Compass bearing from home plate to center field, null when unknown */
  centerFieldBearingDeg: number | null;
  dome: boolean;
}

/**
 * Conditions at the venue around first pitch
 */
export interface WeatherAdjustment {
  windSpeedMph: number | null;
  /** Meteorological direction the wind blows from */
  windFromDeg: number | null;
  temperatureF: number | null;
  elevationFt: number | null;
}

export interface ScoringInput {
  matchup: Matchup;
  batter: BatterProfile;
  pitcher: PitcherProfile;
  park: ParkFactor;
  weather: WeatherAdjustment;
}

/**
 * Normalized component signals, each in [0, 1]
 */
export interface ComponentSignals {
  power: number;
  vulnerability: number;
  form: number;
  pitchMatchup: number;
  platoon: number;
}

export const COMPONENT_KEYS: (keyof ComponentSignals)[] = [
  'power',
  'vulnerability',
  'form',
  'pitchMatchup',
  'platoon',
];

export interface ScoreResult {
  matchupId: string;
  matchup: Matchup;
  score: number;
  probability: number;
  tier: Tier;
  confidence: Confidence;
  /** Profile fields that fell back to league-average defaults */
  imputed: string[];
  components: ComponentSignals;
  multipliers: {
    park: number;
    weather: number;
  };
  scorer: string;
}

/**
 * Anything that turns a scoring input into a score result.
 * The rule-based formula and exported tree ensembles are interchangeable.
 */
export interface HrScorer {
  readonly name: string;
  score(input: ScoringInput): ScoreResult;
}
