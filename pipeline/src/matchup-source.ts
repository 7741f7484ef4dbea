/**
 * Where a daily run gets its matchups and scoring inputs
 */

import type { Matchup, ScoringInput } from '@hrcast/model';
import type { ProfileBuilder } from './fetchers/profiles.js';
import { buildSlate, type SlateResult } from './fetchers/slate.js';
import type { MlbStatsClient } from './fetchers/mlb-stats.js';
import type { SampleSlate } from './inputs.js';

export interface MatchupInput {
  input: ScoringInput;
  degradedSources: string[];
}

export interface MatchupSource {
  readonly name: string;
  slate(date: string): Promise<SlateResult>;
  inputFor(matchup: Matchup): Promise<MatchupInput>;
}

/**
 * Today's schedule from the MLB Stats API, profiles from every feed
 */
export class LiveMatchupSource implements MatchupSource {
  readonly name = 'live';
  private readonly mlb: MlbStatsClient;
  private readonly profiles: ProfileBuilder;

  constructor(mlb: MlbStatsClient, profiles: ProfileBuilder) {
    this.mlb = mlb;
    this.profiles = profiles;
  }

  slate(date: string): Promise<SlateResult> {
    return buildSlate(date, this.mlb);
  }

  inputFor(matchup: Matchup): Promise<MatchupInput> {
    return this.profiles.forMatchup(matchup);
  }
}

/**
 * Pre-built inputs from a JSON file. Makes no network calls; the slate's
 * own date wins over the requested one.
 */
export class SampleMatchupSource implements MatchupSource {
  readonly name = 'sample';
  private readonly sample: SampleSlate;
  private readonly byId = new Map<string, ScoringInput>();

  constructor(sample: SampleSlate) {
    this.sample = sample;
    for (const input of sample.inputs) {
      this.byId.set(input.matchup.id, input);
    }
  }

  async slate(): Promise<SlateResult> {
    return {
      date: this.sample.date,
      matchups: this.sample.inputs.map((input) => input.matchup),
      skipped: [],
      degradedSources: [],
    };
  }

  async inputFor(matchup: Matchup): Promise<MatchupInput> {
    const input = this.byId.get(matchup.id);
    if (!input) {
      throw new Error(`No sample input for matchup ${matchup.id}`);
    }
    return { input, degradedSources: [] };
  }
}
