/**
 * Schemas for scoring inputs read back from disk: the sample slate used by
 * test runs and the inputs stored alongside each logged prediction.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ScoringInput } from '@hrcast/model';
import { ConfigurationError } from './errors.js';

export const DEFAULT_SAMPLE_SLATE_PATH = fileURLToPath(new URL('../data/sample-slate.json', import.meta.url));

const nullableNumber = z.number().nullable().default(null);

// Identity strings default to '' so that validateMatchup reports them
const playerRefSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  teamId: z.string().default(''),
});

export const matchupSchema = z.object({
  id: z.string().default(''),
  gameId: z.string().default(''),
  gameDate: z.string().default(''),
  gameTime: z.string().default(''),
  venue: z.object({ id: z.string().default(''), name: z.string().default('') }),
  batter: playerRefSchema,
  pitcher: playerRefSchema,
  pitcherStatus: z.enum(['confirmed', 'probable']).default('probable'),
  lineupStatus: z.enum(['confirmed', 'projected']).default('projected'),
});

export const batterProfileSchema = z.object({
  iso: nullableNumber,
  barrelPct: nullableNumber,
  xHr: nullableNumber,
  launchAngle: nullableNumber,
  bats: z.enum(['L', 'R', 'S']).nullable().default(null),
  recent: z
    .object({ iso: nullableNumber, barrelPct: nullableNumber, homeRunsLast10: nullableNumber })
    .default({}),
  isoByPitchType: z.record(z.number().nullable()).default({}),
});

export const pitcherProfileSchema = z.object({
  hrPer9: nullableNumber,
  barrelPctAllowed: nullableNumber,
  hardHitPctAllowed: nullableNumber,
  throws: z.enum(['L', 'R']).nullable().default(null),
  pitchMix: z.record(z.number()).default({}),
  recent: z.object({ hrPer9: nullableNumber }).default({}),
  avgInningsPerStart: nullableNumber,
  bullpenHrPer9: nullableNumber,
});

export const scoringInputSchema: z.ZodType<ScoringInput, z.ZodTypeDef, unknown> = z.object({
  matchup: matchupSchema,
  batter: batterProfileSchema.default({}),
  pitcher: pitcherProfileSchema.default({}),
  park: z
    .object({
      venueName: z.string().default(''),
      factor: nullableNumber,
      centerFieldBearingDeg: nullableNumber,
      dome: z.boolean().default(false),
    })
    .default({}),
  weather: z
    .object({
      windSpeedMph: nullableNumber,
      windFromDeg: nullableNumber,
      temperatureF: nullableNumber,
      elevationFt: nullableNumber,
    })
    .default({}),
});

export const sampleSlateSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  inputs: z.array(scoringInputSchema),
});

export type SampleSlate = z.infer<typeof sampleSlateSchema>;

export function loadSampleSlate(file: string = DEFAULT_SAMPLE_SLATE_PATH): SampleSlate {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read sample slate ${file}: ${String(error)}`);
  }
  const parsed = sampleSlateSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid sample slate ${file}: ${issue?.path.join('.')}: ${issue?.message}`);
  }
  return parsed.data;
}
