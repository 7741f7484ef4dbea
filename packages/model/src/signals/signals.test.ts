/**
 * Tests for the component signals and environment multipliers
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SCORING_CONFIG } from '../config.js';
import { windOutMph, weatherMultiplier } from './environment.js';
import { pitchMatchupIso, platoonSignal } from './matchup.js';
import { vulnerabilitySignal } from './pitcher.js';
import { resolveInputs } from './resolve.js';
import type { ResolvedEnvironment, ResolvedPitcher } from './types.js';
import {
	completeBatter,
	completePitcher,
	makeMatchup,
	makePark,
	noWeather,
	nullBatter,
	nullPitcher
} from '../../test/helpers/fixtures.js';

const config = DEFAULT_SCORING_CONFIG;

const outdoors = (overrides: Partial<ResolvedEnvironment> = {}): ResolvedEnvironment => ({
	parkFactor: 1,
	centerFieldBearingDeg: 90,
	dome: false,
	windSpeedMph: null,
	windFromDeg: null,
	temperatureF: null,
	elevationFt: 0,
	...overrides
});

describe('Environment', () => {
	describe('windOutMph', () => {
		it('should count wind from behind home plate as blowing out', () => {
			// CF due east; wind from the west blows toward center
			expect(windOutMph(outdoors({ windSpeedMph: 12, windFromDeg: 270 }))).toBeCloseTo(12, 10);
		});

		it('should count wind from center field as blowing in', () => {
			expect(windOutMph(outdoors({ windSpeedMph: 12, windFromDeg: 90 }))).toBeCloseTo(-12, 10);
		});

		it('should ignore a pure crosswind', () => {
			expect(windOutMph(outdoors({ windSpeedMph: 12, windFromDeg: 0 }))).toBeCloseTo(0, 10);
		});

		it('should ignore wind when the park has no orientation', () => {
			expect(windOutMph(outdoors({ centerFieldBearingDeg: null, windSpeedMph: 20, windFromDeg: 270 }))).toBe(0);
		});
	});

	describe('weatherMultiplier', () => {
		it('should be neutral at the baseline temperature with no wind', () => {
			expect(weatherMultiplier(outdoors({ temperatureF: 70 }), config)).toBe(1);
		});

		it('should cap the wind effect', () => {
			const gale = outdoors({ windSpeedMph: 40, windFromDeg: 270, temperatureF: 70 });
			expect(weatherMultiplier(gale, config)).toBeCloseTo(1.15, 10);
		});

		it('should add heat and altitude', () => {
			// +20°F → +4%, 5200 ft → +5.2%
			const denver = outdoors({ temperatureF: 90, elevationFt: 5200 });
			expect(weatherMultiplier(denver, config)).toBeCloseTo(1.092, 10);
		});

		it('should cap the temperature effect', () => {
			expect(weatherMultiplier(outdoors({ temperatureF: 20 }), config)).toBeCloseTo(0.94, 10);
		});

		it('should be neutral inside a dome', () => {
			const dome = outdoors({ dome: true, windSpeedMph: 30, windFromDeg: 270, temperatureF: 100, elevationFt: 1000 });
			expect(weatherMultiplier(dome, config)).toBe(1);
		});
	});
});

describe('Matchup signals', () => {
	it('should weight batter ISO by pitch usage', () => {
		const { resolved } = resolveInputs(
			{
				matchup: makeMatchup(),
				batter: { ...completeBatter(), isoByPitchType: { FF: 0.3, SL: null } },
				pitcher: { ...completePitcher(), pitchMix: { FF: 0.6, SL: 0.4 } },
				park: makePark(),
				weather: noWeather()
			},
			config
		);
		// SL falls back to the season ISO of .250
		expect(pitchMatchupIso(resolved.batter, resolved.pitcher)).toBeCloseTo(0.28, 10);
	});

	it('should use the season ISO with no pitch mix', () => {
		const { resolved, imputed } = resolveInputs(
			{
				matchup: makeMatchup(),
				batter: completeBatter(),
				pitcher: { ...completePitcher(), pitchMix: {} },
				park: makePark(),
				weather: noWeather()
			},
			config
		);
		expect(pitchMatchupIso(resolved.batter, resolved.pitcher)).toBe(0.25);
		expect(imputed).toContain('pitcher.pitchMix');
	});

	it('should drop non-positive pitch usage', () => {
		const { resolved } = resolveInputs(
			{
				matchup: makeMatchup(),
				batter: nullBatter(),
				pitcher: { ...nullPitcher(), pitchMix: { FF: 0.7, KN: 0, EP: -0.1 } },
				park: makePark(),
				weather: noWeather()
			},
			config
		);
		expect(resolved.pitcher.pitchMix).toEqual({ FF: 0.7 });
	});

	it('should read the platoon table', () => {
		expect(platoonSignal('S', 'L', config)).toBe(0.8);
		expect(platoonSignal('L', 'R', config)).toBe(0.6);
		expect(platoonSignal('R', 'L', config)).toBe(0.7);
		expect(platoonSignal('R', 'R', config)).toBe(0.4);
		expect(platoonSignal('L', 'L', config)).toBe(0.4);
		expect(platoonSignal('L', null, config)).toBe(0.5);
		expect(platoonSignal(null, 'R', config)).toBe(0.5);
	});
});

describe('Pitcher vulnerability', () => {
	const pitcher = (overrides: Partial<ResolvedPitcher>): ResolvedPitcher => ({
		hrPer9: 1.15,
		barrelPctAllowed: 7.5,
		hardHitPctAllowed: 38,
		throws: 'R',
		pitchMix: {},
		recentHrPer9: 1.15,
		avgInningsPerStart: 6,
		bullpenHrPer9: 1.15,
		...overrides
	});

	it('should rise when a short starter hands off to a homer-prone bullpen', () => {
		const workhorse = vulnerabilitySignal(pitcher({ avgInningsPerStart: 7, bullpenHrPer9: 1.8 }), config);
		const opener = vulnerabilitySignal(pitcher({ avgInningsPerStart: 2, bullpenHrPer9: 1.8 }), config);
		expect(opener).toBeGreaterThan(workhorse);
	});

	it('should be the bullpen signal alone for a zero-inning starter', () => {
		// (1.8 - 0.5) / 1.5
		expect(vulnerabilitySignal(pitcher({ avgInningsPerStart: 0, bullpenHrPer9: 1.8 }), config)).toBeCloseTo(
			0.866667,
			6
		);
	});
});
