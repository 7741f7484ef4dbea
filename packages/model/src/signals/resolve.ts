// resolve.ts
import type { ScoringConfig } from '../config.js';
import type { ScoringInput } from '../types.js';
import { isFiniteNumber } from '../utils.js';
import type { Resolution, ResolvedBatter, ResolvedEnvironment, ResolvedPitcher } from './types.js';

/**
 * Replace every missing profile field with its league-average default and
 * record which fields were replaced. Never throws on missing data.
 */
export function resolveInputs(input: ScoringInput, config: ScoringConfig): Resolution {
	const avg = config.leagueAverages;
	const imputed: string[] = [];

	const pick = (value: number | null | undefined, fallback: number, field: string): number => {
		if (isFiniteNumber(value)) return value;
		imputed.push(field);
		return fallback;
	};

	const { batter, pitcher, park, weather } = input;

	const resolvedBatter: ResolvedBatter = {
		iso: pick(batter.iso, avg.iso, 'batter.iso'),
		barrelPct: pick(batter.barrelPct, avg.barrelPct, 'batter.barrelPct'),
		xHr: pick(batter.xHr, avg.xHr, 'batter.xHr'),
		launchAngle: pick(batter.launchAngle, avg.launchAngle, 'batter.launchAngle'),
		bats: batter.bats,
		recentIso: pick(batter.recent.iso, avg.recentIso, 'batter.recent.iso'),
		recentBarrelPct: pick(batter.recent.barrelPct, avg.recentBarrelPct, 'batter.recent.barrelPct'),
		homeRunsLast10: pick(batter.recent.homeRunsLast10, avg.homeRunsLast10, 'batter.recent.homeRunsLast10'),
		isoByPitchType: {},
	};
	if (batter.bats === null) imputed.push('batter.bats');

	const resolvedPitcher: ResolvedPitcher = {
		hrPer9: pick(pitcher.hrPer9, avg.hrPer9, 'pitcher.hrPer9'),
		barrelPctAllowed: pick(pitcher.barrelPctAllowed, avg.barrelPctAllowed, 'pitcher.barrelPctAllowed'),
		hardHitPctAllowed: pick(pitcher.hardHitPctAllowed, avg.hardHitPctAllowed, 'pitcher.hardHitPctAllowed'),
		throws: pitcher.throws,
		pitchMix: {},
		recentHrPer9: pick(pitcher.recent.hrPer9, avg.recentHrPer9, 'pitcher.recent.hrPer9'),
		avgInningsPerStart: pick(pitcher.avgInningsPerStart, avg.avgInningsPerStart, 'pitcher.avgInningsPerStart'),
		bullpenHrPer9: pick(pitcher.bullpenHrPer9, avg.bullpenHrPer9, 'pitcher.bullpenHrPer9'),
	};
	if (pitcher.throws === null) imputed.push('pitcher.throws');

	// Pitch mix: keep only positive, finite shares
	for (const [pitchType, share] of Object.entries(pitcher.pitchMix)) {
		if (isFiniteNumber(share) && share > 0) {
			resolvedPitcher.pitchMix[pitchType] = share;
		}
	}
	const mixTypes = Object.keys(resolvedPitcher.pitchMix);
	if (mixTypes.length === 0) {
		imputed.push('pitcher.pitchMix');
	}

	// Per-pitch ISO falls back to the batter's season ISO
	let knownPitchIso = 0;
	for (const pitchType of mixTypes) {
		const value = batter.isoByPitchType[pitchType];
		if (isFiniteNumber(value)) {
			resolvedBatter.isoByPitchType[pitchType] = value;
			knownPitchIso++;
		} else {
			resolvedBatter.isoByPitchType[pitchType] = resolvedBatter.iso;
		}
	}
	if (mixTypes.length > 0 && knownPitchIso === 0) {
		imputed.push('batter.isoByPitchType');
	}

	const environment: ResolvedEnvironment = {
		parkFactor: pick(park.factor, 1, 'park.factor'),
		centerFieldBearingDeg: isFiniteNumber(park.centerFieldBearingDeg) ? park.centerFieldBearingDeg : null,
		dome: park.dome,
		windSpeedMph: isFiniteNumber(weather.windSpeedMph) ? weather.windSpeedMph : null,
		windFromDeg: isFiniteNumber(weather.windFromDeg) ? weather.windFromDeg : null,
		temperatureF: isFiniteNumber(weather.temperatureF) ? weather.temperatureF : null,
		elevationFt: isFiniteNumber(weather.elevationFt) ? weather.elevationFt : 0,
	};

	// Weather only matters outdoors
	if (!environment.dome) {
		if (
			environment.centerFieldBearingDeg !== null &&
			(environment.windSpeedMph === null || environment.windFromDeg === null)
		) {
			imputed.push('weather.wind');
		}
		if (environment.temperatureF === null) {
			imputed.push('weather.temperature');
		}
	}

	return {
		resolved: { batter: resolvedBatter, pitcher: resolvedPitcher, environment },
		imputed,
	};
}
