/**
 * Batter-side signals: raw power and recent form
 */

import type { ScoringConfig } from '../config.js';
import { minMax, weightedMean } from '../utils.js';
import type { ResolvedBatter } from './types.js';

/**
 * Power signal from season ISO, barrel rate, xHR and launch angle
 */
export function powerSignal(batter: ResolvedBatter, config: ScoringConfig): number {
	const { ranges } = config;
	return weightedMean(
		{
			iso: minMax(batter.iso, ranges.iso),
			barrelPct: minMax(batter.barrelPct, ranges.barrelPct),
			xHr: minMax(batter.xHr, ranges.xHr),
			launchAngle: minMax(batter.launchAngle, ranges.launchAngle),
		},
		config.weights.power
	);
}

/**
 * Recent-form signal over the rolling window (last 10 games).
 * Recent ISO and barrel rate share the season reference ranges.
 */
export function formSignal(batter: ResolvedBatter, config: ScoringConfig): number {
	const { ranges } = config;
	return weightedMean(
		{
			iso: minMax(batter.recentIso, ranges.iso),
			barrelPct: minMax(batter.recentBarrelPct, ranges.barrelPct),
			homeRunsLast10: minMax(batter.homeRunsLast10, ranges.homeRunsLast10),
		},
		config.weights.form
	);
}
