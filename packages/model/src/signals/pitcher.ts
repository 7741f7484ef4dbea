/**
 * Pitcher-side signal: how exposed the pitching staff is to the long ball
 */

import type { ScoringConfig } from '../config.js';
import { clamp, minMax, weightedMean } from '../utils.js';
import type { ResolvedPitcher } from './types.js';

// A full game is nine innings; the starter covers avgInningsPerStart of them
const INNINGS_PER_GAME = 9;

/**
 * Starter vulnerability from HR/9, barrel and hard-hit rates allowed,
 * and recent HR/9
 */
export function starterVulnerability(pitcher: ResolvedPitcher, config: ScoringConfig): number {
	const { ranges } = config;
	return weightedMean(
		{
			hrPer9: minMax(pitcher.hrPer9, ranges.hrPer9),
			barrelPctAllowed: minMax(pitcher.barrelPctAllowed, ranges.barrelPctAllowed),
			hardHitPctAllowed: minMax(pitcher.hardHitPctAllowed, ranges.hardHitPctAllowed),
			recentHrPer9: minMax(pitcher.recentHrPer9, ranges.hrPer9),
		},
		config.weights.vulnerability
	);
}

/**
 * Blend starter and bullpen exposure by the share of the game the starter
 * usually pitches. A short-outing starter in front of a homer-prone bullpen
 * raises the signal.
 */
export function vulnerabilitySignal(pitcher: ResolvedPitcher, config: ScoringConfig): number {
	const starterShare = clamp(pitcher.avgInningsPerStart / INNINGS_PER_GAME, 0, 1);
	const bullpen = minMax(pitcher.bullpenHrPer9, config.ranges.hrPer9);
	return starterShare * starterVulnerability(pitcher, config) + (1 - starterShare) * bullpen;
}
