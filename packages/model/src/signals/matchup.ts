/**
 * Head-to-head signals: pitch-type matchup and platoon advantage
 */

import type { ScoringConfig } from '../config.js';
import type { BatSide, ThrowHand } from '../types.js';
import { minMax } from '../utils.js';
import type { ResolvedBatter, ResolvedPitcher } from './types.js';

/**
 * Usage-weighted ISO of the batter against the pitches this pitcher throws.
 * With no pitch mix the batter's season ISO stands in.
 */
export function pitchMatchupIso(batter: ResolvedBatter, pitcher: ResolvedPitcher): number {
	let weighted = 0;
	let totalUsage = 0;

	for (const [pitchType, usage] of Object.entries(pitcher.pitchMix)) {
		weighted += (batter.isoByPitchType[pitchType] ?? batter.iso) * usage;
		totalUsage += usage;
	}

	return totalUsage > 0 ? weighted / totalUsage : batter.iso;
}

export function pitchMatchupSignal(
	batter: ResolvedBatter,
	pitcher: ResolvedPitcher,
	config: ScoringConfig
): number {
	return minMax(pitchMatchupIso(batter, pitcher), config.ranges.iso);
}

/**
 * Platoon advantage in [0, 1]. Switch hitters always take the favorable side.
 */
export function platoonSignal(
	bats: BatSide | null,
	throws: ThrowHand | null,
	config: ScoringConfig
): number {
	const table = config.platoon;
	if (bats === 'S') return table.switchHitter;
	if (bats === null || throws === null) return table.unknown;
	if (bats === 'L' && throws === 'R') return table.leftVsRight;
	if (bats === 'R' && throws === 'L') return table.rightVsLeft;
	return table.sameSide;
}
