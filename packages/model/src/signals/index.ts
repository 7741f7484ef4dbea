/**
 * Signal layer - turns resolved profiles into normalized component signals
 * and environment multipliers
 */

import type { ScoringConfig } from '../config.js';
import type { ComponentSignals } from '../types.js';
import { formSignal, powerSignal } from './batter.js';
import { pitchMatchupSignal, platoonSignal } from './matchup.js';
import { vulnerabilitySignal } from './pitcher.js';
import type { ResolvedInputs } from './types.js';

export type {
	ResolvedBatter,
	ResolvedPitcher,
	ResolvedEnvironment,
	ResolvedInputs,
	Resolution
} from './types.js';

export { resolveInputs } from './resolve.js';
export { powerSignal, formSignal } from './batter.js';
export { vulnerabilitySignal, starterVulnerability } from './pitcher.js';
export { pitchMatchupIso, pitchMatchupSignal, platoonSignal } from './matchup.js';
export { windOutMph, weatherMultiplier, parkMultiplier } from './environment.js';

export function computeSignals(inputs: ResolvedInputs, config: ScoringConfig): ComponentSignals {
	const { batter, pitcher } = inputs;
	return {
		power: powerSignal(batter, config),
		vulnerability: vulnerabilitySignal(pitcher, config),
		form: formSignal(batter, config),
		pitchMatchup: pitchMatchupSignal(batter, pitcher, config),
		platoon: platoonSignal(batter.bats, pitcher.throws, config),
	};
}
