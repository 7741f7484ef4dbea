/**
 * Types for the signal layer
 *
 * Resolved inputs are scoring inputs after default substitution:
 * every numeric field is a finite number.
 */

import type { BatSide, ThrowHand } from '../types.js';

export interface ResolvedBatter {
	iso: number;
	barrelPct: number;
	xHr: number;
	launchAngle: number;
	bats: BatSide | null;
	recentIso: number;
	recentBarrelPct: number;
	homeRunsLast10: number;
	isoByPitchType: Record<string, number>;
}

export interface ResolvedPitcher {
	hrPer9: number;
	barrelPctAllowed: number;
	hardHitPctAllowed: number;
	throws: ThrowHand | null;
	pitchMix: Record<string, number>;
	recentHrPer9: number;
	avgInningsPerStart: number;
	bullpenHrPer9: number;
}

export interface ResolvedEnvironment {
	parkFactor: number;
	centerFieldBearingDeg: number | null;
	dome: boolean;
	windSpeedMph: number | null;
	windFromDeg: number | null;
	temperatureF: number | null;
	elevationFt: number;
}

export interface ResolvedInputs {
	batter: ResolvedBatter;
	pitcher: ResolvedPitcher;
	environment: ResolvedEnvironment;
}

export interface Resolution {
	resolved: ResolvedInputs;
	/** Dotted field paths that were substituted, in a fixed order */
	imputed: string[];
}
