/**
 * Environment multipliers: park factor and weather
 */

import type { ScoringConfig } from '../config.js';
import { clamp } from '../utils.js';
import type { ResolvedEnvironment } from './types.js';

const DEG_TO_RAD = Math.PI / 180;

/**
 * Component of the wind blowing from home plate toward center field, in mph.
 * Positive = blowing out, negative = blowing in.
 *
 * Wind direction is reported as where the wind comes from, so the direction
 * it travels is 180° opposite.
 */
export function windOutMph(env: ResolvedEnvironment): number {
	if (env.dome) return 0;
	if (env.centerFieldBearingDeg === null || env.windSpeedMph === null || env.windFromDeg === null) {
		return 0;
	}
	const windToDeg = (env.windFromDeg + 180) % 360;
	const angle = (windToDeg - env.centerFieldBearingDeg) * DEG_TO_RAD;
	return env.windSpeedMph * Math.cos(angle);
}

/**
 * Multiplicative weather adjustment. Domes are always neutral.
 */
export function weatherMultiplier(env: ResolvedEnvironment, config: ScoringConfig): number {
	if (env.dome) return 1;
	const w = config.weather;

	const wind = clamp(windOutMph(env) * w.perMphOut, -w.maxWindEffect, w.maxWindEffect);

	const temperature =
		env.temperatureF === null
			? 0
			: clamp((env.temperatureF - w.baselineTempF) * w.perDegreeF, -w.maxTempEffect, w.maxTempEffect);

	const elevation = (env.elevationFt / 1000) * w.per1000FtElevation;

	return Math.max(0, 1 + wind + temperature + elevation);
}

export function parkMultiplier(env: ResolvedEnvironment): number {
	return Math.max(0, env.parkFactor);
}
