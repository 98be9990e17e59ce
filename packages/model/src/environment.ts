/**
 * Scoring environments
 */

import type { ScoringEnvironment } from './types.js';
import { InvalidEnvironmentError } from './errors.js';

/** Runs per team per game the baseline RE24 matrix was calibrated on */
export const MLB_RUNS_PER_GAME = 4.5;

export const NPB_RUNS_PER_GAME = 4.0;

export const MLB: ScoringEnvironment = { runsPerGame: MLB_RUNS_PER_GAME };

export const NPB: ScoringEnvironment = { runsPerGame: NPB_RUNS_PER_GAME };

export function validateEnvironment(env: ScoringEnvironment): void {
	const { runsPerGame } = env;
	if (typeof runsPerGame !== 'number' || !Number.isFinite(runsPerGame) || runsPerGame <= 0) {
		throw new InvalidEnvironmentError(
			`runsPerGame must be a positive number, got ${String(runsPerGame)}`
		);
	}
}
