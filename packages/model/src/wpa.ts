/**
 * Win Probability Added
 */

import type { GameState, PlayOutcome, ScoringEnvironment } from './types.js';
import { MLB } from './environment.js';
import { RE24Table } from './RE24Table.js';
import { advanceGame } from './game-state.js';
import { winProbability } from './win-probability.js';

export interface PlayWinProbability {
	before: GameState;
	after: GameState;
	wpBefore: number;
	wpAfter: number;
	/** wpAfter - wpBefore, from the home team's point of view */
	wpa: number;
}

/**
 * WP(after) - WP(before)
 */
export function wpa(before: GameState, after: GameState, env: ScoringEnvironment = MLB): number {
	const table = RE24Table.from(env);
	return winProbability(after, table) - winProbability(before, table);
}

/**
 * WPA of applying a single play to a state
 */
export function playWpa(
	state: GameState,
	outcome: PlayOutcome,
	env: ScoringEnvironment = MLB
): PlayWinProbability {
	const table = RE24Table.from(env);
	const after = advanceGame(state, outcome);
	const wpBefore = winProbability(state, table);
	const wpAfter = winProbability(after, table);

	return {
		before: state,
		after,
		wpBefore,
		wpAfter,
		wpa: wpAfter - wpBefore,
	};
}
