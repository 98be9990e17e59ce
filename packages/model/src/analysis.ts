/**
 * Full analysis of a game state: WP, matchup-adjusted WP, LI and tactics
 */

import type { GameState, LeverageResult, MatchupContext, ScoringEnvironment } from './types.js';
import type { Recommendation } from './tactics/types.js';
import { MLB } from './environment.js';
import { RE24Table } from './RE24Table.js';
import { isGameOver, toLiveState } from './game-state.js';
import { winProbability } from './win-probability.js';
import { leverageIndex } from './leverage.js';
import { adjustForMatchup, hasMatchup } from './matchup.js';
import { recommend } from './tactics/evaluate.js';

export interface GameAnalysis {
	state: GameState;
	runsPerGame: number;
	winProbability: number;
	/** Null unless a batter OPS or pitcher ERA was supplied */
	adjustedWinProbability: number | null;
	leverage: LeverageResult;
	tactics: Recommendation[];
}

export function analyzeGameState(
	state: GameState,
	env: ScoringEnvironment = MLB,
	matchup: MatchupContext = {}
): GameAnalysis {
	const table = RE24Table.from(env);
	const wp = winProbability(state, table);
	const tactics = recommend(state, table, matchup);

	let adjustedWinProbability: number | null = null;
	if (hasMatchup(matchup)) {
		// At the end of a half-inning the next batter belongs to the other team
		adjustedWinProbability = isGameOver(state) ? wp : adjustForMatchup(wp, toLiveState(state).half, matchup);
	}

	return {
		state,
		runsPerGame: table.runsPerGame,
		winProbability: wp,
		adjustedWinProbability,
		leverage: leverageIndex(state, table),
		tactics,
	};
}
