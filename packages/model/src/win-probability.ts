/**
 * Win probability for the home team
 *
 * Three regimes:
 * - Innings 1-8: normal approximation of the final run differential
 * - Top of the 9th or later: Poisson distribution of the visitors' runs this
 *   half, each total feeding the home team's walk-off chances
 * - Bottom of the 9th or later: discrete walk-off boundary, the home team
 *   needs a fixed number of runs before the third out
 */

import type { GameState, LiveGameState, ScoringEnvironment } from './types.js';
import { MLB } from './environment.js';
import { RE24Table } from './RE24Table.js';
import { REGULATION_INNINGS, finalResult, toLiveState, validateGameState } from './game-state.js';
import { createBaseOutState } from './state-machine/state.js';
import { clamp, normalCdf, poissonCdf, poissonPmf } from './utils.js';

/** Home team's chance of winning a game that reaches extra innings tied */
export const EXTRA_INNINGS_HOME_WIN = 0.52;

/** Poisson mean for late-inning scoring, as a multiple of RE24 */
export const HALF_INNING_SCORING_FACTOR = 1.8;

/** Per half-inning run variance as a multiple of the expected runs */
export const RUN_VARIANCE_FACTOR = 2.0;

/** Live games never report a certain result */
export const WP_FLOOR = 0.001;
export const WP_CEILING = 0.999;

/** Truncation point of the visitors' run distribution in the top of the 9th+ */
const MAX_RUNS_PER_HALF = 25;

/**
 * Probability that the home team wins from the given state
 */
export function winProbability(state: GameState, env: ScoringEnvironment = MLB): number {
	validateGameState(state);
	const table = RE24Table.from(env);

	const winner = finalResult(state);
	if (winner !== null) {
		return winner === 'home' ? 1 : 0;
	}

	const live = toLiveState(state);
	return clamp(estimate(live, table), WP_FLOOR, WP_CEILING);
}

function estimate(state: LiveGameState, table: RE24Table): number {
	const expectedRuns = table.get(state.baseOut);

	if (state.inning >= REGULATION_INNINGS) {
		if (state.half === 'bottom') {
			return walkOffProbability(state.scoreDiff, expectedRuns);
		}
		return lastTopProbability(state.scoreDiff, expectedRuns, table);
	}

	return normalApproximation(state, table);
}

/**
 * Bottom of the 9th or later. Ahead means a walk-off already happened
 * on this play; the game is not recorded as over, so it stays just under 1.
 * Otherwise the home team needs `deficit + 1` runs to win, exactly
 * `deficit` to force extra innings.
 */
export function walkOffProbability(scoreDiff: number, expectedRuns: number): number {
	if (scoreDiff > 0) return WP_CEILING;

	const deficit = -scoreDiff;
	const lambda = HALF_INNING_SCORING_FACTOR * expectedRuns;
	const win = 1 - poissonCdf(deficit, lambda);
	const tie = poissonPmf(deficit, lambda);
	return win + tie * EXTRA_INNINGS_HOME_WIN;
}

/**
 * Top of the 9th or later. Each visitor run total either ends the game
 * (home still ahead) or hands the home team a bottom half needing some number of runs.
 */
function lastTopProbability(scoreDiff: number, expectedRuns: number, table: RE24Table): number {
	const lambda = HALF_INNING_SCORING_FACTOR * expectedRuns;
	const leadoff = table.get(createBaseOutState(0));

	let total = 0;
	for (let runs = 0; runs <= MAX_RUNS_PER_HALF; runs++) {
		const diff = scoreDiff - runs;
		const homeWins = diff > 0 ? 1 : walkOffProbability(diff, leadoff);
		total += poissonPmf(runs, lambda) * homeWins;
	}
	return total;
}

/**
 * Innings 1-8. Final run differential D ~ Normal(mean, variance) where each
 * remaining half-inning adds the bases-empty RE24 value to its team, the
 * current half adds RE24 of the current state, and variance scales with
 * expected runs. Continuity-corrected: win = P(D >= 1), tie = P(D = 0).
 */
function normalApproximation(state: LiveGameState, table: RE24Table): number {
	const perHalf = table.get(createBaseOutState(0));
	const current = table.get(state.baseOut);
	const remaining = Math.max(REGULATION_INNINGS - state.inning, 0);

	// Home still bats in the bottom of the current inning during the top half
	const awayHalves = remaining;
	const homeHalves = state.half === 'top' ? remaining + 1 : remaining;
	const awayCurrent = state.half === 'top' ? current : 0;
	const homeCurrent = state.half === 'bottom' ? current : 0;

	const mean =
		state.scoreDiff + homeCurrent + homeHalves * perHalf - awayCurrent - awayHalves * perHalf;
	const variance = RUN_VARIANCE_FACTOR * (current + (homeHalves + awayHalves) * perHalf);
	const sd = Math.sqrt(variance);

	const atMostTie = normalCdf((0.5 - mean) / sd);
	const belowTie = normalCdf((-0.5 - mean) / sd);
	return 1 - atMostTie + (atMostTie - belowTie) * EXTRA_INNINGS_HOME_WIN;
}
