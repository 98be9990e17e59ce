/**
 * RE24 run expectancy table
 *
 * Expected runs scored in the remainder of the inning for each of the
 * 24 base-out states, scaled linearly to a scoring environment.
 */

import type { BaseOutState, EndOfInning, Outs, ScoringEnvironment } from './types.js';
import { END_OF_INNING } from './types.js';
import { MLB, MLB_RUNS_PER_GAME, validateEnvironment } from './environment.js';
import {
	ALL_BASE_OUT_STATES,
	BaseConfigLabels,
	toBaseConfig,
	validateBaseOutState,
} from './state-machine/state.js';

/**
 * MLB 2010-2019 averages at 4.5 runs per game.
 * Indexed [outs][BaseConfig]; BaseConfig order is ---, 1--, -2-, 12-, --3, 1-3, -23, 123.
 */
const BASELINE_RE24: readonly (readonly number[])[] = [
	[0.481, 0.859, 1.1, 1.437, 1.35, 1.784, 1.964, 2.292],
	[0.254, 0.509, 0.664, 0.884, 0.95, 1.13, 1.376, 1.541],
	[0.098, 0.224, 0.319, 0.429, 0.353, 0.478, 0.58, 0.752],
];

export interface RE24Entry {
	state: BaseOutState;
	/** Runner label, e.g. "1-3" */
	runners: string;
	outs: Outs;
	expectedRuns: number;
}

/**
 * Immutable RE24 table for one scoring environment.
 *
 * A table is itself a ScoringEnvironment, so it can be passed anywhere an
 * environment is accepted without being rebuilt.
 */
export class RE24Table implements ScoringEnvironment {
	readonly runsPerGame: number;
	private readonly values: readonly (readonly number[])[];

	constructor(env: ScoringEnvironment = MLB) {
		validateEnvironment(env);
		this.runsPerGame = env.runsPerGame;
		const scale = env.runsPerGame / MLB_RUNS_PER_GAME;
		this.values = BASELINE_RE24.map((row) => row.map((value) => value * scale));
	}

	/**
	 * Reuse the table when given one, build it otherwise
	 */
	static from(env: ScoringEnvironment): RE24Table {
		return env instanceof RE24Table ? env : new RE24Table(env);
	}

	get(state: BaseOutState): number {
		validateBaseOutState(state);
		return this.values[state.outs][toBaseConfig(state)];
	}

	/**
	 * Like get(), but a finished half-inning has nothing left to score
	 */
	expectedRuns(state: BaseOutState | EndOfInning): number {
		return state === END_OF_INNING ? 0 : this.get(state);
	}

	/**
	 * All 24 entries, ordered by outs then base configuration
	 */
	entries(): RE24Entry[] {
		return ALL_BASE_OUT_STATES.map((state) => ({
			state,
			runners: BaseConfigLabels[toBaseConfig(state)],
			outs: state.outs,
			expectedRuns: this.get(state),
		}));
	}
}

/**
 * Expected runs for the rest of the inning from a base-out state
 */
export function re24(state: BaseOutState, env: ScoringEnvironment = MLB): number {
	return RE24Table.from(env).get(state);
}

/**
 * Tables keyed by runs per game.
 *
 * Owned by whoever creates it; the HTTP layer keeps one per process.
 */
export class RE24Cache {
	private readonly tables = new Map<number, RE24Table>();

	get(env: ScoringEnvironment): RE24Table {
		validateEnvironment(env);
		const cached = this.tables.get(env.runsPerGame);
		if (cached) return cached;

		const table = RE24Table.from(env);
		this.tables.set(env.runsPerGame, table);
		return table;
	}

	get size(): number {
		return this.tables.size;
	}

	clear(): void {
		this.tables.clear();
	}
}
