/**
 * Game state validation and progression
 */

import type { GameState, Half, LiveGameState, PlayOutcome, Team } from './types.js';
import { END_OF_INNING } from './types.js';
import { InvalidStateError } from './errors.js';
import { createBaseOutState, validateBaseOutState } from './state-machine/state.js';
import { applyOutcome } from './state-machine/transitions.js';

/** The home team skips the bottom half once it leads after this many innings */
export const REGULATION_INNINGS = 9;

export function validateGameState(state: GameState): void {
	if (typeof state !== 'object' || state === null) {
		throw new InvalidStateError('Game state must be an object');
	}
	if (!Number.isInteger(state.inning) || state.inning < 1) {
		throw new InvalidStateError(`Inning must be a positive integer, got ${String(state.inning)}`);
	}
	if (state.half !== 'top' && state.half !== 'bottom') {
		throw new InvalidStateError(`Half must be "top" or "bottom", got ${String(state.half)}`);
	}
	if (!Number.isInteger(state.scoreDiff)) {
		throw new InvalidStateError(`Score difference must be an integer, got ${String(state.scoreDiff)}`);
	}
	if (state.baseOut !== END_OF_INNING) {
		validateBaseOutState(state.baseOut);
	}
}

export function battingTeam(half: Half): Team {
	return half === 'top' ? 'away' : 'home';
}

/**
 * Winner of a game that is definitively over, null while it is still being played.
 *
 * A game only ends when a half-inning closes with three outs:
 * - top of the 9th or later with the home team ahead
 * - bottom of the 9th or later with either team ahead
 */
export function finalResult(state: GameState): Team | null {
	if (state.baseOut !== END_OF_INNING || state.inning < REGULATION_INNINGS) {
		return null;
	}
	if (state.half === 'top') {
		return state.scoreDiff > 0 ? 'home' : null;
	}
	if (state.scoreDiff > 0) return 'home';
	if (state.scoreDiff < 0) return 'away';
	return null;
}

export function isGameOver(state: GameState): boolean {
	return finalResult(state) !== null;
}

/**
 * Resolve the end-of-inning marker to the first pitch of the next half-inning
 */
export function toLiveState(state: GameState): LiveGameState {
	const { baseOut } = state;
	if (baseOut !== END_OF_INNING) {
		return { ...state, baseOut };
	}
	if (isGameOver(state)) {
		throw new InvalidStateError('The game is over; there is no next half-inning');
	}
	return {
		inning: state.half === 'top' ? state.inning : state.inning + 1,
		half: state.half === 'top' ? 'bottom' : 'top',
		baseOut: createBaseOutState(0),
		scoreDiff: state.scoreDiff,
	};
}

/**
 * Game state after one play. Runs are credited to the batting team.
 */
export function advanceGame(state: GameState, outcome: PlayOutcome): GameState {
	validateGameState(state);
	if (state.baseOut === END_OF_INNING) {
		throw new InvalidStateError('Cannot apply a play to a half-inning that has already ended');
	}

	const { next, runsScored } = applyOutcome(state.baseOut, outcome);
	const scoreDiff =
		battingTeam(state.half) === 'home' ? state.scoreDiff + runsScored : state.scoreDiff - runsScored;

	return {
		inning: state.inning,
		half: state.half,
		baseOut: next,
		scoreDiff,
	};
}
