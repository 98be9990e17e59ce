/**
 * Base-out state transitions
 * Pure functions: every (state, outcome) pair has exactly one result
 */

import type { BaseOutState, EndOfInning, PlayOutcome } from '../types.js';
import { END_OF_INNING } from '../types.js';
import { InvalidStateError } from '../errors.js';
import { isOuts, validateBaseOutState } from './state.js';
import { startPlay } from './play.js';
import { handleHit } from './rules/hit.js';
import { handleWalk } from './rules/walk.js';
import { handleFlyOut, handleStrikeout } from './rules/air-out.js';
import { handleDoublePlay, handleFieldersChoice, handleGroundOut } from './rules/ground-out.js';
import { handleFailedSqueeze, handleSacrificeBunt } from './rules/bunt.js';
import { handleCaughtStealing, handleStolenBase } from './rules/steal.js';

/**
 * Result of a state transition
 */
export interface TransitionResult {
	next: BaseOutState | EndOfInning;
	runsScored: number;
}

/**
 * Core state transition function
 *
 * @param state - Base-out state before the play
 * @param outcome - The play
 * @returns Next state (or END_OF_INNING on the third out) and runs scored
 */
export function applyOutcome(state: BaseOutState, outcome: PlayOutcome): TransitionResult {
	validateBaseOutState(state);
	const play = startPlay(state);

	switch (outcome) {
		// Outs
		case 'strikeout':
		case 'lineOut':
			handleStrikeout(play);
			break;
		case 'flyOut':
			handleFlyOut(play);
			break;
		case 'groundOut':
			handleGroundOut(play);
			break;
		case 'doublePlay':
			handleDoublePlay(play);
			break;
		case 'fieldersChoice':
			handleFieldersChoice(play);
			break;

		// Hits
		case 'single':
		case 'double':
		case 'triple':
		case 'homeRun':
		case 'hitAndRunSingle':
			handleHit(play, outcome);
			break;

		// Walks
		case 'walk':
		case 'intentionalWalk':
			handleWalk(play);
			break;

		// Bunts
		case 'sacrificeBunt':
			handleSacrificeBunt(play);
			break;
		case 'failedSqueeze':
			handleFailedSqueeze(play);
			break;

		// Baserunning
		case 'stolenBaseSecond':
			handleStolenBase(play, 'second');
			break;
		case 'stolenBaseThird':
			handleStolenBase(play, 'third');
			break;
		case 'caughtStealingSecond':
			handleCaughtStealing(play, 'second');
			break;
		case 'caughtStealingThird':
			handleCaughtStealing(play, 'third');
			break;

		default: {
			const unknown: never = outcome;
			throw new InvalidStateError(`Unknown play outcome: ${String(unknown)}`);
		}
	}

	// No run counts on a play that makes the third out
	if (play.outs >= 3) {
		return { next: END_OF_INNING, runsScored: 0 };
	}

	const outs = play.outs;
	if (!isOuts(outs)) {
		throw new InvalidStateError(`Play produced an invalid out count: ${outs}`);
	}

	return {
		next: { first: play.first, second: play.second, third: play.third, outs },
		runsScored: play.runs,
	};
}

export function isEndOfInning(state: BaseOutState | EndOfInning): state is EndOfInning {
	return state === END_OF_INNING;
}
