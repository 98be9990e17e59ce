/**
 * Ground ball out rules (ground out, double play, fielder's choice)
 *
 * Ground out:
 * - 2 outs before: No advancement, no scoring (inning ends)
 * - 0 outs before: Runner on 3B holds
 * - 1 out before: Runner on 3B scores
 * - Runner on 2B advances to 3B if 3B empty
 * - Runner on 1B advances to 2B if 2B empty
 *
 * Double play:
 * - Needs a runner on 1B and fewer than 2 outs, otherwise a plain ground out
 * - Batter and runner from 1B are out, other runners hold
 *
 * Fielder's choice:
 * - Needs a runner on 1B, otherwise a plain ground out
 * - The lead forced runner is out, the remaining forced runners move up, batter to 1B
 */

import type { PlayState } from '../play.js';
import { advanceRunner, forceAdvance, recordOut, scoreRunner } from '../play.js';

export function handleGroundOut(play: PlayState): void {
	const outsBefore = play.outs;

	if (outsBefore >= 2) {
		recordOut(play);
		return;
	}

	// Process runners from 3B to 1B
	if (play.third && outsBefore === 1) {
		scoreRunner(play, 'third');
	}
	if (play.second && !play.third) {
		advanceRunner(play, 'second', 'third');
	}
	if (play.first && !play.second) {
		advanceRunner(play, 'first', 'second');
	}

	recordOut(play);
}

export function handleDoublePlay(play: PlayState): void {
	if (!play.first || play.outs >= 2) {
		handleGroundOut(play);
		return;
	}

	play.first = false;
	recordOut(play, 2);
}

export function handleFieldersChoice(play: PlayState): void {
	if (!play.first) {
		handleGroundOut(play);
		return;
	}

	// Lead runner in the force chain is retired
	if (play.second && play.third) {
		play.third = false;
	} else if (play.second) {
		play.second = false;
	} else {
		play.first = false;
	}
	recordOut(play);
	forceAdvance(play);
}
