/**
 * Stolen base / caught stealing rules
 *
 * Rules:
 * - Only the runner directly behind the target base runs, and only into an open base
 * - Stolen base: runner moves up one base
 * - Caught stealing: runner is out
 * - Anything else leaves the state unchanged
 */

import type { PlayState } from '../play.js';
import { advanceRunner, recordOut } from '../play.js';

export type StealTarget = 'second' | 'third';

const RUNNER_FOR: Record<StealTarget, 'first' | 'second'> = {
	second: 'first',
	third: 'second',
};

function canAttempt(play: PlayState, target: StealTarget): boolean {
	return play[RUNNER_FOR[target]] && !play[target];
}

export function handleStolenBase(play: PlayState, target: StealTarget): void {
	if (canAttempt(play, target)) {
		advanceRunner(play, RUNNER_FOR[target], target);
	}
}

export function handleCaughtStealing(play: PlayState, target: StealTarget): void {
	if (canAttempt(play, target)) {
		play[RUNNER_FOR[target]] = false;
		recordOut(play);
	}
}
