/**
 * Working state for a single play.
 * Rule handlers mutate a PlayState; outs may reach 3 here and are
 * resolved to the end-of-inning marker by the transition function.
 */

import type { Base, BaseOutState } from '../types.js';

export interface PlayState {
	first: boolean;
	second: boolean;
	third: boolean;
	outs: number;
	runs: number;
}

export function startPlay(state: BaseOutState): PlayState {
	return {
		first: state.first,
		second: state.second,
		third: state.third,
		outs: state.outs,
		runs: 0,
	};
}

/**
 * Move a runner, scoring a run when the destination is home
 */
export function advanceRunner(play: PlayState, from: Base, to: Base | 'home'): void {
	play[from] = false;
	if (to === 'home') {
		play.runs++;
	} else {
		play[to] = true;
	}
}

export function scoreRunner(play: PlayState, from: Base): void {
	advanceRunner(play, from, 'home');
}

export function recordOut(play: PlayState, count: number = 1): void {
	play.outs += count;
}

/**
 * Batter takes first; only runners forced by the batter move up
 */
export function forceAdvance(play: PlayState): void {
	if (play.first) {
		if (play.second) {
			if (play.third) {
				scoreRunner(play, 'third');
			}
			advanceRunner(play, 'second', 'third');
		}
		advanceRunner(play, 'first', 'second');
	}
	play.first = true;
}
