/**
 * Hit baserunning rules
 *
 * Rules:
 * - Single: Runner on 3B scores, runner on 2B to 3B, runner on 1B to 2B, batter to 1B
 * - Double: Runners on 2B and 3B score, runner on 1B to 3B, batter to 2B
 * - Triple: All runners score, batter to 3B
 * - Home Run: All runners + batter score, bases cleared
 * - Hit-and-run single: runners were moving, so 2B and 3B score and 1B goes to 3B
 */

import type { PlayState } from '../play.js';
import { advanceRunner, scoreRunner } from '../play.js';

export type HitOutcome = 'single' | 'double' | 'triple' | 'homeRun' | 'hitAndRunSingle';

export function handleHit(play: PlayState, outcome: HitOutcome): void {
	switch (outcome) {
		case 'single':
			if (play.third) scoreRunner(play, 'third');
			if (play.second) advanceRunner(play, 'second', 'third');
			if (play.first) advanceRunner(play, 'first', 'second');
			play.first = true;
			break;

		case 'double':
			if (play.third) scoreRunner(play, 'third');
			if (play.second) scoreRunner(play, 'second');
			if (play.first) advanceRunner(play, 'first', 'third');
			play.second = true;
			break;

		case 'triple':
			if (play.third) scoreRunner(play, 'third');
			if (play.second) scoreRunner(play, 'second');
			if (play.first) scoreRunner(play, 'first');
			play.third = true;
			break;

		case 'homeRun':
			if (play.third) scoreRunner(play, 'third');
			if (play.second) scoreRunner(play, 'second');
			if (play.first) scoreRunner(play, 'first');
			// Batter scores
			play.runs++;
			break;

		case 'hitAndRunSingle':
			if (play.third) scoreRunner(play, 'third');
			if (play.second) scoreRunner(play, 'second');
			if (play.first) advanceRunner(play, 'first', 'third');
			play.first = true;
			break;
	}
}
