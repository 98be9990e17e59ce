/**
 * Bunt rules (sacrifice bunt, squeeze)
 *
 * Sacrifice bunt:
 * - With 2 outs: batter out, inning ends
 * - Otherwise batter out and every runner advances one base (3B scores)
 *
 * Failed squeeze:
 * - Runner from 3B is tagged out at home, batter reaches 1B, forced runners move up
 * - Without a runner on 3B the batter is simply out
 */

import type { PlayState } from '../play.js';
import { advanceRunner, forceAdvance, recordOut, scoreRunner } from '../play.js';

export function handleSacrificeBunt(play: PlayState): void {
	if (play.outs >= 2) {
		recordOut(play);
		return;
	}

	if (play.third) scoreRunner(play, 'third');
	if (play.second) advanceRunner(play, 'second', 'third');
	if (play.first) advanceRunner(play, 'first', 'second');

	recordOut(play);
}

export function handleFailedSqueeze(play: PlayState): void {
	if (!play.third) {
		recordOut(play);
		return;
	}

	play.third = false;
	recordOut(play);
	forceAdvance(play);
}
