/**
 * Strikeout, line out and fly out rules
 *
 * Rules:
 * - Strikeout / line out: batter out, runners hold
 * - Fly out: batter out; with fewer than 2 outs a runner on 3B tags and scores
 */

import type { PlayState } from '../play.js';
import { recordOut, scoreRunner } from '../play.js';

export function handleStrikeout(play: PlayState): void {
	recordOut(play);
}

export function handleFlyOut(play: PlayState): void {
	if (play.third && play.outs < 2) {
		scoreRunner(play, 'third');
	}
	recordOut(play);
}
