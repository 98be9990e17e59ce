/**
 * Walk / intentional walk baserunning rules
 *
 * Rules:
 * - Force advancement only
 * - Batter takes 1B
 * - Bases loaded: Runner from 3B scores
 */

import type { PlayState } from '../play.js';
import { forceAdvance } from '../play.js';

export function handleWalk(play: PlayState): void {
	forceAdvance(play);
}
