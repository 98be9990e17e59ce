/**
 * Batter / pitcher quality
 *
 * Shifts win probability in logit space toward the batting team for a
 * strong hitter or a weak pitcher.
 */

import type { Half, MatchupContext } from './types.js';
import { InvalidMatchupError } from './errors.js';
import { battingTeam } from './game-state.js';
import { clamp, logistic, logit } from './utils.js';

/** OPS with no effect on win probability */
export const MATCHUP_NEUTRAL_OPS = 0.75;
/** ERA with no effect on win probability */
export const MATCHUP_NEUTRAL_ERA = 3.5;
/** Logit shift per point of OPS */
export const OPS_LOGIT_WEIGHT = 0.5;
/** Logit shift per run of ERA */
export const ERA_LOGIT_WEIGHT = 0.15;

const MATCHUP_WP_FLOOR = 0.01;
const MATCHUP_WP_CEILING = 0.99;

export const MAX_OPS = 2;
export const MAX_ERA = 15;

export function validateMatchup(matchup: MatchupContext): void {
	const { batterOps, pitcherEra } = matchup;
	if (batterOps !== undefined && !(Number.isFinite(batterOps) && batterOps >= 0 && batterOps <= MAX_OPS)) {
		throw new InvalidMatchupError(`batterOps must be between 0 and ${MAX_OPS}, got ${batterOps}`);
	}
	if (pitcherEra !== undefined && !(Number.isFinite(pitcherEra) && pitcherEra >= 0 && pitcherEra <= MAX_ERA)) {
		throw new InvalidMatchupError(`pitcherEra must be between 0 and ${MAX_ERA}, got ${pitcherEra}`);
	}
}

export function hasMatchup(matchup: MatchupContext): boolean {
	return matchup.batterOps !== undefined || matchup.pitcherEra !== undefined;
}

/**
 * Home win probability adjusted for the current batter and pitcher
 *
 * @param wp - Unadjusted home win probability
 * @param half - Half-inning, which decides who is batting
 */
export function adjustForMatchup(wp: number, half: Half, matchup: MatchupContext = {}): number {
	validateMatchup(matchup);
	if (!hasMatchup(matchup)) return wp;

	let battingShift = 0;
	if (matchup.batterOps !== undefined) {
		battingShift += (matchup.batterOps - MATCHUP_NEUTRAL_OPS) * OPS_LOGIT_WEIGHT;
	}
	if (matchup.pitcherEra !== undefined) {
		battingShift += (matchup.pitcherEra - MATCHUP_NEUTRAL_ERA) * ERA_LOGIT_WEIGHT;
	}

	const homeShift = battingTeam(half) === 'home' ? battingShift : -battingShift;
	const p = clamp(wp, MATCHUP_WP_FLOOR, MATCHUP_WP_CEILING);
	return clamp(logistic(logit(p) + homeShift), MATCHUP_WP_FLOOR, MATCHUP_WP_CEILING);
}
