/**
 * Tactical recommendation tests
 * Expected deltas are worked from the MLB RE24 table
 */

import { describe, it, expect } from 'vitest';
import { evaluateTactics, recommend, verdictFor } from './evaluate.js';
import { TACTICS } from './catalog.js';
import type { Recommendation, TacticId } from './types.js';
import { ALL_BASE_OUT_STATES, createBaseOutState } from '../state-machine/state.js';
import { END_OF_INNING } from '../types.js';
import type { BaseOutState, GameState } from '../types.js';
import { InvalidMatchupError } from '../errors.js';

function byId(recommendations: Recommendation[], id: TacticId): Recommendation {
	const found = recommendations.find((recommendation) => recommendation.tactic === id);
	if (!found) throw new Error(`No recommendation for ${id}`);
	return found;
}

// Runner on 1st, nobody out, early in a tied game
const runnerOnFirst: GameState = { inning: 3, half: 'top', baseOut: createBaseOutState(0, 1), scoreDiff: 0 };

// Same base-out state with the game out of reach, so leverage is zero
const runnerOnFirstBlowout: GameState = { inning: 2, half: 'top', baseOut: createBaseOutState(0, 1), scoreDiff: 15 };

// Bases loaded, two outs, tied, bottom of the 9th
const ninthInningDrama: GameState = { inning: 9, half: 'bottom', baseOut: createBaseOutState(2, 7), scoreDiff: 0 };

describe('evaluateTactics', () => {
	it('returns every catalog tactic in catalog order', () => {
		const ids = evaluateTactics(runnerOnFirst).map((recommendation) => recommendation.tactic);
		expect(ids).toEqual(TACTICS.map((tactic) => tactic.id));
	});

	it('values the sacrifice bunt with a runner on 1st', () => {
		// 0.8 × RE(2B, 1 out) + 0.2 × RE(1B, 1 out) - RE(1B, 0 out)
		const bunt = byId(evaluateTactics(runnerOnFirst), 'sacrificeBunt');
		expect(bunt.qualifies).toBe(true);
		expect(bunt.successRate).toBe(0.8);
		expect(bunt.expectedDelta).toBeCloseTo(0.8 * 0.664 + 0.2 * 0.509 - 0.859, 10);
		expect(bunt.verdict).toBe('Not recommended');
	});

	it('values a steal of 2nd as a wash', () => {
		// 0.72 × RE(2B, 0 out) + 0.28 × RE(empty, 1 out) - RE(1B, 0 out) = 0.00412
		const steal = byId(evaluateTactics(runnerOnFirst), 'stealSecond');
		expect(steal.expectedDelta).toBeCloseTo(0.00412, 10);
		expect(steal.verdict).toBe('Neutral');
	});

	it('values the hit and run', () => {
		// 0.55 × RE(1B+3B, 0 out) + 0.45 × RE(empty, 1 out) - RE(1B, 0 out)
		const hitAndRun = byId(evaluateTactics(runnerOnFirst), 'hitAndRun');
		expect(hitAndRun.successRate).toBe(0.55);
		expect(hitAndRun.expectedDelta).toBeCloseTo(0.55 * 1.784 + 0.45 * 0.254 - 0.859, 10);
		expect(hitAndRun.verdict).toBe('Recommended');
	});

	it('values the intentional walk for the defense', () => {
		// Defense sees -(RE(1B+2B, 1 out) - RE(2B, 1 out))
		const state: GameState = { inning: 6, half: 'bottom', baseOut: createBaseOutState(1, 2), scoreDiff: 0 };
		const walk = byId(evaluateTactics(state), 'intentionalWalk');
		expect(walk.side).toBe('defense');
		expect(walk.successRate).toBe(1);
		expect(walk.expectedDelta).toBeCloseTo(-(0.884 - 0.664), 10);
		expect(walk.verdict).toBe('Not recommended');
	});

	it('values the squeeze play', () => {
		// 0.6 × (RE(empty, 1 out) + 1) + 0.4 × RE(1B, 1 out) - RE(3B, 0 out)
		const state: GameState = { inning: 7, half: 'bottom', baseOut: createBaseOutState(0, 4), scoreDiff: 0 };
		const squeeze = byId(evaluateTactics(state), 'squeezePlay');
		expect(squeeze.expectedDelta).toBeCloseTo(0.6 * 1.254 + 0.4 * 0.509 - 1.35, 10);
		expect(squeeze.verdict).toBe('Not recommended');
	});

	it('scales with the scoring environment', () => {
		const mlb = byId(evaluateTactics(runnerOnFirst), 'hitAndRun');
		const doubled = byId(evaluateTactics(runnerOnFirst, { runsPerGame: 9 }), 'hitAndRun');
		expect(doubled.expectedDelta).toBeCloseTo(mlb.expectedDelta * 2, 10);
	});

	it('reports tactics that do not qualify with no value', () => {
		const steal = byId(evaluateTactics(runnerOnFirst), 'stealThird');
		expect(steal).toEqual({
			tactic: 'stealThird',
			name: 'Steal 3rd Base',
			side: 'offense',
			qualifies: false,
			expectedDelta: 0,
			successRate: null,
			verdict: null,
		});
	});

	it('offers nothing once the half-inning has ended', () => {
		const state: GameState = { inning: 4, half: 'top', baseOut: END_OF_INNING, scoreDiff: 0 };
		expect(evaluateTactics(state).every((recommendation) => !recommendation.qualifies)).toBe(true);
	});

	it('rejects an invalid matchup', () => {
		expect(() => evaluateTactics(runnerOnFirst, undefined, { batterOps: 3 })).toThrow(InvalidMatchupError);
	});

	describe('base-out preconditions', () => {
		const expected: Record<Exclude<TacticId, 'pitchingChange' | 'pinchHitter'>, (s: BaseOutState) => boolean> = {
			sacrificeBunt: (s) => s.first && s.outs <= 1,
			stealSecond: (s) => s.first && !s.second,
			stealThird: (s) => s.second && !s.third,
			intentionalWalk: (s) => !s.first,
			hitAndRun: (s) => s.first && !s.second,
			squeezePlay: (s) => s.third && s.outs <= 1,
		};

		it.each(ALL_BASE_OUT_STATES.map((baseOut) => ({ baseOut })))('gate tactics for $baseOut', ({ baseOut }) => {
			const recommendations = evaluateTactics({ inning: 5, half: 'top', baseOut, scoreDiff: 0 });
			for (const [id, qualifies] of Object.entries(expected)) {
				const recommendation = recommendations.find((r) => r.tactic === id);
				expect(recommendation?.qualifies).toBe(qualifies(baseOut));
			}
		});
	});

	describe('situational tactics', () => {
		it('are considered in a high-leverage spot', () => {
			const recommendations = evaluateTactics(ninthInningDrama);
			for (const id of ['pitchingChange', 'pinchHitter'] as const) {
				const recommendation = byId(recommendations, id);
				expect(recommendation.qualifies).toBe(true);
				expect(recommendation.expectedDelta).toBe(0);
				expect(recommendation.successRate).toBeNull();
				expect(recommendation.verdict).toBe('Consider');
				expect(recommendation.reason).toMatch(/^High leverage situation \(LI=\d+\.\d\)$/);
			}
		});

		it('are skipped when leverage is low', () => {
			const recommendations = evaluateTactics(runnerOnFirstBlowout);
			expect(byId(recommendations, 'pitchingChange').qualifies).toBe(false);
			expect(byId(recommendations, 'pinchHitter').qualifies).toBe(false);
		});

		it('recommend pulling a struggling pitcher', () => {
			// 0.752 × (6.0 - 4.14) / 4.14
			const change = byId(evaluateTactics(ninthInningDrama, undefined, { pitcherEra: 6 }), 'pitchingChange');
			expect(change.expectedDelta).toBeCloseTo((0.752 * (6 - 4.14)) / 4.14, 10);
			expect(change.verdict).toBe('Recommended');
		});

		it('advise against pulling an effective pitcher', () => {
			const change = byId(evaluateTactics(ninthInningDrama, undefined, { pitcherEra: 2 }), 'pitchingChange');
			expect(change.expectedDelta).toBeLessThan(0);
			expect(change.verdict).toBe('Not recommended');
		});

		it('recommend pinch hitting for a weak batter', () => {
			// 0.752 × 0.35 × (0.72 - 0.6) / 0.72
			const pinch = byId(evaluateTactics(ninthInningDrama, undefined, { batterOps: 0.6 }), 'pinchHitter');
			expect(pinch.expectedDelta).toBeCloseTo((0.752 * 0.35 * 0.12) / 0.72, 10);
			expect(pinch.verdict).toBe('Recommended');
		});
	});

	describe('batter quality', () => {
		it('makes the hit and run more attractive for a better hitter', () => {
			const deltas = [0.5, 0.72, 0.9].map(
				(batterOps) => byId(evaluateTactics(runnerOnFirst, undefined, { batterOps }), 'hitAndRun').expectedDelta
			);
			expect(deltas[0]).toBeLessThan(deltas[1]);
			expect(deltas[1]).toBeLessThan(deltas[2]);
		});

		it('caps the hit-and-run success rate', () => {
			const hitAndRun = byId(evaluateTactics(runnerOnFirst, undefined, { batterOps: 2 }), 'hitAndRun');
			expect(hitAndRun.successRate).toBe(0.95);
		});

		it('does not change tactics that ignore the batter', () => {
			const plain = byId(evaluateTactics(runnerOnFirst), 'stealSecond');
			const strong = byId(evaluateTactics(runnerOnFirst, undefined, { batterOps: 1.1 }), 'stealSecond');
			expect(strong.expectedDelta).toBe(plain.expectedDelta);
		});
	});
});

describe('recommend', () => {
	it('lists qualifying tactics best first', () => {
		const ids = recommend(runnerOnFirstBlowout).map((recommendation) => recommendation.tactic);
		expect(ids).toEqual(['hitAndRun', 'stealSecond', 'sacrificeBunt']);
	});

	it('keeps catalog order between equal values', () => {
		const ids = recommend(ninthInningDrama).map((recommendation) => recommendation.tactic);
		expect(ids).toEqual(['pitchingChange', 'pinchHitter']);
	});

	it('returns nothing at the end of a half-inning', () => {
		expect(recommend({ inning: 9, half: 'top', baseOut: END_OF_INNING, scoreDiff: 1 })).toEqual([]);
	});
});

describe('verdictFor', () => {
	it.each([
		[0.0201, false, 'Recommended'],
		[0.02, false, 'Neutral'],
		[0, false, 'Neutral'],
		[-0.02, false, 'Neutral'],
		[-0.0201, false, 'Not recommended'],
		[0.01, true, 'Consider'],
		[0.05, true, 'Recommended'],
		[-0.05, true, 'Not recommended'],
	])('%s (situational: %s) is %s', (delta, situational, verdict) => {
		expect(verdictFor(delta, situational)).toBe(verdict);
	});
});
