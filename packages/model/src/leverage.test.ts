import { describe, it, expect } from 'vitest';
import { LEVERAGE_THRESHOLDS, REPRESENTATIVE_OUTCOMES, leverageIndex, leverageLabel } from './leverage.js';
import { createBaseOutState } from './state-machine/state.js';
import { END_OF_INNING } from './types.js';
import type { GameState } from './types.js';

describe('leverageIndex', () => {
	it('rates a tied, bases-loaded, two-out bottom of the 9th as very high', () => {
		const state: GameState = { inning: 9, half: 'bottom', baseOut: createBaseOutState(2, 7), scoreDiff: 0 };
		const result = leverageIndex(state);
		expect(result.value).toBeGreaterThan(LEVERAGE_THRESHOLDS.veryHigh);
		expect(result.label).toBe('Very High');
	});

	it('rates a late, close game above the first pitch', () => {
		const opening: GameState = { inning: 1, half: 'top', baseOut: createBaseOutState(0), scoreDiff: 0 };
		const late: GameState = { inning: 8, half: 'bottom', baseOut: createBaseOutState(1, 3), scoreDiff: -1 };
		expect(leverageIndex(late).value).toBeGreaterThan(leverageIndex(opening).value);
	});

	it('is zero when no play can move the needle', () => {
		// Every outcome leaves the home team pinned at the live ceiling
		const blowout: GameState = { inning: 2, half: 'top', baseOut: createBaseOutState(2), scoreDiff: 15 };
		expect(leverageIndex(blowout)).toEqual({ value: 0, label: 'Low' });
	});

	it('is zero once the game is over', () => {
		const final: GameState = { inning: 9, half: 'top', baseOut: END_OF_INNING, scoreDiff: 2 };
		expect(leverageIndex(final)).toEqual({ value: 0, label: 'Low' });
	});

	it('measures the next half-inning at the end of an unfinished one', () => {
		const end: GameState = { inning: 3, half: 'top', baseOut: END_OF_INNING, scoreDiff: 1 };
		const next: GameState = { inning: 3, half: 'bottom', baseOut: createBaseOutState(0), scoreDiff: 1 };
		expect(leverageIndex(end)).toEqual(leverageIndex(next));
	});
});

describe('leverageLabel', () => {
	it.each([
		[0, 'Low'],
		[0.49, 'Low'],
		[0.5, 'Medium'],
		[1.49, 'Medium'],
		[1.5, 'High'],
		[2.99, 'High'],
		[3, 'Very High'],
		[10, 'Very High'],
	])('labels %s as %s', (value, label) => {
		expect(leverageLabel(value)).toBe(label);
	});
});

describe('REPRESENTATIVE_OUTCOMES', () => {
	it('is a probability distribution', () => {
		const total = REPRESENTATIVE_OUTCOMES.reduce((sum, { probability }) => sum + probability, 0);
		expect(total).toBeCloseTo(1, 10);
	});
});
