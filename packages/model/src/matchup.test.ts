import { describe, it, expect } from 'vitest';
import { adjustForMatchup, hasMatchup, validateMatchup } from './matchup.js';
import { InvalidMatchupError } from './errors.js';

describe('adjustForMatchup', () => {
	it('leaves the probability alone without a matchup', () => {
		expect(adjustForMatchup(0.63, 'top')).toBe(0.63);
		expect(adjustForMatchup(0.63, 'bottom', {})).toBe(0.63);
	});

	it('is neutral at league-average quality', () => {
		expect(adjustForMatchup(0.5, 'bottom', { batterOps: 0.75, pitcherEra: 3.5 })).toBeCloseTo(0.5, 12);
	});

	it('shifts toward the batting team for a strong hitter', () => {
		// logit shift (0.95 - 0.75) * 0.5 = 0.1
		expect(adjustForMatchup(0.5, 'bottom', { batterOps: 0.95 })).toBeCloseTo(0.525, 3);
		expect(adjustForMatchup(0.5, 'top', { batterOps: 0.95 })).toBeCloseTo(0.475, 3);
	});

	it('shifts toward the batting team for a weak pitcher', () => {
		expect(adjustForMatchup(0.5, 'bottom', { pitcherEra: 6 })).toBeGreaterThan(0.5);
		expect(adjustForMatchup(0.5, 'top', { pitcherEra: 6 })).toBeLessThan(0.5);
		expect(adjustForMatchup(0.5, 'top', { pitcherEra: 2 })).toBeGreaterThan(0.5);
	});

	it('rises monotonically with batter OPS', () => {
		const low = adjustForMatchup(0.4, 'bottom', { batterOps: 0.6 });
		const mid = adjustForMatchup(0.4, 'bottom', { batterOps: 0.8 });
		const high = adjustForMatchup(0.4, 'bottom', { batterOps: 1.0 });
		expect(low).toBeLessThan(mid);
		expect(mid).toBeLessThan(high);
	});

	it('stays inside 0.01 and 0.99', () => {
		expect(adjustForMatchup(0.999, 'bottom', { batterOps: 2, pitcherEra: 15 })).toBe(0.99);
		expect(adjustForMatchup(0.001, 'top', { batterOps: 2, pitcherEra: 15 })).toBe(0.01);
	});
});

describe('validateMatchup', () => {
	it.each([{ batterOps: -0.1 }, { batterOps: 2.5 }, { batterOps: Number.NaN }, { pitcherEra: 16 }, { pitcherEra: -1 }])(
		'rejects %o',
		(matchup) => {
			expect(() => validateMatchup(matchup)).toThrow(InvalidMatchupError);
		}
	);

	it('accepts the edges of the range', () => {
		expect(() => validateMatchup({ batterOps: 0, pitcherEra: 15 })).not.toThrow();
		expect(() => validateMatchup({ batterOps: 2, pitcherEra: 0 })).not.toThrow();
	});
});

describe('hasMatchup', () => {
	it('needs at least one input', () => {
		expect(hasMatchup({})).toBe(false);
		expect(hasMatchup({ pitcherEra: 4 })).toBe(true);
	});
});
