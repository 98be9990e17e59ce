/**
 * The fixed catalog of in-game tactics
 */

import type { TacticDefinition } from './types.js';

/** LI at which a pitching change or pinch hitter becomes worth a look */
export const SITUATIONAL_MIN_LEVERAGE = 1.5;

export const TACTICS: readonly TacticDefinition[] = [
	{
		id: 'sacrificeBunt',
		name: 'Sacrifice Bunt',
		side: 'offense',
		requirements: [
			{ kind: 'runnerOn', base: 'first' },
			{ kind: 'maxOuts', outs: 1 },
		],
		valuation: {
			kind: 'branches',
			successRate: 0.8,
			success: 'sacrificeBunt',
			failure: 'fieldersChoice',
		},
	},
	{
		id: 'stealSecond',
		name: 'Steal 2nd Base',
		side: 'offense',
		requirements: [
			{ kind: 'runnerOn', base: 'first' },
			{ kind: 'baseOpen', base: 'second' },
		],
		valuation: {
			kind: 'branches',
			successRate: 0.72,
			success: 'stolenBaseSecond',
			failure: 'caughtStealingSecond',
		},
	},
	{
		id: 'stealThird',
		name: 'Steal 3rd Base',
		side: 'offense',
		requirements: [
			{ kind: 'runnerOn', base: 'second' },
			{ kind: 'baseOpen', base: 'third' },
		],
		valuation: {
			kind: 'branches',
			successRate: 0.65,
			success: 'stolenBaseThird',
			failure: 'caughtStealingThird',
		},
	},
	{
		id: 'intentionalWalk',
		name: 'Intentional Walk',
		side: 'defense',
		requirements: [{ kind: 'baseOpen', base: 'first' }],
		valuation: {
			kind: 'branches',
			successRate: 1,
			success: 'intentionalWalk',
			failure: 'intentionalWalk',
		},
	},
	{
		id: 'pitchingChange',
		name: 'Pitching Change',
		side: 'defense',
		requirements: [{ kind: 'minLeverage', value: SITUATIONAL_MIN_LEVERAGE }],
		valuation: { kind: 'pitchingChange' },
	},
	{
		id: 'pinchHitter',
		name: 'Pinch Hitter',
		side: 'offense',
		requirements: [{ kind: 'minLeverage', value: SITUATIONAL_MIN_LEVERAGE }],
		valuation: { kind: 'pinchHitter' },
	},
	{
		id: 'hitAndRun',
		name: 'Hit and Run',
		side: 'offense',
		requirements: [
			{ kind: 'runnerOn', base: 'first' },
			{ kind: 'baseOpen', base: 'second' },
		],
		valuation: {
			kind: 'branches',
			successRate: 0.55,
			success: 'hitAndRunSingle',
			failure: 'caughtStealingSecond',
			batterOpsSlope: 0.5,
		},
	},
	{
		id: 'squeezePlay',
		name: 'Squeeze Play',
		side: 'offense',
		requirements: [
			{ kind: 'runnerOn', base: 'third' },
			{ kind: 'maxOuts', outs: 1 },
		],
		valuation: {
			kind: 'branches',
			successRate: 0.6,
			success: 'sacrificeBunt',
			failure: 'failedSqueeze',
		},
	},
];
