/**
 * Base-out state types and utilities
 * Models all 24 possible states (0/1/2 outs × 8 base configurations)
 */

import type { Base, BaseOutState, Outs } from '../types.js';
import { InvalidStateError } from '../errors.js';

/**
 * Base configuration as a 3-bit bitmap
 * bit 0 = 1B, bit 1 = 2B, bit 2 = 3B
 */
export type BaseConfig = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const BASE_CONFIGS: readonly BaseConfig[] = [0, 1, 2, 3, 4, 5, 6, 7];

export const OUTS: readonly Outs[] = [0, 1, 2];

/** Scoreboard-style labels, one character per base */
export const BaseConfigLabels: Record<BaseConfig, string> = {
	0: '---',
	1: '1--',
	2: '-2-',
	3: '12-',
	4: '--3',
	5: '1-3',
	6: '-23',
	7: '123',
};

/**
 * Convert runner flags to the BaseConfig bitmap
 */
export function toBaseConfig(runners: Pick<BaseOutState, Base>): BaseConfig {
	let bits = 0;
	if (runners.first) bits |= 1;
	if (runners.second) bits |= 2;
	if (runners.third) bits |= 4;
	return BASE_CONFIGS[bits];
}

/**
 * Build a base-out state from an out count and a BaseConfig bitmap
 */
export function createBaseOutState(outs: Outs, bases: BaseConfig = 0): BaseOutState {
	return {
		first: (bases & 1) !== 0,
		second: (bases & 2) !== 0,
		third: (bases & 4) !== 0,
		outs,
	};
}

/**
 * All 24 states, ordered by outs then base configuration
 */
export const ALL_BASE_OUT_STATES: readonly BaseOutState[] = OUTS.flatMap((outs) =>
	BASE_CONFIGS.map((bases) => createBaseOutState(outs, bases))
);

export function isOuts(value: number): value is Outs {
	return value === 0 || value === 1 || value === 2;
}

/**
 * Reject states that are not one of the 24 (outs outside 0-2, non-boolean runner flags)
 */
export function validateBaseOutState(state: BaseOutState): void {
	if (typeof state !== 'object' || state === null) {
		throw new InvalidStateError('Base-out state must be an object');
	}
	if (!isOuts(state.outs)) {
		throw new InvalidStateError(`Outs must be 0, 1 or 2, got ${String(state.outs)}`);
	}
	for (const base of ['first', 'second', 'third'] as const) {
		if (typeof state[base] !== 'boolean') {
			throw new InvalidStateError(`Runner flag for ${base} base must be a boolean`);
		}
	}
}
