/**
 * Base-out state machine
 *
 * Models all 24 possible states (0/1/2 outs × 8 base configurations)
 * and the transition each play outcome produces.
 */

export type { BaseConfig } from './state.js';

export {
	BASE_CONFIGS,
	OUTS,
	BaseConfigLabels,
	ALL_BASE_OUT_STATES,
	toBaseConfig,
	createBaseOutState,
	isOuts,
	validateBaseOutState,
} from './state.js';

export type { TransitionResult } from './transitions.js';
export { applyOutcome, isEndOfInning } from './transitions.js';
