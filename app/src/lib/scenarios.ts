/**
 * Preset game situations
 */

import { createBaseOutState } from '@wpe/model';
import type { GameState } from '@wpe/model';
import { UnknownScenarioError } from './errors.js';

export interface Scenario {
	name: string;
	description: string;
	state: GameState;
}

export const SCENARIOS = {
	ninth_inning_drama: {
		name: '9th Inning Drama',
		description: 'Bottom 9th, 2 outs, bases loaded, tie game',
		state: { inning: 9, half: 'bottom', baseOut: createBaseOutState(2, 7), scoreDiff: 0 },
	},
	game_start: {
		name: 'Game Start',
		description: 'Top of 1st, no outs, bases empty, 0-0',
		state: { inning: 1, half: 'top', baseOut: createBaseOutState(0), scoreDiff: 0 },
	},
	rally_7th: {
		name: '7th Inning Rally',
		description: 'Bottom 7th, 1 out, runners on 1st & 2nd, down by 1',
		state: { inning: 7, half: 'bottom', baseOut: createBaseOutState(1, 3), scoreDiff: -1 },
	},
	tied_8th: {
		name: 'Tied 8th',
		description: 'Top of 8th, no outs, bases empty, tie game',
		state: { inning: 8, half: 'top', baseOut: createBaseOutState(0), scoreDiff: 0 },
	},
	walkoff_chance: {
		name: 'Walk-off Chance',
		description: 'Bottom 9th, 1 out, runners on 2nd & 3rd, tie game',
		state: { inning: 9, half: 'bottom', baseOut: createBaseOutState(1, 6), scoreDiff: 0 },
	},
	comfortable_lead: {
		name: 'Comfortable Lead',
		description: 'Top of 5th, no outs, bases empty, home team up by 3',
		state: { inning: 5, half: 'top', baseOut: createBaseOutState(0), scoreDiff: 3 },
	},
} satisfies Record<string, Scenario>;

export type ScenarioKey = keyof typeof SCENARIOS;

export const SCENARIO_KEYS = Object.keys(SCENARIOS).filter(isScenarioKey);

export function isScenarioKey(key: string): key is ScenarioKey {
	return Object.prototype.hasOwnProperty.call(SCENARIOS, key);
}

export function getScenario(key: string): Scenario {
	if (!isScenarioKey(key)) {
		throw new UnknownScenarioError(key);
	}
	return SCENARIOS[key];
}
