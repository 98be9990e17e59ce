/**
 * Leverage Index
 *
 * LI = expected |WP change| over a representative plate appearance mix,
 * divided by the league-average WP swing per plate appearance.
 * LI of 1.0 = average importance.
 */

import type {
	GameState,
	LeverageLabel,
	LeverageResult,
	PlayOutcome,
	ScoringEnvironment,
} from './types.js';
import { MLB } from './environment.js';
import { RE24Table } from './RE24Table.js';
import { advanceGame, isGameOver, toLiveState, validateGameState } from './game-state.js';
import { winProbability } from './win-probability.js';

export interface OutcomeWeight {
	outcome: PlayOutcome;
	probability: number;
}

/**
 * League plate appearance outcome mix (sums to 1)
 */
export const REPRESENTATIVE_OUTCOMES: readonly OutcomeWeight[] = [
	{ outcome: 'strikeout', probability: 0.22 },
	{ outcome: 'groundOut', probability: 0.2 },
	{ outcome: 'flyOut', probability: 0.12 },
	{ outcome: 'lineOut', probability: 0.1 },
	{ outcome: 'single', probability: 0.16 },
	{ outcome: 'walk', probability: 0.09 },
	{ outcome: 'double', probability: 0.05 },
	{ outcome: 'homeRun', probability: 0.03 },
	{ outcome: 'doublePlay', probability: 0.03 },
];

/** Average |WP change| per plate appearance across all situations */
export const LEAGUE_AVERAGE_WP_SWING = 0.035;

/** Lower bounds (inclusive) of each label above Low */
export const LEVERAGE_THRESHOLDS = {
	medium: 0.5,
	high: 1.5,
	veryHigh: 3.0,
} as const;

export function leverageIndex(state: GameState, env: ScoringEnvironment = MLB): LeverageResult {
	validateGameState(state);
	const table = RE24Table.from(env);

	if (isGameOver(state)) {
		return { value: 0, label: leverageLabel(0) };
	}

	const live = toLiveState(state);
	const before = winProbability(live, table);

	let swing = 0;
	for (const { outcome, probability } of REPRESENTATIVE_OUTCOMES) {
		const after = winProbability(advanceGame(live, outcome), table);
		swing += probability * Math.abs(after - before);
	}

	const value = swing / LEAGUE_AVERAGE_WP_SWING;
	return { value, label: leverageLabel(value) };
}

export function leverageLabel(value: number): LeverageLabel {
	if (value < LEVERAGE_THRESHOLDS.medium) return 'Low';
	if (value < LEVERAGE_THRESHOLDS.high) return 'Medium';
	if (value < LEVERAGE_THRESHOLDS.veryHigh) return 'High';
	return 'Very High';
}
