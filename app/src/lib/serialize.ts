/**
 * JSON response shapes
 *
 * Probabilities are rounded to 4 places, leverage to 2 and run values to 3.
 */

import { END_OF_INNING, roundTo } from '@wpe/model';
import type { GameAnalysis, GameState, PlayWinProbability, RE24Entry, Recommendation } from '@wpe/model';

type Flag = 0 | 1;

export interface SerializedRunners {
	'1B': Flag;
	'2B': Flag;
	'3B': Flag;
}

export interface SerializedState {
	inning: number;
	top_bottom: 'top' | 'bottom';
	/** 3 once the half-inning has ended */
	outs: number;
	runners: SerializedRunners;
	score_diff: number;
}

export interface SerializedTactic {
	tactic: string;
	name: string;
	side: 'offense' | 'defense';
	re24_delta: number;
	recommendation: string | null;
	success_rate: number | null;
	reason?: string;
}

export interface SerializedAnalysis {
	game_state: SerializedState & { runs_per_game: number };
	win_probability: number;
	win_probability_pct: string;
	adjusted_wp: number | null;
	leverage_index: number;
	leverage_label: string;
	tactics: SerializedTactic[];
}

export interface SerializedWpa {
	wpa: number;
	wp_before: number;
	wp_after: number;
	before_state: SerializedState;
	after_state: SerializedState;
	runs_per_game: number;
}

export interface SerializedRE24Entry {
	runners: string;
	runner1: Flag;
	runner2: Flag;
	runner3: Flag;
	outs: number;
	expected_runs: number;
}

function flag(value: boolean): Flag {
	return value ? 1 : 0;
}

export function formatPercent(probability: number): string {
	return `${(probability * 100).toFixed(1)}%`;
}

export function serializeState(state: GameState): SerializedState {
	const { baseOut } = state;
	const ended = baseOut === END_OF_INNING;
	return {
		inning: state.inning,
		top_bottom: state.half,
		outs: ended ? 3 : baseOut.outs,
		runners: {
			'1B': ended ? 0 : flag(baseOut.first),
			'2B': ended ? 0 : flag(baseOut.second),
			'3B': ended ? 0 : flag(baseOut.third),
		},
		score_diff: state.scoreDiff,
	};
}

export function serializeTactic(recommendation: Recommendation): SerializedTactic {
	const serialized: SerializedTactic = {
		tactic: recommendation.tactic,
		name: recommendation.name,
		side: recommendation.side,
		re24_delta: roundTo(recommendation.expectedDelta, 3),
		recommendation: recommendation.verdict,
		success_rate: recommendation.successRate === null ? null : roundTo(recommendation.successRate, 3),
	};
	if (recommendation.reason !== undefined) {
		serialized.reason = recommendation.reason;
	}
	return serialized;
}

export function serializeAnalysis(analysis: GameAnalysis): SerializedAnalysis {
	return {
		game_state: { ...serializeState(analysis.state), runs_per_game: analysis.runsPerGame },
		win_probability: roundTo(analysis.winProbability),
		win_probability_pct: formatPercent(analysis.winProbability),
		adjusted_wp: analysis.adjustedWinProbability === null ? null : roundTo(analysis.adjustedWinProbability),
		leverage_index: roundTo(analysis.leverage.value, 2),
		leverage_label: analysis.leverage.label,
		tactics: analysis.tactics.map(serializeTactic),
	};
}

export function serializeWpa(result: PlayWinProbability, runsPerGame: number): SerializedWpa {
	return {
		wpa: roundTo(result.wpa),
		wp_before: roundTo(result.wpBefore),
		wp_after: roundTo(result.wpAfter),
		before_state: serializeState(result.before),
		after_state: serializeState(result.after),
		runs_per_game: runsPerGame,
	};
}

export function serializeRE24Entry(entry: RE24Entry): SerializedRE24Entry {
	return {
		runners: entry.runners,
		runner1: flag(entry.state.first),
		runner2: flag(entry.state.second),
		runner3: flag(entry.state.third),
		outs: entry.outs,
		expected_runs: roundTo(entry.expectedRuns, 3),
	};
}
