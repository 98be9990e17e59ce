/**
 * Route handlers
 *
 * Each takes the raw query object and returns a JSON body, throwing on bad
 * input; the error middleware turns the throw into a status code.
 */

import { analyzeGameState, playWpa, winProbability, wpa } from '@wpe/model';
import type { RE24Cache, RE24Table } from '@wpe/model';
import { OutcomeQuery, PlayQuery, RE24Query, ScenarioQuery, WinProbabilityQuery, parseQuery } from './query.js';
import { SCENARIO_KEYS, getScenario } from './scenarios.js';
import {
	serializeAnalysis,
	serializeRE24Entry,
	serializeWpa,
} from './serialize.js';
import type { SerializedAnalysis, SerializedRE24Entry, SerializedWpa } from './serialize.js';

export const SERVICE_NAME = 'Win Probability API';
export const SERVICE_VERSION = '0.1.0';

export const ENDPOINTS = ['/wp', '/wp/play', '/wp/outcome', '/re24', '/wp/scenario'] as const;

export interface HandlerOptions {
	tables: RE24Cache;
	defaultRunsPerGame: number;
}

export interface ServiceIndex {
	name: string;
	version: string;
	endpoints: readonly string[];
	scenarios: string[];
}

export interface OutcomeResponse extends SerializedWpa {
	outcome: string;
	runs_scored: number;
}

export interface RE24Response {
	runs_per_game: number;
	count: number;
	re24_table: SerializedRE24Entry[];
}

export interface ScenarioResponse extends SerializedAnalysis {
	scenario: string;
	key: string;
	description: string;
}

export interface Handlers {
	index(): ServiceIndex;
	winProbability(query: unknown): SerializedAnalysis;
	play(query: unknown): SerializedWpa;
	outcome(query: unknown): OutcomeResponse;
	re24(query: unknown): RE24Response;
	scenario(query: unknown): ScenarioResponse;
}

export function createHandlers(options: HandlerOptions): Handlers {
	const { tables, defaultRunsPerGame } = options;

	const tableFor = (runsPerGame: number | undefined): RE24Table =>
		tables.get({ runsPerGame: runsPerGame ?? defaultRunsPerGame });

	return {
		index() {
			return {
				name: SERVICE_NAME,
				version: SERVICE_VERSION,
				endpoints: ENDPOINTS,
				scenarios: SCENARIO_KEYS,
			};
		},

		winProbability(query) {
			const { state, runsPerGame, matchup } = parseQuery(WinProbabilityQuery, query);
			return serializeAnalysis(analyzeGameState(state, tableFor(runsPerGame), matchup));
		},

		play(query) {
			const { before, after, runsPerGame } = parseQuery(PlayQuery, query);
			const table = tableFor(runsPerGame);
			const result = {
				before,
				after,
				wpBefore: winProbability(before, table),
				wpAfter: winProbability(after, table),
				wpa: wpa(before, after, table),
			};
			return serializeWpa(result, table.runsPerGame);
		},

		outcome(query) {
			const { state, outcome, runsPerGame } = parseQuery(OutcomeQuery, query);
			const table = tableFor(runsPerGame);
			const result = playWpa(state, outcome, table);
			return {
				outcome,
				runs_scored: Math.abs(result.after.scoreDiff - result.before.scoreDiff),
				...serializeWpa(result, table.runsPerGame),
			};
		},

		re24(query) {
			const { runs_per_game } = parseQuery(RE24Query, query);
			const entries = tableFor(runs_per_game).entries().map(serializeRE24Entry);
			return {
				runs_per_game: runs_per_game ?? defaultRunsPerGame,
				count: entries.length,
				re24_table: entries,
			};
		},

		scenario(query) {
			const { name, runs_per_game } = parseQuery(ScenarioQuery, query);
			const scenario = getScenario(name);
			return {
				scenario: scenario.name,
				key: name,
				description: scenario.description,
				...serializeAnalysis(analyzeGameState(scenario.state, tableFor(runs_per_game))),
			};
		},
	};
}
