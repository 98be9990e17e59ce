/**
 * Query-string schemas
 *
 * Express hands query values over as strings; each schema coerces,
 * range-checks and reshapes them into model inputs.
 */

import { z } from 'zod';
import { END_OF_INNING, PLAY_OUTCOMES, createBaseOutState, isOuts } from '@wpe/model';
import type { BaseOutState, EndOfInning, GameState, MatchupContext, Outs } from '@wpe/model';
import { QueryValidationError } from './errors.js';

const Inning = z.coerce.number().int().min(1).max(15);
const TopBottom = z.enum(['top', 'bottom']);
const LiveOuts = z.coerce
	.number()
	.int()
	.refine(isOuts, { message: 'outs must be 0, 1 or 2' });
/** 3 means the play ended the half-inning */
const AfterOuts = z.coerce
	.number()
	.int()
	.refine((value): value is Outs | 3 => value === 3 || isOuts(value), {
		message: 'outs must be 0, 1, 2 or 3',
	});
const Runner = z.coerce
	.number()
	.int()
	.min(0)
	.max(1)
	.default(0)
	.transform((value) => value === 1);
const ScoreDiff = z.coerce.number().int().min(-20).max(20).default(0);
const RunsPerGame = z.coerce.number().min(2).max(8).optional();
const BatterOps = z.coerce.number().min(0).max(2).optional();
const PitcherEra = z.coerce.number().min(0).max(15).optional();

function baseOut(outs: Outs, first: boolean, second: boolean, third: boolean): BaseOutState {
	return { ...createBaseOutState(outs), first, second, third };
}

export const WinProbabilityQuery = z
	.object({
		inning: Inning,
		top_bottom: TopBottom,
		outs: LiveOuts,
		runner1: Runner,
		runner2: Runner,
		runner3: Runner,
		score_diff: ScoreDiff,
		runs_per_game: RunsPerGame,
		batter_ops: BatterOps,
		pitcher_era: PitcherEra,
	})
	.transform((q) => {
		const state: GameState = {
			inning: q.inning,
			half: q.top_bottom,
			baseOut: baseOut(q.outs, q.runner1, q.runner2, q.runner3),
			scoreDiff: q.score_diff,
		};
		const matchup: MatchupContext = {};
		if (q.batter_ops !== undefined) matchup.batterOps = q.batter_ops;
		if (q.pitcher_era !== undefined) matchup.pitcherEra = q.pitcher_era;
		return { state, runsPerGame: q.runs_per_game, matchup };
	});

export const PlayQuery = z
	.object({
		before_inning: Inning,
		before_top_bottom: TopBottom,
		before_outs: LiveOuts,
		before_runner1: Runner,
		before_runner2: Runner,
		before_runner3: Runner,
		before_score_diff: ScoreDiff,
		after_inning: Inning,
		after_top_bottom: TopBottom,
		after_outs: AfterOuts,
		after_runner1: Runner,
		after_runner2: Runner,
		after_runner3: Runner,
		after_score_diff: ScoreDiff,
		runs_per_game: RunsPerGame,
	})
	.transform((q) => {
		const before: GameState = {
			inning: q.before_inning,
			half: q.before_top_bottom,
			baseOut: baseOut(q.before_outs, q.before_runner1, q.before_runner2, q.before_runner3),
			scoreDiff: q.before_score_diff,
		};
		// Runners are dropped once the half-inning is over
		const afterBaseOut: BaseOutState | EndOfInning =
			q.after_outs === 3
				? END_OF_INNING
				: baseOut(q.after_outs, q.after_runner1, q.after_runner2, q.after_runner3);
		const after: GameState = {
			inning: q.after_inning,
			half: q.after_top_bottom,
			baseOut: afterBaseOut,
			scoreDiff: q.after_score_diff,
		};
		return { before, after, runsPerGame: q.runs_per_game };
	});

export const OutcomeQuery = z
	.object({
		inning: Inning,
		top_bottom: TopBottom,
		outs: LiveOuts,
		runner1: Runner,
		runner2: Runner,
		runner3: Runner,
		score_diff: ScoreDiff,
		outcome: z.enum(PLAY_OUTCOMES),
		runs_per_game: RunsPerGame,
	})
	.transform((q) => {
		const state: GameState = {
			inning: q.inning,
			half: q.top_bottom,
			baseOut: baseOut(q.outs, q.runner1, q.runner2, q.runner3),
			scoreDiff: q.score_diff,
		};
		return { state, outcome: q.outcome, runsPerGame: q.runs_per_game };
	});

export const RE24Query = z.object({
	runs_per_game: RunsPerGame,
});

export const ScenarioQuery = z.object({
	name: z.string().min(1),
	runs_per_game: RunsPerGame,
});

/**
 * Parse a query object, throwing QueryValidationError with every issue
 */
export function parseQuery<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, query: unknown): Output {
	const result = schema.safeParse(query);
	if (!result.success) {
		throw new QueryValidationError(
			result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
		);
	}
	return result.data;
}
