/**
 * Tactical recommendation engine
 *
 * Values each tactic by the RE24 change it is expected to produce,
 * from the point of view of the team that would call it.
 */

import type { BaseOutState, GameState, LeverageResult, MatchupContext, PlayOutcome, ScoringEnvironment } from '../types.js';
import type {
	Recommendation,
	RequirementContext,
	TacticDefinition,
	TacticValuation,
	Verdict,
} from './types.js';
import { END_OF_INNING } from '../types.js';
import { MLB } from '../environment.js';
import { RE24Table } from '../RE24Table.js';
import { validateGameState } from '../game-state.js';
import { leverageIndex } from '../leverage.js';
import { validateMatchup } from '../matchup.js';
import { applyOutcome } from '../state-machine/transitions.js';
import { clamp } from '../utils.js';
import { TACTICS } from './catalog.js';
import { meetsAllRequirements } from './requirements.js';

/** League-average OPS; tactics are neutral to a batter at this level */
export const LEAGUE_AVERAGE_OPS = 0.72;

/** League ERA as a share of runs per game (earned runs only) */
export const LEAGUE_ERA_SHARE = 0.92;

/** Share of the remaining inning's runs that hinge on the current batter */
export const PINCH_HITTER_SHARE = 0.35;

/** Success rates adjusted for the batter stay inside these bounds */
export const MIN_SUCCESS_RATE = 0.05;
export const MAX_SUCCESS_RATE = 0.95;

/** |delta| below this is treated as a wash */
export const VERDICT_MARGIN = 0.02;

/**
 * Evaluate every catalog tactic for a state, in catalog order
 */
export function evaluateTactics(
	state: GameState,
	env: ScoringEnvironment = MLB,
	matchup: MatchupContext = {}
): Recommendation[] {
	return evaluateCatalog(TACTICS, state, env, matchup);
}

/**
 * Package-internal; the public entry points always use the fixed catalog
 */
export function evaluateCatalog(
	catalog: readonly TacticDefinition[],
	state: GameState,
	env: ScoringEnvironment,
	matchup: MatchupContext
): Recommendation[] {
	validateGameState(state);
	validateMatchup(matchup);
	const table = RE24Table.from(env);
	const context = requirementContext(state, table);

	return catalog.map((tactic) => evaluateTactic(tactic, context, table, matchup));
}

/**
 * Qualifying tactics, best expected RE24 change first
 */
export function recommend(
	state: GameState,
	env: ScoringEnvironment = MLB,
	matchup: MatchupContext = {}
): Recommendation[] {
	return evaluateTactics(state, env, matchup)
		.filter((recommendation) => recommendation.qualifies)
		.sort((a, b) => b.expectedDelta - a.expectedDelta);
}

function requirementContext(state: GameState, table: RE24Table): RequirementContext | null {
	// A finished half-inning offers no decisions
	if (state.baseOut === END_OF_INNING) return null;

	let leverage: LeverageResult | null = null;
	return {
		baseOut: state.baseOut,
		leverage: () => {
			if (leverage === null) {
				leverage = leverageIndex(state, table);
			}
			return leverage;
		},
	};
}

function evaluateTactic(
	tactic: TacticDefinition,
	context: RequirementContext | null,
	table: RE24Table,
	matchup: MatchupContext
): Recommendation {
	if (context === null || !meetsAllRequirements(tactic.requirements, context)) {
		return {
			tactic: tactic.id,
			name: tactic.name,
			side: tactic.side,
			qualifies: false,
			expectedDelta: 0,
			successRate: null,
			verdict: null,
		};
	}

	const before = table.get(context.baseOut);
	const { valuation } = tactic;

	switch (valuation.kind) {
		case 'branches': {
			const rate = successRate(valuation, matchup);
			const success = branchValue(context.baseOut, valuation.success, table);
			const failure = branchValue(context.baseOut, valuation.failure, table);
			const offensiveDelta = rate * success + (1 - rate) * failure - before;
			const expectedDelta = tactic.side === 'offense' ? offensiveDelta : -offensiveDelta;
			return {
				tactic: tactic.id,
				name: tactic.name,
				side: tactic.side,
				qualifies: true,
				expectedDelta,
				successRate: rate,
				verdict: verdictFor(expectedDelta, false),
			};
		}

		case 'pitchingChange': {
			// Runs saved by swapping the current pitcher for a league-average reliever
			const leagueEra = LEAGUE_ERA_SHARE * table.runsPerGame;
			const expectedDelta =
				matchup.pitcherEra === undefined ? 0 : (before * (matchup.pitcherEra - leagueEra)) / leagueEra;
			return situational(tactic, expectedDelta, context);
		}

		case 'pinchHitter': {
			// Runs gained by swapping the current batter for a league-average bench bat
			const expectedDelta =
				matchup.batterOps === undefined
					? 0
					: (before * PINCH_HITTER_SHARE * (LEAGUE_AVERAGE_OPS - matchup.batterOps)) / LEAGUE_AVERAGE_OPS;
			return situational(tactic, expectedDelta, context);
		}
	}
}

function situational(
	tactic: TacticDefinition,
	expectedDelta: number,
	context: RequirementContext
): Recommendation {
	return {
		tactic: tactic.id,
		name: tactic.name,
		side: tactic.side,
		qualifies: true,
		expectedDelta,
		successRate: null,
		verdict: verdictFor(expectedDelta, true),
		reason: `High leverage situation (LI=${context.leverage().value.toFixed(1)})`,
	};
}

/**
 * Success rate for a branch tactic, shifted by batter OPS where the tactic depends on contact
 */
export function successRate(
	valuation: Extract<TacticValuation, { kind: 'branches' }>,
	matchup: MatchupContext
): number {
	if (valuation.batterOpsSlope === undefined || matchup.batterOps === undefined) {
		return valuation.successRate;
	}
	const adjusted = valuation.successRate + valuation.batterOpsSlope * (matchup.batterOps - LEAGUE_AVERAGE_OPS);
	return clamp(adjusted, MIN_SUCCESS_RATE, MAX_SUCCESS_RATE);
}

/**
 * Runs in hand after a play plus the RE24 of where it leaves the inning
 */
function branchValue(state: BaseOutState, outcome: PlayOutcome, table: RE24Table): number {
	const { next, runsScored } = applyOutcome(state, outcome);
	return table.expectedRuns(next) + runsScored;
}

export function verdictFor(expectedDelta: number, situationalTactic: boolean): Verdict {
	if (expectedDelta > VERDICT_MARGIN) return 'Recommended';
	if (expectedDelta >= -VERDICT_MARGIN) return situationalTactic ? 'Consider' : 'Neutral';
	return 'Not recommended';
}
