/**
 * Tactical Recommendation Engine
 *
 * Exports the tactic catalog, precondition checks and RE24-based evaluation.
 */

export type {
	TacticId,
	TacticSide,
	Requirement,
	TacticValuation,
	TacticDefinition,
	Verdict,
	Recommendation,
	RequirementContext,
} from './types.js';

export { TACTICS, SITUATIONAL_MIN_LEVERAGE } from './catalog.js';
export { meetsRequirement, meetsAllRequirements } from './requirements.js';
export {
	evaluateTactics,
	recommend,
	successRate,
	verdictFor,
	LEAGUE_AVERAGE_OPS,
	LEAGUE_ERA_SHARE,
	PINCH_HITTER_SHARE,
	VERDICT_MARGIN,
} from './evaluate.js';
