/**
 * Tactic precondition checks
 */

import type { Requirement, RequirementContext } from './types.js';
import { UnknownTacticPreconditionError } from '../errors.js';

export function meetsRequirement(requirement: Requirement, context: RequirementContext): boolean {
	switch (requirement.kind) {
		case 'runnerOn':
			return context.baseOut[requirement.base];
		case 'baseOpen':
			return !context.baseOut[requirement.base];
		case 'maxOuts':
			return context.baseOut.outs <= requirement.outs;
		case 'minLeverage':
			return context.leverage().value >= requirement.value;
		default: {
			const unknown: never = requirement;
			throw new UnknownTacticPreconditionError(JSON.stringify(unknown));
		}
	}
}

export function meetsAllRequirements(
	requirements: readonly Requirement[],
	context: RequirementContext
): boolean {
	return requirements.every((requirement) => meetsRequirement(requirement, context));
}
