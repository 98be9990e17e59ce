/**
 * Typed failures raised by the model
 */

export class ModelError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** Malformed base-out or game state */
export class InvalidStateError extends ModelError {}

/** Non-positive or non-finite runs per game */
export class InvalidEnvironmentError extends ModelError {}

/** Batter OPS or pitcher ERA outside its meaningful range */
export class InvalidMatchupError extends ModelError {}

/**
 * A tactic requirement the engine cannot classify.
 * Only a broken catalog entry can produce this.
 */
export class UnknownTacticPreconditionError extends ModelError {
	readonly requirement: string;

	constructor(requirement: string) {
		super(`Unknown tactic precondition: ${requirement}`);
		this.requirement = requirement;
	}
}
