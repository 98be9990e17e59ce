/**
 * HTTP-facing errors and their translation to status codes
 */

import {
	InvalidEnvironmentError,
	InvalidMatchupError,
	InvalidStateError,
} from '@wpe/model';

export interface ValidationIssue {
	/** Dotted path of the offending query parameter */
	path: string;
	message: string;
}

export class QueryValidationError extends Error {
	readonly issues: ValidationIssue[];

	constructor(issues: ValidationIssue[]) {
		super('Invalid query parameters');
		this.name = 'QueryValidationError';
		this.issues = issues;
	}
}

export class UnknownScenarioError extends Error {
	readonly scenario: string;

	constructor(scenario: string) {
		super(`Unknown scenario: ${scenario}`);
		this.name = 'UnknownScenarioError';
		this.scenario = scenario;
	}
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

export interface ErrorBody {
	error: string;
	details?: ValidationIssue[];
}

export interface ErrorResponse {
	status: number;
	body: ErrorBody;
}

export function toErrorResponse(error: unknown): ErrorResponse {
	if (error instanceof QueryValidationError) {
		return { status: 400, body: { error: error.message, details: error.issues } };
	}
	if (
		error instanceof InvalidStateError ||
		error instanceof InvalidEnvironmentError ||
		error instanceof InvalidMatchupError
	) {
		return { status: 400, body: { error: error.message } };
	}
	if (error instanceof UnknownScenarioError) {
		return { status: 404, body: { error: error.message } };
	}
	return { status: 500, body: { error: 'Internal server error' } };
}
