import { describe, it, expect } from 'vitest';
import {
	InvalidEnvironmentError,
	InvalidMatchupError,
	InvalidStateError,
	UnknownTacticPreconditionError,
} from '@wpe/model';
import { QueryValidationError, UnknownScenarioError, toErrorResponse } from './errors.js';

describe('toErrorResponse', () => {
	it('returns validation details with a 400', () => {
		const error = new QueryValidationError([{ path: 'outs', message: 'outs must be 0, 1 or 2' }]);
		expect(toErrorResponse(error)).toEqual({
			status: 400,
			body: {
				error: 'Invalid query parameters',
				details: [{ path: 'outs', message: 'outs must be 0, 1 or 2' }],
			},
		});
	});

	it('maps model input errors to 400', () => {
		for (const error of [
			new InvalidStateError('bad state'),
			new InvalidEnvironmentError('bad environment'),
			new InvalidMatchupError('bad matchup'),
		]) {
			expect(toErrorResponse(error)).toEqual({ status: 400, body: { error: error.message } });
		}
	});

	it('maps an unknown scenario to 404', () => {
		expect(toErrorResponse(new UnknownScenarioError('extra_innings'))).toEqual({
			status: 404,
			body: { error: 'Unknown scenario: extra_innings' },
		});
	});

	it('hides internal failures behind a 500', () => {
		const internal = { status: 500, body: { error: 'Internal server error' } };
		expect(toErrorResponse(new UnknownTacticPreconditionError('{"kind":"pitchCount"}'))).toEqual(internal);
		expect(toErrorResponse(new Error('boom'))).toEqual(internal);
		expect(toErrorResponse('not an error')).toEqual(internal);
	});
});
