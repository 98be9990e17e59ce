// app/src/routes/index.ts

import { Router } from 'express';
import type { ErrorRequestHandler } from 'express';
import type { Handlers } from '../lib/handlers.js';
import { toErrorResponse } from '../lib/errors.js';
import type { ErrorBody } from '../lib/errors.js';
import wpRoutes from './wp.js';
import re24Routes from './re24.js';

export function createRouter(handlers: Handlers): Router {
	const api = Router();

	api.get('/', (_req, res) => {
		res.json(handlers.index());
	});
	api.use(wpRoutes(handlers));
	api.use(re24Routes(handlers));

	return api;
}

/** The slice of an express response the error path writes to */
export interface ErrorReply {
	status(code: number): { json(body: ErrorBody): unknown };
}

export function sendError(err: unknown, res: ErrorReply): void {
	const { status, body } = toErrorResponse(err);
	if (status >= 500) {
		console.error('Unhandled error:', err);
	}
	res.status(status).json(body);
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
	sendError(err, res);
};
