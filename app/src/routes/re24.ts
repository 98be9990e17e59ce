// app/src/routes/re24.ts

import { Router } from 'express';
import type { Handlers } from '../lib/handlers.js';

export default function re24Routes(handlers: Handlers): Router {
	const r = Router();

	r.get('/re24', (req, res) => {
		res.json(handlers.re24(req.query));
	});

	return r;
}
