// app/src/routes/wp.ts

import { Router } from 'express';
import type { Handlers } from '../lib/handlers.js';

export default function wpRoutes(handlers: Handlers): Router {
	const r = Router();

	// Full analysis: WP, matchup-adjusted WP, LI and tactics
	r.get('/wp', (req, res) => {
		res.json(handlers.winProbability(req.query));
	});

	// WPA between two states
	r.get('/wp/play', (req, res) => {
		res.json(handlers.play(req.query));
	});

	// WPA of applying one play outcome to a state
	r.get('/wp/outcome', (req, res) => {
		res.json(handlers.outcome(req.query));
	});

	r.get('/wp/scenario', (req, res) => {
		res.json(handlers.scenario(req.query));
	});

	return r;
}
