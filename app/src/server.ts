// app/src/server.ts

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { RE24Cache } from '@wpe/model';
import type { AppConfig } from './lib/config.js';
import { createHandlers } from './lib/handlers.js';
import { createRouter, errorHandler } from './routes/index.js';

export function createServer(config: AppConfig): Express {
	const handlers = createHandlers({
		tables: new RE24Cache(),
		defaultRunsPerGame: config.defaultRunsPerGame,
	});

	const app = express();
	app.use(cors({ origin: config.corsOrigin }));
	app.use(createRouter(handlers));
	app.use(errorHandler);

	return app;
}
