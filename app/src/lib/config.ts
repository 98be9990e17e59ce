/**
 * Process configuration, read from the environment (and .env via dotenv)
 */

import { z } from 'zod';
import { MLB_RUNS_PER_GAME } from '@wpe/model';
import { ConfigError } from './errors.js';

const ConfigSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(3001),
	HOST: z.string().min(1).default('0.0.0.0'),
	/** Scoring environment used when a request does not pass runs_per_game */
	DEFAULT_RUNS_PER_GAME: z.coerce.number().min(2).max(8).default(MLB_RUNS_PER_GAME),
	CORS_ORIGIN: z.string().min(1).default('*'),
});

export interface AppConfig {
	port: number;
	host: string;
	defaultRunsPerGame: number;
	corsOrigin: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const parsed = ConfigSchema.safeParse(env);
	if (!parsed.success) {
		const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
		throw new ConfigError(`Invalid configuration (${problems.join('; ')})`);
	}

	const { PORT, HOST, DEFAULT_RUNS_PER_GAME, CORS_ORIGIN } = parsed.data;
	return {
		port: PORT,
		host: HOST,
		defaultRunsPerGame: DEFAULT_RUNS_PER_GAME,
		corsOrigin: CORS_ORIGIN,
	};
}
