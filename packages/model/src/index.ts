/**
 * @wpe/model - Baseball Win Probability Model
 *
 * A TypeScript library for in-game baseball decision analysis:
 * run expectancy (RE24), base-out transitions, home win probability,
 * leverage index, win probability added and tactical recommendations.
 */

// Core types
export type {
	Outs,
	Half,
	Base,
	Team,
	BaseOutState,
	EndOfInning,
	GameState,
	LiveGameState,
	ScoringEnvironment,
	PlayOutcome,
	LeverageLabel,
	LeverageResult,
	MatchupContext,
} from './types.js';
export { END_OF_INNING, PLAY_OUTCOMES } from './types.js';

// Errors
export {
	ModelError,
	InvalidStateError,
	InvalidEnvironmentError,
	InvalidMatchupError,
	UnknownTacticPreconditionError,
} from './errors.js';

// Scoring environments
export {
	MLB,
	NPB,
	MLB_RUNS_PER_GAME,
	NPB_RUNS_PER_GAME,
	validateEnvironment,
} from './environment.js';

// State machine
export * from './state-machine/index.js';

// Run expectancy
export type { RE24Entry } from './RE24Table.js';
export { RE24Table, RE24Cache, re24 } from './RE24Table.js';

// Game progression
export {
	REGULATION_INNINGS,
	validateGameState,
	battingTeam,
	finalResult,
	isGameOver,
	toLiveState,
	advanceGame,
} from './game-state.js';

// Win probability
export {
	winProbability,
	walkOffProbability,
	EXTRA_INNINGS_HOME_WIN,
	WP_FLOOR,
	WP_CEILING,
} from './win-probability.js';

// Leverage
export type { OutcomeWeight } from './leverage.js';
export {
	leverageIndex,
	leverageLabel,
	REPRESENTATIVE_OUTCOMES,
	LEAGUE_AVERAGE_WP_SWING,
	LEVERAGE_THRESHOLDS,
} from './leverage.js';

// WPA
export type { PlayWinProbability } from './wpa.js';
export { wpa, playWpa } from './wpa.js';

// Matchup adjustment
export { adjustForMatchup, validateMatchup, hasMatchup, MAX_OPS, MAX_ERA } from './matchup.js';

// Tactics
export * from './tactics/index.js';

// Full analysis
export type { GameAnalysis } from './analysis.js';
export { analyzeGameState } from './analysis.js';

// Utility functions
export { roundTo } from './utils.js';
