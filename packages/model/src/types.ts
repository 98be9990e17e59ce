/**
 * Core types for the win probability model
 */

/** Outs recorded in the current half-inning. Three outs ends it and is not a state. */
export type Outs = 0 | 1 | 2;

export type Half = 'top' | 'bottom';

export type Base = 'first' | 'second' | 'third';

export type Team = 'home' | 'away';

/**
 * One of the 24 base-out states (8 runner configurations × 3 out counts)
 */
export interface BaseOutState {
	first: boolean;
	second: boolean;
	third: boolean;
	outs: Outs;
}

/**
 * Marker for a half-inning that has just ended on the third out.
 * Produced by the transition model and accepted in place of a base-out state.
 */
export const END_OF_INNING = 'END_OF_INNING' as const;
export type EndOfInning = typeof END_OF_INNING;

/**
 * Game state from the home team's point of view
 */
export interface GameState {
	/** Current inning (1-9+) */
	inning: number;
	half: Half;
	baseOut: BaseOutState | EndOfInning;
	/** Home score minus away score */
	scoreDiff: number;
}

/**
 * A game state with a live half-inning (never the end-of-inning marker)
 */
export interface LiveGameState extends GameState {
	baseOut: BaseOutState;
}

/**
 * League scoring level used to scale run expectancy
 */
export interface ScoringEnvironment {
	/** Average runs scored per team per game */
	runsPerGame: number;
}

/**
 * Every play the transition model knows how to apply.
 * Plate appearance results first, then tactic-specific plays.
 */
export const PLAY_OUTCOMES = [
	// Outs
	'strikeout',
	'groundOut',
	'flyOut',
	'lineOut',
	'doublePlay',
	'fieldersChoice',
	// Hits
	'single',
	'double',
	'triple',
	'homeRun',
	// Walks
	'walk',
	'intentionalWalk',
	// Bunts and baserunning
	'sacrificeBunt',
	'failedSqueeze',
	'hitAndRunSingle',
	'stolenBaseSecond',
	'stolenBaseThird',
	'caughtStealingSecond',
	'caughtStealingThird',
] as const;

export type PlayOutcome = (typeof PLAY_OUTCOMES)[number];

export type LeverageLabel = 'Low' | 'Medium' | 'High' | 'Very High';

export interface LeverageResult {
	value: number;
	label: LeverageLabel;
}

/**
 * Optional batter/pitcher quality inputs for the current plate appearance
 */
export interface MatchupContext {
	/** On-base plus slugging of the batter */
	batterOps?: number;
	/** Earned run average of the pitcher */
	pitcherEra?: number;
}
