/**
 * Types for the tactical recommendation engine
 */

import type { Base, LeverageResult, Outs, PlayOutcome, BaseOutState } from '../types.js';

export type TacticId =
	| 'sacrificeBunt'
	| 'stealSecond'
	| 'stealThird'
	| 'intentionalWalk'
	| 'pitchingChange'
	| 'pinchHitter'
	| 'hitAndRun'
	| 'squeezePlay';

/** Which team makes the call: the batting side or the fielding side */
export type TacticSide = 'offense' | 'defense';

/**
 * A single precondition a tactic places on the game state
 */
export type Requirement =
	| { kind: 'runnerOn'; base: Base }
	| { kind: 'baseOpen'; base: Base }
	| { kind: 'maxOuts'; outs: Outs }
	| { kind: 'minLeverage'; value: number };

/**
 * How a qualifying tactic is valued
 *
 * - branches: success / failure plays weighted by the success rate
 * - pitchingChange: current pitcher's ERA against a league-average reliever
 * - pinchHitter: current batter's OPS against a league-average bench bat
 */
export type TacticValuation =
	| {
			kind: 'branches';
			successRate: number;
			success: PlayOutcome;
			failure: PlayOutcome;
			/** Change in success rate per point of batter OPS above league average */
			batterOpsSlope?: number;
	  }
	| { kind: 'pitchingChange' }
	| { kind: 'pinchHitter' };

export interface TacticDefinition {
	id: TacticId;
	name: string;
	side: TacticSide;
	requirements: readonly Requirement[];
	valuation: TacticValuation;
}

export type Verdict = 'Recommended' | 'Consider' | 'Neutral' | 'Not recommended';

export interface Recommendation {
	tactic: TacticId;
	name: string;
	side: TacticSide;
	/** All requirements met for the current state */
	qualifies: boolean;
	/** Expected RE24 change for the deciding side; 0 when the tactic does not qualify */
	expectedDelta: number;
	/** Success probability used for branch tactics, null otherwise */
	successRate: number | null;
	/** Null when the tactic does not qualify */
	verdict: Verdict | null;
	reason?: string;
}

/**
 * What requirements are checked against.
 * Leverage is computed on first use.
 */
export interface RequirementContext {
	baseOut: BaseOutState;
	leverage: () => LeverageResult;
}
