/**
 * Type Definitions for the Fuzzy Matching Engine
 *
 * The engine is pure and deterministic: no I/O, no shared state.
 */

// ============================================
// OPTIONS
// ============================================

/**
 * How the consecutive bonus is decided for a matching cell (i, j).
 *
 * - `previous-characters`: pattern[i-1] equals candidate[j-1]
 * - `adjacent-run`: the position list carried by cell (i-1, j-1) ends at j-2
 */
export type ConsecutiveRule = 'previous-characters' | 'adjacent-run';

export interface MatchOptions {
  consecutiveRule?: ConsecutiveRule;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Outcome of matching one pattern against one candidate.
 * Unmatched results carry a zero score and no positions.
 */
export interface MatchResult {
  matched: boolean;
  score: number;
  /** Ascending character (grapheme cluster) indices into the original candidate */
  positions: number[];
}

/**
 * A candidate that survived filtering, with what it scored.
 */
export interface RankedCandidate {
  candidate: string;
  /** Position in the original candidate list (tie-break key) */
  index: number;
  score: number;
  positions: number[];
}

// ============================================
// INTERNAL TYPES
// ============================================

/**
 * Back-pointer stored per DP cell; replaces a position list per cell.
 */
export enum CellMove {
  /** Matched here, came from (i-1, j-1) and appended j-1 */
  MatchStart = 1,
  /** Matching cell that kept the row above: from (i-1, j) */
  GapFromAbove = 2,
  /** Mismatching cell: positions taken from (i, j-1) */
  GapFromLeft = 3,
}
