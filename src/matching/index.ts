/**
 * Fuzzy Matching Engine
 *
 * Pure, deterministic functions for scoring a query against candidate lines
 * and ranking a candidate list.
 *
 * Usage:
 * ```typescript
 * import { rankCandidates } from './matching';
 *
 * rankCandidates('readme', ['Readme.md', 'main.go', 'README']);
 * // ['README', 'Readme.md', 'main.go']
 * ```
 */

export { fuzzyMatch, foldCharacters } from './fuzzyMatch';
export { rankCandidates, rankWithScores, scoreCandidates, compareRanked } from './rankCandidates';

export { SCORE_CONFIG, BOUNDARY_CHARACTERS, DEFAULT_CONSECUTIVE_RULE } from './constants';

export { CellMove } from './types';
export type { ConsecutiveRule, MatchOptions, MatchResult, RankedCandidate } from './types';
