/**
 * Ranker
 *
 * Runs the matcher over a candidate list, drops non-matches and orders the
 * rest by score. Equal scores keep their original order.
 */

import { fuzzyMatch } from './fuzzyMatch';
import type { MatchOptions, RankedCandidate } from './types';

/**
 * Sort order for ranked candidates: score descending, then original index.
 */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  return b.score - a.score || a.index - b.index;
}

/**
 * Scores a slice of candidates and keeps the matched ones, unsorted.
 *
 * @param offset - Index of `candidates[0]` in the full list
 */
export function scoreCandidates(
  query: string,
  candidates: readonly string[],
  options: MatchOptions = {},
  offset = 0
): RankedCandidate[] {
  const kept: RankedCandidate[] = [];

  candidates.forEach((candidate, k) => {
    const result = fuzzyMatch(query, candidate, options);
    if (result.matched) {
      kept.push({
        candidate,
        index: offset + k,
        score: result.score,
        positions: result.positions,
      });
    }
  });

  return kept;
}

/**
 * Ranks candidates and keeps their scores and positions.
 * An empty query returns every candidate in its original order, unscored.
 */
export function rankWithScores(
  query: string,
  candidates: readonly string[],
  options: MatchOptions = {}
): RankedCandidate[] {
  if (query.length === 0) {
    return candidates.map((candidate, index) => ({ candidate, index, score: 0, positions: [] }));
  }

  return scoreCandidates(query, candidates, options).sort(compareRanked);
}

/**
 * Ranks candidates against a query and returns the candidate strings.
 *
 * @example
 * rankCandidates('ap', ['apple pie', 'banana split', 'grape juice'])
 * // ['apple pie', 'grape juice', 'banana split']
 */
export function rankCandidates(
  query: string,
  candidates: readonly string[],
  options: MatchOptions = {}
): string[] {
  return rankWithScores(query, candidates, options).map((ranked) => ranked.candidate);
}

export default rankCandidates;
