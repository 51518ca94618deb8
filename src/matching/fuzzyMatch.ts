/**
 * Fuzzy Matcher
 *
 * Scores how well a pattern occurs, in order and with gaps allowed, inside a
 * candidate line. Both strings are NFC-normalized, split into grapheme
 * clusters and case-folded one cluster at a time, so indices into the folded
 * text are character indices into the original candidate.
 *
 * The score table is kept as two rolling rows. Instead of a position list per
 * cell, each cell stores a back-pointer (see CellMove) and the positions of
 * the final cell are rebuilt with a single backtrack.
 */

import { BOUNDARY_CHARACTERS, DEFAULT_CONSECUTIVE_RULE, SCORE_CONFIG } from './constants';
import { CellMove } from './types';
import type { MatchOptions, MatchResult } from './types';

const unmatched = (): MatchResult => ({ matched: false, score: 0, positions: [] });

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Splits NFC-normalized text into grapheme clusters and lower-cases each one.
 *
 * @example
 * foldCharacters('Cafe\u0301') // ['c', 'a', 'f', 'é']
 */
export function foldCharacters(text: string): string[] {
  return Array.from(graphemes.segment(text.normalize('NFC')), ({ segment }) =>
    segment.toLowerCase()
  );
}

/**
 * Walks back-pointers from (rows, columns) to row 0 or column 0.
 */
function recoverPositions(moves: Uint8Array, rows: number, columns: number): number[] {
  const width = columns + 1;
  const positions: number[] = [];
  let i = rows;
  let j = columns;

  while (i > 0 && j > 0) {
    switch (moves[i * width + j]) {
      case CellMove.MatchStart:
        positions.push(j - 1);
        i -= 1;
        j -= 1;
        break;
      case CellMove.GapFromAbove:
        i -= 1;
        break;
      default:
        j -= 1;
    }
  }

  return positions.reverse();
}

/**
 * Matches a pattern against a candidate.
 *
 * @example
 * fuzzyMatch('fo', 'foo')  // { matched: true, score: 47, positions: [0, 2] }
 * fuzzyMatch('fo', 'xfoo') // { matched: true, score: 31, positions: [1, 3] }
 * fuzzyMatch('abc', 'ab')  // { matched: false, score: 0, positions: [] }
 */
export function fuzzyMatch(
  pattern: string,
  candidate: string,
  options: MatchOptions = {}
): MatchResult {
  const rule = options.consecutiveRule ?? DEFAULT_CONSECUTIVE_RULE;
  const p = foldCharacters(pattern);

  // Empty pattern matches everything
  if (p.length === 0) {
    return { matched: true, score: 0, positions: [] };
  }

  const c = foldCharacters(candidate);
  const rows = p.length;
  const columns = c.length;

  if (rows > columns) {
    return unmatched();
  }

  const width = columns + 1;
  let previous = new Int32Array(width);
  let current = new Int32Array(width);
  // Last position held by each cell's path, -1 when the path is empty
  let previousTail = new Int32Array(width).fill(-1);
  let currentTail = new Int32Array(width).fill(-1);
  const moves = new Uint8Array((rows + 1) * width);

  for (let i = 1; i <= rows; i++) {
    current[0] = 0;
    currentTail[0] = -1;

    for (let j = 1; j <= columns; j++) {
      const cell = i * width + j;

      if (p[i - 1] === c[j - 1]) {
        let bonus = SCORE_CONFIG.MATCH_BONUS;

        if (j === 1 || BOUNDARY_CHARACTERS.has(c[j - 2])) {
          bonus += SCORE_CONFIG.BOUNDARY_BONUS;
        }

        const consecutive =
          i > 1 &&
          j > 1 &&
          (rule === 'adjacent-run' ? previousTail[j - 1] === j - 2 : p[i - 2] === c[j - 2]);
        if (consecutive) {
          bonus += SCORE_CONFIG.CONSECUTIVE_BONUS;
        }

        const startScore = previous[j - 1] + bonus;
        const gapScore = previous[j] + SCORE_CONFIG.GAP_START_PENALTY;

        if (startScore > gapScore) {
          current[j] = startScore;
          currentTail[j] = j - 1;
          moves[cell] = CellMove.MatchStart;
        } else {
          current[j] = gapScore;
          currentTail[j] = previousTail[j];
          moves[cell] = CellMove.GapFromAbove;
        }
      } else {
        // Positions always come from the left here, whichever term wins
        current[j] = Math.max(
          current[j - 1] + SCORE_CONFIG.GAP_EXTEND_PENALTY,
          previous[j] + SCORE_CONFIG.GAP_START_PENALTY
        );
        currentTail[j] = currentTail[j - 1];
        moves[cell] = CellMove.GapFromLeft;
      }
    }

    [previous, current] = [current, previous];
    [previousTail, currentTail] = [currentTail, previousTail];
  }

  const finalScore = previous[columns];
  if (finalScore <= 0) {
    return unmatched();
  }

  return {
    matched: true,
    score: finalScore,
    positions: recoverPositions(moves, rows, columns),
  };
}

export default fuzzyMatch;
