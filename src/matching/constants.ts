/**
 * Constants for the Fuzzy Matching Engine
 *
 * Every matched character earns MATCH_BONUS; starting a word and following
 * the previous pattern character earn extra. Skipped candidate characters
 * cost a gap penalty, so tight, word-aligned matches rank first.
 */

// ============================================
// SCORE CONFIGURATION
// ============================================

export const SCORE_CONFIG = {
  /** Awarded for every matched character */
  MATCH_BONUS: 16,
  /** Match at index 0 or right after a space */
  BOUNDARY_BONUS: 16,
  /** Previous pattern character equals previous candidate character */
  CONSECUTIVE_BONUS: 16,
  /** Skipping a pattern row (vertical move) */
  GAP_START_PENALTY: -3,
  /** Skipping a candidate character (horizontal move) */
  GAP_EXTEND_PENALTY: -1,
  /** Reserved for tuning. Not applied by any transition. */
  NON_CONTIGUOUS_PENALTY: -5,
} as const;

/**
 * Characters after which a match counts as a word boundary.
 */
export const BOUNDARY_CHARACTERS: ReadonlySet<string> = new Set([' ']);

/**
 * Default rule for the consecutive bonus.
 */
export const DEFAULT_CONSECUTIVE_RULE = 'previous-characters' as const;
