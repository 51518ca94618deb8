/**
 * Selection index rules shared by the session and the CLI.
 * `null` means nothing is selected, which is the only state for an empty list.
 */

/**
 * Keeps a selection valid after the list has been replaced.
 *
 * @example
 * clampSelection(3, 10)   // 3
 * clampSelection(3, 2)    // 0
 * clampSelection(null, 4) // 0
 * clampSelection(1, 0)    // null
 */
export function clampSelection(previous: number | null, length: number): number | null {
  if (length <= 0) {
    return null;
  }

  if (previous === null || previous < 0 || previous >= length) {
    return 0;
  }

  return previous;
}

/**
 * Moves a selection by `offset`, stopping at either end of the list.
 * A missing selection moves from -1, so an offset of 1 selects the first row.
 */
export function moveSelection(current: number | null, offset: number, length: number): number | null {
  if (length <= 0) {
    return null;
  }

  const next = (current ?? -1) + offset;
  return Math.min(Math.max(next, 0), length - 1);
}
